import { parseFeedRecord } from '../../events/feed-record';

describe('parseFeedRecord', () => {
  it('normalizes a tool invocation record', () => {
    const result = parseFeedRecord(
      {
        kind: 'tool_invocation',
        conversation_id: 'c1',
        sequence_marker: 3,
        payload: { invocation_id: 'tc-1', tool_name: 'search', arguments: '{"q":"weather"}' }
      },
      1000
    );

    expect(result).toEqual({
      ok: true,
      event: {
        kind: 'tool_invocation',
        conversationId: 'c1',
        sequence: 3,
        receivedAt: 1000,
        payload: { invocationId: 'tc-1', toolName: 'search', arguments: '{"q":"weather"}', createdAt: 1000 }
      }
    });
  });

  it('keeps the creation time and confirmation flag when present', () => {
    const result = parseFeedRecord(
      {
        kind: 'tool_invocation',
        conversation_id: 'c1',
        sequence_marker: 4,
        payload: { invocation_id: 'tc-1', tool_name: 'deploy', created_at: 900, confirmed_by_human: true }
      },
      1000
    );

    expect(result.ok && result.event.kind === 'tool_invocation' ? result.event.payload : undefined).toEqual({
      invocationId: 'tc-1',
      toolName: 'deploy',
      arguments: '{}',
      createdAt: 900,
      confirmedByHuman: true
    });
  });

  it('defaults a budget reset to the reset mode', () => {
    const result = parseFeedRecord({ kind: 'budget_reset', conversation_id: 'c1', sequence_marker: 1 }, 0);
    expect(result.ok && result.event.payload).toEqual({ mode: 'reset' });
  });

  it('carries the placeholder flag of a posted result', () => {
    const result = parseFeedRecord(
      { kind: 'tool_result_posted', conversation_id: 'c1', sequence_marker: 2, payload: { invocation_id: 'tc-1', as_placeholder: true } },
      0
    );
    expect(result.ok && result.event.payload).toEqual({ invocationId: 'tc-1', placeholder: true });
  });

  it('maps the control profile of a conversation update', () => {
    const result = parseFeedRecord(
      { kind: 'conversation_updated', conversation_id: 'c1', sequence_marker: 2, payload: { control_profile: 'research' } },
      0
    );
    expect(result.ok && result.event.payload).toEqual({ controlProfile: 'research' });
  });

  it('rejects unknown kinds', () => {
    expect(parseFeedRecord({ kind: 'mystery', conversation_id: 'c1', sequence_marker: 1 }, 0)).toEqual({
      ok: false,
      reason: 'unknown event kind mystery'
    });
  });

  it('rejects records without a conversation id', () => {
    const result = parseFeedRecord({ kind: 'generation_requested', sequence_marker: 1 }, 0);
    expect(result.ok).toBe(false);
  });

  it('rejects a message with an unknown role', () => {
    const result = parseFeedRecord(
      { kind: 'message_appended', conversation_id: 'c1', sequence_marker: 1, payload: { message_id: 'm1', role: 'robot', content: 'hi' } },
      0
    );
    expect(result.ok).toBe(false);
  });

  it('rejects negative sequence markers', () => {
    const result = parseFeedRecord({ kind: 'generation_requested', conversation_id: 'c1', sequence_marker: -1 }, 0);
    expect(result.ok).toBe(false);
  });
});
