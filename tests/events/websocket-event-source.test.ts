import type { AddressInfo } from 'net';
import type { IncomingHttpHeaders } from 'http';
import WebSocket, { WebSocketServer } from 'ws';
import type { RuntimeEvent } from '../../core/contracts/events';
import { parseFeedFrame, WebSocketEventSource } from '../../events/websocket-event-source';

describe('parseFeedFrame', () => {
  it('decodes a text frame', () => {
    const frame = JSON.stringify({ kind: 'generation_requested', conversation_id: 'c1', sequence_marker: 7 });
    expect(parseFeedFrame(frame, 50)).toEqual({
      ok: true,
      event: { kind: 'generation_requested', conversationId: 'c1', sequence: 7, receivedAt: 50, payload: {} }
    });
  });

  it('decodes a binary frame', () => {
    const frame = Buffer.from(JSON.stringify({ kind: 'generation_requested', conversation_id: 'c2', sequence_marker: 1 }));
    const result = parseFeedFrame(frame, 0);
    expect(result.ok && result.event.conversationId).toBe('c2');
  });

  it('rejects frames that are not JSON', () => {
    expect(parseFeedFrame('not json', 0)).toEqual({ ok: false, reason: 'frame is not valid JSON' });
  });
});

describe('WebSocketEventSource', () => {
  let server: WebSocketServer;
  let url: string;

  beforeEach(async () => {
    server = new WebSocketServer({ port: 0, host: '127.0.0.1' });
    await new Promise<void>((resolve) => server.once('listening', () => resolve()));
    const address: AddressInfo | string = server.address();
    url = typeof address === 'string' ? address : `ws://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    for (const client of server.clients) {
      client.terminate();
    }
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it('sends a hello frame, forwards valid records and drops malformed ones', async () => {
    const hello = new Promise<{ message: unknown; headers: IncomingHttpHeaders; socket: WebSocket }>((resolve) => {
      server.on('connection', (socket, request) => {
        socket.once('message', (data) => {
          resolve({ message: JSON.parse(data.toString()), headers: request.headers, socket });
        });
      });
    });

    const source = new WebSocketEventSource({ url, agentId: 'agent-1', token: 'test-secret' });
    const received: RuntimeEvent[] = [];
    let onDelivered: () => void = () => undefined;
    const delivered = new Promise<void>((resolve) => {
      onDelivered = resolve;
    });
    const subscription = source.subscribe({
      onEvent: (event) => {
        received.push(event);
        onDelivered();
      }
    });

    const { message, headers, socket } = await hello;
    expect(message).toEqual({ type: 'hello', agent_id: 'agent-1' });
    expect(headers.authorization).toBe('Bearer test-secret');

    socket.send('{"kind":"mystery","conversation_id":"c1","sequence_marker":1}');
    socket.send(JSON.stringify({ kind: 'generation_requested', conversation_id: 'c1', sequence_marker: 2 }));
    await delivered;

    expect(received.map((event) => `${event.kind}@${event.conversationId}#${event.sequence}`)).toEqual([
      'generation_requested@c1#2'
    ]);
    await subscription.close();
  });
});
