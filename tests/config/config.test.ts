import { loadConfig } from '../../config/config';
import { ConfigError } from '../../core/errors';

const required = {
  AGENT_ID: 'agent-1',
  BACKEND_URL: 'http://localhost:8080',
  FEED_URL: 'ws://localhost:8081/feed'
};

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig(required)).toEqual({
      agentId: 'agent-1',
      backendUrl: 'http://localhost:8080',
      feedUrl: 'ws://localhost:8081/feed',
      backendTimeoutMs: 30_000,
      sleepIfIdleMs: 10_000,
      unhandledToolPolicy: 'shutdown',
      externalTools: [],
      budgetCeiling: 100,
      budgetSoftRatio: 0.5,
      controlScriptTimeoutMs: 250,
      subchatDeadlineMs: 3_600_000,
      nodeEnv: 'development'
    });
  });

  it('reads overrides', () => {
    const config = loadConfig({
      ...required,
      BACKEND_TOKEN: 'test-secret',
      SLEEP_IF_IDLE_MS: '0',
      UNHANDLED_TOOL_POLICY: 'leave-pending',
      EXTERNAL_TOOLS: ' browser, ,search ',
      BUDGET_CEILING: '2.5',
      CONTROL_SCRIPTS_DIR: './control',
      OPS_PORT: '9090',
      LOG_LEVEL: 'warn'
    });

    expect(config).toMatchObject({
      backendToken: 'test-secret',
      sleepIfIdleMs: 0,
      unhandledToolPolicy: 'leave-pending',
      externalTools: ['browser', 'search'],
      budgetCeiling: 2.5,
      controlScriptsDir: './control',
      opsPort: 9090,
      logLevel: 'warn'
    });
  });

  it('treats empty strings as unset', () => {
    expect(loadConfig({ ...required, BACKEND_TOKEN: '', BUDGET_CEILING: '' })).toMatchObject({
      backendToken: undefined,
      budgetCeiling: 100
    });
  });

  it('lists every problem in one ConfigError', () => {
    let caught: unknown;
    try {
      loadConfig({ BACKEND_URL: 'http://localhost:8080', FEED_URL: 'http://localhost:8081' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught instanceof ConfigError && caught.issues).toEqual([
      'AGENT_ID: Required',
      'FEED_URL: FEED_URL must use ws:// or wss://'
    ]);
  });

  it('rejects an unknown unhandled-tool policy', () => {
    expect(() => loadConfig({ ...required, UNHANDLED_TOOL_POLICY: 'sometimes' })).toThrow(/^Invalid configuration: UNHANDLED_TOOL_POLICY: /);
  });

  it('rejects a soft ratio outside (0, 1]', () => {
    expect(() => loadConfig({ ...required, BUDGET_SOFT_RATIO: '0' })).toThrow(ConfigError);
  });
});
