import type { RuntimeStatus } from '../../runtime/types';
import { buildOpsServer, type StatusProvider } from '../../server/server';

const status: RuntimeStatus = {
  running: true,
  parkDepth: 2,
  pendingToolCalls: 1,
  openSubchatGroups: 1,
  blockedConversations: ['c2'],
  deferredTurns: ['c2'],
  dispatch: { dispatched: 5, failed: 1, dropped: 0 }
};

const provider: StatusProvider = { status: () => status };

describe('Ops server', () => {
  it('responds to health checks', async () => {
    const server = buildOpsServer(provider);

    const response = await server.inject({ method: 'GET', url: '/health' });
    expect(response.statusCode).toBe(200);
    expect(JSON.parse(response.payload)).toEqual({ status: 'ok' });

    await server.close();
  });

  it('reports runtime status', async () => {
    const server = buildOpsServer(provider);

    const response = await server.inject({ method: 'GET', url: '/status' });
    expect(response.statusCode).toBe(200);
    expect(JSON.parse(response.payload)).toEqual(status);

    await server.close();
  });

  it('reads status on every request', async () => {
    let depth = 0;
    const server = buildOpsServer({ status: () => ({ ...status, parkDepth: depth }) });

    depth = 7;
    const response = await server.inject({ method: 'GET', url: '/status' });
    expect(JSON.parse(response.payload).parkDepth).toBe(7);

    await server.close();
  });

  it('exposes no write routes', async () => {
    const server = buildOpsServer(provider);

    const response = await server.inject({ method: 'POST', url: '/status' });
    expect(response.statusCode).toBe(404);

    await server.close();
  });
});
