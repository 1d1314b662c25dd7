import { describe, expect, it, vi } from 'vitest';
import { MonitorClient } from '../src/client.js';

const createFetch = (handlers: Record<string, (init?: RequestInit) => Promise<Response>>) => {
  return vi.fn(async (url: string | URL | Request, init?: RequestInit) => {
    const key = `${init?.method ?? 'GET'} ${url.toString()}`;
    const handler = handlers[key];
    if (!handler) {
      throw new Error(`No handler for ${key}`);
    }
    return handler(init);
  });
};

const json = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

describe('MonitorClient', () => {
  it('reads the health endpoint', async () => {
    const fetchMock = createFetch({
      'GET http://edge.test/health': async () => json({ status: 'ok', state: 'RUNNING', source: '/dev/video0' }),
    });

    const client = new MonitorClient({ baseUrl: 'http://edge.test/', fetchImpl: fetchMock });
    const health = await client.getHealth();

    expect(health.state).toBe('RUNNING');
    expect(fetchMock).toHaveBeenCalledWith('http://edge.test/health', expect.any(Object));
  });

  it('returns the current alert', async () => {
    const fetchMock = createFetch({
      'GET http://edge.test/alert': async () =>
        json({
          level: 'DANGER',
          type: 'fall',
          message: 'Person on the floor',
          confidence: 0.9,
          updatedAt: '2024-01-01T00:00:00.000Z',
          sourceFrameSeq: 42,
        }),
    });

    const client = new MonitorClient({ baseUrl: 'http://edge.test', fetchImpl: fetchMock });
    const alert = await client.getAlert();

    expect(alert.level).toBe('DANGER');
    expect(alert.sourceFrameSeq).toBe(42);
  });

  it('sends default headers with stats requests', async () => {
    const fetchMock = createFetch({
      'GET http://edge.test/stats': async () => json({ frames: 10, uploadsSubmitted: 2 }),
    });

    const client = new MonitorClient({
      baseUrl: 'http://edge.test',
      fetchImpl: fetchMock,
      headers: { 'X-Operator': 'desk-1' },
    });
    const stats = await client.getStats();

    expect(stats.frames).toBe(10);
    expect(fetchMock).toHaveBeenCalledWith('http://edge.test/stats', {
      method: 'GET',
      headers: { 'X-Operator': 'desk-1' },
    });
  });

  it('posts the stop reason', async () => {
    let sent: string | undefined;
    const fetchMock = createFetch({
      'POST http://edge.test/stop': async (init) => {
        sent = typeof init?.body === 'string' ? init.body : undefined;
        return json({ state: 'STOPPED', reason: 'maintenance' }, 202);
      },
    });

    const client = new MonitorClient({ baseUrl: 'http://edge.test', fetchImpl: fetchMock });
    const result = await client.stop('maintenance');

    expect(sent).toBe('{"reason":"maintenance"}');
    expect(result.state).toBe('STOPPED');
  });

  it('includes the error body when a request fails', async () => {
    const fetchMock = createFetch({
      'POST http://edge.test/stop': async () => new Response('reason must be a string', { status: 400 }),
    });

    const client = new MonitorClient({ baseUrl: 'http://edge.test', fetchImpl: fetchMock });
    await expect(client.stop()).rejects.toThrow('Stop request failed with 400: reason must be a string');
  });

  it('rejects payloads of the wrong shape', async () => {
    const fetchMock = createFetch({
      'GET http://edge.test/alert': async () => json({ unexpected: true }),
    });

    const client = new MonitorClient({ baseUrl: 'http://edge.test', fetchImpl: fetchMock });
    await expect(client.getAlert()).rejects.toThrow('Unexpected alert response: {"unexpected":true}');
  });
});
