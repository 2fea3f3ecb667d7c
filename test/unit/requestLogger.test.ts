import { describe, it, expect, vi, afterEach } from 'vitest';
import { Hono } from 'hono';
import { requestLoggerMiddleware } from '../../src/middleware/requestLogger.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('requestLoggerMiddleware', () => {
  it('logs one JSON line per request', async () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const app = new Hono();
    app.use('*', requestLoggerMiddleware);
    app.get('/ping', (c) => c.text('pong', 201));

    await app.request('/ping?x=1');

    expect(logSpy).toHaveBeenCalledTimes(1);
    const [label, line] = logSpy.mock.calls[0] ?? [];
    expect(label).toBe('Request:');
    const entry: unknown = JSON.parse(String(line));
    expect(entry).toMatchObject({ method: 'GET', path: '/ping', status: 201 });
  });
});
