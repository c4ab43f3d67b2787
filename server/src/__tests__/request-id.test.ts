import { describe, it, expect } from 'vitest';
import { Hono } from 'hono';
import { requestIdMiddleware } from '../middleware/request-id.js';

function createApp() {
  const app = new Hono();
  app.use('*', requestIdMiddleware);
  app.get('/id', (c) => c.json({
    requestId: c.get('requestId'),
    loggerBinding: c.get('logger').bindings().requestId,
  }));
  return app;
}

describe('requestIdMiddleware', () => {
  it('echoes a valid caller-provided request id', async () => {
    const res = await createApp().request('http://test/id', {
      headers: { 'X-Request-ID': 'req-123_ABC' },
    });
    expect(res.status).toBe(200);
    expect(res.headers.get('X-Request-ID')).toBe('req-123_ABC');
    expect(await res.json()).toEqual({ requestId: 'req-123_ABC', loggerBinding: 'req-123_ABC' });
  });

  it('mints an id when the header has unsafe characters', async () => {
    const res = await createApp().request('http://test/id', {
      headers: { 'X-Request-ID': 'bad id' },
    });
    const echoed = res.headers.get('X-Request-ID') ?? '';
    expect(echoed).not.toBe('bad id');
    expect(echoed).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('caps long request ids at 64 characters', async () => {
    const res = await createApp().request('http://test/id', {
      headers: { 'X-Request-ID': 'a'.repeat(200) },
    });
    expect(res.headers.get('X-Request-ID')).toBe('a'.repeat(64));
  });
});
