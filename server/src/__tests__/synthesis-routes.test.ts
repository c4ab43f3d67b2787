import { describe, it, expect, vi } from 'vitest';
import { Hono } from 'hono';
import { app } from '../index.js';
import { requestIdMiddleware } from '../middleware/request-id.js';
import { createSynthesisRoutes } from '../routes/synthesis.js';
import { FALLBACK_EXECUTIVE_SUMMARY } from '../synthesis/engine.js';
import type { ThemeTagger } from '../synthesis/theme-tagging.js';
import { makeEngine, makeWorkedExample } from './helpers/synthesis-fixtures.js';

function createApp(themeTagger: ThemeTagger | null = null) {
  const testApp = new Hono();
  testApp.use('*', requestIdMiddleware);
  testApp.route('/api/synthesis', createSynthesisRoutes({ engine: makeEngine(), themeTagger }));
  return testApp;
}

function post(target: Hono, path: string, body: unknown) {
  return target.request(`http://test${path}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
}

function workedBody() {
  const { selfResponses, advisorResponses } = makeWorkedExample();
  return { sessionId: 'session-1', selfResponses, advisorResponses };
}

describe('POST /api/synthesis', () => {
  it('returns the synthesis for a valid request', async () => {
    const res = await post(createApp(), '/api/synthesis', workedBody());

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      degraded: false,
      synthesis: {
        id: 'synthesis-1',
        sessionId: 'session-1',
        alignmentAreas: [{ id: 'strength_leadership' }],
        confidenceLevel: 'medium',
        metadata: { degradedCollaborators: [] },
      },
    });
  });

  it('rejects a body that fails validation', async () => {
    const res = await post(createApp(), '/api/synthesis', { sessionId: '', selfResponses: [], advisorResponses: [] });

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      error: 'Invalid request',
      code: 'validation',
      details: [{ path: ['sessionId'] }],
    });
  });

  it('rejects malformed JSON', async () => {
    const res = await createApp().request('http://test/api/synthesis', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"sessionId":',
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Invalid JSON body' });
  });

  it('rejects non-JSON content types', async () => {
    const res = await createApp().request('http://test/api/synthesis', {
      method: 'POST',
      headers: { 'Content-Type': 'text/plain' },
      body: 'hello',
    });
    expect(res.status).toBe(415);
    expect(await res.json()).toEqual({ error: 'Unsupported content type. Use application/json.' });
  });

  it('serves the fallback synthesis with its error when inputs are empty', async () => {
    const res = await post(createApp(), '/api/synthesis', { ...workedBody(), selfResponses: [] });

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      degraded: true,
      error: { code: 'validation', message: 'Both self and advisor responses are required' },
      synthesis: { executiveSummary: FALLBACK_EXECUTIVE_SUMMARY, alignmentScore: 0.5, confidenceLevel: 'low' },
    });
  });
});

describe('POST /api/synthesis/experiments', () => {
  it('returns the micro-experiments', async () => {
    const res = await post(createApp(), '/api/synthesis/experiments', workedBody());
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ experiments: [{ id: 'experiment_blind_spot_mentoring' }] });
  });

  it('honours max', async () => {
    const res = await post(createApp(), '/api/synthesis/experiments', { ...workedBody(), max: 0 });
    expect(await res.json()).toEqual({ experiments: [] });
  });

  it('returns no experiments for a fallback run', async () => {
    const res = await post(createApp(), '/api/synthesis/experiments', { ...workedBody(), advisorResponses: [] });
    expect(await res.json()).toEqual({ experiments: [] });
  });
});

describe('POST /api/synthesis/themes', () => {
  it('uses the keyword scan without a collaborator', async () => {
    const res = await post(createApp(), '/api/synthesis/themes', { answer: 'I coordinate release planning.' });
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ themes: ['leadership'], source: 'keyword' });
  });

  it('uses the collaborator when one is configured', async () => {
    const extractThemes = vi.fn(async () => ['release_management']);
    const res = await post(createApp({ extractThemes }), '/api/synthesis/themes', {
      question: 'What do you do?',
      answer: 'I coordinate release planning.',
    });

    expect(await res.json()).toEqual({ themes: ['release_management'], source: 'collaborator' });
    expect(extractThemes).toHaveBeenCalledWith('What do you do?', 'I coordinate release planning.', expect.any(AbortSignal));
  });

  it('falls back to keywords when the collaborator fails', async () => {
    const tagger: ThemeTagger = {
      extractThemes: async () => {
        throw new Error('invalid api key');
      },
    };
    const res = await post(createApp(tagger), '/api/synthesis/themes', { answer: 'I coordinate release planning.' });
    expect(await res.json()).toEqual({ themes: ['leadership'], source: 'keyword' });
  });

  it('requires an answer', async () => {
    const res = await post(createApp(), '/api/synthesis/themes', { question: 'q' });
    expect(res.status).toBe(400);
  });
});

describe('server app', () => {
  it('reports health', async () => {
    const res = await app.request('http://test/health');
    expect(res.status).toBe(200);
    expect(res.headers.get('Cache-Control')).toBe('no-store');
    expect(await res.json()).toMatchObject({ status: 'ok', shutting_down: false, llm_collaborators: false });
  });

  it('answers unknown paths with a JSON 404 and a request id', async () => {
    const res = await app.request('http://test/nope', { headers: { 'X-Request-ID': 'req-404' } });
    expect(res.status).toBe(404);
    expect(res.headers.get('X-Request-ID')).toBe('req-404');
    expect(await res.json()).toEqual({ error: 'Not found' });
  });

  it('mounts the synthesis routes', async () => {
    const res = await post(app, '/api/synthesis/themes', { answer: 'I love solving problems.' });
    expect(await res.json()).toEqual({ themes: ['problem_solving', 'passion'], source: 'keyword' });
  });

  it('exposes runtime metrics outside production', async () => {
    const res = await app.request('http://test/metrics');
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ shutting_down: false, http_runtime: { latency: { count: expect.any(Number) } } });
  });
});
