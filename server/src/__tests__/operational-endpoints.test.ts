import { describe, it, expect } from 'vitest';
import { createApp } from '../index.js';
import { loadConfig } from '../lib/config.js';
import { resolveRequestId } from '../middleware/request-id.js';
import { createServices } from '../services.js';
import { StaticProfileSource, scriptedEngine } from './fixtures.js';

function appFor(env: Record<string, string>) {
  const services = createServices(loadConfig({ STORE_BACKEND: 'memory', INGESTION_SCHEDULER_ENABLED: 'false', ...env }), {
    source: new StaticProfileSource({}),
    engine: scriptedEngine([]).engine,
  });
  return createApp(services);
}

describe('operational endpoints', () => {
  it('returns no-store and security headers on /health', async () => {
    const app = appFor({ OPENAI_API_KEY: 'test-openai' });
    const res = await app.request('http://test/health');
    expect(res.status).toBe(200);
    expect(res.headers.get('cache-control')).toBe('no-store');
    expect(res.headers.get('x-content-type-options')).toBe('nosniff');
    expect(res.headers.get('x-frame-options')).toBe('DENY');
    expect(await res.json()).toMatchObject({
      status: 'ok',
      store: 'memory',
      store_ok: true,
      llm_provider: 'openai',
      llm_key_ok: true,
      tasks: { pending: 0, running: 0, completed: 0, failed: 0 },
      scheduler: { running: false, enabled: false },
    });
  });

  it('reports degraded health without engine credentials', async () => {
    const res = await appFor({}).request('http://test/health');
    expect(await res.json()).toMatchObject({ status: 'degraded', llm_key_ok: false });
  });

  it('describes the service at the root', async () => {
    const res = await appFor({}).request('http://test/');
    expect(await res.json()).toMatchObject({
      supported_platforms: ['instagram', 'linkedin', 'facebook'],
      endpoints: { task_status: 'GET /api/tasks/:taskId' },
    });
  });

  it('echoes a well-formed request id and replaces a malformed one', async () => {
    const app = appFor({});
    const echoed = await app.request('http://test/health', { headers: { 'X-Request-ID': 'req-123' } });
    expect(echoed.headers.get('x-request-id')).toBe('req-123');

    const replaced = await app.request('http://test/health', { headers: { 'X-Request-ID': 'bad id <script>' } });
    expect(replaced.headers.get('x-request-id')).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('returns JSON 404 for unknown paths', async () => {
    const res = await appFor({}).request('http://test/api/unknown');
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Not found' });
  });
});

describe('resolveRequestId', () => {
  it('truncates long ids to 64 characters', () => {
    expect(resolveRequestId('a'.repeat(80))).toBe('a'.repeat(64));
  });
});
