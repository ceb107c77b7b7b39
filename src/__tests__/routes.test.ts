import { describe, it, expect, vi } from 'vitest';
import { createApp } from '../app.js';
import type { OutputBundle } from '../lib/output-manager.js';
import { ANALYZER_MARKER, GOOD_REFLECTION, REFLECTOR_MARKER, makeAnalysis, routedModel } from './helpers.js';

function testApp() {
  const model = routedModel([[ANALYZER_MARKER, JSON.stringify(makeAnalysis())], [REFLECTOR_MARKER, GOOD_REFLECTION]]);
  const packager = { save: vi.fn(async (_bundle: OutputBundle) => '/tmp/out') };
  return { app: createApp({ model, packager }), packager };
}

function postGenerate(app: ReturnType<typeof createApp>, body: string) {
  return app.request('/api/generate', {
    method: 'POST',
    headers: { 'content-type': 'application/json' },
    body,
  });
}

const VALID_CONFIG = {
  provider: 'openai',
  api_key: 'test-key',
  enabled_apps: ['contacts'],
  data_volume: { contacts: 2 },
  start_date: '2024-01-01',
  end_date: '2024-05-31',
  seed: 7,
};

describe('GET /health', () => {
  it('reports ok and echoes a request id', async () => {
    const { app } = testApp();
    const res = await app.request('/health', { headers: { 'X-Request-ID': 'req-123' } });

    expect(res.status).toBe(200);
    expect(res.headers.get('X-Request-ID')).toBe('req-123');
    expect(await res.json()).toEqual({ status: 'ok' });
  });
});

describe('GET /api/apps', () => {
  it('lists registered generators with their data keys', async () => {
    const { app } = testApp();
    const res = await app.request('/api/apps');
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body).toHaveProperty('apps.length', 8);
    expect(body).toMatchObject({ apps: expect.arrayContaining([{ app_name: 'calendar', data_key: 'events' }]) });
  });
});

describe('POST /api/generate', () => {
  it('rejects a request that fails schema checks', async () => {
    const { app } = testApp();
    const res = await postGenerate(app, JSON.stringify({ user_profile: {}, events: ['Trip'] }));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: 'Invalid request',
      issues: ['user_profile: user_profile cannot be empty'],
    });
  });

  it('rejects malformed JSON', async () => {
    const { app } = testApp();
    const res = await postGenerate(app, '{"user_profile":');

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Invalid JSON body' });
  });

  it('rejects a non-JSON content type', async () => {
    const { app } = testApp();
    const res = await app.request('/api/generate', {
      method: 'POST',
      headers: { 'content-type': 'text/plain' },
      body: 'hello',
    });

    expect(res.status).toBe(415);
  });

  it('reports configuration issues', async () => {
    const { app, packager } = testApp();
    const res = await postGenerate(app, JSON.stringify({
      user_profile: { occupation: 'Baker' },
      events: ['Bakery expansion'],
      config: { api_key: 'test-key', enabled_apps: ['fax'] },
    }));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: 'Invalid configuration',
      issues: ['Invalid apps specified: fax'],
    });
    expect(packager.save).not.toHaveBeenCalled();
  });

  it('runs the workflow and returns the result', async () => {
    const { app, packager } = testApp();
    const res = await postGenerate(app, JSON.stringify({
      user_profile: { occupation: 'Baker', age: 45 },
      events: ['Bakery expansion'],
      config: VALID_CONFIG,
    }));
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body).toMatchObject({ success: true, output_path: '/tmp/out', errors: [] });
    expect(body).toHaveProperty('generated_data.contacts.contacts.length', 2);
    expect(body).toHaveProperty('validation_results.contacts.is_valid', true);
    expect(packager.save).toHaveBeenCalledTimes(1);
  });
});

describe('unknown routes', () => {
  it('returns a JSON 404', async () => {
    const { app } = testApp();
    const res = await app.request('/api/nothing');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Not found' });
  });
});
