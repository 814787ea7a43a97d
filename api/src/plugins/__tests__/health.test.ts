import { afterEach, describe, expect, it } from 'vitest';
import { GitHubAPIError } from '../../types/github.js';
import { account } from '../../services/__tests__/fakeSource.js';
import { createTestApp, type TestApp } from './helpers.js';

const data = { account: account('acme'), repositories: [] };

describe('health routes', () => {
  let app: TestApp;

  afterEach(async () => {
    await app.close();
  });

  it('reports GitHub as healthy when the quota can be read', async () => {
    app = await createTestApp(data);

    const response = await app.server.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ status: 'healthy', services: { github: 'healthy' } });
    expect(app.source.callsTo('rateLimit.get')).toHaveLength(1);
  });

  it('answers the liveness probe', async () => {
    app = await createTestApp(data);

    const response = await app.server.inject({ method: 'GET', url: '/health/live' });

    expect(response.statusCode).toBe(200);
    expect(response.json().status).toBe('alive');
  });

  it('stops being ready once the pools are shut down', async () => {
    app = await createTestApp(data);

    const ready = await app.server.inject({ method: 'GET', url: '/health/ready' });
    await app.service.pools.shutdown();
    const draining = await app.server.inject({ method: 'GET', url: '/health/ready' });

    expect(ready.statusCode).toBe(200);
    expect(draining.statusCode).toBe(503);
    expect(draining.json()).toMatchObject({ status: 'not_ready', error: 'Work pools are shut down' });
  });

  it('includes engine counters and the GitHub quota in the detailed check', async () => {
    app = await createTestApp(data, { GOVERNOR_LIMIT: '6' });

    const response = await app.server.inject({ method: 'GET', url: '/health/detailed' });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body.status).toBe('healthy');
    expect(body.environment).toBe('test');
    expect(body.engine.governor).toMatchObject({ limit: 6, inFlight: 0 });
    expect(body.engine.pools.map((pool: { name: string }) => pool.name)).toEqual([
      'repository',
      'pull-request',
      'sub-resource',
    ]);
    expect(body.rateLimit).toEqual({ limit: 5000, remaining: 4999, used: 1, reset: '2026-01-05T11:00:00.000Z' });
  });

  it('closes the GitHub source when the server closes', async () => {
    app = await createTestApp(data);

    await app.close();

    expect(app.source.closed).toBe(true);
    await expect(app.service.rateLimit()).rejects.toBeInstanceOf(GitHubAPIError);
  });

  it('answers unknown routes with a JSON 404', async () => {
    app = await createTestApp(data);

    const response = await app.server.inject({ method: 'GET', url: '/metrics/unknown' });

    expect(response.statusCode).toBe(404);
    const body = response.json();
    expect(body).toMatchObject({ error: 'Not Found', message: 'Cannot GET /metrics/unknown', statusCode: 404 });
    expect(Object.keys(body).sort()).toEqual(['error', 'message', 'statusCode', 'timestamp']);
    expect(new Date(body.timestamp).toISOString()).toBe(body.timestamp);
  });

  it('sends request errors in the same shape, without a stack outside development', async () => {
    app = await createTestApp(data);

    const response = await app.server.inject({
      method: 'POST',
      url: '/api/v1/reviews',
      headers: { 'content-type': 'application/json' },
      payload: '{"organization":',
    });

    expect(response.statusCode).toBe(400);
    const body = response.json();
    expect(body.statusCode).toBe(400);
    expect(Object.keys(body).sort()).toEqual(['error', 'message', 'statusCode', 'timestamp']);
  });
});
