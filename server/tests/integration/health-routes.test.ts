/**
 * Integration Tests: Health Endpoints
 * /health, HEAD / and /live over the Express app
 */

import { describe, it, expect, vi } from 'vitest';
import request from 'supertest';
import { createApp } from '../../http/server';
import { HealthRegistry } from '../../health/registry';
import { silentLogger } from '../helpers';

function buildRegistry(brokerUp: boolean) {
  const registry = new HealthRegistry();
  registry.addLivenessCheck('goroutine-threshold', vi.fn().mockResolvedValue(undefined));
  registry.addReadinessCheck('S3-backend-http', vi.fn().mockResolvedValue(undefined));
  registry.addReadinessCheck(
    'broker-tcp',
    brokerUp
      ? vi.fn().mockResolvedValue(undefined)
      : vi.fn().mockRejectedValue(new Error('connect ECONNREFUSED 127.0.0.1:5672'))
  );
  registry.addReadinessCheck('database', vi.fn().mockResolvedValue(undefined));
  return registry;
}

describe('GET /health', () => {
  it('should answer 200 when every dependency is healthy', async () => {
    const res = await request(createApp(buildRegistry(true), silentLogger)).get('/health');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      status: 'ready',
      checks: {
        'goroutine-threshold': { ok: true },
        'S3-backend-http': { ok: true },
        'broker-tcp': { ok: true },
        database: { ok: true }
      }
    });
  });

  it('should answer 503 naming the failing check', async () => {
    const res = await request(createApp(buildRegistry(false), silentLogger)).get('/health');

    expect(res.status).toBe(503);
    expect(res.body.status).toBe('not_ready');
    expect(res.body.checks['broker-tcp']).toEqual({ ok: false, detail: 'connect ECONNREFUSED 127.0.0.1:5672' });
    expect(res.body.checks.database).toEqual({ ok: true });
  });

  it('should refuse methods other than GET', async () => {
    const app = createApp(buildRegistry(true), silentLogger);

    const post = await request(app).post('/health');
    expect(post.status).toBe(405);
    expect(post.headers.allow).toBe('GET');

    const head = await request(app).head('/health');
    expect(head.status).toBe(405);
  });

  it('should echo the correlation id', async () => {
    const res = await request(createApp(buildRegistry(true), silentLogger))
      .get('/health')
      .set('x-correlation-id', 'probe-42');

    expect(res.headers['x-correlation-id']).toBe('probe-42');
  });
});

describe('HEAD /', () => {
  it('should match GET /health when healthy', async () => {
    const app = createApp(buildRegistry(true), silentLogger);

    const head = await request(app).head('/');
    const get = await request(app).get('/health');

    expect(head.status).toBe(200);
    expect(head.status).toBe(get.status);
  });

  it('should match GET /health when a dependency is down', async () => {
    const app = createApp(buildRegistry(false), silentLogger);

    const head = await request(app).head('/');
    const get = await request(app).get('/health');

    expect(head.status).toBe(503);
    expect(head.status).toBe(get.status);
  });

  it('should not evaluate health for other methods', async () => {
    const registry = buildRegistry(true);
    const ready = vi.spyOn(registry, 'ready');
    const app = createApp(registry, silentLogger);

    expect((await request(app).get('/')).status).toBe(404);
    expect((await request(app).post('/')).status).toBe(404);
    expect(ready).not.toHaveBeenCalled();
  });
});

describe('GET /live', () => {
  it('should only consider liveness checks', async () => {
    const res = await request(createApp(buildRegistry(false), silentLogger)).get('/live');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: 'live', checks: { 'goroutine-threshold': { ok: true } } });
  });

  it('should answer 503 when the process is overloaded', async () => {
    const registry = new HealthRegistry();
    registry.addLivenessCheck('goroutine-threshold', vi.fn().mockRejectedValue(new Error('too many active resources (120 > 100)')));

    const res = await request(createApp(registry, silentLogger)).get('/live');

    expect(res.status).toBe(503);
    expect(res.body).toEqual({
      status: 'not_live',
      checks: { 'goroutine-threshold': { ok: false, detail: 'too many active resources (120 > 100)' } }
    });
  });
});

describe('unknown paths', () => {
  it('should answer 404', async () => {
    const res = await request(createApp(buildRegistry(true), silentLogger)).get('/ready');
    expect(res.status).toBe(404);
  });
});
