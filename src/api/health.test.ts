import { describe, it, expect, vi } from 'vitest';

import { TEST_CONFIG } from '../../tests/helpers/app.ts';
import { HealthCheckRegistry, type HealthChecker, StoreHealthChecker } from './health.ts';
import { buildServer } from './server.ts';
import { MemoryStore } from './store/memory.ts';

/** A store whose backing database never answers. */
class UnreachableStore extends MemoryStore {
  override async ping(): Promise<void> {
    throw new Error('connect ECONNREFUSED 127.0.0.1:5432');
  }
}

function staticChecker(name: string, critical: boolean, status: 'healthy' | 'degraded' | 'unhealthy'): HealthChecker {
  return { name, critical, check: async () => ({ status, latency_ms: 0 }) };
}

describe('StoreHealthChecker', () => {
  it('reports healthy when the store answers', async () => {
    const result = await new StoreHealthChecker(new MemoryStore()).check();

    expect(result.status).toBe('healthy');
    expect(result.details).toEqual({ driver: 'memory' });
  });

  it('reports unhealthy and logs when the store does not answer', async () => {
    const log = { warn: vi.fn() };
    const result = await new StoreHealthChecker(new UnreachableStore(), log).check();

    expect(result.status).toBe('unhealthy');
    expect(result.details).toEqual({ driver: 'memory', error: 'Storage unreachable' });
    expect(log.warn).toHaveBeenCalledTimes(1);
    expect(log.warn.mock.calls[0][1]).toBe('store health check failed');
  });
});

describe('HealthCheckRegistry', () => {
  it('is degraded when only a non-critical component fails', async () => {
    const registry = new HealthCheckRegistry();
    registry.register(staticChecker('store', true, 'healthy'));
    registry.register(staticChecker('cache', false, 'unhealthy'));

    const health = await registry.checkAll();
    expect(health.status).toBe('degraded');
    expect(Object.keys(health.components)).toEqual(['store', 'cache']);
    expect(await registry.isReady()).toBe(true);
  });

  it('is unhealthy and not ready when a critical component fails', async () => {
    const registry = new HealthCheckRegistry();
    registry.register(staticChecker('store', true, 'unhealthy'));

    expect((await registry.checkAll()).status).toBe('unhealthy');
    expect(await registry.isReady()).toBe(false);
  });
});

describe('health endpoints', () => {
  it('answers liveness without authentication', async () => {
    const app = buildServer({ config: TEST_CONFIG, store: new MemoryStore() });

    const res = await app.inject({ method: 'GET', url: '/health' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: 'ok' });
    await app.close();
  });

  it('reports ready when the store answers', async () => {
    const app = buildServer({ config: TEST_CONFIG, store: new MemoryStore() });

    const res = await app.inject({ method: 'GET', url: '/health/ready' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: 'ok' });
    await app.close();
  });

  it('returns 503 when the store is unreachable', async () => {
    const app = buildServer({ config: TEST_CONFIG, store: new UnreachableStore() });

    const ready = await app.inject({ method: 'GET', url: '/health/ready' });
    expect(ready.statusCode).toBe(503);
    expect(ready.json()).toEqual({ status: 'unavailable' });

    const status = await app.inject({ method: 'GET', url: '/health/status' });
    expect(status.statusCode).toBe(503);
    expect(status.json().status).toBe('unhealthy');
    expect(status.json().components.store.details).toEqual({ driver: 'memory', error: 'Storage unreachable' });
    await app.close();
  });
});
