import { describe, it, expect, beforeAll, vi } from 'vitest';
import { ProxyPool, axiosProxyCheck, formatProxyForAxios, formatProxyForPlaywright } from '../src/drivers/proxy.js';
import { ConfigurationError } from '../src/utils/errors.js';
import { LogLevel, logger } from '../src/utils/logger.js';
import type { Proxy } from '../src/types/proxy.js';

const proxy = (id: string, overrides: Partial<Proxy> = {}): Proxy => ({
  id,
  type: 'datacenter',
  url: `http://${id}.proxy.test:8080`,
  ...overrides
});

describe('Proxy Driver', () => {
  beforeAll(() => {
    logger.setLevel(LogLevel.QUIET);
  });

  describe('ProxyPool', () => {
    it('should rotate round-robin', () => {
      const pool = new ProxyPool([proxy('p1'), proxy('p2'), proxy('p3')]);

      expect([pool.next(), pool.next(), pool.next(), pool.next()].map(p => p?.id))
        .toEqual(['p1', 'p2', 'p3', 'p1']);
    });

    it('should prefer proxies with fewer failures', () => {
      const p1 = proxy('p1');
      const pool = new ProxyPool([p1, proxy('p2'), proxy('p3')]);
      pool.markFailed(p1);

      expect([pool.next(), pool.next(), pool.next()].map(p => p?.id)).toEqual(['p2', 'p3', 'p2']);
    });

    it('should bring a proxy back once it succeeds', () => {
      const p1 = proxy('p1');
      const pool = new ProxyPool([p1, proxy('p2')]);
      pool.markFailed(p1);
      pool.markSucceeded(p1);

      expect(pool.failureCount(p1)).toBe(0);
      expect(pool.next()?.id).toBe('p1');
    });

    it('should return undefined for an empty pool', () => {
      expect(new ProxyPool([]).next()).toBeUndefined();
    });
  });

  describe('health check', () => {
    it('should keep only the proxies that pass, in order', async () => {
      const pool = new ProxyPool([proxy('p1'), proxy('p2'), proxy('p3')]);

      const healthy = await pool.healthy(async candidate => candidate.id !== 'p2');

      expect(healthy.size).toBe(2);
      expect([healthy.next(), healthy.next(), healthy.next()].map(p => p?.id)).toEqual(['p1', 'p3', 'p1']);
    });

    it('should fail when no proxy passes', async () => {
      const pool = new ProxyPool([proxy('p1'), proxy('p2')]);

      await expect(pool.healthy(async () => false)).rejects.toThrow(ConfigurationError);
      await expect(pool.healthy(async () => false)).rejects.toThrow('None of the 2 proxies passed the health check');
    });

    it('should GET the test URL through the proxy', async () => {
      const get = vi.fn()
        .mockResolvedValueOnce({ status: 200, data: '{"origin":"192.0.2.1"}' })
        .mockResolvedValueOnce({ status: 407, data: 'Proxy Authentication Required' })
        .mockRejectedValueOnce(new Error('connect ECONNREFUSED'));
      const check = axiosProxyCheck({ testUrl: 'https://ip.check.test/', timeoutMs: 2000, client: { get } });

      const results = [await check(proxy('p1')), await check(proxy('p2')), await check(proxy('p3'))];

      expect(results).toEqual([true, false, false]);
      expect(get).toHaveBeenNthCalledWith(1, 'https://ip.check.test/', expect.objectContaining({
        timeout: 2000,
        proxy: { protocol: 'http', host: 'p1.proxy.test', port: 8080 }
      }));
    });
  });

  describe('formatProxyForAxios', () => {
    it('should split the proxy URL and carry credentials', () => {
      const config = formatProxyForAxios(proxy('p1', {
        url: 'http://proxy.test:3128',
        username: 'test-user',
        password: 'test-secret'
      }));

      expect(config).toEqual({
        protocol: 'http',
        host: 'proxy.test',
        port: 3128,
        auth: { username: 'test-user', password: 'test-secret' }
      });
    });

    it('should take a bare host as http on port 80', () => {
      expect(formatProxyForAxios(proxy('p1', { url: 'proxy.test' }))).toEqual({
        protocol: 'http',
        host: 'proxy.test',
        port: 80
      });
    });
  });

  describe('formatProxyForPlaywright', () => {
    it('should pass the server URL through', () => {
      expect(formatProxyForPlaywright(proxy('p1', { username: 'test-user', password: 'test-secret' }))).toEqual({
        server: 'http://p1.proxy.test:8080',
        username: 'test-user',
        password: 'test-secret'
      });
    });
  });
});
