import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { ProxyManager } from '../proxy-manager.js';
import { DIRECT_HANDLE, toProxyHandle } from '../../drivers/proxy.js';
import { clearCache } from '../../providers/local-db.js';
import { logger, LogLevel } from '../../utils/logger.js';
import type { Proxy } from '../../types/proxy.js';

const proxy = (id: string): Proxy => ({ id, url: `http://${id}.proxy.test:8080` });

/** Random source replaying fixed values */
const sequence = (...values: number[]) => {
  let index = 0;
  return () => values[index++ % values.length];
};

describe('ProxyManager', () => {
  beforeAll(() => {
    logger.setLevel(LogLevel.QUIET);
  });

  describe('getProxy', () => {
    it('should connect directly without configured proxies', () => {
      const manager = new ProxyManager([]);

      expect(manager.getProxy()).toBe(DIRECT_HANDLE);
      expect(manager.getProxy().server).toBeNull();
    });

    it('should keep the first of duplicate ids', () => {
      const manager = new ProxyManager([proxy('a'), { id: 'a', url: 'http://other.proxy.test:8080' }]);

      expect(manager.size).toBe(1);
      expect(manager.getProxy().server).toBe('http://a.proxy.test:8080');
    });

    it('should weight unsampled proxies equally', () => {
      const manager = new ProxyManager([proxy('a'), proxy('b')], { random: sequence(0.4, 0.6) });

      expect(manager.getProxy().id).toBe('a');
      expect(manager.getProxy().id).toBe('b');
    });

    it('should favour faster proxies', () => {
      const manager = new ProxyManager([proxy('fast'), proxy('slow')], { random: sequence(0.7, 0.9) });
      manager.updateLoadTime(toProxyHandle(proxy('fast')), 1, true);
      manager.updateLoadTime(toProxyHandle(proxy('slow')), 4, true);

      // Weights 2/3 and 1/6: 0.7 of the total falls in the first, 0.9 in the second
      expect(manager.getProxy().id).toBe('fast');
      expect(manager.getProxy().id).toBe('slow');
    });

    it('should give unsampled proxies the best known weight', () => {
      const manager = new ProxyManager([proxy('known'), proxy('new')], { random: sequence(0.55) });
      manager.updateLoadTime(toProxyHandle(proxy('known')), 1, true);

      expect(manager.getProxy().id).toBe('new');
    });

    it('should bench proxies that keep failing', () => {
      const manager = new ProxyManager([proxy('bad'), proxy('good')], { random: sequence(0), minSamples: 5 });
      for (let i = 0; i < 5; i++) {
        manager.updateLoadTime(toProxyHandle(proxy('bad')), 1, false);
      }

      expect(manager.getProxy().id).toBe('good');
    });

    it('should fall back to all proxies when every one is benched', () => {
      const manager = new ProxyManager([proxy('a')], { minSamples: 1 });
      manager.updateLoadTime(toProxyHandle(proxy('a')), 1, false);

      expect(manager.getProxy().id).toBe('a');
    });

    it('should stamp the selected proxy as used', () => {
      const manager = new ProxyManager([proxy('a')]);

      manager.getProxy();

      expect(manager.getHealth()[0].lastUsedAt).toBeInstanceOf(Date);
    });
  });

  describe('updateLoadTime', () => {
    it('should average load times of successful runs', () => {
      const manager = new ProxyManager([proxy('a')], { smoothing: 0.5 });
      const handle = toProxyHandle(proxy('a'));

      manager.updateLoadTime(handle, 2, true);
      manager.updateLoadTime(handle, 4, true);

      expect(manager.getHealth()[0]).toMatchObject({ samples: 2, failures: 0, averageLoadTime: 3 });
    });

    it('should count failures without touching the average', () => {
      const manager = new ProxyManager([proxy('a')]);
      const handle = toProxyHandle(proxy('a'));

      manager.updateLoadTime(handle, 2, true);
      manager.updateLoadTime(handle, 30, false);

      expect(manager.getHealth()[0]).toMatchObject({ samples: 2, failures: 1, averageLoadTime: 2 });
    });

    it('should ignore feedback for unknown or direct handles', () => {
      const manager = new ProxyManager([proxy('a')]);

      manager.updateLoadTime({ id: 'gone', server: 'http://gone.proxy.test' }, 1, false);
      manager.updateLoadTime(DIRECT_HANDLE, 1, true);

      expect(manager.getHealth()[0]).toMatchObject({ samples: 0, failures: 0 });
    });
  });

  describe('fromDb', () => {
    let dir: string;

    beforeAll(async () => {
      dir = await mkdtemp(join(tmpdir(), 'proxies-'));
    });

    afterAll(async () => {
      clearCache();
      await rm(dir, { recursive: true, force: true });
    });

    it('should load proxies from a json file', async () => {
      const file = join(dir, 'proxies.json');
      await writeFile(file, JSON.stringify({
        proxies: [
          { id: 'dc-1', type: 'datacenter', url: 'dc-1.proxy.test:8080', username: 'user', password: 'test-secret' }
        ]
      }));

      const manager = await ProxyManager.fromDb(file);

      expect(manager.size).toBe(1);
      expect(manager.getProxy()).toEqual({
        id: 'dc-1',
        server: 'dc-1.proxy.test:8080',
        username: 'user',
        password: 'test-secret'
      });
    });
  });
});
