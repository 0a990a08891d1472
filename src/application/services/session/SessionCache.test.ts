import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { SessionCache, SessionCacheOptions } from './SessionCache';
import { ILogger, ISessionEvictionHook } from '../../../domain/interfaces';
import { MagnetDescriptor } from '../../../domain/value-objects';
import {
  ResolutionFailedError,
  ResolutionTimeoutError,
  SessionErrorCode,
  ShuttingDownError
} from '../../../domain/errors';
import { FakeContentEngine, magnetFor } from '../../../__mocks__/contentEngine';
import { InMemoryMetadataStore } from '../../../__mocks__/metadataStore';

const KEY_A = 'a'.repeat(40);
const KEY_B = 'b'.repeat(40);
const KEY_C = 'c'.repeat(40);

function descriptor(key: string): MagnetDescriptor {
  return MagnetDescriptor.parse(magnetFor(key));
}

describe('SessionCache', () => {
  let engine: FakeContentEngine;
  let store: InMemoryMetadataStore;
  let mockLogger: ILogger;
  let evicted: string[];
  let hook: ISessionEvictionHook;

  function createCache(overrides: Partial<SessionCacheOptions> = {}): SessionCache {
    const cache = new SessionCache(engine, store, mockLogger, {
      capacity: 2,
      resolveTimeoutMs: 1000,
      ...overrides
    });
    cache.addEvictionHook(hook);
    return cache;
  }

  beforeEach(() => {
    engine = new FakeContentEngine();
    store = new InMemoryMetadataStore();
    mockLogger = {
      info: vi.fn(),
      error: vi.fn(),
      warn: vi.fn(),
      debug: vi.fn(),
      log: vi.fn()
    };
    evicted = [];
    hook = { onSessionEvicted: (key) => evicted.push(key) };
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('resolve', () => {
    it('should share one load between concurrent calls for the same key', async () => {
      engine.infoMode = 'manual';
      const cache = createCache();

      const first = cache.resolve(descriptor(KEY_A));
      const second = cache.resolve(descriptor(KEY_A));
      // The warm lookup runs first, so the network handle appears a few ticks later
      await vi.waitFor(() => expect(engine.lastHandle()).toBeDefined());
      const third = cache.resolve(descriptor(KEY_A));
      engine.lastHandle()?.resolveInfo();

      const [a, b, c] = await Promise.all([first, second, third]);
      expect(a).toBe(b);
      expect(c).toBe(a);
      expect(engine.coldCalls).toBe(1);
    });

    it('should serve a cached session without touching the engine', async () => {
      const cache = createCache();
      const first = await cache.resolve(descriptor(KEY_A));
      const second = await cache.resolve(descriptor(KEY_A));

      expect(second).toBe(first);
      expect(engine.coldCalls).toBe(1);
      expect(engine.rehydrateCalls).toBe(0);
    });

    it('should persist metadata after a network resolution', async () => {
      const cache = createCache();
      const session = await cache.resolve(descriptor(KEY_A));

      expect(store.get(KEY_A)).toEqual(session.handle.serializeMetadata());
    });

    it('should restore from stored metadata before going to the network', async () => {
      const seeded = createCache();
      await seeded.resolve(descriptor(KEY_A));
      seeded.clear();

      const cache = createCache();
      const session = await cache.resolve(descriptor(KEY_A));

      expect(engine.coldCalls).toBe(1);
      expect(engine.rehydrateCalls).toBe(1);
      expect(session.files.map((f) => f.path)).toEqual(['Movie/movie.mp4']);
    });

    it('should fall back to the network when restoring fails', async () => {
      store.put(KEY_A, Buffer.from('garbage'));
      engine.failRehydrate = true;
      const cache = createCache();

      const session = await cache.resolve(descriptor(KEY_A));

      expect(session.key).toBe(KEY_A);
      expect(engine.coldCalls).toBe(1);
      expect(mockLogger.warn).toHaveBeenCalledWith(
        `[cache] Failed to resolve ${KEY_A} (warm): corrupt metadata, fetching from network`
      );
    });

    it('should keep the session when persisting fails', async () => {
      store.failWrites = true;
      const cache = createCache();

      const session = await cache.resolve(descriptor(KEY_A));

      expect(cache.has(KEY_A)).toBe(true);
      expect(session.key).toBe(KEY_A);
      expect(mockLogger.warn).toHaveBeenCalledWith(`[cache] Failed to resolve ${KEY_A} (persist): disk full`);
    });

    it('should fail with a timeout and release the handle', async () => {
      engine.infoMode = 'manual';
      const cache = createCache({ resolveTimeoutMs: 20 });

      const error = await cache.resolve(descriptor(KEY_A)).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ResolutionTimeoutError);
      expect(error).toMatchObject({ code: SessionErrorCode.RESOLUTION_TIMEOUT, context: { key: KEY_A } });
      expect(engine.lastHandle()?.released).toBe(1);
      expect(cache.has(KEY_A)).toBe(false);
    });

    it('should start a fresh load after a failed one', async () => {
      engine.infoMode = 'error';
      const cache = createCache();
      await expect(cache.resolve(descriptor(KEY_A))).rejects.toBeInstanceOf(ResolutionFailedError);

      engine.infoMode = 'immediate';
      await cache.resolve(descriptor(KEY_A));
      expect(engine.coldCalls).toBe(2);
    });

    it('should wrap engine errors with key and phase', async () => {
      engine.infoMode = 'error';
      const cache = createCache();

      const error = await cache.resolve(descriptor(KEY_A)).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ResolutionFailedError);
      expect(error).toMatchObject({
        code: SessionErrorCode.RESOLUTION_FAILED,
        context: { key: KEY_A, phase: 'cold' },
        message: `Failed to resolve ${KEY_A} (cold): no peers`
      });
      expect(engine.lastHandle()?.released).toBe(1);
    });

    it('should abort pending loads on shutdown', async () => {
      engine.infoMode = 'manual';
      const controller = new AbortController();
      const cache = createCache({ shutdownSignal: controller.signal });

      const pending = cache.resolve(descriptor(KEY_A));
      controller.abort();

      await expect(pending).rejects.toBeInstanceOf(ShuttingDownError);
      expect(engine.lastHandle()?.released).toBe(1);
      await expect(cache.resolve(descriptor(KEY_B))).rejects.toBeInstanceOf(ShuttingDownError);
      expect(engine.coldCalls).toBe(1);
    });
  });

  describe('eviction', () => {
    it('should hold at most capacity sessions and evict the least recently used', async () => {
      const cache = createCache();
      const a = await cache.resolve(descriptor(KEY_A));
      const b = await cache.resolve(descriptor(KEY_B));
      await cache.resolve(descriptor(KEY_A));
      await cache.resolve(descriptor(KEY_C));

      expect(cache.size).toBe(2);
      expect(cache.has(KEY_A)).toBe(true);
      expect(cache.has(KEY_B)).toBe(false);
      expect(cache.has(KEY_C)).toBe(true);
      expect(evicted).toEqual([KEY_B]);
      expect(engine.handles.filter((h) => h.released > 0).map((h) => h.key)).toEqual([KEY_B]);
      expect(a.handle).not.toBe(b.handle);
    });

    it('should run hooks on explicit removal', async () => {
      const cache = createCache();
      await cache.resolve(descriptor(KEY_A));

      expect(cache.remove(KEY_A)).toBe(true);
      expect(cache.remove(KEY_A)).toBe(false);
      expect(evicted).toEqual([KEY_A]);
      expect(engine.lastHandle()?.released).toBe(1);
    });

    it('should keep evicting when a hook throws', async () => {
      const cache = createCache();
      cache.addEvictionHook({
        onSessionEvicted: () => {
          throw new Error('cleanup exploded');
        }
      });
      await cache.resolve(descriptor(KEY_A));

      cache.remove(KEY_A);

      expect(evicted).toEqual([KEY_A]);
      expect(mockLogger.error).toHaveBeenCalledWith(
        `[cache] eviction cleanup for ${KEY_A} failed:`,
        expect.any(Error)
      );
    });

    it('should evict every session on clear', async () => {
      const cache = createCache();
      await cache.resolve(descriptor(KEY_A));
      await cache.resolve(descriptor(KEY_B));

      cache.clear();

      expect(cache.size).toBe(0);
      expect([...evicted].sort()).toEqual([KEY_A, KEY_B]);
    });
  });

  describe('idleKeys', () => {
    it('should report keys idle strictly longer than the threshold', async () => {
      vi.useFakeTimers({ toFake: ['Date'] });
      vi.setSystemTime(1_000_000);
      const cache = createCache();
      await cache.resolve(descriptor(KEY_A));

      expect(cache.idleKeys(1_000_000 + 500, 500)).toEqual([]);
      expect(cache.idleKeys(1_000_000 + 501, 500)).toEqual([KEY_A]);
    });

    it('should report nothing for a threshold of zero', async () => {
      const cache = createCache();
      await cache.resolve(descriptor(KEY_A));

      expect(cache.idleKeys(Date.now() + 1_000_000, 0)).toEqual([]);
    });
  });

  describe('list', () => {
    it('should list entries from most to least recently used', async () => {
      const cache = createCache();
      await cache.resolve(descriptor(KEY_A));
      await cache.resolve(descriptor(KEY_B));

      expect(cache.list().map((entry) => entry.session.key)).toEqual([KEY_B, KEY_A]);
    });
  });
});
