import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { InactivitySweeper } from './InactivitySweeper';
import { SessionCache } from './SessionCache';
import { ILogger } from '../../../domain/interfaces';
import { MagnetDescriptor } from '../../../domain/value-objects';
import { FakeContentEngine, magnetFor } from '../../../__mocks__/contentEngine';
import { InMemoryMetadataStore } from '../../../__mocks__/metadataStore';

const KEY_A = 'a'.repeat(40);
const KEY_B = 'b'.repeat(40);
const START = 5_000_000;

describe('InactivitySweeper', () => {
  let engine: FakeContentEngine;
  let store: InMemoryMetadataStore;
  let cache: SessionCache;
  let mockLogger: ILogger;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(START);
    engine = new FakeContentEngine();
    store = new InMemoryMetadataStore();
    mockLogger = {
      info: vi.fn(),
      error: vi.fn(),
      warn: vi.fn(),
      debug: vi.fn(),
      log: vi.fn()
    };
    cache = new SessionCache(engine, store, mockLogger, { capacity: 2, resolveTimeoutMs: 1000 });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should evict sessions idle past the threshold and drop their metadata', async () => {
    await cache.resolve(MagnetDescriptor.parse(magnetFor(KEY_A)));
    vi.setSystemTime(START + 1000);
    await cache.resolve(MagnetDescriptor.parse(magnetFor(KEY_B)));
    const sweeper = new InactivitySweeper(cache, store, mockLogger, { intervalMs: 100, thresholdMs: 1500 });

    const evicted = sweeper.sweep(START + 2000);

    expect(evicted).toEqual([KEY_A]);
    expect(cache.has(KEY_A)).toBe(false);
    expect(cache.has(KEY_B)).toBe(true);
    expect(store.get(KEY_A)).toBeNull();
    expect(store.get(KEY_B)).not.toBeNull();
  });

  it('should leave sessions exactly at the threshold', async () => {
    await cache.resolve(MagnetDescriptor.parse(magnetFor(KEY_A)));
    const sweeper = new InactivitySweeper(cache, store, mockLogger, { intervalMs: 100, thresholdMs: 1500 });

    expect(sweeper.sweep(START + 1500)).toEqual([]);
    expect(cache.has(KEY_A)).toBe(true);
  });

  it('should do nothing when disabled', async () => {
    await cache.resolve(MagnetDescriptor.parse(magnetFor(KEY_A)));
    const sweeper = new InactivitySweeper(cache, store, mockLogger, { intervalMs: 100, thresholdMs: 0 });

    sweeper.start();

    expect(sweeper.running).toBe(false);
    expect(sweeper.sweep(START + 10_000_000)).toEqual([]);
    expect(cache.has(KEY_A)).toBe(true);
  });

  it('should start and stop its timer', () => {
    const sweeper = new InactivitySweeper(cache, store, mockLogger, { intervalMs: 60_000, thresholdMs: 1500 });

    sweeper.start();
    expect(sweeper.running).toBe(true);

    sweeper.stop();
    expect(sweeper.running).toBe(false);
  });

  it('should log and continue when deleting metadata fails', async () => {
    await cache.resolve(MagnetDescriptor.parse(magnetFor(KEY_A)));
    vi.spyOn(store, 'delete').mockImplementation(() => {
      throw new Error('locked');
    });
    const sweeper = new InactivitySweeper(cache, store, mockLogger, { intervalMs: 100, thresholdMs: 10 });

    expect(sweeper.sweep(START + 100)).toEqual([KEY_A]);
    expect(mockLogger.error).toHaveBeenCalledWith(
      `[sweeper] failed to delete metadata for ${KEY_A}:`,
      expect.any(Error)
    );
  });
});
