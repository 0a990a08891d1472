import { LRUCache } from 'lru-cache';
import { createSession, Session, SessionKey } from '../../../domain/entities';
import {
  ContentHandle,
  IContentEngine,
  ILogger,
  IMetadataStore,
  ISessionEvictionHook
} from '../../../domain/interfaces';
import { MagnetDescriptor } from '../../../domain/value-objects';
import {
  ResolutionFailedError,
  ResolutionTimeoutError,
  SessionError,
  ShuttingDownError,
  describeError
} from '../../../domain/errors';
import { CacheEntry } from './CacheEntry';

export interface SessionCacheOptions {
  capacity: number;
  /** How long a network resolution may wait for info */
  resolveTimeoutMs: number;
  /** Aborting it fails every pending resolution with ShuttingDownError */
  shutdownSignal?: AbortSignal;
}

/**
 * Bounded set of live sessions with tiered resolution:
 * hot (cached entry), warm (stored metadata), cold (network).
 *
 * Evicting an entry releases its session and then runs every eviction hook,
 * synchronously, inside the LRU dispose callback.
 */
export class SessionCache {
  private readonly entries: LRUCache<SessionKey, CacheEntry>;
  private readonly inFlight = new Map<SessionKey, Promise<Session>>();
  private readonly hooks: ISessionEvictionHook[] = [];

  constructor(
    private readonly engine: IContentEngine,
    private readonly store: IMetadataStore,
    private readonly logger: ILogger,
    private readonly options: SessionCacheOptions
  ) {
    this.entries = new LRUCache<SessionKey, CacheEntry>({
      max: Math.max(1, options.capacity),
      dispose: (entry, key, reason) => this.onDispose(entry, key, reason)
    });
  }

  addEvictionHook(hook: ISessionEvictionHook): void {
    this.hooks.push(hook);
  }

  /**
   * Returns the live session for a descriptor, loading it when needed.
   * Concurrent calls for one key share a single load.
   */
  resolve(descriptor: MagnetDescriptor): Promise<Session> {
    const key = descriptor.infoHash;

    const hot = this.entries.get(key);
    if (hot) {
      hot.touch();
      return Promise.resolve(hot.session);
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      return pending;
    }

    if (this.options.shutdownSignal?.aborted) {
      return Promise.reject(new ShuttingDownError(key));
    }

    const load = this.load(descriptor).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, load);
    return load;
  }

  /**
   * Cached entry without loading; bumps LRU recency but not the access time
   */
  peek(key: SessionKey): CacheEntry | undefined {
    return this.entries.get(key);
  }

  has(key: SessionKey): boolean {
    return this.entries.has(key);
  }

  /**
   * Evicts a session explicitly
   * @returns false when the key was not cached
   */
  remove(key: SessionKey): boolean {
    return this.entries.delete(key);
  }

  /**
   * Keys idle strictly longer than the threshold; empty when the threshold is <= 0
   */
  idleKeys(now: number, thresholdMs: number): SessionKey[] {
    if (thresholdMs <= 0) {
      return [];
    }
    const idle: SessionKey[] = [];
    for (const [key, entry] of this.entries.entries()) {
      if (entry.idleFor(now) > thresholdMs) {
        idle.push(key);
      }
    }
    return idle;
  }

  /**
   * Entries from most to least recently used
   */
  list(): CacheEntry[] {
    return [...this.entries.values()];
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Evicts everything (shutdown)
   */
  clear(): void {
    this.entries.clear();
  }

  private async load(descriptor: MagnetDescriptor): Promise<Session> {
    const warm = await this.loadWarm(descriptor);
    if (warm) {
      return this.insert(warm);
    }

    const cold = await this.loadCold(descriptor);
    this.persist(cold);
    return this.insert(cold);
  }

  private async loadWarm(descriptor: MagnetDescriptor): Promise<Session | null> {
    const key = descriptor.infoHash;

    let metadata: Buffer | null;
    try {
      metadata = this.store.get(key);
    } catch (error) {
      this.logger.warn(`[cache] ${new ResolutionFailedError(key, 'warm', error).message}`);
      return null;
    }
    if (!metadata) {
      return null;
    }

    let handle: ContentHandle | null = null;
    try {
      handle = this.engine.rehydrate(metadata);
      await this.waitForInfo(handle, key);
      this.logger.info(`[cache] ${key} restored from stored metadata`);
      return createSession(key, handle, descriptor.displayName);
    } catch (error) {
      handle?.release();
      if (error instanceof ShuttingDownError) {
        throw error;
      }
      this.logger.warn(`[cache] ${new ResolutionFailedError(key, 'warm', error).message}, fetching from network`);
      return null;
    }
  }

  private async loadCold(descriptor: MagnetDescriptor): Promise<Session> {
    const key = descriptor.infoHash;
    this.logger.info(`[cache] ${key} not cached, resolving from network`);

    let handle: ContentHandle;
    try {
      handle = this.engine.resolveFromDescriptor(descriptor);
    } catch (error) {
      throw new ResolutionFailedError(key, 'cold', error);
    }

    try {
      await this.waitForInfo(handle, key);
    } catch (error) {
      handle.release();
      this.logger.error(`[cache] ${key} resolution failed: ${describeError(error)}`);
      if (error instanceof SessionError) {
        throw error;
      }
      throw new ResolutionFailedError(key, 'cold', error);
    }

    return createSession(key, handle, descriptor.displayName);
  }

  private waitForInfo(handle: ContentHandle, key: SessionKey): Promise<void> {
    const signal = this.options.shutdownSignal;
    const timeoutMs = this.options.resolveTimeoutMs;

    return new Promise<void>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new ShuttingDownError(key));
        return;
      }

      const cleanup = (): void => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
      };
      const onAbort = (): void => {
        cleanup();
        reject(new ShuttingDownError(key));
      };
      const timer = setTimeout(() => {
        cleanup();
        reject(new ResolutionTimeoutError(key, timeoutMs));
      }, timeoutMs);

      signal?.addEventListener('abort', onAbort, { once: true });
      handle.whenInfo().then(
        () => {
          cleanup();
          resolve();
        },
        (error: unknown) => {
          cleanup();
          reject(error);
        }
      );
    });
  }

  private persist(session: Session): void {
    try {
      this.store.put(session.key, session.handle.serializeMetadata());
    } catch (error) {
      this.logger.warn(`[cache] ${new ResolutionFailedError(session.key, 'persist', error).message}`);
    }
  }

  private insert(session: Session): Session {
    if (this.options.shutdownSignal?.aborted) {
      session.handle.release();
      throw new ShuttingDownError(session.key);
    }

    // Never overwrite: dispose would release the live session
    const existing = this.entries.peek(session.key);
    if (existing) {
      if (existing.session !== session) {
        session.handle.release();
      }
      existing.touch();
      return existing.session;
    }

    this.entries.set(session.key, new CacheEntry(session));
    this.logger.info(`[cache] ${session.key} cached (${this.entries.size}/${this.entries.max})`);
    return session;
  }

  private onDispose(entry: CacheEntry, key: SessionKey, reason: LRUCache.DisposeReason): void {
    this.logger.info(`[cache] evicting ${key} (${reason})`);
    try {
      entry.session.handle.release();
    } catch (error) {
      this.logger.error(`[cache] releasing ${key} failed:`, error);
    }
    for (const hook of this.hooks) {
      try {
        hook.onSessionEvicted(key);
      } catch (error) {
        this.logger.error(`[cache] eviction cleanup for ${key} failed:`, error);
      }
    }
  }
}
