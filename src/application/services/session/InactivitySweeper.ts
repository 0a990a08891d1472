import { SessionKey } from '../../../domain/entities';
import { ILogger, IMetadataStore } from '../../../domain/interfaces';
import { SessionCache } from './SessionCache';

export interface InactivitySweeperOptions {
  intervalMs: number;
  /** Idle time after which a session is dropped; <= 0 disables sweeping */
  thresholdMs: number;
}

/**
 * Periodically evicts sessions nobody touched for a while
 * and forgets their stored metadata.
 */
export class InactivitySweeper {
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly cache: SessionCache,
    private readonly store: IMetadataStore,
    private readonly logger: ILogger,
    private readonly options: InactivitySweeperOptions
  ) {}

  get enabled(): boolean {
    return this.options.thresholdMs > 0 && this.options.intervalMs > 0;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (!this.enabled) {
      this.logger.info('[sweeper] inactivity cleanup disabled');
      return;
    }
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      this.sweep();
    }, this.options.intervalMs);
    // Must not keep the process alive on its own
    this.timer.unref();
    this.logger.info(
      `[sweeper] checking every ${this.options.intervalMs} ms for sessions idle over ${this.options.thresholdMs} ms`
    );
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /**
   * One pass. Keys are collected first, then evicted one by one;
   * a session touched in between is still evicted.
   * @returns the evicted keys
   */
  sweep(now: number = Date.now()): SessionKey[] {
    if (this.options.thresholdMs <= 0) {
      return [];
    }

    const idle = this.cache.idleKeys(now, this.options.thresholdMs);
    if (idle.length === 0) {
      this.logger.debug('[sweeper] no idle sessions');
      return [];
    }

    this.logger.info(`[sweeper] found ${idle.length} idle session(s)`);
    const evicted: SessionKey[] = [];
    for (const key of idle) {
      if (this.cache.remove(key)) {
        evicted.push(key);
      }
      try {
        this.store.delete(key);
      } catch (error) {
        this.logger.error(`[sweeper] failed to delete metadata for ${key}:`, error);
      }
    }
    this.logger.info(`[sweeper] removed ${evicted.length} session(s)`);
    return evicted;
  }
}
