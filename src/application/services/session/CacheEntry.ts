import { Session } from '../../../domain/entities';

/**
 * Cached session plus its access and transfer-rate bookkeeping.
 * All mutation goes through the methods below; each runs to completion
 * on the event loop, so callers never interleave on the same fields.
 */
export class CacheEntry {
  private lastAccessedAt: number;
  private prevBytesCompleted: number;
  private prevSampleAt: number;
  private lastSpeedBps = 0;

  constructor(
    readonly session: Session,
    now: number = Date.now()
  ) {
    this.lastAccessedAt = now;
    this.prevSampleAt = now;
    this.prevBytesCompleted = session.handle.progress().bytesCompleted;
  }

  get lastAccessed(): number {
    return this.lastAccessedAt;
  }

  touch(now: number = Date.now()): void {
    this.lastAccessedAt = now;
  }

  idleFor(now: number = Date.now()): number {
    return now - this.lastAccessedAt;
  }

  /**
   * Updates the download rate when at least `minIntervalMs` passed since the last sample.
   * @returns the most recent rate in bytes per second
   */
  sampleSpeed(bytesCompleted: number, now: number, minIntervalMs: number): number {
    const elapsed = now - this.prevSampleAt;
    if (elapsed > 0 && elapsed >= minIntervalMs) {
      this.lastSpeedBps = Math.max(0, ((bytesCompleted - this.prevBytesCompleted) * 1000) / elapsed);
      this.prevBytesCompleted = bytesCompleted;
      this.prevSampleAt = now;
    }
    return this.lastSpeedBps;
  }
}
