import { SessionKey } from './Session';

export type ExtractionJobState = 'running' | 'succeeded' | 'failed';

/**
 * Background subtitle extraction for one file of a session.
 *
 * State moves running -> succeeded | failed exactly once, and only the
 * monitor that launched the process calls the transitions. Everyone else
 * reads.
 */
export class ExtractionJob {
  private _state: ExtractionJobState = 'running';
  private _failureReason: string | null = null;
  private _finishedAt: number | null = null;

  constructor(
    public readonly sessionKey: SessionKey,
    public readonly fileIndex: number,
    public readonly outputPath: string,
    public readonly logPath: string,
    public readonly startedAt: number = Date.now()
  ) {}

  get state(): ExtractionJobState {
    return this._state;
  }

  get failureReason(): string | null {
    return this._failureReason;
  }

  get finishedAt(): number | null {
    return this._finishedAt;
  }

  get isRunning(): boolean {
    return this._state === 'running';
  }

  succeed(now: number = Date.now()): void {
    this.assertRunning('succeed');
    this._state = 'succeeded';
    this._finishedAt = now;
  }

  fail(reason: string, now: number = Date.now()): void {
    this.assertRunning('fail');
    this._state = 'failed';
    this._failureReason = reason;
    this._finishedAt = now;
  }

  private assertRunning(transition: string): void {
    if (this._state !== 'running') {
      throw new Error(`ExtractionJob: cannot ${transition} a job that already ${this._state}`);
    }
  }
}
