import { ExtractionJob, SessionKey } from '../../../domain/entities';
import { ExtractionProcess } from '../../../domain/interfaces';

export interface TrackedExtraction {
  job: ExtractionJob;
  /** Unset while the tool is still starting */
  process: ExtractionProcess | null;
}

/**
 * Extraction jobs by (session, file index)
 * Prevents a second launch for a file whose extraction is still running
 */
export class ExtractionJobTracker {
  private readonly jobs = new Map<string, TrackedExtraction>();

  private createJobKey(sessionKey: SessionKey, fileIndex: number): string {
    return `${sessionKey}:${fileIndex}`;
  }

  get(sessionKey: SessionKey, fileIndex: number): ExtractionJob | undefined {
    return this.jobs.get(this.createJobKey(sessionKey, fileIndex))?.job;
  }

  running(sessionKey: SessionKey, fileIndex: number): ExtractionJob | undefined {
    const job = this.get(sessionKey, fileIndex);
    return job?.isRunning ? job : undefined;
  }

  /**
   * Replaces any finished job for the same file
   */
  register(job: ExtractionJob): void {
    this.jobs.set(this.createJobKey(job.sessionKey, job.fileIndex), { job, process: null });
  }

  /**
   * @returns false when the job is no longer tracked (its session went away)
   */
  attach(job: ExtractionJob, process: ExtractionProcess): boolean {
    const tracked = this.jobs.get(this.createJobKey(job.sessionKey, job.fileIndex));
    if (!tracked || tracked.job !== job) {
      return false;
    }
    tracked.process = process;
    return true;
  }

  isTracked(job: ExtractionJob): boolean {
    return this.jobs.get(this.createJobKey(job.sessionKey, job.fileIndex))?.job === job;
  }

  forget(job: ExtractionJob): void {
    const key = this.createJobKey(job.sessionKey, job.fileIndex);
    if (this.jobs.get(key)?.job === job) {
      this.jobs.delete(key);
    }
  }

  /**
   * Removes every job of a session
   */
  dropSession(sessionKey: SessionKey): TrackedExtraction[] {
    const dropped: TrackedExtraction[] = [];
    for (const [key, tracked] of this.jobs) {
      if (tracked.job.sessionKey === sessionKey) {
        dropped.push(tracked);
        this.jobs.delete(key);
      }
    }
    return dropped;
  }

  getAll(): ExtractionJob[] {
    return Array.from(this.jobs.values(), (tracked) => tracked.job);
  }

  get size(): number {
    return this.jobs.size;
  }
}
