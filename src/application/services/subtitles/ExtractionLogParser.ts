import { ExtractionJobState } from '../../../domain/entities';

export interface ExtractionProgress {
  size: string;
  time: string;
  bitrate: string;
  speed: string;
}

export interface ParsedExtractionLog {
  state: ExtractionJobState;
  progress: ExtractionProgress | null;
  failureReason: string | null;
}

const PROGRESS_LINE = /size=\s*(\S+)\s*time=\s*(\S+)\s*bitrate=\s*(\S+)\s*speed=\s*(\S+)/;

/**
 * Reads the state of an extraction from its log file content
 */
export class ExtractionLogParser {
  static readonly SUCCESS_MARKER = 'Extraction finished successfully.';
  static readonly FAILURE_MARKER = 'Extraction failed:';

  static successTrailer(): string {
    return `\n\n${this.SUCCESS_MARKER}`;
  }

  static failureTrailer(reason: string): string {
    return `\n\n${this.FAILURE_MARKER} ${reason}`;
  }

  static parse(log: string): ParsedExtractionLog {
    // ffmpeg rewrites its progress line with bare carriage returns
    const lines = log.split(/[\r\n]+/);

    let progress: ExtractionProgress | null = null;
    for (let i = lines.length - 1; i >= 0; i--) {
      const match = PROGRESS_LINE.exec(lines[i]);
      if (match) {
        progress = { size: match[1], time: match[2], bitrate: match[3], speed: match[4] };
        break;
      }
    }

    if (log.includes(this.SUCCESS_MARKER)) {
      return { state: 'succeeded', progress, failureReason: null };
    }

    const failureLine = lines.find((line) => line.startsWith(this.FAILURE_MARKER));
    if (failureLine !== undefined) {
      return {
        state: 'failed',
        progress,
        failureReason: failureLine.slice(this.FAILURE_MARKER.length).trim()
      };
    }

    return { state: 'running', progress, failureReason: null };
  }
}
