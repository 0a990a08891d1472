import { spawn } from 'child_process';
import { once } from 'events';
import fs from 'fs';
import { ToolUnavailableError } from '../../domain/errors';
import {
  ExtractionProcess,
  ExtractionProcessRequest,
  ILogger,
  ISubtitleExtractor
} from '../../domain/interfaces';

/**
 * ffmpeg arguments copying the first subtitle stream of the input as-is
 */
export function extractionArgs(request: ExtractionProcessRequest): string[] {
  return ['-y', '-i', request.inputUrl, '-map', '0:s:0', '-c', 'copy', request.outputPath];
}

export type FfmpegAvailability = { available: true; version: string } | { available: false; reason: string };

function isMissingExecutable(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Runs ffmpeg with stdout and stderr going straight to the job's log file
 */
export class FfmpegSubtitleExtractor implements ISubtitleExtractor {
  constructor(
    private readonly ffmpegPath: string,
    private readonly logger: ILogger
  ) {}

  /**
   * Runs `ffmpeg -version` once
   */
  async checkAvailable(): Promise<FfmpegAvailability> {
    const child = spawn(this.ffmpegPath, ['-version'], { stdio: ['ignore', 'pipe', 'ignore'] });

    let stdout = '';
    child.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });
    const exited = new Promise<number | null>((resolve) => {
      child.once('close', (code) => resolve(code));
    });

    try {
      await once(child, 'spawn');
    } catch (error) {
      if (isMissingExecutable(error)) {
        return { available: false, reason: `${this.ffmpegPath} not found` };
      }
      throw error;
    }

    const code = await exited;
    if (code !== 0) {
      return { available: false, reason: `${this.ffmpegPath} -version exited with code ${code ?? 'null'}` };
    }
    // First line: "ffmpeg version X.Y.Z ..."
    const match = /ffmpeg version (\S+)/.exec(stdout);
    return { available: true, version: match ? match[1] : 'unknown' };
  }

  async launch(request: ExtractionProcessRequest): Promise<ExtractionProcess> {
    const logFd = fs.openSync(request.logPath, 'w');
    try {
      const child = spawn(this.ffmpegPath, extractionArgs(request), {
        stdio: ['ignore', logFd, logFd]
      });

      const exited = new Promise<number | null>((resolve) => {
        child.once('close', (code) => resolve(code));
      });

      try {
        await once(child, 'spawn');
      } catch (error) {
        if (isMissingExecutable(error)) {
          throw new ToolUnavailableError('ffmpeg', error);
        }
        throw error;
      }

      child.on('error', (error) => {
        this.logger.error(`[ffmpeg] process ${child.pid ?? '?'} error:`, error);
      });

      this.logger.debug(`[ffmpeg] started pid ${child.pid ?? '?'}: ${this.ffmpegPath} ${extractionArgs(request).join(' ')}`);

      return {
        pid: child.pid,
        exited,
        kill: () => {
          if (child.exitCode === null && child.signalCode === null) {
            child.kill('SIGKILL');
          }
        }
      };
    } finally {
      // The child holds its own copy of the descriptor
      fs.closeSync(logFd);
    }
  }
}
