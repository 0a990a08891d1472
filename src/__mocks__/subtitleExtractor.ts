/**
 * Scripted stand-in for the extraction tool
 * Each launch writes one progress line to its log and waits for finish()
 */

import fs from 'fs';
import { ToolUnavailableError } from '../domain/errors';
import { ExtractionProcess, ExtractionProcessRequest, ISubtitleExtractor } from '../domain/interfaces';

export const FAKE_PROGRESS_LINE = 'size=       1kB time=00:00:10.00 bitrate=   0.8kbits/s speed=5x\r';

export class FakeSubtitleExtractor implements ISubtitleExtractor {
  readonly launches: ExtractionProcessRequest[] = [];
  unavailable = false;
  killed = 0;
  private readonly pending: Array<{ request: ExtractionProcessRequest; exit: (code: number | null) => void }> = [];

  async launch(request: ExtractionProcessRequest): Promise<ExtractionProcess> {
    if (this.unavailable) {
      throw new ToolUnavailableError('ffmpeg');
    }
    this.launches.push(request);
    fs.writeFileSync(request.logPath, FAKE_PROGRESS_LINE);

    let exit: (code: number | null) => void = () => undefined;
    const exited = new Promise<number | null>((resolve) => {
      exit = resolve;
    });
    const entry = { request, exit };
    this.pending.push(entry);

    return {
      pid: 4242,
      exited,
      kill: () => {
        this.killed += 1;
        this.settle(entry, null);
      }
    };
  }

  /**
   * Ends the oldest running launch, optionally writing its output first
   */
  finish(code: number, output?: string): void {
    const entry = this.pending[0];
    if (!entry) {
      throw new Error('no running extraction');
    }
    if (output !== undefined) {
      fs.writeFileSync(entry.request.outputPath, output);
    }
    this.settle(entry, code);
  }

  private settle(
    entry: { request: ExtractionProcessRequest; exit: (code: number | null) => void },
    code: number | null
  ): void {
    const index = this.pending.indexOf(entry);
    if (index !== -1) {
      this.pending.splice(index, 1);
      entry.exit(code);
    }
  }
}
