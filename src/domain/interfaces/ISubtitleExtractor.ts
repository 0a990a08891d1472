/**
 * Port for the external subtitle extraction tool
 */

export interface ExtractionProcessRequest {
  /** URL the tool reads the media from */
  inputUrl: string;
  outputPath: string;
  /** File receiving the tool's stdout and stderr */
  logPath: string;
}

export interface ExtractionProcess {
  readonly pid: number | undefined;
  /**
   * Resolves with the exit code (null when killed by a signal). Never rejects.
   */
  readonly exited: Promise<number | null>;
  kill(): void;
}

export interface ISubtitleExtractor {
  /**
   * Launches the tool. Rejects with ToolUnavailableError when it cannot start;
   * resolves as soon as the process is running.
   */
  launch(request: ExtractionProcessRequest): Promise<ExtractionProcess>;
}
