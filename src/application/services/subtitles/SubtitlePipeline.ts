import fs from 'fs';
import { ExtractionJob, ExtractionJobState, FileDescriptor, Session, SessionKey } from '../../../domain/entities';
import {
  ExtractionProcess,
  ILogger,
  ISessionEvictionHook,
  ISubtitleExtractor
} from '../../../domain/interfaces';
import { MagnetDescriptor } from '../../../domain/value-objects';
import { NotFoundError, ResolutionFailedError, describeError } from '../../../domain/errors';
import { ArtifactRegistry } from './ArtifactRegistry';
import { ExtractionJobTracker } from './ExtractionJobTracker';
import { ExtractionLogParser, ExtractionProgress } from './ExtractionLogParser';
import { extractionArtifactNames, ExtractionArtifactNames, vttArtifactName } from './artifactNames';
import { srtToVtt } from './srtToVtt';

export interface SubtitlePipelineOptions {
  /** Base URL of this server; the extraction tool reads the media through /stream */
  selfBaseUrl: string;
}

export interface ExtractionStatus extends ExtractionArtifactNames {
  state: ExtractionJobState;
  progress: ExtractionProgress | null;
  failureReason: string | null;
}

async function readAll(stream: NodeJS.ReadableStream): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
}

function isNonEmptyFile(filePath: string): boolean {
  try {
    return fs.statSync(filePath).size > 0;
  } catch {
    return false;
  }
}

/**
 * Subtitle artifacts derived from session files:
 * SRT -> WebVTT conversion and background track extraction.
 * Everything a session produced is deleted when it is evicted.
 */
export class SubtitlePipeline implements ISessionEvictionHook {
  // Conversions being written, by artifact name
  private readonly converting = new Map<string, Promise<string>>();

  constructor(
    private readonly registry: ArtifactRegistry,
    private readonly tracker: ExtractionJobTracker,
    private readonly extractor: ISubtitleExtractor,
    private readonly logger: ILogger,
    private readonly options: SubtitlePipelineOptions
  ) {}

  /**
   * Converts a subtitle file of the session to WebVTT
   * @returns the artifact key to fetch it with
   */
  async convert(session: Session, sourcePath: string): Promise<string> {
    const file = session.files.find((candidate) => candidate.path === sourcePath);
    if (!file) {
      throw new NotFoundError('Subtitle file not found in torrent', { key: session.key, phase: 'convert' });
    }

    const name = vttArtifactName(session.key, sourcePath);
    const pending = this.converting.get(name);
    if (pending) {
      return pending;
    }

    const conversion = this.writeVtt(session, file, name).finally(() => {
      this.converting.delete(name);
    });
    this.converting.set(name, conversion);
    return conversion;
  }

  private async writeVtt(session: Session, file: FileDescriptor, name: string): Promise<string> {
    const target = this.registry.pathFor(name);

    if (fs.existsSync(target)) {
      this.logger.debug(`[subtitles] ${name} already converted`);
      this.registry.register(name);
      return name;
    }

    try {
      const srt =
        file.size > 0
          ? await readAll(session.handle.openReader(file.index, { start: 0, end: file.size - 1 }))
          : Buffer.alloc(0);
      await fs.promises.writeFile(target, srtToVtt(srt.toString('utf8')));
    } catch (error) {
      throw new ResolutionFailedError(session.key, 'convert', error);
    }

    this.registry.register(name);
    this.logger.info(`[subtitles] converted ${file.path} -> ${name}`);
    return name;
  }

  /**
   * Starts extracting the first subtitle track of a file, or reuses a running or finished one.
   * Rejects with ToolUnavailableError when the tool cannot be started.
   */
  async startExtraction(
    session: Session,
    descriptor: MagnetDescriptor,
    fileIndex: number
  ): Promise<ExtractionArtifactNames> {
    const file = session.files[fileIndex];
    if (!file) {
      throw new NotFoundError('Could not find the specified file in the torrent', {
        key: session.key,
        phase: 'extract'
      });
    }

    const names = extractionArtifactNames(session.key, fileIndex);
    const outputPath = this.registry.pathFor(names.subtitleFile);
    const logPath = this.registry.pathFor(names.logFile);

    if (this.tracker.running(session.key, fileIndex)) {
      return names;
    }

    if (isNonEmptyFile(outputPath)) {
      if (!fs.existsSync(logPath)) {
        fs.writeFileSync(logPath, ExtractionLogParser.successTrailer());
      }
      this.registry.register(names.subtitleFile);
      this.registry.register(names.logFile);
      return names;
    }

    fs.rmSync(logPath, { force: true });

    const job = new ExtractionJob(session.key, fileIndex, outputPath, logPath);
    this.tracker.register(job);

    const inputUrl =
      `${this.options.selfBaseUrl}/stream?magnet=${encodeURIComponent(descriptor.uri)}` + `&index=${fileIndex}`;

    let process: ExtractionProcess;
    try {
      process = await this.extractor.launch({ inputUrl, outputPath, logPath });
    } catch (error) {
      this.tracker.forget(job);
      throw error;
    }

    if (!this.tracker.attach(job, process)) {
      // Session was evicted while the tool was starting
      process.kill();
      throw new NotFoundError('Torrent not found or not active', { key: session.key, phase: 'extract' });
    }

    this.registry.register(names.subtitleFile);
    this.registry.register(names.logFile);
    this.logger.info(`[subtitles] extracting ${session.displayName} #${fileIndex} (pid ${process.pid ?? '?'})`);

    this.monitor(job, process).catch((error: unknown) => {
      this.logger.error(`[subtitles] monitor for ${names.logFile} failed:`, error);
    });

    return names;
  }

  /**
   * Current state of an extraction, read from its log
   */
  extractionStatus(key: SessionKey, fileIndex: number): ExtractionStatus {
    const names = extractionArtifactNames(key, fileIndex);
    const logPath = this.registry.pathFor(names.logFile);
    const job = this.tracker.get(key, fileIndex);

    if (!fs.existsSync(logPath)) {
      if (!job) {
        throw new NotFoundError(`No extraction found for file ${fileIndex}`, { key, phase: 'extract' });
      }
      return { ...names, state: job.state, progress: null, failureReason: job.failureReason };
    }

    const parsed = ExtractionLogParser.parse(fs.readFileSync(logPath, 'utf8'));
    // A log without a marker is either still growing or was cut short
    const state = parsed.state === 'running' && job && !job.isRunning ? job.state : parsed.state;
    return {
      ...names,
      state,
      progress: parsed.progress,
      failureReason: parsed.failureReason ?? job?.failureReason ?? null
    };
  }

  onSessionEvicted(key: SessionKey): void {
    for (const tracked of this.tracker.dropSession(key)) {
      if (tracked.job.isRunning && tracked.process) {
        this.logger.info(`[subtitles] stopping extraction ${key} #${tracked.job.fileIndex}`);
        tracked.process.kill();
      }
    }
    this.registry.purge(key);
  }

  private async monitor(job: ExtractionJob, process: ExtractionProcess): Promise<void> {
    const code = await process.exited;

    if (!this.tracker.isTracked(job)) {
      // Session evicted: its files are gone
      return;
    }

    let failure: string | null = null;
    if (code !== 0) {
      failure = code === null ? 'terminated by signal' : `exit code ${code}`;
    } else if (!isNonEmptyFile(job.outputPath)) {
      failure = 'Output file is missing or empty.';
    }

    try {
      await fs.promises.appendFile(
        job.logPath,
        failure ? ExtractionLogParser.failureTrailer(failure) : ExtractionLogParser.successTrailer()
      );
    } catch (error) {
      this.logger.warn(`[subtitles] cannot append to ${job.logPath}: ${describeError(error)}`);
    }

    if (failure) {
      this.logger.warn(`[subtitles] extraction ${job.sessionKey} #${job.fileIndex} failed: ${failure}`);
      job.fail(failure);
    } else {
      this.logger.info(`[subtitles] extraction ${job.sessionKey} #${job.fileIndex} finished`);
      job.succeed();
    }
  }
}
