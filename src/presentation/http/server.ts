#!/usr/bin/env node

/**
 * Main server file for the session streamer
 *
 * Usage:
 *   npm run build && npm start
 *
 * Then send a GET request:
 *   http://localhost:3000/files?magnet=magnet:?xt=urn:btih:...
 *   http://localhost:3000/stream?magnet=magnet:?xt=urn:btih:...&index=0
 */

import config from '../../config';
import { createApp } from './app';
import { CompositeLogger } from '../../infrastructure/logging/CompositeLogger';
import { ConsoleLogger } from '../../infrastructure/logging/ConsoleLogger';
import { FileLogger } from '../../infrastructure/logging/FileLogger';
import { SqliteMetadataStore } from '../../infrastructure/persistence/SqliteMetadataStore';
import { WebTorrentContentEngine } from '../../infrastructure/torrent/WebTorrentContentEngine';
import { LargestFileSelector } from '../../infrastructure/torrent/LargestFileSelector';
import { AxiosTorrentFileFetcher } from '../../infrastructure/torrent/AxiosTorrentFileFetcher';
import { RangeStreamService } from '../../infrastructure/streaming/RangeStreamService';
import { FfmpegSubtitleExtractor } from '../../infrastructure/subprocess/FfmpegSubtitleExtractor';
import { SessionCache } from '../../application/services/session/SessionCache';
import { InactivitySweeper } from '../../application/services/session/InactivitySweeper';
import { ArtifactRegistry } from '../../application/services/subtitles/ArtifactRegistry';
import { ExtractionJobTracker } from '../../application/services/subtitles/ExtractionJobTracker';
import { SubtitlePipeline } from '../../application/services/subtitles/SubtitlePipeline';

const logger = new CompositeLogger(new ConsoleLogger(config.LOG_LEVEL), new FileLogger(config.LOG_DIR, config.LOG_LEVEL));

(async () => {
  const extractor = new FfmpegSubtitleExtractor(config.FFMPEG_PATH, logger);

  logger.info('Checking for ffmpeg executable...');
  const ffmpeg = await extractor.checkAvailable();
  if (!ffmpeg.available) {
    logger.error(`${ffmpeg.reason}. Subtitle extraction will not work.`);
    logger.close();
    process.exit(1);
  }
  logger.info(`ffmpeg ${ffmpeg.version} found.`);

  const shutdown = new AbortController();

  const metadataStore = new SqliteMetadataStore(config.METADATA_DB_PATH);
  const engine = new WebTorrentContentEngine(config.DOWNLOAD_DIR, logger);
  const sessionCache = new SessionCache(engine, metadataStore, logger, {
    capacity: config.CACHE_CAPACITY,
    resolveTimeoutMs: config.METADATA_TIMEOUT,
    shutdownSignal: shutdown.signal
  });

  const artifacts = new ArtifactRegistry(config.ARTIFACTS_DIR, logger);
  const subtitlePipeline = new SubtitlePipeline(
    artifacts,
    new ExtractionJobTracker(),
    extractor,
    logger,
    { selfBaseUrl: config.SELF_BASE_URL }
  );
  sessionCache.addEvictionHook(subtitlePipeline);

  const sweeper = new InactivitySweeper(sessionCache, metadataStore, logger, {
    intervalMs: config.SWEEP_INTERVAL,
    thresholdMs: config.INACTIVITY_THRESHOLD
  });

  const app = createApp({
    sessionCache,
    metadataStore,
    subtitlePipeline,
    artifacts,
    streamService: new RangeStreamService(logger, {
      chunkSize: config.STREAM_CHUNK_SIZE,
      contentTypes: config.CONTENT_TYPES
    }),
    fileSelector: new LargestFileSelector(),
    torrentFetcher: new AxiosTorrentFileFetcher(logger, {
      timeoutMs: config.TORRENT_FETCH_TIMEOUT,
      maxBytes: config.TORRENT_MAX_BYTES
    }),
    logger,
    settings: {
      speedSampleIntervalMs: config.SPEED_SAMPLE_INTERVAL,
      subtitleExtensions: config.SUBTITLE_EXTENSIONS,
      contentTypes: config.CONTENT_TYPES,
      maxTorrentBytes: config.TORRENT_MAX_BYTES
    }
  });

  const server = app.listen(config.PORT, () => {
    logger.info(`🚀 Session streamer running on http://localhost:${config.PORT}`);
    logger.info(`📂 Downloads: ${config.DOWNLOAD_DIR}, metadata: ${config.METADATA_DB_PATH}`);
    logger.info(`📺 Usage example:`);
    logger.info(`   http://localhost:${config.PORT}/stream?magnet=magnet:?xt=urn:btih:...`);
  });

  sweeper.start();

  let stopping = false;
  const stop = async (signal: string): Promise<void> => {
    if (stopping) {
      return;
    }
    stopping = true;
    logger.info(`\n🛑 ${signal} received, stopping server...`);

    shutdown.abort();
    sweeper.stop();
    server.close();
    sessionCache.clear();
    await engine.destroy();
    logger.info('✅ All sessions stopped');
    metadataStore.close();
    logger.close();
    process.exit(0);
  };

  const onSignal = (signal: NodeJS.Signals): void => {
    stop(signal).catch((error: unknown) => {
      logger.error('Error during shutdown:', error);
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
})().catch((error: unknown) => {
  logger.error('Failed to start server:', error);
  process.exit(1);
});
