/**
 * Configuration for the session streamer
 */

import path from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Config {
  PORT: number;
  RUNTIME_DIR: string;
  // Torrent payload directory; the metadata database lives beside it by default
  DOWNLOAD_DIR: string;
  // Converted subtitles, extracted tracks and extraction logs
  ARTIFACTS_DIR: string;
  METADATA_DB_PATH: string;
  LOG_DIR: string;
  LOG_LEVEL: LogLevel;
  // Each cached session holds live peer connections and open files, keep it tiny
  CACHE_CAPACITY: number;
  METADATA_TIMEOUT: number;
  // Upper bound of one response write; always at least 1
  STREAM_CHUNK_SIZE: number;
  SPEED_SAMPLE_INTERVAL: number;
  SWEEP_INTERVAL: number;
  // Idle time after which a session is dropped; <= 0 disables the sweeper
  INACTIVITY_THRESHOLD: number;
  FFMPEG_PATH: string;
  // Base URL ffmpeg uses to read back from our own /stream endpoint
  SELF_BASE_URL: string;
  TORRENT_FETCH_TIMEOUT: number;
  // Largest .torrent file accepted by upload or fetch
  TORRENT_MAX_BYTES: number;
  SUBTITLE_EXTENSIONS: readonly string[];
  CONTENT_TYPES: Readonly<Record<string, string>>;
}

/**
 * Reads a numeric env variable, keeping an explicit 0
 */
export function numberFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  return Number.isFinite(value) ? value : fallback;
}

/**
 * Like numberFromEnv, but zero and negative values fall back too
 */
export function positiveNumberFromEnv(name: string, fallback: number): number {
  const value = numberFromEnv(name, fallback);
  return value > 0 ? value : fallback;
}

function logLevelFromEnv(fallback: LogLevel): LogLevel {
  const level = process.env.LOG_LEVEL;
  switch (level) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
      return level;
    default:
      return fallback;
  }
}

const PORT = numberFromEnv('PORT', 3000);
const RUNTIME_DIR = process.env.RUNTIME_DIR || path.join(process.cwd(), '.runtime');
const DOWNLOAD_DIR = path.resolve(process.env.DOWNLOAD_DIR || path.join(RUNTIME_DIR, 'downloads'));

const config: Config = {
  // Server configuration
  PORT,
  RUNTIME_DIR,

  // Storage
  DOWNLOAD_DIR,
  ARTIFACTS_DIR: path.resolve(process.env.ARTIFACTS_DIR || DOWNLOAD_DIR),
  METADATA_DB_PATH: process.env.METADATA_DB_PATH || path.join(DOWNLOAD_DIR, 'metadata.db'),

  // Logging
  LOG_DIR: process.env.LOG_DIR || path.join(RUNTIME_DIR, 'logs'),
  LOG_LEVEL: logLevelFromEnv('info'),

  // Session cache
  CACHE_CAPACITY: numberFromEnv('CACHE_CAPACITY', 2),
  METADATA_TIMEOUT: numberFromEnv('METADATA_TIMEOUT', 30000), // 30 seconds
  SPEED_SAMPLE_INTERVAL: 500,

  // Streaming
  STREAM_CHUNK_SIZE: Math.max(1, Math.floor(positiveNumberFromEnv('STREAM_CHUNK_SIZE', 512 * 1024))), // 512 KB

  // Inactivity sweeper
  SWEEP_INTERVAL: numberFromEnv('SWEEP_INTERVAL_MS', 5 * 60 * 1000), // 5 minutes
  INACTIVITY_THRESHOLD: numberFromEnv('CLEANUP_INACTIVE_AFTER_MS', 30 * 60 * 1000), // 30 minutes

  // Subtitles
  FFMPEG_PATH: process.env.FFMPEG_PATH || 'ffmpeg',
  SELF_BASE_URL: process.env.SELF_BASE_URL || `http://localhost:${PORT}`,
  SUBTITLE_EXTENSIONS: ['.srt'] as const,

  // .torrent files
  TORRENT_FETCH_TIMEOUT: positiveNumberFromEnv('TORRENT_FETCH_TIMEOUT', 15000), // 15 seconds
  TORRENT_MAX_BYTES: positiveNumberFromEnv('TORRENT_MAX_BYTES', 10 * 1024 * 1024), // 10 MB

  CONTENT_TYPES: {
    '.mp4': 'video/mp4',
    '.m4v': 'video/mp4',
    '.mkv': 'video/x-matroska',
    '.webm': 'video/webm',
    '.avi': 'video/x-msvideo',
    '.mov': 'video/quicktime',
    '.srt': 'application/x-subrip',
    '.vtt': 'text/vtt',
    '.ass': 'text/x-ssa',
    '.log': 'text/plain; charset=utf-8'
  }
};

export default config;
