/**
 * Domain entities for content sessions
 * Independent of the engine that backs them
 */

import { ContentHandle } from '../interfaces/IContentEngine';

/** Lower-case hex info hash, the cache key of a session */
export type SessionKey = string;

export interface FileDescriptor {
  index: number;
  /** Path inside the content, '/'-separated, including the root folder */
  path: string;
  /** Base name of the path */
  name: string;
  size: number;
}

export interface ProgressSnapshot {
  bytesCompleted: number;
  totalBytes: number;
  peerCount: number;
  /** Verified bytes per file, same order as the file list */
  fileBytesCompleted: number[];
}

export interface StreamRange {
  start: number;
  end: number;
}

export interface Session {
  readonly key: SessionKey;
  readonly displayName: string;
  readonly files: readonly FileDescriptor[];
  readonly totalSize: number;
  readonly handle: ContentHandle;
}

/**
 * Single file of a session, ready to be streamed
 */
export interface SessionFileEntity {
  index: number;
  name: string;
  path: string;
  length: number;
  createReadStream(range: StreamRange): NodeJS.ReadableStream;
}

/**
 * Builds a session from a handle whose info is known.
 * The file list is frozen here and never changes afterwards.
 */
export function createSession(key: SessionKey, handle: ContentHandle, fallbackName: string): Session {
  const files = Object.freeze(handle.files().map((file) => Object.freeze({ ...file })));
  return Object.freeze({
    key,
    displayName: handle.name() || fallbackName || key,
    files,
    totalSize: files.reduce((sum, file) => sum + file.size, 0),
    handle
  });
}

export function toFileEntity(session: Session, file: FileDescriptor): SessionFileEntity {
  return {
    index: file.index,
    name: file.name,
    path: file.path,
    length: file.size,
    createReadStream: (range: StreamRange) => session.handle.openReader(file.index, range)
  };
}
