/**
 * Error types surfaced by the session core
 * Each carries a stable code the HTTP layer maps to a status
 */

import { SessionKey } from '../entities/Session';

export enum SessionErrorCode {
  INVALID_INPUT = 'INVALID_INPUT',
  NOT_FOUND = 'NOT_FOUND',
  RESOLUTION_TIMEOUT = 'RESOLUTION_TIMEOUT',
  RESOLUTION_FAILED = 'RESOLUTION_FAILED',
  TOOL_UNAVAILABLE = 'TOOL_UNAVAILABLE',
  SHUTTING_DOWN = 'SHUTTING_DOWN',
  FETCH_FAILED = 'FETCH_FAILED'
}

export type SessionPhase = 'warm' | 'cold' | 'persist' | 'convert' | 'extract';

export interface SessionErrorContext {
  key?: SessionKey;
  phase?: SessionPhase;
}

export class SessionError extends Error {
  constructor(
    public readonly code: SessionErrorCode,
    message: string,
    public readonly context: SessionErrorContext = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidInputError extends SessionError {
  constructor(message: string) {
    super(SessionErrorCode.INVALID_INPUT, message);
  }
}

export class NotFoundError extends SessionError {
  constructor(message: string, context: SessionErrorContext = {}) {
    super(SessionErrorCode.NOT_FOUND, message, context);
  }
}

export class ResolutionTimeoutError extends SessionError {
  constructor(key: SessionKey, timeoutMs: number) {
    super(
      SessionErrorCode.RESOLUTION_TIMEOUT,
      `Timeout getting torrent info for ${key} after ${timeoutMs} ms`,
      { key, phase: 'cold' }
    );
  }
}

export class ResolutionFailedError extends SessionError {
  constructor(key: SessionKey, phase: SessionPhase, cause: unknown) {
    super(
      SessionErrorCode.RESOLUTION_FAILED,
      `Failed to resolve ${key} (${phase}): ${describeError(cause)}`,
      { key, phase },
      { cause }
    );
  }
}

export class ToolUnavailableError extends SessionError {
  constructor(tool: string, cause?: unknown) {
    super(
      SessionErrorCode.TOOL_UNAVAILABLE,
      `${tool} executable not found. Please ensure ${tool} is installed and in your system's PATH.`,
      { phase: 'extract' },
      { cause }
    );
  }
}

export class ShuttingDownError extends SessionError {
  constructor(key: SessionKey) {
    super(SessionErrorCode.SHUTTING_DOWN, `Server is shutting down, resolution of ${key} aborted`, {
      key,
      phase: 'cold'
    });
  }
}

export class TorrentFetchError extends SessionError {
  constructor(
    public readonly url: string,
    reason: string
  ) {
    super(SessionErrorCode.FETCH_FAILED, `Failed to fetch .torrent file from URL: ${reason}`);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === 'string' ? error : 'Unknown error';
}
