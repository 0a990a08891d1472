import { Request, Response } from 'express';
import { SessionErrorCode } from '../../../domain/errors';
import { UseCaseFailure } from '../../../application/use-cases/UseCaseFailure';
import { HTTP_STATUS } from '../../../infrastructure/streaming/constants/HttpConstants';
import { StreamErrorHandler } from '../../../infrastructure/streaming/utils';

const STATUS_BY_CODE: Record<SessionErrorCode, number> = {
  [SessionErrorCode.INVALID_INPUT]: HTTP_STATUS.BAD_REQUEST,
  [SessionErrorCode.NOT_FOUND]: HTTP_STATUS.NOT_FOUND,
  [SessionErrorCode.RESOLUTION_TIMEOUT]: HTTP_STATUS.GATEWAY_TIMEOUT,
  [SessionErrorCode.RESOLUTION_FAILED]: HTTP_STATUS.BAD_GATEWAY,
  [SessionErrorCode.TOOL_UNAVAILABLE]: HTTP_STATUS.SERVICE_UNAVAILABLE,
  [SessionErrorCode.SHUTTING_DOWN]: HTTP_STATUS.SERVICE_UNAVAILABLE,
  [SessionErrorCode.FETCH_FAILED]: HTTP_STATUS.BAD_GATEWAY
};

export function statusForCode(code: SessionErrorCode | undefined): number {
  return code ? STATUS_BY_CODE[code] : HTTP_STATUS.INTERNAL_SERVER_ERROR;
}

export function sendFailure(res: Response, failure: UseCaseFailure): void {
  StreamErrorHandler.sendError(res, failure.error, statusForCode(failure.code), failure.code);
}

/**
 * Status of a client error raised by a body parser, undefined for anything else
 */
export function clientErrorStatus(error: Error): number | undefined {
  if ('status' in error && typeof error.status === 'number' && error.status >= 400 && error.status < 500) {
    return error.status;
  }
  return undefined;
}

/**
 * Single string value of a query parameter; repeated or nested values count as absent
 */
export function queryString(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === 'string' ? value : undefined;
}
