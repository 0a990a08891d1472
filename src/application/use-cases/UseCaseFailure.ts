/**
 * Failed result shared by all use cases
 */

import { ILogger } from '../../domain/interfaces';
import { describeError, SessionError, SessionErrorCode } from '../../domain/errors';

export interface UseCaseFailure {
    success: false;
    error: string;
    /** Absent for unexpected errors */
    code?: SessionErrorCode;
}

export function toFailure(error: unknown): UseCaseFailure {
    if (error instanceof SessionError) {
        return { success: false, error: error.message, code: error.code };
    }
    return { success: false, error: describeError(error) };
}

/**
 * Logs anything that is not a SessionError
 */
export function logUnexpected(logger: ILogger, useCase: string, error: unknown): void {
    if (!(error instanceof SessionError)) {
        logger.error(`Error in ${useCase}:`, error);
    }
}
