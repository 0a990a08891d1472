/**
 * Use case for starting a background subtitle extraction
 */

import { ILogger } from '../../domain/interfaces';
import { InvalidInputError } from '../../domain/errors';
import { MagnetDescriptor } from '../../domain/value-objects';
import { SessionCache } from '../services/session/SessionCache';
import { SubtitlePipeline } from '../services/subtitles/SubtitlePipeline';
import { parseFileIndex } from '../../infrastructure/torrent/LargestFileSelector';
import { logUnexpected, toFailure, UseCaseFailure } from './UseCaseFailure';

export interface StartExtractionRequest {
    magnet?: string;
    index?: unknown;
}

export type StartExtractionResponse =
    | { success: true; logFile: string; subtitleFile: string }
    | UseCaseFailure;

/**
 * Parses the required file index of extraction requests
 */
export function requireFileIndex(raw: unknown): number {
    const index = parseFileIndex(raw);
    if (index === undefined) {
        throw new InvalidInputError("Missing or invalid 'index' query parameter");
    }
    return index;
}

export class StartExtractionUseCase {
    constructor(
        private sessionCache: SessionCache,
        private subtitlePipeline: SubtitlePipeline,
        private logger: ILogger
    ) { }

    async execute(request: StartExtractionRequest): Promise<StartExtractionResponse> {
        try {
            const descriptor = MagnetDescriptor.parse(request.magnet);
            const index = requireFileIndex(request.index);

            const session = await this.sessionCache.resolve(descriptor);
            const names = await this.subtitlePipeline.startExtraction(session, descriptor, index);
            return { success: true, logFile: names.logFile, subtitleFile: names.subtitleFile };
        } catch (error) {
            logUnexpected(this.logger, 'StartExtractionUseCase', error);
            return toFailure(error);
        }
    }
}
