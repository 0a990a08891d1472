/**
 * Use case for converting a subtitle file of a session to WebVTT
 */

import { ILogger } from '../../domain/interfaces';
import { InvalidInputError } from '../../domain/errors';
import { MagnetDescriptor } from '../../domain/value-objects';
import { SessionCache } from '../services/session/SessionCache';
import { SubtitlePipeline } from '../services/subtitles/SubtitlePipeline';
import { logUnexpected, toFailure, UseCaseFailure } from './UseCaseFailure';

export interface ConvertSubtitleRequest {
    magnet?: string;
    filePath?: string;
}

export type ConvertSubtitleResponse = { success: true; vttKey: string } | UseCaseFailure;

export class ConvertSubtitleUseCase {
    constructor(
        private sessionCache: SessionCache,
        private subtitlePipeline: SubtitlePipeline,
        private logger: ILogger
    ) { }

    async execute(request: ConvertSubtitleRequest): Promise<ConvertSubtitleResponse> {
        try {
            const descriptor = MagnetDescriptor.parse(request.magnet);
            if (!request.filePath) {
                throw new InvalidInputError("Missing 'filePath' query parameter");
            }

            const session = await this.sessionCache.resolve(descriptor);
            const vttKey = await this.subtitlePipeline.convert(session, request.filePath);
            return { success: true, vttKey };
        } catch (error) {
            logUnexpected(this.logger, 'ConvertSubtitleUseCase', error);
            return toFailure(error);
        }
    }
}
