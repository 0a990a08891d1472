/**
 * Use case for polling an extraction
 */

import { ILogger } from '../../domain/interfaces';
import { MagnetDescriptor } from '../../domain/value-objects';
import { ExtractionStatus, SubtitlePipeline } from '../services/subtitles/SubtitlePipeline';
import { requireFileIndex } from './StartExtractionUseCase';
import { logUnexpected, toFailure, UseCaseFailure } from './UseCaseFailure';

export interface GetExtractionStatusRequest {
    magnet?: string;
    index?: unknown;
}

export type GetExtractionStatusResponse = { success: true; status: ExtractionStatus } | UseCaseFailure;

export class GetExtractionStatusUseCase {
    constructor(
        private subtitlePipeline: SubtitlePipeline,
        private logger: ILogger
    ) { }

    execute(request: GetExtractionStatusRequest): GetExtractionStatusResponse {
        try {
            const descriptor = MagnetDescriptor.parse(request.magnet);
            const index = requireFileIndex(request.index);
            return { success: true, status: this.subtitlePipeline.extractionStatus(descriptor.infoHash, index) };
        } catch (error) {
            logUnexpected(this.logger, 'GetExtractionStatusUseCase', error);
            return toFailure(error);
        }
    }
}
