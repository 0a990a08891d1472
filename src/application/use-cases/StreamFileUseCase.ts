/**
 * Use case for picking the session file to stream
 * The bytes themselves are delivered by the stream service
 */

import { IFileSelector, ILogger } from '../../domain/interfaces';
import { SessionFileEntity, toFileEntity } from '../../domain/entities';
import { NotFoundError } from '../../domain/errors';
import { MagnetDescriptor } from '../../domain/value-objects';
import { SessionCache } from '../services/session/SessionCache';
import { parseFileIndex } from '../../infrastructure/torrent/LargestFileSelector';
import { logUnexpected, toFailure, UseCaseFailure } from './UseCaseFailure';

export interface StreamFileRequest {
    magnet?: string;
    /** Raw `index` query value; anything but an integer selects the default file */
    index?: unknown;
}

export type StreamFileResponse = { success: true; file: SessionFileEntity } | UseCaseFailure;

export class StreamFileUseCase {
    constructor(
        private sessionCache: SessionCache,
        private fileSelector: IFileSelector,
        private logger: ILogger
    ) { }

    async execute(request: StreamFileRequest): Promise<StreamFileResponse> {
        try {
            const descriptor = MagnetDescriptor.parse(request.magnet);
            const session = await this.sessionCache.resolve(descriptor);

            const file = this.fileSelector.select(session, parseFileIndex(request.index));
            if (!file) {
                throw new NotFoundError('Could not find the specified file in the torrent', { key: session.key });
            }

            this.logger.debug(`[stream] ${session.key} -> ${file.path} (${file.size} bytes)`);
            return { success: true, file: toFileEntity(session, file) };
        } catch (error) {
            logUnexpected(this.logger, 'StreamFileUseCase', error);
            return toFailure(error);
        }
    }
}
