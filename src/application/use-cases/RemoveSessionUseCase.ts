/**
 * Use case for evicting a session and forgetting its metadata
 */

import { ILogger, IMetadataStore } from '../../domain/interfaces';
import { NotFoundError } from '../../domain/errors';
import { MagnetDescriptor } from '../../domain/value-objects';
import { SessionCache } from '../services/session/SessionCache';
import { logUnexpected, toFailure, UseCaseFailure } from './UseCaseFailure';

export interface RemoveSessionRequest {
    magnet?: string;
}

export type RemoveSessionResponse = { success: true; message: string } | UseCaseFailure;

export class RemoveSessionUseCase {
    constructor(
        private sessionCache: SessionCache,
        private metadataStore: IMetadataStore,
        private logger: ILogger
    ) { }

    execute(request: RemoveSessionRequest): RemoveSessionResponse {
        try {
            const key = MagnetDescriptor.parse(request.magnet).infoHash;

            const evicted = this.sessionCache.remove(key);
            let forgotten = false;
            try {
                forgotten = this.metadataStore.delete(key);
            } catch (error) {
                this.logger.error(`[session] failed to delete metadata for ${key}:`, error);
            }

            if (!evicted && !forgotten) {
                throw new NotFoundError('Torrent not found', { key });
            }

            this.logger.info(`[session] removed ${key}`);
            return {
                success: true,
                message: evicted ? 'Torrent stopped' : 'Stored metadata deleted'
            };
        } catch (error) {
            logUnexpected(this.logger, 'RemoveSessionUseCase', error);
            return toFailure(error);
        }
    }
}
