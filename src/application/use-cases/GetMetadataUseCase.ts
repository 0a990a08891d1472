/**
 * Use case for the summary of a session
 */

import { ILogger } from '../../domain/interfaces';
import { MagnetDescriptor } from '../../domain/value-objects';
import { SessionCache } from '../services/session/SessionCache';
import { ByteFormatter } from '../../infrastructure/streaming/utils/ByteFormatter';
import { logUnexpected, toFailure, UseCaseFailure } from './UseCaseFailure';

export interface GetMetadataRequest {
    magnet?: string;
}

export interface SessionMetadata {
    name: string;
    infoHash: string;
    totalSize: number;
    totalSizeHuman: string;
    fileCount: number;
}

export type GetMetadataResponse = { success: true; metadata: SessionMetadata } | UseCaseFailure;

export class GetMetadataUseCase {
    constructor(
        private sessionCache: SessionCache,
        private logger: ILogger
    ) { }

    async execute(request: GetMetadataRequest): Promise<GetMetadataResponse> {
        try {
            const session = await this.sessionCache.resolve(MagnetDescriptor.parse(request.magnet));

            return {
                success: true,
                metadata: {
                    name: session.displayName,
                    infoHash: session.key,
                    totalSize: session.totalSize,
                    totalSizeHuman: ByteFormatter.toHumanReadable(session.totalSize),
                    fileCount: session.files.length
                }
            };
        } catch (error) {
            logUnexpected(this.logger, 'GetMetadataUseCase', error);
            return toFailure(error);
        }
    }
}
