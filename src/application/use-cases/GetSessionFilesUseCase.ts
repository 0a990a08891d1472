/**
 * Use case for resolving a session and listing its files
 */

import path from 'path';
import { ILogger } from '../../domain/interfaces';
import { MagnetDescriptor } from '../../domain/value-objects';
import { SessionCache } from '../services/session/SessionCache';
import { ByteFormatter } from '../../infrastructure/streaming/utils/ByteFormatter';
import { logUnexpected, toFailure, UseCaseFailure } from './UseCaseFailure';

export interface GetSessionFilesRequest {
    magnet?: string;
}

export interface FileListing {
    index: number;
    path: string;
    size: number;
    sizeHuman: string;
    isSubtitle: boolean;
}

export type GetSessionFilesResponse =
    | { success: true; infoHash: string; name: string; files: FileListing[] }
    | UseCaseFailure;

export class GetSessionFilesUseCase {
    constructor(
        private sessionCache: SessionCache,
        private logger: ILogger,
        private subtitleExtensions: readonly string[]
    ) { }

    async execute(request: GetSessionFilesRequest): Promise<GetSessionFilesResponse> {
        try {
            const descriptor = MagnetDescriptor.parse(request.magnet);
            const session = await this.sessionCache.resolve(descriptor);

            return {
                success: true,
                infoHash: session.key,
                name: session.displayName,
                files: session.files.map((file) => ({
                    index: file.index,
                    path: file.path,
                    size: file.size,
                    sizeHuman: ByteFormatter.toHumanReadable(file.size),
                    isSubtitle: this.subtitleExtensions.includes(path.extname(file.path).toLowerCase())
                }))
            };
        } catch (error) {
            logUnexpected(this.logger, 'GetSessionFilesUseCase', error);
            return toFailure(error);
        }
    }
}
