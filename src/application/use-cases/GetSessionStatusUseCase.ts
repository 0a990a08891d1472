/**
 * Use case for transfer progress of a cached session
 * Never loads a session: an uncached key is reported as not found
 */

import { IFileSelector, ILogger } from '../../domain/interfaces';
import { NotFoundError } from '../../domain/errors';
import { MagnetDescriptor } from '../../domain/value-objects';
import { SessionCache } from '../services/session/SessionCache';
import { ByteFormatter } from '../../infrastructure/streaming/utils/ByteFormatter';
import { parseFileIndex } from '../../infrastructure/torrent/LargestFileSelector';
import { logUnexpected, toFailure, UseCaseFailure } from './UseCaseFailure';

export interface GetSessionStatusRequest {
    magnet?: string;
    index?: unknown;
}

export interface FileStatus {
    path: string;
    size: number;
    bytesCompleted: number;
    percentageCompleted: number;
}

export interface SessionStatus {
    infoHash: string;
    name: string;
    totalBytes: number;
    bytesCompleted: number;
    percentageCompleted: number;
    downloadSpeedBps: number;
    downloadSpeedHuman: string;
    connectedPeers: number;
    files: FileStatus[];
    /** Size of the file `index` selects; only reported when an integer index is given */
    streamingFileSize?: number;
    streamingFileSizeHuman?: string;
}

export type GetSessionStatusResponse = { success: true; status: SessionStatus } | UseCaseFailure;

export class GetSessionStatusUseCase {
    constructor(
        private sessionCache: SessionCache,
        private fileSelector: IFileSelector,
        private logger: ILogger,
        private speedSampleIntervalMs: number
    ) { }

    execute(request: GetSessionStatusRequest, now: number = Date.now()): GetSessionStatusResponse {
        try {
            const descriptor = MagnetDescriptor.parse(request.magnet);
            const entry = this.sessionCache.peek(descriptor.infoHash);
            if (!entry) {
                throw new NotFoundError('Torrent not found or not active', { key: descriptor.infoHash });
            }

            const { session } = entry;
            const progress = session.handle.progress();
            const speed = entry.sampleSpeed(progress.bytesCompleted, now, this.speedSampleIntervalMs);

            const status: SessionStatus = {
                infoHash: session.key,
                name: session.displayName,
                totalBytes: progress.totalBytes,
                bytesCompleted: progress.bytesCompleted,
                percentageCompleted: ByteFormatter.toPercentage(progress.bytesCompleted, progress.totalBytes),
                downloadSpeedBps: speed,
                downloadSpeedHuman: ByteFormatter.toSpeed(speed),
                connectedPeers: progress.peerCount,
                files: session.files.map((file, i) => {
                    const completed = progress.fileBytesCompleted[i] ?? 0;
                    return {
                        path: file.path,
                        size: file.size,
                        bytesCompleted: completed,
                        percentageCompleted: ByteFormatter.toPercentage(completed, file.size)
                    };
                })
            };

            const index = parseFileIndex(request.index);
            const streaming = index === undefined ? null : this.fileSelector.select(session, index);
            if (streaming) {
                status.streamingFileSize = streaming.size;
                status.streamingFileSizeHuman = ByteFormatter.toHumanReadable(streaming.size);
            }

            return { success: true, status };
        } catch (error) {
            logUnexpected(this.logger, 'GetSessionStatusUseCase', error);
            return toFailure(error);
        }
    }
}
