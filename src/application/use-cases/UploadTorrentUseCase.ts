/**
 * Use case for turning an uploaded .torrent file into a magnet link
 */

import { ILogger } from '../../domain/interfaces';
import { torrentFileToMagnet } from '../../infrastructure/torrent/torrentFileToMagnet';
import { logUnexpected, toFailure, UseCaseFailure } from './UseCaseFailure';

export interface UploadTorrentRequest {
    torrent: Buffer;
}

export type TorrentFileResponse = { success: true; magnetLink: string } | UseCaseFailure;

export class UploadTorrentUseCase {
    constructor(private logger: ILogger) { }

    execute(request: UploadTorrentRequest): TorrentFileResponse {
        try {
            const magnetLink = torrentFileToMagnet(request.torrent);
            this.logger.info(`[torrent-file] converted upload of ${request.torrent.length} bytes`);
            return { success: true, magnetLink };
        } catch (error) {
            logUnexpected(this.logger, 'UploadTorrentUseCase', error);
            return toFailure(error);
        }
    }
}
