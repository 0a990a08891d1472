/**
 * Use case for downloading a remote .torrent file and turning it into a magnet link
 */

import { ILogger, ITorrentFileFetcher } from '../../domain/interfaces';
import { InvalidInputError } from '../../domain/errors';
import { torrentFileToMagnet } from '../../infrastructure/torrent/torrentFileToMagnet';
import { TorrentFileResponse } from './UploadTorrentUseCase';
import { logUnexpected, toFailure } from './UseCaseFailure';

export interface FetchTorrentUrlRequest {
    url: unknown;
}

export class FetchTorrentUrlUseCase {
    constructor(
        private fetcher: ITorrentFileFetcher,
        private logger: ILogger
    ) { }

    async execute(request: FetchTorrentUrlRequest): Promise<TorrentFileResponse> {
        try {
            const url = parseHttpUrl(request.url);
            const torrent = await this.fetcher.fetch(url);
            const magnetLink = torrentFileToMagnet(torrent);
            this.logger.info(`[torrent-file] converted ${url}`);
            return { success: true, magnetLink };
        } catch (error) {
            logUnexpected(this.logger, 'FetchTorrentUrlUseCase', error);
            return toFailure(error);
        }
    }
}

function parseHttpUrl(raw: unknown): string {
    if (typeof raw === 'string' && URL.canParse(raw)) {
        const url = new URL(raw);
        if (url.protocol === 'http:' || url.protocol === 'https:') {
            return url.href;
        }
    }
    throw new InvalidInputError("Missing or invalid 'url' in request body");
}
