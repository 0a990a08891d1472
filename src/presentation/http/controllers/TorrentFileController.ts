import { Request, Response } from 'express';
import { UploadTorrentUseCase } from '../../../application/use-cases/UploadTorrentUseCase';
import { FetchTorrentUrlUseCase } from '../../../application/use-cases/FetchTorrentUrlUseCase';
import { sendFailure } from '../utils/httpResult';

/**
 * Controller for converting .torrent files into magnet links
 */
export class TorrentFileController {
    constructor(
        private uploadTorrentUseCase: UploadTorrentUseCase,
        private fetchTorrentUrlUseCase: FetchTorrentUrlUseCase
    ) { }

    /**
     * Handles POST /upload-torrent with the raw file as body
     */
    upload(req: Request, res: Response): void {
        const body: unknown = req.body;
        const result = this.uploadTorrentUseCase.execute({
            torrent: Buffer.isBuffer(body) ? body : Buffer.alloc(0)
        });

        if (!result.success) {
            sendFailure(res, result);
            return;
        }

        res.json({ magnetLink: result.magnetLink });
    }

    /**
     * Handles POST /fetch-torrent-url with a JSON body {"url": "..."}
     */
    async fetchUrl(req: Request, res: Response): Promise<void> {
        const body: unknown = req.body;
        const url = typeof body === 'object' && body !== null && 'url' in body ? body.url : undefined;
        const result = await this.fetchTorrentUrlUseCase.execute({ url });

        if (!result.success) {
            sendFailure(res, result);
            return;
        }

        res.json({ magnetLink: result.magnetLink });
    }
}
