import { Request, Response } from 'express';
import { ConvertSubtitleUseCase } from '../../../application/use-cases/ConvertSubtitleUseCase';
import { StartExtractionUseCase } from '../../../application/use-cases/StartExtractionUseCase';
import { GetExtractionStatusUseCase } from '../../../application/use-cases/GetExtractionStatusUseCase';
import { GetArtifactUseCase } from '../../../application/use-cases/GetArtifactUseCase';
import { ILogger } from '../../../domain/interfaces/ILogger';
import { contentTypeFor, StreamErrorHandler } from '../../../infrastructure/streaming/utils';
import { HTTP_HEADERS } from '../../../infrastructure/streaming/constants/HttpConstants';
import { queryString, sendFailure } from '../utils/httpResult';

/**
 * Controller for subtitle conversion, extraction and artifact downloads
 */
export class SubtitleController {
    constructor(
        private convertSubtitleUseCase: ConvertSubtitleUseCase,
        private startExtractionUseCase: StartExtractionUseCase,
        private getExtractionStatusUseCase: GetExtractionStatusUseCase,
        private getArtifactUseCase: GetArtifactUseCase,
        private contentTypes: Readonly<Record<string, string>>,
        private logger: ILogger
    ) { }

    /**
     * Handles GET /download-subtitle?magnet=...&filePath=...
     */
    async convert(req: Request, res: Response): Promise<void> {
        const result = await this.convertSubtitleUseCase.execute({
            magnet: queryString(req, 'magnet'),
            filePath: queryString(req, 'filePath')
        });

        if (!result.success) {
            sendFailure(res, result);
            return;
        }

        res.json({ vttKey: result.vttKey });
    }

    /**
     * Handles GET /stream-vtt?key=...
     */
    streamVtt(req: Request, res: Response): void {
        const result = this.getArtifactUseCase.execute({ key: queryString(req, 'key') ?? '' });

        if (!result.success) {
            sendFailure(res, result);
            return;
        }

        this.sendArtifact(res, result.filePath);
    }

    /**
     * Handles GET /extract-subtitles?magnet=...&index=...
     */
    async extract(req: Request, res: Response): Promise<void> {
        const result = await this.startExtractionUseCase.execute({
            magnet: queryString(req, 'magnet'),
            index: queryString(req, 'index')
        });

        if (!result.success) {
            sendFailure(res, result);
            return;
        }

        res.json({ logFile: result.logFile, subtitleFile: result.subtitleFile });
    }

    /**
     * Handles GET /extraction-status?magnet=...&index=...
     */
    getExtractionStatus(req: Request, res: Response): void {
        const result = this.getExtractionStatusUseCase.execute({
            magnet: queryString(req, 'magnet'),
            index: queryString(req, 'index')
        });

        if (!result.success) {
            sendFailure(res, result);
            return;
        }

        res.json(result.status);
    }

    /**
     * Handles GET /subtitles?file=...
     */
    getFile(req: Request, res: Response): void {
        const result = this.getArtifactUseCase.execute({ file: queryString(req, 'file') });

        if (!result.success) {
            sendFailure(res, result);
            return;
        }

        this.sendArtifact(res, result.filePath);
    }

    private sendArtifact(res: Response, filePath: string): void {
        const contentType = contentTypeFor(filePath, this.contentTypes);
        if (contentType !== HTTP_HEADERS.DEFAULT_CONTENT_TYPE) {
            res.setHeader('Content-Type', contentType);
        }
        res.setHeader('Cache-Control', HTTP_HEADERS.CACHE_CONTROL_NO_CACHE);

        res.sendFile(filePath, (error) => {
            if (error) {
                StreamErrorHandler.handle(error, res, this.logger, 'subtitles', { filePath });
            }
        });
    }
}
