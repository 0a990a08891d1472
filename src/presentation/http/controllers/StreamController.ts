import { Request, Response } from 'express';
import { StreamFileUseCase } from '../../../application/use-cases/StreamFileUseCase';
import { IStreamService } from '../../../domain/interfaces/IStreamService';
import { ILogger } from '../../../domain/interfaces/ILogger';
import { StreamErrorHandler } from '../../../infrastructure/streaming/utils';
import { queryString, sendFailure } from '../utils/httpResult';

/**
 * Controller for handling stream-related HTTP requests
 */
export class StreamController {
    constructor(
        private streamFileUseCase: StreamFileUseCase,
        private streamService: IStreamService,
        private logger: ILogger
    ) { }

    /**
     * Handles GET /stream?magnet=...&index=...
     */
    async stream(req: Request, res: Response): Promise<void> {
        const result = await this.streamFileUseCase.execute({
            magnet: queryString(req, 'magnet'),
            index: queryString(req, 'index')
        });

        if (!result.success) {
            sendFailure(res, result);
            return;
        }

        try {
            await this.streamService.stream(req, res, result.file);
        } catch (error) {
            // Only sends an error body if headers haven't been sent yet
            StreamErrorHandler.handle(
                error instanceof Error ? error : new Error(String(error)),
                res,
                this.logger,
                'stream',
                { file: result.file.path }
            );
        }
    }
}
