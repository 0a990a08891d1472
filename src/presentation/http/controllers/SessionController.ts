import { Request, Response } from 'express';
import { GetSessionFilesUseCase } from '../../../application/use-cases/GetSessionFilesUseCase';
import { GetMetadataUseCase } from '../../../application/use-cases/GetMetadataUseCase';
import { GetSessionStatusUseCase } from '../../../application/use-cases/GetSessionStatusUseCase';
import { ListSessionsUseCase } from '../../../application/use-cases/ListSessionsUseCase';
import { RemoveSessionUseCase } from '../../../application/use-cases/RemoveSessionUseCase';
import { queryString, sendFailure } from '../utils/httpResult';

/**
 * Controller for session lookups and lifecycle
 */
export class SessionController {
    constructor(
        private getSessionFilesUseCase: GetSessionFilesUseCase,
        private getMetadataUseCase: GetMetadataUseCase,
        private getSessionStatusUseCase: GetSessionStatusUseCase,
        private listSessionsUseCase: ListSessionsUseCase,
        private removeSessionUseCase: RemoveSessionUseCase
    ) { }

    /**
     * Handles GET /files?magnet=...
     */
    async getFiles(req: Request, res: Response): Promise<void> {
        const result = await this.getSessionFilesUseCase.execute({ magnet: queryString(req, 'magnet') });

        if (!result.success) {
            sendFailure(res, result);
            return;
        }

        res.json({ infoHash: result.infoHash, name: result.name, files: result.files });
    }

    /**
     * Handles GET /metadata?magnet=...
     */
    async getMetadata(req: Request, res: Response): Promise<void> {
        const result = await this.getMetadataUseCase.execute({ magnet: queryString(req, 'magnet') });

        if (!result.success) {
            sendFailure(res, result);
            return;
        }

        res.json(result.metadata);
    }

    /**
     * Handles GET /status?magnet=...&index=...
     */
    getStatus(req: Request, res: Response): void {
        const result = this.getSessionStatusUseCase.execute({
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
     * Handles GET /sessions
     */
    getAll(_req: Request, res: Response): void {
        const result = this.listSessionsUseCase.execute();
        res.json({ sessions: result.sessions, count: result.count });
    }

    /**
     * Handles DELETE /session?magnet=...
     */
    remove(req: Request, res: Response): void {
        const result = this.removeSessionUseCase.execute({ magnet: queryString(req, 'magnet') });

        if (!result.success) {
            sendFailure(res, result);
            return;
        }

        res.json({ message: result.message });
    }
}
