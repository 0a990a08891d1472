import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { IFileSelector, ILogger, IMetadataStore, IStreamService, ITorrentFileFetcher } from '../../domain/interfaces';
import { SessionCache } from '../../application/services/session/SessionCache';
import { SubtitlePipeline } from '../../application/services/subtitles/SubtitlePipeline';
import { ArtifactRegistry } from '../../application/services/subtitles/ArtifactRegistry';
import { StreamFileUseCase } from '../../application/use-cases/StreamFileUseCase';
import { GetSessionFilesUseCase } from '../../application/use-cases/GetSessionFilesUseCase';
import { GetMetadataUseCase } from '../../application/use-cases/GetMetadataUseCase';
import { GetSessionStatusUseCase } from '../../application/use-cases/GetSessionStatusUseCase';
import { ListSessionsUseCase } from '../../application/use-cases/ListSessionsUseCase';
import { RemoveSessionUseCase } from '../../application/use-cases/RemoveSessionUseCase';
import { ConvertSubtitleUseCase } from '../../application/use-cases/ConvertSubtitleUseCase';
import { StartExtractionUseCase } from '../../application/use-cases/StartExtractionUseCase';
import { GetExtractionStatusUseCase } from '../../application/use-cases/GetExtractionStatusUseCase';
import { GetArtifactUseCase } from '../../application/use-cases/GetArtifactUseCase';
import { UploadTorrentUseCase } from '../../application/use-cases/UploadTorrentUseCase';
import { FetchTorrentUrlUseCase } from '../../application/use-cases/FetchTorrentUrlUseCase';
import { SessionErrorCode } from '../../domain/errors';
import { EXPOSED_HEADERS } from '../../infrastructure/streaming/constants/HttpConstants';
import { StreamErrorHandler } from '../../infrastructure/streaming/utils';
import { StreamController } from './controllers/StreamController';
import { SessionController } from './controllers/SessionController';
import { SubtitleController } from './controllers/SubtitleController';
import { TorrentFileController } from './controllers/TorrentFileController';
import { createSessionRoutes } from './routes/session.routes';
import { createTorrentFileRoutes } from './routes/torrent.routes';
import { clientErrorStatus } from './utils/httpResult';

export interface AppDependencies {
    sessionCache: SessionCache;
    metadataStore: IMetadataStore;
    subtitlePipeline: SubtitlePipeline;
    artifacts: ArtifactRegistry;
    streamService: IStreamService;
    fileSelector: IFileSelector;
    torrentFetcher: ITorrentFileFetcher;
    logger: ILogger;
    settings: {
        speedSampleIntervalMs: number;
        subtitleExtensions: readonly string[];
        contentTypes: Readonly<Record<string, string>>;
        maxTorrentBytes: number;
    };
}

/**
 * Creates and configures Express application
 * Used both by the production server and by tests, which inject fakes
 */
export function createApp(deps: AppDependencies): Express {
    const { sessionCache, subtitlePipeline, logger, settings } = deps;

    // Initialize use cases
    const streamFileUseCase = new StreamFileUseCase(sessionCache, deps.fileSelector, logger);
    const getSessionFilesUseCase = new GetSessionFilesUseCase(sessionCache, logger, settings.subtitleExtensions);
    const getMetadataUseCase = new GetMetadataUseCase(sessionCache, logger);
    const getSessionStatusUseCase = new GetSessionStatusUseCase(
        sessionCache,
        deps.fileSelector,
        logger,
        settings.speedSampleIntervalMs
    );
    const listSessionsUseCase = new ListSessionsUseCase(sessionCache);
    const removeSessionUseCase = new RemoveSessionUseCase(sessionCache, deps.metadataStore, logger);
    const convertSubtitleUseCase = new ConvertSubtitleUseCase(sessionCache, subtitlePipeline, logger);
    const startExtractionUseCase = new StartExtractionUseCase(sessionCache, subtitlePipeline, logger);
    const getExtractionStatusUseCase = new GetExtractionStatusUseCase(subtitlePipeline, logger);
    const getArtifactUseCase = new GetArtifactUseCase(deps.artifacts, logger);
    const uploadTorrentUseCase = new UploadTorrentUseCase(logger);
    const fetchTorrentUrlUseCase = new FetchTorrentUrlUseCase(deps.torrentFetcher, logger);

    // Initialize controllers
    const streamController = new StreamController(streamFileUseCase, deps.streamService, logger);
    const sessionController = new SessionController(
        getSessionFilesUseCase,
        getMetadataUseCase,
        getSessionStatusUseCase,
        listSessionsUseCase,
        removeSessionUseCase
    );
    const subtitleController = new SubtitleController(
        convertSubtitleUseCase,
        startExtractionUseCase,
        getExtractionStatusUseCase,
        getArtifactUseCase,
        settings.contentTypes,
        logger
    );
    const torrentFileController = new TorrentFileController(uploadTorrentUseCase, fetchTorrentUrlUseCase);

    // Initialize Express app
    const app: Express = express();

    app.use(cors({ exposedHeaders: [...EXPOSED_HEADERS] }));

    // Setup routes
    app.use('/', createSessionRoutes(streamController, sessionController, subtitleController));
    app.use('/', createTorrentFileRoutes(torrentFileController, settings.maxTorrentBytes));

    // Anything a handler threw without answering
    app.use((error: Error, _req: Request, res: Response, _next: NextFunction) => {
        const status = clientErrorStatus(error);
        if (status !== undefined) {
            logger.warn(`[http] rejected request body: ${error.message}`);
            StreamErrorHandler.sendError(
                res,
                `Invalid request body: ${error.message}`,
                status,
                SessionErrorCode.INVALID_INPUT
            );
            return;
        }
        StreamErrorHandler.handle(error, res, logger, 'http');
    });

    return app;
}
