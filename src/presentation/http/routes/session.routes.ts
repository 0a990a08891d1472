import { Router } from 'express';
import { StreamController } from '../controllers/StreamController';
import { SessionController } from '../controllers/SessionController';
import { SubtitleController } from '../controllers/SubtitleController';

/**
 * Creates and configures the session routes
 * Every session is addressed by its magnet link in ?magnet=
 */
export function createSessionRoutes(
  streamController: StreamController,
  sessionController: SessionController,
  subtitleController: SubtitleController
): Router {
  const router = Router();

  // Stream endpoint
  router.get('/stream', (req, res, next) => streamController.stream(req, res).catch(next));

  // Session info endpoints
  router.get('/files', (req, res, next) => sessionController.getFiles(req, res).catch(next));
  router.get('/metadata', (req, res, next) => sessionController.getMetadata(req, res).catch(next));
  router.get('/status', (req, res) => sessionController.getStatus(req, res));

  // Session lifecycle
  router.get('/sessions', (req, res) => sessionController.getAll(req, res));
  router.delete('/session', (req, res) => sessionController.remove(req, res));

  // Subtitles
  router.get('/download-subtitle', (req, res, next) => subtitleController.convert(req, res).catch(next));
  router.get('/stream-vtt', (req, res) => subtitleController.streamVtt(req, res));
  router.get('/extract-subtitles', (req, res, next) => subtitleController.extract(req, res).catch(next));
  router.get('/extraction-status', (req, res) => subtitleController.getExtractionStatus(req, res));
  router.get('/subtitles', (req, res) => subtitleController.getFile(req, res));

  return router;
}
