import express, { Router } from 'express';
import { TorrentFileController } from '../controllers/TorrentFileController';

/**
 * Creates the routes that turn .torrent files into magnet links
 */
export function createTorrentFileRoutes(controller: TorrentFileController, maxBytes: number): Router {
  const router = Router();

  // Any content type: clients send application/x-bittorrent or octet-stream
  router.post('/upload-torrent', express.raw({ type: () => true, limit: maxBytes }), (req, res) =>
    controller.upload(req, res)
  );
  router.post('/fetch-torrent-url', express.json(), (req, res, next) => controller.fetchUrl(req, res).catch(next));

  return router;
}
