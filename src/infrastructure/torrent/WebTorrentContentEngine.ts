import WebTorrent, { Instance } from 'webtorrent';
import fs from 'fs';
import { IContentEngine, ContentHandle, ILogger } from '../../domain/interfaces';
import { MagnetDescriptor } from '../../domain/value-objects';
import { WebTorrentHandle } from './WebTorrentAdapter';
import { ExtendedTorrent } from './WebTorrentExtendedTypes';

/**
 * WebTorrent implementation of IContentEngine
 * Owns the client; payload files are written under the download directory
 */
export class WebTorrentContentEngine implements IContentEngine {
  private readonly client: Instance;

  constructor(
    private readonly downloadDir: string,
    private readonly logger: ILogger
  ) {
    try {
      fs.mkdirSync(downloadDir, { recursive: true });
    } catch (error) {
      logger.error('Failed to create download directory:', error);
      throw new Error(`Failed to create download directory: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }

    this.client = new WebTorrent();
    this.client.on('error', (err: Error | string) => {
      this.logger.error('[engine] client error:', err);
    });
  }

  resolveFromDescriptor(descriptor: MagnetDescriptor): ContentHandle {
    this.logger.info(`[engine] fetching metadata for ${descriptor.infoHash}`);
    const torrent: ExtendedTorrent = this.client.add(descriptor.uri, { path: this.downloadDir });
    return new WebTorrentHandle(this.client, torrent, this.logger);
  }

  rehydrate(metadata: Buffer): ContentHandle {
    const torrent: ExtendedTorrent = this.client.add(metadata, { path: this.downloadDir });
    this.logger.debug(`[engine] rehydrated ${torrent.infoHash}`);
    return new WebTorrentHandle(this.client, torrent, this.logger);
  }

  destroy(): Promise<void> {
    return new Promise<void>((resolve) => {
      this.client.destroy((err) => {
        if (err) {
          this.logger.warn('[engine] destroy reported an error:', err);
        }
        resolve();
      });
    });
  }
}
