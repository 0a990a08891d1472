/**
 * Adapter from WebTorrent torrents to content handles
 */

import { Instance, TorrentFile } from 'webtorrent';
import { ContentHandle, ILogger } from '../../domain/interfaces';
import { FileDescriptor, ProgressSnapshot, StreamRange } from '../../domain/entities';
import { ExtendedTorrent, hasMetadata } from './WebTorrentExtendedTypes';

export class WebTorrentAdapter {
  static toFileDescriptor(file: TorrentFile, index: number): FileDescriptor {
    return {
      index,
      path: file.path.split('\\').join('/'),
      name: file.name,
      size: file.length
    };
  }

  static toProgress(torrent: ExtendedTorrent): ProgressSnapshot {
    return {
      bytesCompleted: torrent.downloaded,
      totalBytes: torrent.length,
      peerCount: torrent.numPeers,
      fileBytesCompleted: torrent.files.map((file) => file.downloaded)
    };
  }
}

/**
 * ContentHandle backed by one WebTorrent torrent
 */
export class WebTorrentHandle implements ContentHandle {
  private released = false;

  constructor(
    private readonly client: Instance,
    private readonly torrent: ExtendedTorrent,
    private readonly logger: ILogger
  ) {}

  whenInfo(): Promise<void> {
    if (hasMetadata(this.torrent)) {
      return Promise.resolve();
    }
    if (this.released) {
      return Promise.reject(new Error('torrent was released before metadata arrived'));
    }

    return new Promise<void>((resolve, reject) => {
      const torrentRef = this.torrent;

      const cleanup = (): void => {
        torrentRef.off('metadata', onMetadata);
        torrentRef.off('error', onError);
      };

      const onMetadata = (): void => {
        cleanup();
        resolve();
      };

      const onError = (raw: Error | string): void => {
        cleanup();
        reject(typeof raw === 'string' ? new Error(raw) : raw);
      };

      torrentRef.once('metadata', onMetadata);
      torrentRef.once('error', onError);
    });
  }

  name(): string {
    return this.torrent.name ?? '';
  }

  files(): FileDescriptor[] {
    return this.torrent.files.map((file, index) => WebTorrentAdapter.toFileDescriptor(file, index));
  }

  openReader(fileIndex: number, range: StreamRange): NodeJS.ReadableStream {
    const file = this.torrent.files[fileIndex];
    if (!file) {
      throw new RangeError(`file index ${fileIndex} out of range`);
    }
    return file.createReadStream({ start: range.start, end: range.end });
  }

  progress(): ProgressSnapshot {
    return WebTorrentAdapter.toProgress(this.torrent);
  }

  serializeMetadata(): Buffer {
    const torrentFile = this.torrent.torrentFile;
    if (!torrentFile || torrentFile.length === 0) {
      throw new Error(`no metadata available for ${this.torrent.infoHash}`);
    }
    return torrentFile;
  }

  release(): void {
    if (this.released) {
      return;
    }
    this.released = true;
    try {
      this.client.remove(this.torrent);
    } catch (error) {
      // Already gone from the client (destroyed or never registered)
      this.logger.warn(`[engine] remove ${this.torrent.infoHash} failed:`, error);
    }
  }
}
