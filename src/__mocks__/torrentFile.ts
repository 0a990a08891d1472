/**
 * A minimal single-file .torrent and an in-memory fetcher serving it
 */

import { createHash } from 'crypto';
import { TorrentFetchError } from '../domain/errors';
import { ITorrentFileFetcher } from '../domain/interfaces';

const INFO = `d6:lengthi1000e4:name9:movie.mp412:piece lengthi16384e6:pieces20:${'a'.repeat(20)}e`;

export const SAMPLE_TORRENT = Buffer.from(`d8:announce21:udp://tracker.test:804:info${INFO}e`);
export const SAMPLE_INFO_HASH = createHash('sha1').update(INFO).digest('hex');

export class FakeTorrentFileFetcher implements ITorrentFileFetcher {
  readonly files = new Map<string, Buffer>();
  readonly requested: string[] = [];

  async fetch(url: string): Promise<Buffer> {
    this.requested.push(url);
    const file = this.files.get(url);
    if (!file) {
      throw new TorrentFetchError(url, '404 Not Found');
    }
    return file;
  }
}
