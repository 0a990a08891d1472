import axios from 'axios';
import { ILogger, ITorrentFileFetcher } from '../../domain/interfaces';
import { describeError, TorrentFetchError } from '../../domain/errors';

export interface TorrentFileFetcherOptions {
  timeoutMs: number;
  maxBytes: number;
}

/**
 * Downloads .torrent files over HTTP(S)
 */
export class AxiosTorrentFileFetcher implements ITorrentFileFetcher {
  constructor(
    private readonly logger: ILogger,
    private readonly options: TorrentFileFetcherOptions
  ) {}

  async fetch(url: string): Promise<Buffer> {
    this.logger.info(`[torrent-file] fetching ${url}`);
    try {
      const response = await axios.get<ArrayBuffer>(url, {
        responseType: 'arraybuffer',
        timeout: this.options.timeoutMs,
        maxContentLength: this.options.maxBytes
      });
      const data = Buffer.from(response.data);
      this.logger.debug(`[torrent-file] received ${data.length} bytes from ${url}`);
      return data;
    } catch (error) {
      if (axios.isAxiosError(error) && error.response) {
        const { status, statusText } = error.response;
        this.logger.warn(`[torrent-file] ${url} answered ${status}`);
        throw new TorrentFetchError(url, `${status} ${statusText}`.trim());
      }
      this.logger.warn(`[torrent-file] request to ${url} failed: ${describeError(error)}`);
      throw new TorrentFetchError(url, describeError(error));
    }
  }
}
