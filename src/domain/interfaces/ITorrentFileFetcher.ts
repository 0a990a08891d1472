/**
 * Interface for downloading .torrent files from remote URLs
 */
export interface ITorrentFileFetcher {
  /**
   * @throws TorrentFetchError when the file cannot be downloaded
   */
  fetch(url: string): Promise<Buffer>;
}
