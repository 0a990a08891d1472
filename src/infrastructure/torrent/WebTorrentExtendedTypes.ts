/**
 * Extended types for WebTorrent internal properties
 * These are not part of the published typings but exist at runtime
 */

import { Torrent } from 'webtorrent';

/**
 * Torrent with its parsed info dictionary.
 * Uses an intersection type to avoid conflicts with the base Torrent interface;
 * every Torrent is assignable since the property is optional.
 */
export type ExtendedTorrent = Torrent & {
  /**
   * Raw info dictionary, set once metadata has been received
   */
  readonly metadata?: Buffer | null;
};

/**
 * True once the file list is known
 */
export function hasMetadata(torrent: ExtendedTorrent): boolean {
  return Boolean(torrent.metadata) || torrent.files.length > 0;
}
