/**
 * Durable metadata store port
 * Maps a session key to an opaque metadata blob
 */

import { SessionKey } from '../entities/Session';

export interface IMetadataStore {
  /**
   * @returns the stored blob or null when the key is unknown
   */
  get(key: SessionKey): Buffer | null;

  /**
   * Inserts or replaces the blob for a key. Throws on write failure.
   */
  put(key: SessionKey, metadata: Buffer): void;

  /**
   * @returns true when a record was deleted
   */
  delete(key: SessionKey): boolean;

  close(): void;
}
