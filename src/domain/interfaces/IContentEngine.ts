/**
 * Content engine port
 * Hides the transfer protocol (peers, pieces, discovery) behind handles
 */

import { FileDescriptor, ProgressSnapshot, StreamRange } from '../entities/Session';
import { MagnetDescriptor } from '../value-objects/MagnetDescriptor';

export interface ContentHandle {
  /**
   * Resolves once the file list is known, rejects on engine error
   */
  whenInfo(): Promise<void>;

  name(): string;

  /**
   * Files in content order. Only meaningful after whenInfo() resolved.
   */
  files(): FileDescriptor[];

  /**
   * Opens a reader over an inclusive byte range of one file.
   * Bytes that are not downloaded yet are fetched on demand.
   */
  openReader(fileIndex: number, range: StreamRange): NodeJS.ReadableStream;

  progress(): ProgressSnapshot;

  /**
   * Serialized metadata that rehydrate() accepts
   */
  serializeMetadata(): Buffer;

  /**
   * Stops the transfer and frees its connections. Safe to call twice.
   */
  release(): void;
}

export interface IContentEngine {
  /**
   * Starts resolving a descriptor over the network
   */
  resolveFromDescriptor(descriptor: MagnetDescriptor): ContentHandle;

  /**
   * Rebuilds a handle from persisted metadata, without waiting for peers
   */
  rehydrate(metadata: Buffer): ContentHandle;

  destroy(): Promise<void>;
}
