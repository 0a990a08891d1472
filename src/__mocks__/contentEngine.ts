/**
 * In-process content engine for tests
 * File bytes are deterministic: byte i of a file is i % 256
 */

import { Readable } from 'stream';
import { ContentHandle, IContentEngine } from '../domain/interfaces';
import { createSession, FileDescriptor, ProgressSnapshot, Session, StreamRange } from '../domain/entities';
import { MagnetDescriptor } from '../domain/value-objects';

export interface FakeFileSpec {
  path: string;
  size: number;
  /** Overrides the generated bytes */
  content?: string;
}

export type InfoMode = 'immediate' | 'manual' | 'error';

export const DEFAULT_FILES: FakeFileSpec[] = [{ path: 'Movie/movie.mp4', size: 1000 }];

export class FakeHandle implements ContentHandle {
  released = 0;
  bytesCompleted = 0;
  peerCount = 2;
  private settleInfo: { resolve: () => void; reject: (error: Error) => void } | null = null;
  private readonly info: Promise<void>;

  constructor(
    readonly key: string,
    private readonly displayName: string,
    private readonly specs: FakeFileSpec[],
    mode: InfoMode = 'immediate'
  ) {
    this.info = new Promise<void>((resolve, reject) => {
      if (mode === 'immediate') {
        resolve();
      } else if (mode === 'error') {
        reject(new Error('no peers'));
      } else {
        this.settleInfo = { resolve, reject };
      }
    });
  }

  resolveInfo(): void {
    this.settleInfo?.resolve();
  }

  failInfo(error: Error): void {
    this.settleInfo?.reject(error);
  }

  whenInfo(): Promise<void> {
    return this.info;
  }

  name(): string {
    return this.displayName;
  }

  files(): FileDescriptor[] {
    return this.specs.map((spec, index) => ({
      index,
      path: spec.path,
      name: spec.path.split('/').pop() ?? spec.path,
      size: spec.content !== undefined ? Buffer.byteLength(spec.content) : spec.size
    }));
  }

  openReader(fileIndex: number, range: StreamRange): NodeJS.ReadableStream {
    const spec = this.specs[fileIndex];
    if (spec.content !== undefined) {
      return Readable.from([Buffer.from(spec.content).subarray(range.start, range.end + 1)]);
    }
    const data = Buffer.alloc(range.end - range.start + 1);
    for (let i = 0; i < data.length; i++) {
      data[i] = (range.start + i) % 256;
    }
    return Readable.from([data]);
  }

  progress(): ProgressSnapshot {
    const files = this.files();
    return {
      bytesCompleted: this.bytesCompleted,
      totalBytes: files.reduce((sum, f) => sum + f.size, 0),
      peerCount: this.peerCount,
      fileBytesCompleted: files.map(() => 0)
    };
  }

  serializeMetadata(): Buffer {
    return Buffer.from(JSON.stringify({ key: this.key, name: this.displayName, specs: this.specs }));
  }

  release(): void {
    this.released += 1;
  }
}

export class FakeContentEngine implements IContentEngine {
  readonly handles: FakeHandle[] = [];
  coldCalls = 0;
  rehydrateCalls = 0;
  destroyed = false;
  infoMode: InfoMode = 'immediate';
  failRehydrate = false;
  readonly filesByKey = new Map<string, FakeFileSpec[]>();

  resolveFromDescriptor(descriptor: MagnetDescriptor): FakeHandle {
    this.coldCalls += 1;
    const files = this.filesByKey.get(descriptor.infoHash) ?? DEFAULT_FILES;
    const handle = new FakeHandle(descriptor.infoHash, descriptor.displayName || 'Movie', files, this.infoMode);
    this.handles.push(handle);
    return handle;
  }

  rehydrate(metadata: Buffer): FakeHandle {
    this.rehydrateCalls += 1;
    if (this.failRehydrate) {
      throw new Error('corrupt metadata');
    }
    const parsed: { key: string; name: string; specs: FakeFileSpec[] } = JSON.parse(metadata.toString('utf8'));
    const handle = new FakeHandle(parsed.key, parsed.name, parsed.specs);
    this.handles.push(handle);
    return handle;
  }

  lastHandle(): FakeHandle | undefined {
    return this.handles[this.handles.length - 1];
  }

  async destroy(): Promise<void> {
    this.destroyed = true;
  }
}

export function magnetFor(key: string, name = 'Movie'): string {
  return `magnet:?xt=urn:btih:${key}&dn=${encodeURIComponent(name)}`;
}

export function createFakeSession(key: string, files: Array<{ path: string; size: number }>, name = 'Movie'): Session {
  return createSession(key, new FakeHandle(key, name, files), name);
}
