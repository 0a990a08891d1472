/**
 * Mock implementation of WebTorrent for testing
 * Torrents are built from `mockControl`; metadata serializes to JSON
 */

import { EventEmitter } from 'events';
import { Readable } from 'stream';

export interface MockFileSpec {
    path: string;
    length: number;
}

export type MetadataMode = 'emit' | 'never' | 'error';

export const mockControl: { files: MockFileSpec[]; name: string; metadataMode: MetadataMode } = {
    files: [{ path: 'Test Torrent/test-video.mp4', length: 1000 }],
    name: 'Test Torrent',
    metadataMode: 'emit'
};

export function resetMockControl(): void {
    mockControl.files = [{ path: 'Test Torrent/test-video.mp4', length: 1000 }];
    mockControl.name = 'Test Torrent';
    mockControl.metadataMode = 'emit';
}

/**
 * Byte at absolute offset `i` of every mock file
 */
function mockByteAt(i: number): number {
    return i % 256;
}

export class MockTorrentFile {
    readonly name: string;
    downloaded = 0;

    constructor(
        readonly path: string,
        readonly length: number
    ) {
        this.name = path.split('/').pop() ?? path;
    }

    createReadStream(options?: { start?: number; end?: number }): NodeJS.ReadableStream {
        const start = options?.start ?? 0;
        const end = options?.end ?? this.length - 1;
        const data = Buffer.alloc(Math.max(0, end - start + 1));
        for (let i = 0; i < data.length; i++) {
            data[i] = mockByteAt(start + i);
        }
        return Readable.from([data]);
    }
}

export class MockTorrent extends EventEmitter {
    files: MockTorrentFile[] = [];
    metadata: Buffer | null = null;
    torrentFile: Buffer | null = null;
    downloaded = 0;
    numPeers = 3;
    length = 0;
    destroyed = false;

    constructor(
        readonly infoHash: string,
        public name: string
    ) {
        super();
    }

    /**
     * Fills in files and metadata the way a real torrent does once peers answer
     */
    receiveMetadata(files: MockFileSpec[]): void {
        this.files = files.map((f) => new MockTorrentFile(f.path, f.length));
        this.length = files.reduce((sum, f) => sum + f.length, 0);
        this.torrentFile = Buffer.from(JSON.stringify({ infoHash: this.infoHash, name: this.name, files }));
        this.metadata = this.torrentFile;
        this.emit('metadata');
    }
}

function parseMetadata(buffer: Buffer): { infoHash: string; name: string; files: MockFileSpec[] } {
    const parsed: unknown = JSON.parse(buffer.toString('utf8'));
    if (
        typeof parsed === 'object' &&
        parsed !== null &&
        'infoHash' in parsed &&
        typeof parsed.infoHash === 'string' &&
        'name' in parsed &&
        typeof parsed.name === 'string' &&
        'files' in parsed &&
        Array.isArray(parsed.files)
    ) {
        const files: MockFileSpec[] = parsed.files.filter(
            (f: unknown): f is MockFileSpec =>
                typeof f === 'object' && f !== null && 'path' in f && 'length' in f
        );
        return { infoHash: parsed.infoHash, name: parsed.name, files };
    }
    throw new Error('Invalid torrent identifier');
}

export class MockWebTorrentClient extends EventEmitter {
    readonly torrents: MockTorrent[] = [];
    readonly added: Array<{ torrentId: string | Buffer; opts?: { path?: string } }> = [];

    add(torrentId: string | Buffer, opts?: { path?: string }): MockTorrent {
        this.added.push({ torrentId, opts });

        if (Buffer.isBuffer(torrentId)) {
            const meta = parseMetadata(torrentId);
            const torrent = new MockTorrent(meta.infoHash, meta.name);
            this.torrents.push(torrent);
            // Parsed synchronously like a .torrent buffer
            torrent.receiveMetadata(meta.files);
            return torrent;
        }

        const match = torrentId.match(/btih:([a-fA-F0-9]{40})/);
        const infoHash = match ? match[1].toLowerCase() : `hash_${this.torrents.length}`;
        const torrent = new MockTorrent(infoHash, mockControl.name);
        this.torrents.push(torrent);

        const files = mockControl.files;
        switch (mockControl.metadataMode) {
            case 'emit':
                // Emit metadata after a short delay (simulating network delay)
                setImmediate(() => {
                    if (!torrent.destroyed) {
                        torrent.receiveMetadata(files);
                    }
                });
                break;
            case 'error':
                setImmediate(() => torrent.emit('error', new Error('tracker unreachable')));
                break;
            case 'never':
                break;
        }
        return torrent;
    }

    remove(torrent: MockTorrent): void {
        const index = this.torrents.indexOf(torrent);
        if (index === -1) {
            throw new Error(`No torrent with id ${torrent.infoHash}`);
        }
        this.torrents.splice(index, 1);
        torrent.destroyed = true;
    }

    destroy(callback?: (err?: Error) => void): void {
        this.torrents.forEach((t) => {
            t.destroyed = true;
        });
        this.torrents.length = 0;
        if (callback) {
            setImmediate(callback);
        }
    }
}

/**
 * Every client the mocked constructor has returned
 */
export const createdClients: MockWebTorrentClient[] = [];

export function createMockWebTorrentClient(): MockWebTorrentClient {
    const client = new MockWebTorrentClient();
    createdClients.push(client);
    return client;
}
