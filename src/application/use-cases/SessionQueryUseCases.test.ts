/**
 * Unit tests for the use cases that read session data
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { GetSessionFilesUseCase } from './GetSessionFilesUseCase';
import { GetMetadataUseCase } from './GetMetadataUseCase';
import { StreamFileUseCase } from './StreamFileUseCase';
import { GetSessionStatusUseCase } from './GetSessionStatusUseCase';
import { ListSessionsUseCase } from './ListSessionsUseCase';
import { RemoveSessionUseCase } from './RemoveSessionUseCase';
import { SessionCache } from '../services/session/SessionCache';
import { LargestFileSelector } from '../../infrastructure/torrent/LargestFileSelector';
import { ILogger } from '../../domain/interfaces';
import { MagnetDescriptor } from '../../domain/value-objects';
import { SessionErrorCode } from '../../domain/errors';
import { FakeContentEngine, magnetFor } from '../../__mocks__/contentEngine';
import { InMemoryMetadataStore } from '../../__mocks__/metadataStore';

const KEY_A = 'a'.repeat(40);
const KEY_B = 'b'.repeat(40);
const START = 1_700_000_000_000;

describe('session query use cases', () => {
    let engine: FakeContentEngine;
    let store: InMemoryMetadataStore;
    let cache: SessionCache;
    let mockLogger: ILogger;

    beforeEach(() => {
        vi.useFakeTimers({ toFake: ['Date'] });
        vi.setSystemTime(START);
        engine = new FakeContentEngine();
        store = new InMemoryMetadataStore();
        mockLogger = {
            log: vi.fn(),
            error: vi.fn(),
            warn: vi.fn(),
            info: vi.fn(),
            debug: vi.fn()
        };
        cache = new SessionCache(engine, store, mockLogger, { capacity: 2, resolveTimeoutMs: 1000 });
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    describe('GetSessionFilesUseCase', () => {
        it('should list files with human sizes and subtitle flags', async () => {
            engine.filesByKey.set(KEY_A, [
                { path: 'Show/ep1.mkv', size: 2048 },
                { path: 'Show/ep1.EN.SRT', size: 10 }
            ]);
            const useCase = new GetSessionFilesUseCase(cache, mockLogger, ['.srt']);

            const result = await useCase.execute({ magnet: magnetFor(KEY_A, 'Show') });

            expect(result).toEqual({
                success: true,
                infoHash: KEY_A,
                name: 'Show',
                files: [
                    { index: 0, path: 'Show/ep1.mkv', size: 2048, sizeHuman: '2.00 KB', isSubtitle: false },
                    { index: 1, path: 'Show/ep1.EN.SRT', size: 10, sizeHuman: '10 B', isSubtitle: true }
                ]
            });
        });

        it('should return error for a missing magnet link', async () => {
            const useCase = new GetSessionFilesUseCase(cache, mockLogger, ['.srt']);

            const result = await useCase.execute({});

            expect(result).toEqual({
                success: false,
                error: 'Magnet link required in parameter ?magnet=magnet:?xt=...',
                code: SessionErrorCode.INVALID_INPUT
            });
            expect(engine.coldCalls).toBe(0);
        });

        it('should report a failed resolution with its code', async () => {
            engine.infoMode = 'error';
            const useCase = new GetSessionFilesUseCase(cache, mockLogger, ['.srt']);

            const result = await useCase.execute({ magnet: magnetFor(KEY_A) });

            expect(result).toEqual({
                success: false,
                error: `Failed to resolve ${KEY_A} (cold): no peers`,
                code: SessionErrorCode.RESOLUTION_FAILED
            });
            expect(mockLogger.error).not.toHaveBeenCalledWith('Error in GetSessionFilesUseCase:', expect.anything());
        });
    });

    describe('GetMetadataUseCase', () => {
        it('should summarize the session', async () => {
            const useCase = new GetMetadataUseCase(cache, mockLogger);

            const result = await useCase.execute({ magnet: magnetFor(KEY_A) });

            expect(result).toEqual({
                success: true,
                metadata: {
                    name: 'Movie',
                    infoHash: KEY_A,
                    totalSize: 1000,
                    totalSizeHuman: '1000 B',
                    fileCount: 1
                }
            });
        });
    });

    describe('StreamFileUseCase', () => {
        let useCase: StreamFileUseCase;

        beforeEach(() => {
            engine.filesByKey.set(KEY_A, [
                { path: 'Movie/sample.mkv', size: 10 },
                { path: 'Movie/movie.mkv', size: 2048 }
            ]);
            useCase = new StreamFileUseCase(cache, new LargestFileSelector(), mockLogger);
        });

        it('should select the file by index', async () => {
            const result = await useCase.execute({ magnet: magnetFor(KEY_A), index: '0' });

            expect(result.success).toBe(true);
            if (result.success) {
                expect(result.file.path).toBe('Movie/sample.mkv');
                expect(result.file.length).toBe(10);
            }
        });

        it('should fall back to the largest file for a non-integer index', async () => {
            const result = await useCase.execute({ magnet: magnetFor(KEY_A), index: 'abc' });

            expect(result.success).toBe(true);
            if (result.success) {
                expect(result.file.name).toBe('movie.mkv');
                expect(result.file.index).toBe(1);
            }
        });

        it('should fall back to the largest file for an index out of range', async () => {
            for (const index of ['5', '-1']) {
                const result = await useCase.execute({ magnet: magnetFor(KEY_A), index });

                expect(result.success).toBe(true);
                if (result.success) {
                    expect(result.file.path).toBe('Movie/movie.mkv');
                    expect(result.file.length).toBe(2048);
                }
            }
        });

        it('should return not found for a session without files', async () => {
            engine.filesByKey.set(KEY_B, []);

            const result = await useCase.execute({ magnet: magnetFor(KEY_B), index: '0' });

            expect(result).toEqual({
                success: false,
                error: 'Could not find the specified file in the torrent',
                code: SessionErrorCode.NOT_FOUND
            });
        });
    });

    describe('GetSessionStatusUseCase', () => {
        it('should not load uncached sessions', () => {
            const useCase = new GetSessionStatusUseCase(cache, new LargestFileSelector(), mockLogger, 500);

            const result = useCase.execute({ magnet: magnetFor(KEY_A) });

            expect(result).toEqual({
                success: false,
                error: 'Torrent not found or not active',
                code: SessionErrorCode.NOT_FOUND
            });
            expect(engine.coldCalls).toBe(0);
        });

        it('should report progress, peers and the sampled speed', async () => {
            await cache.resolve(MagnetDescriptor.parse(magnetFor(KEY_A)));
            const handle = engine.lastHandle();
            if (!handle) {
                throw new Error('no handle');
            }
            handle.bytesCompleted = 500;
            const useCase = new GetSessionStatusUseCase(cache, new LargestFileSelector(), mockLogger, 500);

            const result = useCase.execute({ magnet: magnetFor(KEY_A), index: '0' }, START + 1000);

            expect(result).toEqual({
                success: true,
                status: {
                    infoHash: KEY_A,
                    name: 'Movie',
                    totalBytes: 1000,
                    bytesCompleted: 500,
                    percentageCompleted: 50,
                    downloadSpeedBps: 500,
                    downloadSpeedHuman: '500 B/s',
                    connectedPeers: 2,
                    files: [{ path: 'Movie/movie.mp4', size: 1000, bytesCompleted: 0, percentageCompleted: 0 }],
                    streamingFileSize: 1000,
                    streamingFileSizeHuman: '1000 B'
                }
            });
        });

        it('should keep the previous speed inside the sampling interval', async () => {
            await cache.resolve(MagnetDescriptor.parse(magnetFor(KEY_A)));
            const handle = engine.lastHandle();
            if (!handle) {
                throw new Error('no handle');
            }
            const useCase = new GetSessionStatusUseCase(cache, new LargestFileSelector(), mockLogger, 500);
            handle.bytesCompleted = 500;
            useCase.execute({ magnet: magnetFor(KEY_A) }, START + 1000);
            handle.bytesCompleted = 900;

            const result = useCase.execute({ magnet: magnetFor(KEY_A) }, START + 1200);

            expect(result.success).toBe(true);
            if (result.success) {
                expect(result.status.downloadSpeedBps).toBe(500);
                expect(result.status.streamingFileSize).toBeUndefined();
            }
        });

        it('should report the largest file for an index out of range', async () => {
            engine.filesByKey.set(KEY_A, [
                { path: 'Movie/sample.mkv', size: 10 },
                { path: 'Movie/movie.mkv', size: 2048 }
            ]);
            await cache.resolve(MagnetDescriptor.parse(magnetFor(KEY_A)));
            const useCase = new GetSessionStatusUseCase(cache, new LargestFileSelector(), mockLogger, 500);

            const result = useCase.execute({ magnet: magnetFor(KEY_A), index: '-1' }, START + 1000);

            expect(result.success).toBe(true);
            if (result.success) {
                expect(result.status.streamingFileSize).toBe(2048);
                expect(result.status.streamingFileSizeHuman).toBe('2.00 KB');
            }
        });
    });

    describe('ListSessionsUseCase', () => {
        it('should list sessions from most to least recently used', async () => {
            await cache.resolve(MagnetDescriptor.parse(magnetFor(KEY_A)));
            vi.setSystemTime(START + 1000);
            await cache.resolve(MagnetDescriptor.parse(magnetFor(KEY_B)));

            const result = new ListSessionsUseCase(cache).execute(START + 3000);

            expect(result.count).toBe(2);
            expect(result.sessions).toEqual([
                {
                    infoHash: KEY_B,
                    name: 'Movie',
                    fileCount: 1,
                    totalSize: 1000,
                    totalSizeHuman: '1000 B',
                    lastAccessed: new Date(START + 1000).toISOString(),
                    idleMs: 2000
                },
                {
                    infoHash: KEY_A,
                    name: 'Movie',
                    fileCount: 1,
                    totalSize: 1000,
                    totalSizeHuman: '1000 B',
                    lastAccessed: new Date(START).toISOString(),
                    idleMs: 3000
                }
            ]);
        });
    });

    describe('RemoveSessionUseCase', () => {
        it('should evict the session and delete its metadata', async () => {
            await cache.resolve(MagnetDescriptor.parse(magnetFor(KEY_A)));
            const useCase = new RemoveSessionUseCase(cache, store, mockLogger);

            const result = useCase.execute({ magnet: magnetFor(KEY_A) });

            expect(result).toEqual({ success: true, message: 'Torrent stopped' });
            expect(cache.has(KEY_A)).toBe(false);
            expect(store.get(KEY_A)).toBeNull();
            expect(engine.lastHandle()?.released).toBe(1);
        });

        it('should delete stored metadata of an uncached session', () => {
            store.put(KEY_A, Buffer.from('{}'));
            const useCase = new RemoveSessionUseCase(cache, store, mockLogger);

            expect(useCase.execute({ magnet: magnetFor(KEY_A) })).toEqual({
                success: true,
                message: 'Stored metadata deleted'
            });
        });

        it('should return not found for an unknown session', () => {
            const useCase = new RemoveSessionUseCase(cache, store, mockLogger);

            expect(useCase.execute({ magnet: magnetFor(KEY_A) })).toEqual({
                success: false,
                error: 'Torrent not found',
                code: SessionErrorCode.NOT_FOUND
            });
        });
    });
});
