/**
 * Unit tests for the .torrent file use cases
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { UploadTorrentUseCase } from './UploadTorrentUseCase';
import { FetchTorrentUrlUseCase } from './FetchTorrentUrlUseCase';
import { ILogger } from '../../domain/interfaces';
import { SessionErrorCode } from '../../domain/errors';
import { MagnetDescriptor } from '../../domain/value-objects';
import { FakeTorrentFileFetcher, SAMPLE_INFO_HASH, SAMPLE_TORRENT } from '../../__mocks__/torrentFile';

const TORRENT_URL = 'https://tracker.test/files/movie.torrent';

describe('torrent file use cases', () => {
    let mockLogger: ILogger;
    let fetcher: FakeTorrentFileFetcher;

    beforeEach(() => {
        mockLogger = {
            log: vi.fn(),
            error: vi.fn(),
            warn: vi.fn(),
            info: vi.fn(),
            debug: vi.fn()
        };
        fetcher = new FakeTorrentFileFetcher();
        fetcher.files.set(TORRENT_URL, SAMPLE_TORRENT);
    });

    describe('UploadTorrentUseCase', () => {
        it('should return a magnet link for a valid file', () => {
            const result = new UploadTorrentUseCase(mockLogger).execute({ torrent: SAMPLE_TORRENT });

            expect(result.success).toBe(true);
            if (result.success) {
                expect(MagnetDescriptor.parse(result.magnetLink).infoHash).toBe(SAMPLE_INFO_HASH);
            }
        });

        it('should return invalid input for an empty body', () => {
            const result = new UploadTorrentUseCase(mockLogger).execute({ torrent: Buffer.alloc(0) });

            expect(result).toEqual({
                success: false,
                error: 'Failed to parse torrent file: not a bencoded dictionary',
                code: SessionErrorCode.INVALID_INPUT
            });
            expect(mockLogger.error).not.toHaveBeenCalled();
        });
    });

    describe('FetchTorrentUrlUseCase', () => {
        it('should download and convert the file', async () => {
            const result = await new FetchTorrentUrlUseCase(fetcher, mockLogger).execute({ url: TORRENT_URL });

            expect(result.success).toBe(true);
            if (result.success) {
                expect(MagnetDescriptor.parse(result.magnetLink).displayName).toBe('movie.mp4');
            }
            expect(fetcher.requested).toEqual([TORRENT_URL]);
        });

        it.each([undefined, 42, '', 'not a url', 'ftp://tracker.test/movie.torrent'])(
            'should reject %s without fetching',
            async (url) => {
                const result = await new FetchTorrentUrlUseCase(fetcher, mockLogger).execute({ url });

                expect(result).toEqual({
                    success: false,
                    error: "Missing or invalid 'url' in request body",
                    code: SessionErrorCode.INVALID_INPUT
                });
                expect(fetcher.requested).toEqual([]);
            }
        );

        it('should pass a download failure through', async () => {
            const result = await new FetchTorrentUrlUseCase(fetcher, mockLogger).execute({
                url: 'https://tracker.test/missing.torrent'
            });

            expect(result).toEqual({
                success: false,
                error: 'Failed to fetch .torrent file from URL: 404 Not Found',
                code: SessionErrorCode.FETCH_FAILED
            });
        });

        it('should return invalid input when the download is not a torrent', async () => {
            fetcher.files.set(TORRENT_URL, Buffer.from('<html>not found</html>'));

            const result = await new FetchTorrentUrlUseCase(fetcher, mockLogger).execute({ url: TORRENT_URL });

            expect(result).toMatchObject({ success: false, code: SessionErrorCode.INVALID_INPUT });
        });
    });
});
