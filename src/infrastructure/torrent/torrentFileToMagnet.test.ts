import { describe, it, expect } from 'vitest';
import { torrentFileToMagnet } from './torrentFileToMagnet';
import { MagnetDescriptor } from '../../domain/value-objects';
import { InvalidInputError } from '../../domain/errors';
import { SAMPLE_INFO_HASH, SAMPLE_TORRENT } from '../../__mocks__/torrentFile';

describe('torrentFileToMagnet', () => {
    it('should build a magnet link carrying the info hash and name', () => {
        const magnet = MagnetDescriptor.parse(torrentFileToMagnet(SAMPLE_TORRENT));

        expect(magnet.infoHash).toBe(SAMPLE_INFO_HASH);
        expect(magnet.displayName).toBe('movie.mp4');
    });

    it('should reject bytes that are not a bencoded dictionary', () => {
        expect(() => torrentFileToMagnet(Buffer.from('definitely not a torrent file'))).toThrow(
            'Failed to parse torrent file: not a bencoded dictionary'
        );
    });

    it('should reject a twenty byte body', () => {
        expect(() => torrentFileToMagnet(Buffer.from('d'.repeat(20)))).toThrow(InvalidInputError);
    });

    it('should reject a dictionary without an info section', () => {
        expect(() => torrentFileToMagnet(Buffer.from('d8:announce21:udp://tracker.test:80e'))).toThrow(
            InvalidInputError
        );
    });
});
