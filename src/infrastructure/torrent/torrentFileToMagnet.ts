import parseTorrent from 'parse-torrent';
import { describeError, InvalidInputError } from '../../domain/errors';

// 'd': every .torrent file is a bencoded dictionary
const BENCODE_DICT = 0x64;
// parse-torrent reads a buffer of exactly this length as a raw info hash
const RAW_INFO_HASH_LENGTH = 20;

/**
 * Converts the contents of a .torrent file into a magnet link
 * @throws InvalidInputError when the bytes are not a valid .torrent file
 */
export function torrentFileToMagnet(torrent: Buffer): string {
    if (torrent.length <= RAW_INFO_HASH_LENGTH || torrent[0] !== BENCODE_DICT) {
        throw new InvalidInputError('Failed to parse torrent file: not a bencoded dictionary');
    }

    let magnet: string;
    try {
        const parsed = parseTorrent(torrent);
        if (!parsed.infoHash) {
            throw new Error('missing info hash');
        }
        magnet = parseTorrent.toMagnetURI(parsed);
    } catch (error) {
        throw new InvalidInputError(`Failed to parse torrent file: ${describeError(error)}`);
    }
    return magnet;
}
