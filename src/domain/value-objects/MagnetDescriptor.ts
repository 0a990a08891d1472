/**
 * Parsed magnet link, the caller-supplied locator of a session
 */

import { InvalidInputError } from '../errors/SessionErrors';

const BTIH_PREFIX = 'urn:btih:';
const HEX_HASH = /^[0-9a-fA-F]{40}$/;
const BASE32_HASH = /^[A-Za-z2-7]{32}$/;
const BASE32_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ234567';
const UNSAFE_NAME_CHARS = /[<>:"/\\|?*[\]()]/g;

export class MagnetDescriptor {
  private constructor(
    public readonly uri: string,
    public readonly infoHash: string,
    public readonly displayName: string
  ) {}

  /**
   * Parses a magnet URI
   * @throws InvalidInputError when the URI is not a magnet link with a btih hash
   */
  static parse(uri: string | undefined): MagnetDescriptor {
    if (!uri || !uri.startsWith('magnet:')) {
      throw new InvalidInputError('Magnet link required in parameter ?magnet=magnet:?xt=...');
    }

    const queryStart = uri.indexOf('?');
    const params = new URLSearchParams(queryStart === -1 ? '' : uri.slice(queryStart + 1));

    const topic = params.getAll('xt').find((xt) => xt.toLowerCase().startsWith(BTIH_PREFIX));
    if (!topic) {
      throw new InvalidInputError('invalid magnet link: missing xt=urn:btih: topic');
    }

    const infoHash = MagnetDescriptor.normalizeInfoHash(topic.slice(BTIH_PREFIX.length));
    if (!infoHash) {
      throw new InvalidInputError(`invalid magnet link: malformed info hash '${topic}'`);
    }

    return new MagnetDescriptor(uri, infoHash, sanitizeName(params.get('dn') ?? ''));
  }

  private static normalizeInfoHash(raw: string): string | null {
    if (HEX_HASH.test(raw)) {
      return raw.toLowerCase();
    }
    if (BASE32_HASH.test(raw)) {
      return base32ToHex(raw.toUpperCase());
    }
    return null;
  }
}

/**
 * Replaces characters that are unsafe in file names with underscores
 */
export function sanitizeName(name: string): string {
  return name.replace(UNSAFE_NAME_CHARS, '_');
}

function base32ToHex(encoded: string): string {
  let bits = '';
  for (const char of encoded) {
    bits += BASE32_ALPHABET.indexOf(char).toString(2).padStart(5, '0');
  }
  let hex = '';
  for (let i = 0; i + 4 <= bits.length; i += 4) {
    hex += parseInt(bits.slice(i, i + 4), 2).toString(16);
  }
  return hex;
}
