/**
 * Magnet link decoding.
 *
 * @module core/torrent/magnet
 */

import { EngineError } from '../types.js';

const HEX_HASH = /^[0-9a-f]{40}$/i;
const BASE32_HASH = /^[A-Z2-7]{32}$/i;
const BASE32_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ234567';

/**
 * Decodes a base32 info hash into lower-case hex.
 */
function base32ToHex(value: string): string {
  let bits = '';
  for (const char of value.toUpperCase()) {
    bits += BASE32_ALPHABET.indexOf(char).toString(2).padStart(5, '0');
  }
  let hex = '';
  for (let i = 0; i + 4 <= bits.length; i += 4) {
    hex += parseInt(bits.slice(i, i + 4), 2).toString(16);
  }
  return hex;
}

/**
 * Extracts the info hash from a magnet link.
 *
 * Accepts both hex and base32 `urn:btih:` hashes; the result is always
 * 40 lower-case hex characters.
 *
 * @example
 * parseMagnetInfoHash('magnet:?xt=urn:btih:ABCDEF...') // 'abcdef...'
 *
 * @throws {EngineError} If the link is not a magnet link with a BitTorrent info hash
 */
export function parseMagnetInfoHash(link: string): string {
  if (!link.startsWith('magnet:?')) {
    throw new EngineError(`Not a magnet link: ${link}`);
  }

  const params = new URLSearchParams(link.slice('magnet:?'.length));
  for (const xt of params.getAll('xt')) {
    if (!xt.startsWith('urn:btih:')) {
      continue;
    }
    const hash = xt.slice('urn:btih:'.length);
    if (HEX_HASH.test(hash)) {
      return hash.toLowerCase();
    }
    if (BASE32_HASH.test(hash)) {
      return base32ToHex(hash);
    }
    throw new EngineError(`Invalid info hash in magnet link: ${hash}`);
  }

  throw new EngineError('Magnet link has no BitTorrent info hash');
}
