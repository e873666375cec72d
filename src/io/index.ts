/**
 * Byte-level I/O: the base58 transform and Uint8Array helpers.
 *
 * @packageDocumentation
 */

export { ALPHABET, base58, encode as encodeBase58, decode as decodeBase58 } from './base58.js';

export { concat, equals, startsWith, fromHex, toHex } from '../uint8array-utils.js';
