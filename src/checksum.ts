/**
 * Integrity tag appended to every encoded identifier.
 *
 * @packageDocumentation
 */
import { sha256 } from '@noble/hashes/sha2.js';
import { equals } from './uint8array-utils.js';

export const CHECKSUM_LENGTH = 4;

/**
 * Computes the 4-byte checksum of `bytes`: the first four bytes of
 * SHA-256 applied twice.
 *
 * @example
 * ```typescript
 * import { checksum, toHex } from 'ledger-address-codec';
 *
 * toHex(checksum(new Uint8Array(0))); // '5DF6E0E2'
 * ```
 */
export function checksum(bytes: Uint8Array): Uint8Array {
    return sha256(sha256(bytes)).slice(0, CHECKSUM_LENGTH);
}

/**
 * Recomputes the checksum of `bytes` and compares it with `claimed`.
 */
export function verifyChecksum(bytes: Uint8Array, claimed: Uint8Array): boolean {
    return equals(checksum(bytes), claimed);
}
