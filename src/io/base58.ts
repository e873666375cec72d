/**
 * Base58 encoding/decoding over the ledger alphabet using @scure/base.
 *
 * The alphabet starts with `r`, so a leading zero byte (the account ID
 * prefix) renders as `r`.
 *
 * @packageDocumentation
 */

import { utils } from '@scure/base';

/** Symbol order defines the digit values 0..57. */
export const ALPHABET = 'rpshnaf39wBUDNEGHJKLM4PQRST7VWXYZ2bcdeCg65jkm8oFqi1tuvAxyz';

/**
 * Base58 codec instance over {@link ALPHABET}. Leading zero bytes map to
 * leading `r` symbols and back.
 */
export const base58 = utils.chain(utils.radix(58), utils.alphabet(ALPHABET), utils.join(''));

/**
 * Encode a Uint8Array to a base58 string.
 */
export function encode(data: Uint8Array): string {
    return base58.encode(data);
}

/**
 * Decode a base58 string to a Uint8Array.
 * @throws If the string contains a symbol outside {@link ALPHABET}
 */
export function decode(str: string): Uint8Array {
    return base58.decode(str);
}
