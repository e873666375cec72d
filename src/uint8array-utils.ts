/**
 * Uint8Array helpers used by the codec for framing and comparing byte strings.
 *
 * @packageDocumentation
 */

/**
 * Concatenates multiple Uint8Arrays into a single Uint8Array.
 *
 * @param arrays - Arrays to concatenate
 * @returns A new Uint8Array containing all input arrays
 *
 * @example
 * ```typescript
 * import { concat, fromHex } from 'ledger-address-codec';
 *
 * const prefix = fromHex('21');
 * const entropy = fromHex('cf2de378fbdd7e2ee87d486dfb5a7bff');
 * const framed = concat([prefix, entropy]);
 * // framed is 17 bytes starting with 0x21
 * ```
 */
export function concat(arrays: readonly Uint8Array[]): Uint8Array {
    const totalLength = arrays.reduce((sum, arr) => sum + arr.length, 0);
    const result = new Uint8Array(totalLength);
    let offset = 0;
    for (const arr of arrays) {
        result.set(arr, offset);
        offset += arr.length;
    }
    return result;
}

/**
 * Checks if two Uint8Arrays are equal.
 *
 * @returns True if arrays have the same length and contents
 */
export function equals(a: Uint8Array, b: Uint8Array): boolean {
    if (a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
        if (a[i] !== b[i]) return false;
    }
    return true;
}

/**
 * Checks whether `bytes` begins with every byte of `prefix`.
 * An empty prefix matches any input.
 */
export function startsWith(bytes: Uint8Array, prefix: ArrayLike<number>): boolean {
    if (bytes.length < prefix.length) return false;
    for (let i = 0; i < prefix.length; i++) {
        if (bytes[i] !== prefix[i]) return false;
    }
    return true;
}

/**
 * Converts a hex string to Uint8Array.
 *
 * @param hex - Hex string (with or without 0x prefix)
 * @throws Error if hex string is invalid
 *
 * @example
 * ```typescript
 * import { fromHex } from 'ledger-address-codec';
 *
 * const bytes = fromHex('BA8E78626EE42C41B46D46C3048DF3A1C3C87072');
 * // bytes.length is 20
 * ```
 */
export function fromHex(hex: string): Uint8Array {
    if (hex.startsWith('0x') || hex.startsWith('0X')) {
        hex = hex.slice(2);
    }
    if (hex.length % 2 !== 0) {
        throw new Error('Invalid hex string: odd length');
    }
    const length = hex.length / 2;
    const result = new Uint8Array(length);
    for (let i = 0; i < length; i++) {
        const pair = hex.slice(i * 2, i * 2 + 2);
        if (!/^[0-9a-fA-F]{2}$/.test(pair)) {
            throw new Error(`Invalid hex character at position ${i * 2}`);
        }
        result[i] = parseInt(pair, 16);
    }
    return result;
}

const HEX_CHARS = '0123456789ABCDEF';

/**
 * Converts a Uint8Array to an uppercase hex string, the form ledger tooling
 * prints account IDs and entropy in.
 *
 * @example
 * ```typescript
 * import { toHex } from 'ledger-address-codec';
 *
 * toHex(new Uint8Array([0xcf, 0x2d])); // 'CF2D'
 * ```
 */
export function toHex(bytes: Uint8Array): string {
    let result = '';
    for (let i = 0; i < bytes.length; i++) {
        result += HEX_CHARS[bytes[i] >> 4] + HEX_CHARS[bytes[i] & 0x0f];
    }
    return result;
}
