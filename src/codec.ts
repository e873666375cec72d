/**
 * Framing of identifiers: prefix ++ payload ++ checksum, rendered in base58.
 *
 * Decoding checks, in order, the alphabet, the total length, the prefix and
 * the checksum. Every failure surfaces as the same {@link DecodeError}.
 *
 * @packageDocumentation
 */
import { CHECKSUM_LENGTH, checksum, verifyChecksum } from './checksum.js';
import { DecodeError } from './errors.js';
import { FORMATS, type FormatDescriptor, type IdentifierKind } from './formats.js';
import { decode as decodeBase58, encode as encodeBase58 } from './io/base58.js';
import { assertUint8ArrayN, isString } from './types.js';
import { concat, startsWith } from './uint8array-utils.js';

/**
 * Encodes `payload` behind `prefix` and appends the checksum of both.
 *
 * @example
 * ```typescript
 * import { encodeWithPrefix } from 'ledger-address-codec';
 *
 * encodeWithPrefix(new Uint8Array([0x00]), new Uint8Array(20));
 * // 'rrrrrrrrrrrrrrrrrrrrrhoLvTp'
 * ```
 */
export function encodeWithPrefix(prefix: ArrayLike<number>, payload: Uint8Array): string {
    const body = concat([Uint8Array.from(prefix), payload]);
    return encodeBase58(concat([body, checksum(body)]));
}

/**
 * Encodes `payload` as an identifier of the given kind.
 *
 * @throws TypeError if `payload` is not exactly the format's payload length
 */
export function encodeIdentifier(kind: IdentifierKind, payload: Uint8Array): string {
    const format = FORMATS[kind];
    assertUint8ArrayN(payload, format.payloadLength, 'payload');
    return encodeWithPrefix(format.prefix, payload);
}

/**
 * Decodes an identifier string and returns its payload bytes.
 *
 * @param format - Identifier kind or a format descriptor to validate against
 * @param encoded - Base58 string over the ledger alphabet
 * @returns A fresh array of exactly `payloadLength` bytes
 * @throws DecodeError if the string is not a valid identifier of that format
 */
export function decodeIdentifier(
    format: IdentifierKind | FormatDescriptor,
    encoded: string,
): Uint8Array {
    const { prefix, payloadLength } = typeof format === 'string' ? FORMATS[format] : format;
    const raw = decodeRaw(encoded);

    // Minimum length first; the subtraction below relies on it.
    if (raw.length < prefix.length + CHECKSUM_LENGTH + 1) throw new DecodeError();
    if (raw.length - CHECKSUM_LENGTH - prefix.length !== payloadLength) throw new DecodeError();

    if (!startsWith(raw, prefix)) throw new DecodeError();

    const body = raw.subarray(0, raw.length - CHECKSUM_LENGTH);
    const claimed = raw.subarray(raw.length - CHECKSUM_LENGTH);
    if (!verifyChecksum(body, claimed)) throw new DecodeError();

    return body.slice(prefix.length);
}

function decodeRaw(encoded: string): Uint8Array {
    if (!isString(encoded)) throw new DecodeError();
    try {
        return decodeBase58(encoded);
    } catch {
        throw new DecodeError();
    }
}
