/**
 * Classic account addresses: a 20-byte account ID rendered as an `r...` string.
 *
 * @packageDocumentation
 */
import { decodeIdentifier, encodeIdentifier } from './codec.js';
import { isDecodeError } from './errors.js';
import { IdentifierKind } from './formats.js';
import { type Bytes20, isBytes20, toBytes20 } from './types.js';

/**
 * Encode account ID bytes as a classic address (starting with `r`).
 *
 * @throws TypeError if `bytes` is not 20 bytes long
 *
 * @example
 * ```typescript
 * import { encodeAccountId } from 'ledger-address-codec';
 *
 * encodeAccountId(new Uint8Array(20)); // 'rrrrrrrrrrrrrrrrrrrrrhoLvTp'
 * ```
 */
export function encodeAccountId(bytes: Uint8Array): string {
    if (!isBytes20(bytes)) throw new TypeError('Expected 20 bytes account ID');
    return encodeIdentifier(IdentifierKind.AccountId, bytes);
}

/**
 * Decode a classic address to its raw account ID bytes.
 *
 * @throws DecodeError if the address is invalid
 */
export function decodeAccountId(accountId: string): Bytes20 {
    return toBytes20(decodeIdentifier(IdentifierKind.AccountId, accountId));
}

/**
 * Returns true when `accountId` decodes as a classic address.
 */
export function isValidAccountId(accountId: string): boolean {
    try {
        decodeAccountId(accountId);
        return true;
    } catch (e) {
        if (isDecodeError(e)) return false;
        throw e;
    }
}
