/**
 * Registry of identifier formats: the prefix each kind is tagged with and the
 * number of payload bytes it carries.
 *
 * @packageDocumentation
 */
import { ACCOUNT_ID_LENGTH, ENTROPY_LENGTH } from './types.js';

export const IdentifierKind = {
    AccountId: 'accountId',
    Secp256k1Seed: 'secp256k1Seed',
    Ed25519Seed: 'ed25519Seed',
} as const;

export type IdentifierKind = (typeof IdentifierKind)[keyof typeof IdentifierKind];

export interface FormatDescriptor {
    readonly kind: IdentifierKind;
    /** Leading bytes of the framed value, possibly empty. */
    readonly prefix: readonly number[];
    /** Number of bytes between the prefix and the checksum. */
    readonly payloadLength: number;
}

function descriptor(
    kind: IdentifierKind,
    prefix: readonly number[],
    payloadLength: number,
): FormatDescriptor {
    return Object.freeze({ kind, prefix: Object.freeze([...prefix]), payloadLength });
}

export const FORMATS: Readonly<Record<IdentifierKind, FormatDescriptor>> = Object.freeze({
    // 'r...' classic address
    [IdentifierKind.AccountId]: descriptor(IdentifierKind.AccountId, [0x00], ACCOUNT_ID_LENGTH),
    // 's...'
    [IdentifierKind.Secp256k1Seed]: descriptor(IdentifierKind.Secp256k1Seed, [0x21], ENTROPY_LENGTH),
    // 'sEd...'
    [IdentifierKind.Ed25519Seed]: descriptor(
        IdentifierKind.Ed25519Seed,
        [0x01, 0xe1, 0x4b],
        ENTROPY_LENGTH,
    ),
});

/**
 * Returns the prefix of `kind` as a fresh Uint8Array.
 */
export function prefixOf(kind: IdentifierKind): Uint8Array {
    return Uint8Array.from(FORMATS[kind].prefix);
}

export function payloadLengthOf(kind: IdentifierKind): number {
    return FORMATS[kind].payloadLength;
}
