/**
 * Seeds (secrets): 16 bytes of entropy tagged with the signing algorithm the
 * seed is meant for.
 *
 * @packageDocumentation
 */
import { decodeIdentifier, encodeIdentifier } from './codec.js';
import { DecodeError, isDecodeError } from './errors.js';
import { IdentifierKind } from './formats.js';
import { type Entropy, isEntropy, toEntropy } from './types.js';

/**
 * Digital signature algorithm a seed is intended to be used with.
 */
export const Algorithm = {
    /** ECDSA over secp256k1 */
    Secp256k1: 'secp256k1',
    /** EdDSA over Ed25519 */
    Ed25519: 'ed25519',
} as const;

export type Algorithm = (typeof Algorithm)[keyof typeof Algorithm];

export const DEFAULT_ALGORITHM: Algorithm = Algorithm.Secp256k1;

/** Result of {@link decodeSeed}. */
export interface DecodedSeed {
    entropy: Entropy;
    algorithm: Algorithm;
}

export interface SeedFormat {
    kind: IdentifierKind;
    algorithm: Algorithm;
}

/**
 * Seed formats in the order {@link decodeSeed} tries them. Their prefixes are
 * disjoint, so at most one can match a valid seed.
 */
export const SEED_FORMATS: readonly SeedFormat[] = Object.freeze([
    { kind: IdentifierKind.Secp256k1Seed, algorithm: Algorithm.Secp256k1 },
    { kind: IdentifierKind.Ed25519Seed, algorithm: Algorithm.Ed25519 },
]);

function seedKindOf(algorithm: Algorithm): IdentifierKind {
    const format = SEED_FORMATS.find((f) => f.algorithm === algorithm);
    if (!format) throw new TypeError(`Unsupported seed algorithm: ${String(algorithm)}`);
    return format.kind;
}

/**
 * Encode entropy as a seed for the given algorithm.
 *
 * In the real world the entropy must come from a secure random source.
 *
 * @throws TypeError if `entropy` is not 16 bytes long or the algorithm is unknown
 *
 * @example
 * ```typescript
 * import { Algorithm, encodeSeed } from 'ledger-address-codec';
 *
 * const naiveEntropy = new Uint8Array(16);
 * encodeSeed(naiveEntropy, Algorithm.Secp256k1); // 'sp6JS7f14BuwFY8Mw6bTtLKWauoUs'
 * encodeSeed(naiveEntropy, Algorithm.Ed25519); // 'sEdSJHS4oiAdz7w2X2ni1gFiqtbJHqE'
 * ```
 */
export function encodeSeed(entropy: Uint8Array, algorithm: Algorithm = DEFAULT_ALGORITHM): string {
    if (!isEntropy(entropy)) throw new TypeError('Expected 16 bytes entropy');
    return encodeIdentifier(seedKindOf(algorithm), entropy);
}

/**
 * Decode a seed into its entropy and algorithm.
 *
 * Formats are tried in {@link SEED_FORMATS} order and the first match wins.
 * When none matches, the error of the last attempt is thrown.
 *
 * @throws DecodeError if the seed is invalid
 */
export function decodeSeed(seed: string): DecodedSeed {
    let lastError: DecodeError = new DecodeError();
    for (const { kind, algorithm } of SEED_FORMATS) {
        try {
            return { entropy: toEntropy(decodeIdentifier(kind, seed)), algorithm };
        } catch (e) {
            if (!isDecodeError(e)) throw e;
            lastError = e;
        }
    }
    throw lastError;
}

/**
 * Returns true when `seed` decodes under any seed format.
 */
export function isValidSeed(seed: string): boolean {
    try {
        decodeSeed(seed);
        return true;
    } catch (e) {
        if (isDecodeError(e)) return false;
        throw e;
    }
}
