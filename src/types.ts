/**
 * Core type definitions, branded types, and type guard functions.
 *
 * @packageDocumentation
 */

// ============================================================================
// Branded Types
// ============================================================================

declare const __brand: unique symbol;
type Brand<T, B> = T & { [__brand]: B };

/** Raw 20-byte account identifier. */
export type Bytes20 = Brand<Uint8Array, 'Bytes20'>;
/** 16 bytes (128 bits) of seed entropy. */
export type Entropy = Brand<Uint8Array, 'Entropy'>;

// ============================================================================
// Constants
// ============================================================================

export const ACCOUNT_ID_LENGTH = 20;
export const ENTROPY_LENGTH = 16;

// ============================================================================
// Type Guards
// ============================================================================

export function isString(value: unknown): value is string {
    return typeof value === 'string';
}

export function isUint8ArrayN(value: unknown, n: number): value is Uint8Array {
    return value instanceof Uint8Array && value.length === n;
}

export function isBytes20(value: unknown): value is Bytes20 {
    return isUint8ArrayN(value, ACCOUNT_ID_LENGTH);
}

export function isEntropy(value: unknown): value is Entropy {
    return isUint8ArrayN(value, ENTROPY_LENGTH);
}

// ============================================================================
// Utility Functions
// ============================================================================

export function toBytes20(value: Uint8Array): Bytes20 {
    if (!isBytes20(value)) {
        throw new TypeError(`Expected 20-byte Uint8Array, got ${value.length} bytes`);
    }
    return value;
}

export function toEntropy(value: Uint8Array): Entropy {
    if (!isEntropy(value)) {
        throw new TypeError(`Expected 16-byte entropy, got ${value.length} bytes`);
    }
    return value;
}

// ============================================================================
// Assertion Helpers
// ============================================================================

export function assertUint8ArrayN(
    value: unknown,
    n: number,
    name: string,
): asserts value is Uint8Array {
    if (!(value instanceof Uint8Array) || value.length !== n) {
        throw new TypeError(`${name} must be a Uint8Array of ${n} bytes`);
    }
}
