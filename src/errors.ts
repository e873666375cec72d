/**
 * Error raised when an encoded identifier cannot be decoded.
 *
 * The same error, with the same message, is thrown for a symbol outside the
 * alphabet, a wrong decoded length, a wrong prefix and a checksum mismatch.
 * Seeds are secrets, so the failing check is not disclosed.
 */
export class DecodeError extends Error {
    constructor() {
        super('decode error');
        this.name = 'DecodeError';
    }
}

export function isDecodeError(value: unknown): value is DecodeError {
    return value instanceof DecodeError;
}
