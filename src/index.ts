import * as address from './address.js';
import * as seed from './seed.js';

export * as address from './address.js';
export * as seed from './seed.js';

export { encodeAccountId, decodeAccountId, isValidAccountId } from './address.js';
export {
    Algorithm,
    DEFAULT_ALGORITHM,
    SEED_FORMATS,
    encodeSeed,
    decodeSeed,
    isValidSeed,
} from './seed.js';
export type { DecodedSeed, SeedFormat } from './seed.js';

export { encodeWithPrefix, encodeIdentifier, decodeIdentifier } from './codec.js';
export { CHECKSUM_LENGTH, checksum, verifyChecksum } from './checksum.js';
export { FORMATS, IdentifierKind, prefixOf, payloadLengthOf } from './formats.js';
export type { FormatDescriptor } from './formats.js';
export { DecodeError, isDecodeError } from './errors.js';

export {
    ACCOUNT_ID_LENGTH,
    ENTROPY_LENGTH,
    isBytes20,
    isEntropy,
    toBytes20,
    toEntropy,
} from './types.js';
export type { Bytes20, Entropy } from './types.js';

export * from './io/index.js';

const codec = {
    address,
    seed,
};

export default codec;
