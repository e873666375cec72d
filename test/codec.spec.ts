import assert from 'assert';
import { describe, it } from 'vitest';

import {
    ALPHABET,
    CHECKSUM_LENGTH,
    DecodeError,
    FORMATS,
    IdentifierKind,
    checksum,
    decodeBase58,
    decodeIdentifier,
    encodeBase58,
    encodeIdentifier,
    encodeWithPrefix,
    fromHex,
    payloadLengthOf,
    prefixOf,
    toHex,
    verifyChecksum,
} from '../src/index.js';
import type { FormatDescriptor } from '../src/index.js';

describe('format registry', () => {
    it('declares prefix and payload length per kind', () => {
        assert.strictEqual(toHex(prefixOf(IdentifierKind.AccountId)), '00');
        assert.strictEqual(toHex(prefixOf(IdentifierKind.Secp256k1Seed)), '21');
        assert.strictEqual(toHex(prefixOf(IdentifierKind.Ed25519Seed)), '01E14B');

        assert.strictEqual(payloadLengthOf(IdentifierKind.AccountId), 20);
        assert.strictEqual(payloadLengthOf(IdentifierKind.Secp256k1Seed), 16);
        assert.strictEqual(payloadLengthOf(IdentifierKind.Ed25519Seed), 16);
    });

    it('hands out prefix copies', () => {
        const prefix = prefixOf(IdentifierKind.Ed25519Seed);
        prefix[0] = 0xff;

        assert.deepStrictEqual(FORMATS[IdentifierKind.Ed25519Seed].prefix, [0x01, 0xe1, 0x4b]);
    });

    it('freezes descriptors', () => {
        assert.ok(Object.isFrozen(FORMATS));
        for (const format of Object.values(FORMATS)) {
            assert.ok(Object.isFrozen(format));
            assert.ok(Object.isFrozen(format.prefix));
        }
    });
});

describe('checksum', () => {
    it('takes the first four bytes of double SHA-256', () => {
        assert.strictEqual(toHex(checksum(new Uint8Array(0))), '5DF6E0E2');
    });

    it('is four bytes long', () => {
        assert.strictEqual(checksum(fromHex('deadbeef')).length, CHECKSUM_LENGTH);
    });

    it('verifies by recomputing', () => {
        const bytes = fromHex('00ba8e78');
        const tag = checksum(bytes);

        assert.strictEqual(verifyChecksum(bytes, tag), true);
        assert.strictEqual(verifyChecksum(fromHex('00ba8e79'), tag), false);
        assert.strictEqual(verifyChecksum(bytes, tag.subarray(0, 3)), false);
    });
});

describe('base58 alphabet', () => {
    it('has 58 distinct symbols', () => {
        assert.strictEqual(ALPHABET.length, 58);
        assert.strictEqual(new Set(ALPHABET).size, 58);
    });

    it('maps leading zero bytes to r', () => {
        assert.strictEqual(encodeBase58(new Uint8Array([0])), 'r');
        assert.strictEqual(encodeBase58(new Uint8Array([0, 1])), 'rp');
        assert.deepStrictEqual(decodeBase58('rp'), new Uint8Array([0, 1]));
    });

    it('throws on symbols outside the alphabet', () => {
        assert.throws(() => decodeBase58('r0'));
    });
});

describe('codec', () => {
    it('frames prefix, payload and checksum', () => {
        const encoded = encodeWithPrefix([0x00], new Uint8Array(20));
        const raw = decodeBase58(encoded);

        assert.strictEqual(encoded, 'rrrrrrrrrrrrrrrrrrrrrhoLvTp');
        assert.strictEqual(raw.length, 25);
        assert.deepStrictEqual(raw.subarray(0, 21), new Uint8Array(21));
        assert.deepStrictEqual(raw.subarray(21), checksum(new Uint8Array(21)));
    });

    it('encodes by kind', () => {
        assert.strictEqual(
            encodeIdentifier(IdentifierKind.Secp256k1Seed, new Uint8Array(16)),
            'sp6JS7f14BuwFY8Mw6bTtLKWauoUs',
        );
    });

    it('rejects payloads of the wrong size when encoding by kind', () => {
        assert.throws(
            () => encodeIdentifier(IdentifierKind.AccountId, new Uint8Array(16)),
            TypeError,
        );
    });

    it('returns a payload that owns its memory', () => {
        const payload = decodeIdentifier(IdentifierKind.AccountId, 'rrrrrrrrrrrrrrrrrrrrrhoLvTp');

        assert.strictEqual(payload.length, 20);
        assert.strictEqual(payload.buffer.byteLength, 20);
    });

    it('decodes against a descriptor with an empty prefix', () => {
        const bare: FormatDescriptor = {
            kind: IdentifierKind.AccountId,
            prefix: [],
            payloadLength: 2,
        };
        const encoded = encodeWithPrefix([], fromHex('abcd'));

        assert.strictEqual(toHex(decodeIdentifier(bare, encoded)), 'ABCD');
    });

    it('rejects buffers shorter than prefix plus checksum', () => {
        const tooShort = encodeBase58(new Uint8Array([0x00, 1, 2, 3]));
        const bare: FormatDescriptor = {
            kind: IdentifierKind.AccountId,
            prefix: [],
            payloadLength: 0,
        };

        assert.throws(() => decodeIdentifier(IdentifierKind.AccountId, tooShort), DecodeError);
        assert.throws(() => decodeIdentifier(bare, encodeBase58(new Uint8Array(2))), DecodeError);
    });

    it('rejects a wrong prefix even when length and checksum hold', () => {
        const encoded = encodeWithPrefix([0x22], new Uint8Array(16));

        assert.throws(
            () => decodeIdentifier(IdentifierKind.Secp256k1Seed, encoded),
            DecodeError,
        );
    });

    it('rejects a checksum mismatch', () => {
        const raw = decodeBase58(encodeWithPrefix([0x00], new Uint8Array(20)));
        raw[raw.length - 1] ^= 0x01;

        assert.throws(
            () => decodeIdentifier(IdentifierKind.AccountId, encodeBase58(raw)),
            DecodeError,
        );
    });
});
