import assert from 'node:assert/strict';
import test from 'node:test';

import { DefaultFlagDecoder, hasFlag, MESSAGE_FLAGS, ZLIB_COMPRESSED_FLAG } from '../src/render/flags.js';

test('DefaultFlagDecoder names the set bits in table order', () => {
  const decoder = new DefaultFlagDecoder();
  assert.deepEqual(decoder.describe(0x801n), ['PHP_SERIALIZED', 'ZLIB_COMPRESSED']);
  assert.deepEqual(decoder.describe(0x20002n), ['COMPRESSED', 'HOT_KEY']);
});

test('DefaultFlagDecoder ignores unknown bits', () => {
  const decoder = new DefaultFlagDecoder();
  assert.deepEqual(decoder.describe(0n), []);
  assert.deepEqual(decoder.describe(0x40n), []);
  assert.deepEqual(decoder.describe(0x40n | 0x8000n), ['BIG_VALUE']);
});

test('every known flag is a single distinct bit', () => {
  const bits = MESSAGE_FLAGS.map((flag) => flag.bit);
  assert.equal(new Set(bits).size, bits.length);
  for (const bit of bits) {
    assert.equal(bit & (bit - 1n), 0n, `0x${bit.toString(16)}`);
  }
});

test('hasFlag tests one bit', () => {
  assert.equal(hasFlag(0x801n, ZLIB_COMPRESSED_FLAG), true);
  assert.equal(hasFlag(0x1n, ZLIB_COMPRESSED_FLAG), false);
});
