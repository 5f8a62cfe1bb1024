import type { FlagDecoder } from '../core/types.js';

export const MESSAGE_FLAGS = [
  { bit: 0x1n, name: 'PHP_SERIALIZED' },
  { bit: 0x2n, name: 'COMPRESSED' },
  { bit: 0x4n, name: 'FB_SERIALIZED' },
  { bit: 0x8n, name: 'FB_COMPACT_SERIALIZED' },
  { bit: 0x10n, name: 'ASCII_INT_SERIALIZED' },
  { bit: 0x20n, name: 'SIZE_SPLIT' },
  { bit: 0x800n, name: 'ZLIB_COMPRESSED' },
  { bit: 0x1000n, name: 'SNAPPY_COMPRESSED' },
  { bit: 0x2000n, name: 'QUICKLZ_COMPRESSED' },
  { bit: 0x4000n, name: 'NZLIB_COMPRESSED' },
  { bit: 0x8000n, name: 'BIG_VALUE' },
  { bit: 0x10000n, name: 'NEGATIVE_CACHE' },
  { bit: 0x20000n, name: 'HOT_KEY' },
] as const;

export const ZLIB_COMPRESSED_FLAG = 0x800n;

export function hasFlag(flags: bigint, bit: bigint): boolean {
  return (flags & bit) !== 0n;
}

export class DefaultFlagDecoder implements FlagDecoder {
  describe(flags: bigint): string[] {
    return MESSAGE_FLAGS.filter((flag) => hasFlag(flags, flag.bit)).map((flag) => flag.name);
  }
}
