import { sha256 as nobleSha256 } from '@noble/hashes/sha256';
import { bytesToHex, randomBytes, utf8ToBytes } from '@noble/hashes/utils';
import { validateInteger } from '@bftsim/types';

export type { HashHex, RandomSource } from './types';

import type { HashHex, RandomSource } from './types';

/**
 * SHA-256 hash of arbitrary bytes, returned as a lowercase hex string.
 *
 * @example
 * ```typescript
 * sha256(new Uint8Array([1, 2, 3])); // 64-char hex string
 * ```
 */
export function sha256(data: Uint8Array): HashHex {
  return toHex(nobleSha256(data));
}

/**
 * SHA-256 hash of a UTF-8 string, returned as a lowercase hex string.
 *
 * @example
 * ```typescript
 * sha256String('abc');
 * // 'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad'
 * ```
 */
export function sha256String(data: string): HashHex {
  return sha256(utf8ToBytes(data));
}

/** Encode bytes as lowercase hex. */
export function toHex(data: Uint8Array): string {
  return bytesToHex(data);
}

/**
 * Whole seconds since the unix epoch, the timestamp unit blocks carry.
 *
 * @param at - Instant to convert; defaults to now.
 */
export function unixTimestamp(at: Date = new Date()): number {
  return Math.floor(at.getTime() / 1000);
}

/**
 * Uniform random integer in `[0, maxExclusive)` from the platform CSPRNG.
 *
 * Uses rejection sampling over 32-bit draws so every outcome is equally
 * likely.
 *
 * @throws {ConfigurationError} when `maxExclusive` is not an integer in `[1, 2^32]`.
 */
export function randomInt(maxExclusive: number): number {
  validateInteger(maxExclusive, 'maxExclusive', 1, 2 ** 32);
  const limit = 2 ** 32 - (2 ** 32 % maxExclusive);
  for (;;) {
    const bytes = randomBytes(4);
    const draw = new DataView(bytes.buffer, bytes.byteOffset, 4).getUint32(0);
    if (draw < limit) {
      return draw % maxExclusive;
    }
  }
}

/** Default {@link RandomSource} backed by {@link randomInt}. */
export const secureRandom: RandomSource = randomInt;
