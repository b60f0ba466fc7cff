import type { Hash } from 'viem';

const TX_HASH_REGEX = /^0x[0-9a-fA-F]{64}$/;

/**
 * 0x + 64 hex chars, either case. No checksum, no normalisation.
 */
export function isTxHash(value: string): value is Hash {
  return value.length === 66 && TX_HASH_REGEX.test(value);
}
