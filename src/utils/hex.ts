import type { Hash32 } from '../types';

/**
 * Strict 32-byte hash validation: exactly 64 hex chars, no `0x` prefix.
 */
export const isHash32 = (value: unknown): value is Hash32 => typeof value === 'string' && /^[0-9a-fA-F]{64}$/.test(value);

/**
 * Lowercase a hash so map keys and comparisons agree.
 */
export const normalizeHash32 = (value: Hash32): Hash32 => value.toLowerCase();
