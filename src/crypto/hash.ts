import { sha256 } from '@noble/hashes/sha256';
import { bytesToHex, concatBytes, hexToBytes } from '@noble/hashes/utils';
import type { Hash32 } from '../types';

/**
 * Double SHA-256, the hash used for txids, block hashes and Merkle nodes.
 */
export const sha256d = (data: Uint8Array): Uint8Array => sha256(sha256(data));

/**
 * Display-order hex -> internal byte order (reversed).
 */
export const hashDecode = (hash: Hash32): Uint8Array => hexToBytes(hash).reverse();

/**
 * Internal byte order -> display-order hex.
 */
export const hashEncode = (bytes: Uint8Array): Hash32 => bytesToHex(Uint8Array.from(bytes).reverse());

/**
 * Hash of two Merkle children given in internal byte order.
 */
export const hashPair = (left: Uint8Array, right: Uint8Array): Uint8Array => sha256d(concatBytes(left, right));
