import { MerkleVerificationFailure } from '../errors';
import { hashDecode, hashEncode, hashPair } from '../crypto/hash';
import { isHash32 } from '../utils/hex';
import type { BlockHeader, Hash32 } from '../types';

/** Longest branch accepted; 30 levels already cover over a billion leaves. */
export const MAX_MERKLE_BRANCH_LENGTH = 30;

/**
 * Fold a Merkle branch from `leaf` up to the root.
 *
 * Bit `i` of `leafPosition` says which side the running hash sits on at
 * level `i`: 0 means left (hash first), 1 means right (sibling first).
 */
export const hashMerkleRoot = (branch: readonly Hash32[], leaf: Hash32, leafPosition: number): Hash32 => {
  if (!isHash32(leaf)) {
    throw new MerkleVerificationFailure('malformed', 'Invalid merkle leaf hash', { leaf });
  }
  let h = hashDecode(leaf);
  let index = leafPosition;
  branch.forEach((item, level) => {
    if (!isHash32(item)) {
      throw new MerkleVerificationFailure('malformed', 'Invalid merkle branch entry', { level, item });
    }
    const sibling = hashDecode(item);
    h = index % 2 === 1 ? hashPair(sibling, h) : hashPair(h, sibling);
    index = Math.floor(index / 2);
  });
  return hashEncode(h);
};

/**
 * Throws MerkleVerificationFailure unless `txHash` at `leafPosition` hashes up
 * to `header.merkleRoot` through `branch`.
 */
export const verifyTxIsInBlock = (
  txHash: Hash32,
  branch: readonly Hash32[],
  leafPosition: number,
  header: BlockHeader | null | undefined,
  blockHeight: number,
): void => {
  if (!header) {
    throw new MerkleVerificationFailure('missing_header', `merkle verification failed for ${txHash} (missing header ${blockHeight})`, {
      txHash,
      blockHeight,
    });
  }
  if (branch.length > MAX_MERKLE_BRANCH_LENGTH) {
    throw new MerkleVerificationFailure('branch_too_long', `merkle branch too long: ${branch.length}`, { txHash, length: branch.length });
  }
  if (!Number.isSafeInteger(leafPosition) || leafPosition < 0) {
    throw new MerkleVerificationFailure('malformed', 'Invalid merkle leaf position', { txHash, leafPosition });
  }
  const calculated = hashMerkleRoot(branch, txHash, leafPosition);
  if (header.merkleRoot.toLowerCase() !== calculated) {
    throw new MerkleVerificationFailure('root_mismatch', `merkle verification failed for ${txHash} (${header.merkleRoot} != ${calculated})`, {
      txHash,
      blockHeight,
      expected: header.merkleRoot,
      calculated,
    });
  }
};
