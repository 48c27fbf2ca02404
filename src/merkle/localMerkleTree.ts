import { hashDecode, hashEncode, hashPair } from '../crypto/hash';
import { isHash32 } from '../utils/hex';
import type { Hash32, MerkleProof } from '../types';

/**
 * Bitcoin-style Merkle tree over an ordered list of txids.
 * An odd node at any level is paired with itself.
 * Used to build proofs locally (tests, servers) in the shape the verifier reads.
 */
export class LocalMerkleTree {
  private readonly levels: Uint8Array[][];

  constructor(txHashes: readonly Hash32[]) {
    if (!txHashes.length) {
      throw new Error('Merkle tree requires at least one leaf');
    }
    const leaves = txHashes.map((h, index) => {
      if (!isHash32(h)) throw new Error(`Invalid leaf hash at index=${index}`);
      return hashDecode(h);
    });
    this.levels = [leaves];
    let current = leaves;
    while (current.length > 1) {
      const next: Uint8Array[] = [];
      for (let i = 0; i < current.length; i += 2) {
        const left = current[i]!;
        const right = current[i + 1] ?? left;
        next.push(hashPair(left, right));
      }
      this.levels.push(next);
      current = next;
    }
  }

  /**
   * Number of leaves in the tree.
   */
  get leafCount() {
    return this.levels[0]!.length;
  }

  /**
   * Root hash in display order.
   */
  get root(): Hash32 {
    return hashEncode(this.levels[this.levels.length - 1]![0]!);
  }

  /**
   * Sibling path for the leaf at `position`, leaf level first.
   */
  branch(position: number): Hash32[] {
    if (!Number.isInteger(position) || position < 0 || position >= this.leafCount) {
      throw new Error(`Leaf position out of range: ${position}`);
    }
    const out: Hash32[] = [];
    let pos = position;
    for (let level = 0; level < this.levels.length - 1; level++) {
      const nodes = this.levels[level]!;
      const sibling = nodes[pos ^ 1] ?? nodes[pos]!;
      out.push(hashEncode(sibling));
      pos = Math.floor(pos / 2);
    }
    return out;
  }

  /**
   * Proof for the leaf at `position` in a block at `blockHeight`.
   */
  proof(position: number, blockHeight: number): MerkleProof {
    return { blockHeight, leafPosition: position, branch: this.branch(position) };
  }
}
