import type { Hash32 } from '../types';

/**
 * Per-transaction proof bookkeeping shared by the dispatcher, verification
 * tasks and the reorg handler.
 *
 * Every method completes synchronously, so no caller can observe a txid in
 * both sets at once.
 */
export class ProofStateStore {
  private readonly requested = new Set<Hash32>();
  private readonly roots = new Map<Hash32, Hash32>();

  /**
   * True while a request is in flight or the tx already has a verified root.
   */
  isKnown(txHash: Hash32) {
    return this.requested.has(txHash) || this.roots.has(txHash);
  }

  isRequested(txHash: Hash32) {
    return this.requested.has(txHash);
  }

  /**
   * Reserve `txHash` for a new request. Returns false if it is already known.
   */
  markRequested(txHash: Hash32): boolean {
    if (this.isKnown(txHash)) return false;
    this.requested.add(txHash);
    return true;
  }

  /**
   * Record the proven root and release the in-flight marker.
   */
  markVerified(txHash: Hash32, merkleRoot: Hash32) {
    this.roots.set(txHash, merkleRoot);
    this.requested.delete(txHash);
  }

  /**
   * Release the in-flight marker without recording a root.
   */
  release(txHash: Hash32) {
    this.requested.delete(txHash);
  }

  /**
   * Forget everything about `txHash` so the dispatcher picks it up again.
   */
  discard(txHash: Hash32) {
    this.roots.delete(txHash);
    this.requested.delete(txHash);
  }

  getRoot(txHash: Hash32): Hash32 | undefined {
    return this.roots.get(txHash);
  }

  hasRoot(txHash: Hash32) {
    return this.roots.has(txHash);
  }

  get pendingCount() {
    return this.requested.size;
  }

  get verifiedCount() {
    return this.roots.size;
  }

  clear() {
    this.requested.clear();
    this.roots.clear();
  }
}
