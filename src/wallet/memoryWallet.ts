import type { ChainTip, Hash32, SpvWallet, VerifiedTxInfo } from '../types';
import { normalizeHash32 } from '../utils/hex';

/**
 * In-memory SpvWallet implementation.
 * Useful for ephemeral sessions or tests (non-persistent).
 */
export class MemoryWallet implements SpvWallet {
  private readonly unverified = new Map<Hash32, number>();
  private readonly verified = new Map<Hash32, VerifiedTxInfo>();

  constructor(private readonly name = 'memory-wallet') {}

  diagnosticName() {
    return this.name;
  }

  /**
   * Track a mined transaction that still needs a proof.
   */
  addUnverifiedTransaction(txHash: Hash32, height: number) {
    const key = normalizeHash32(txHash);
    if (this.verified.has(key)) return;
    this.unverified.set(key, height);
  }

  getUnverifiedTransactions(): ReadonlyMap<Hash32, number> {
    return new Map(this.unverified);
  }

  addVerifiedTransaction(txHash: Hash32, info: VerifiedTxInfo) {
    const key = normalizeHash32(txHash);
    this.verified.set(key, { ...info });
    this.unverified.delete(key);
  }

  /**
   * Drop a pending transaction; ignored when the tracked height differs.
   */
  removeUnverifiedTransaction(txHash: Hash32, height: number) {
    const key = normalizeHash32(txHash);
    if (this.unverified.get(key) !== height) return;
    this.unverified.delete(key);
  }

  undoVerificationsAbove(_tip: ChainTip, height: number): Hash32[] {
    const undone: Hash32[] = [];
    for (const [txHash, info] of this.verified) {
      if (info.height <= height) continue;
      this.verified.delete(txHash);
      this.unverified.set(txHash, info.height);
      undone.push(txHash);
    }
    return undone;
  }

  getVerifiedTransaction(txHash: Hash32): VerifiedTxInfo | undefined {
    const info = this.verified.get(normalizeHash32(txHash));
    return info ? { ...info } : undefined;
  }

  isVerified(txHash: Hash32) {
    return this.verified.has(normalizeHash32(txHash));
  }
}
