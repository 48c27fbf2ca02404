import type {
  BlockHeader,
  ChainTip,
  Hash32,
  MerkleProof,
  PeerRef,
  SpvEvent,
  SpvNetwork,
  SpvOptions,
  SpvWallet,
  VerifiedTxInfo,
} from '../types';
import { GracefulDisconnect, MerkleVerificationFailure, SpvError, isNotFoundAtHeight, toErrorPayload } from '../errors';
import { SpvEventBus } from '../core/events';
import { hashHeader } from '../chain/blockHeader';
import { verifyTxIsInBlock } from '../merkle/merkleProof';
import { TaskGroup } from '../utils/taskGroup';
import { toBoundedInt } from '../utils/options';
import { throwIfAborted } from '../utils/signal';
import { errorToDebug } from '../utils/debug';
import { chunkIndexOf, isChunkCheaper } from './costModel';
import { ProofStateStore } from './proofState';

const DEFAULT_POLL_MS = 100;

type NormalizedSpvOptions = { pollMs: number; skipMerkleCheck: boolean };

const normalizeSpvOptions = (options?: SpvOptions): NormalizedSpvOptions => ({
  pollMs: toBoundedInt(options?.pollMs, DEFAULT_POLL_MS, { min: 10 }),
  skipMerkleCheck: options?.skipMerkleCheck === true,
});

export type VerifyTransactionOptions = {
  useIndividualHeaderProof?: boolean;
  /** Connection to ask; individual-header mode falls back to the network's default peer. */
  peer?: PeerRef | null;
  signal?: AbortSignal;
};

/**
 * Simple Payment Verification job.
 *
 * Every `pollMs` it reconciles proof state with the best chain (undoing
 * verifications above a reorg's fork point) and then requests a Merkle proof
 * for each wallet transaction that has none. Proof requests run as children of
 * one TaskGroup, so `stop()` cancels all of them together.
 *
 * Without a wallet the job dispatches nothing; `verifyTransaction()` can still
 * be used directly and throws on every failure.
 */
export class Spv {
  private readonly proofs = new ProofStateStore();
  private readonly eventBus = new SpvEventBus();
  private readonly options: NormalizedSpvOptions;
  private blockchain: ChainTip | null = null;
  private group: TaskGroup | null = null;
  private closedPromise: Promise<void> = Promise.resolve();
  private timer: ReturnType<typeof setInterval> | null = null;
  private cycleRunning = false;

  constructor(
    private readonly network: SpvNetwork,
    private readonly wallet: SpvWallet | null,
    private readonly config: SpvOptions = {},
  ) {
    this.options = normalizeSpvOptions(config);
  }

  diagnosticName(): string {
    return this.wallet?.diagnosticName?.() ?? 'SPV';
  }

  /**
   * True when no proof request is outstanding.
   */
  isUpToDate(): boolean {
    return this.proofs.pendingCount === 0;
  }

  get isRunning() {
    return this.group != null;
  }

  /**
   * Settles when the current run ends; rejects with the failure that tore it down.
   */
  get closed(): Promise<void> {
    return this.closedPromise;
  }

  /**
   * Verified Merkle root recorded for `txHash`, if any.
   */
  getMerkleRoot(txHash: Hash32): Hash32 | undefined {
    return this.proofs.getRoot(txHash);
  }

  /**
   * True while a proof request for `txHash` is outstanding.
   */
  isRequested(txHash: Hash32): boolean {
    return this.proofs.isRequested(txHash);
  }

  /**
   * Forget any proof state for `txHash`; the next cycle requests it again.
   */
  removeSpvProofForTx(txHash: Hash32) {
    this.proofs.discard(txHash);
  }

  on<T extends SpvEvent['type']>(type: T, handler: (event: Extract<SpvEvent, { type: T }>) => void) {
    this.eventBus.on(type, handler);
  }

  off<T extends SpvEvent['type']>(type: T, handler: (event: Extract<SpvEvent, { type: T }>) => void) {
    this.eventBus.off(type, handler);
  }

  /**
   * Start the job: run one cycle now, then one every `pollMs`. Idempotent.
   */
  async start(): Promise<void> {
    if (this.group) return;
    const group: TaskGroup = new TaskGroup({ onError: (error) => this.handleFailure(group, error) });
    this.group = group;
    this.closedPromise = group.closed;
    this.blockchain = this.network.currentBestChainTip();
    this.emit({ type: 'spv:start', payload: { name: this.diagnosticName() } });
    if (!this.wallet) return;
    await this.tick();
    if (this.group !== group) return;
    this.timer = setInterval(() => {
      void this.tick();
    }, this.options.pollMs);
  }

  /**
   * Cancel the loop and every in-flight request, and wait for them to finish.
   */
  async stop(reason?: unknown): Promise<void> {
    const group = this.group;
    if (!group) return;
    this.clearTimer();
    this.group = null;
    await group.cancel(reason);
    this.emit({ type: 'spv:stop', payload: { name: this.diagnosticName(), reason } });
  }

  /**
   * Stop, forget all proof state, and start again (e.g. after switching server).
   */
  async restart(): Promise<void> {
    await this.stop();
    this.proofs.clear();
    await this.start();
  }

  /**
   * Run one cycle: undo verifications orphaned by a reorg, then dispatch proof
   * requests. A tick that fires while a cycle is still running is skipped.
   */
  async tick(): Promise<void> {
    const group = this.group;
    if (!group || group.isCancelled || this.cycleRunning || !this.wallet) return;
    this.cycleRunning = true;
    try {
      await group.spawn(async () => {
        await this.maybeUndoVerifications();
        await this.requestProofs(group);
      });
    } finally {
      this.cycleRunning = false;
    }
  }

  /**
   * Fetch and verify the proof for one transaction outside the dispatch loop.
   */
  async verifyTransaction(txHash: Hash32, height: number, options?: VerifyTransactionOptions): Promise<void> {
    try {
      await this.requestAndVerifySingleProof(txHash, height, options);
    } catch (error) {
      if (error instanceof GracefulDisconnect) this.reportViolation(error);
      throw error;
    }
  }

  private async requestProofs(group: TaskGroup) {
    const wallet = this.wallet;
    const blockchain = this.blockchain;
    if (!wallet || !blockchain) return;
    const localHeight = blockchain.height();
    const unverified = await wallet.getUnverifiedTransactions();
    if (group.isCancelled) return;

    const maxCheckpoint = this.network.maxCheckpoint();
    const heightsPerPeriod = new Map<number, number>();
    const chunksRequested = new Set<number>();
    const countHeightsInPeriod = (chunkIndex: number) => {
      let count = heightsPerPeriod.get(chunkIndex);
      if (count == null) {
        const heights = new Set<number>();
        for (const h of unverified.values()) {
          if (chunkIndexOf(h) === chunkIndex) heights.add(h);
        }
        count = heights.size;
        heightsPerPeriod.set(chunkIndex, count);
      }
      return count;
    };

    for (const [txHash, txHeight] of unverified) {
      // already in flight or verified; never starts a chunk download for it
      if (this.proofs.isKnown(txHash)) continue;
      // not before headers are available
      if (txHeight <= 0 || txHeight > localHeight) continue;
      let useIndividualHeaderProof = false;
      const header = blockchain.readHeader(txHeight);
      if (!header) {
        if (txHeight < maxCheckpoint) {
          const chunkIndex = chunkIndexOf(txHeight);
          const heightsInPeriod = countHeightsInPeriod(chunkIndex);
          if (isChunkCheaper(heightsInPeriod, maxCheckpoint)) {
            if (!chunksRequested.has(chunkIndex)) {
              chunksRequested.add(chunkIndex);
              this.emit({ type: 'spv:chunk', payload: { txHash, height: txHeight, chunkIndex, heightsInPeriod } });
              void group.spawn((signal) => this.network.requestHeaderChunk(txHeight, { canReturnEarly: true, signal }));
            }
          } else {
            this.debug('dispatch', 'individual header is cheaper than chunk', { txHash, height: txHeight, heightsInPeriod });
            useIndividualHeaderProof = true;
          }
        }
        if (!useIndividualHeaderProof) continue;
      }
      // at most one request per tx
      if (!this.proofs.markRequested(txHash)) continue;
      this.emit({ type: 'spv:requested', payload: { txHash, height: txHeight, individualHeader: useIndividualHeaderProof } });
      void group.spawn((signal) => this.verifyDispatched(txHash, txHeight, useIndividualHeaderProof, signal));
    }
  }

  private async verifyDispatched(txHash: Hash32, height: number, useIndividualHeaderProof: boolean, signal: AbortSignal) {
    try {
      await this.requestAndVerifySingleProof(txHash, height, { useIndividualHeaderProof, signal });
    } catch (error) {
      // the job keeps running; only the serving connection is dropped
      if (error instanceof GracefulDisconnect) {
        this.reportViolation(error);
        return;
      }
      throw error;
    }
  }

  private async requestAndVerifySingleProof(txHash: Hash32, txHeight: number, options?: VerifyTransactionOptions) {
    const useIndividualHeaderProof = options?.useIndividualHeaderProof === true;
    const signal = options?.signal;
    let peer = options?.peer ?? null;
    let merkle: MerkleProof;
    let header: BlockHeader | undefined;
    try {
      if (useIndividualHeaderProof) {
        peer = peer ?? this.network.defaultPeer();
        if (!peer) {
          throw new SpvError('NETWORK', 'No clean connection is ready', { txHash, height: txHeight });
        }
        const [proof, proven] = await Promise.all([
          this.network.requestMerkleProof(txHash, txHeight, { peer, signal }),
          this.network.requestHeaderWithProof(txHeight, { peer, signal }),
        ]);
        merkle = proof;
        if (proven.proofWasProvided) {
          header = proven.header;
        } else {
          this.debug('verify', 'header served without checkpoint proof', { txHash, height: txHeight, peer: peer.id });
        }
      } else {
        merkle = await this.network.requestMerkleProof(txHash, txHeight, { peer, signal });
      }
    } catch (error) {
      if (!isNotFoundAtHeight(error) || !this.wallet) throw error;
      this.debug('verify', 'tx not at height', { txHash, height: txHeight });
      await this.wallet.removeUnverifiedTransaction(txHash, txHeight);
      this.proofs.release(txHash);
      this.emit({ type: 'spv:rejected', payload: { txHash, height: txHeight } });
      return;
    }
    throwIfAborted(signal);

    // The server's height wins. It is not checked against the local tip; a wrong
    // one fails verification below unless the check is skipped.
    if (merkle.blockHeight !== txHeight) {
      this.debug('verify', 'requested height differs from received height', { txHash, requested: txHeight, received: merkle.blockHeight });
    }
    const height = merkle.blockHeight;
    const pos = merkle.leafPosition;

    if (!useIndividualHeaderProof) {
      header = this.network.currentBestChainTip().readHeader(height);
      if (!header) {
        // header sync or reorg may still be in progress
        header = await this.network.headerLock.withReadLock(() => this.network.currentBestChainTip().readHeader(height), signal);
      }
    }

    let checkSkipped = false;
    try {
      verifyTxIsInBlock(txHash, merkle.branch, pos, header, height);
    } catch (error) {
      if (!(error instanceof MerkleVerificationFailure)) throw error;
      if (this.options.skipMerkleCheck) {
        this.debug('verify', 'skipping merkle proof check', { txHash, height, reason: error.reason });
        checkSkipped = true;
      } else if (!this.wallet) {
        throw error;
      } else {
        this.debug('verify', 'merkle verification failed', { txHash, height, error: errorToDebug(error) });
        throw new GracefulDisconnect(peer, error);
      }
    }
    if (!header) {
      // only reachable with skipMerkleCheck: nothing to record yet, retry next cycle
      this.proofs.release(txHash);
      return;
    }

    this.proofs.markVerified(txHash, header.merkleRoot);
    this.emit({ type: 'spv:verified', payload: { txHash, height, merkleRoot: header.merkleRoot, checkSkipped } });
    if (!this.wallet) return;
    const info: VerifiedTxInfo = {
      height,
      timestamp: header.timestamp,
      txPosition: pos,
      headerHash: hashHeader(header),
    };
    await this.wallet.addVerifiedTransaction(txHash, info);
  }

  private async maybeUndoVerifications() {
    const wallet = this.wallet;
    const oldChain = this.blockchain;
    const curChain = this.network.currentBestChainTip();
    if (!wallet || curChain === oldChain) return;
    this.blockchain = curChain;
    if (!oldChain) return;
    const aboveHeight = curChain.commonAncestorHeight(oldChain);
    this.debug('reorg', 'undoing verifications above height', { aboveHeight });
    const txHashes = await wallet.undoVerificationsAbove(curChain, aboveHeight);
    for (const txHash of txHashes) {
      this.removeSpvProofForTx(txHash);
    }
    this.emit({ type: 'spv:undo', payload: { aboveHeight, txHashes } });
  }

  private reportViolation(error: GracefulDisconnect) {
    this.emit({ type: 'spv:disconnect', payload: { peer: error.peer, error: error.toPayload() } });
    this.config.onProtocolViolation?.({ peer: error.peer, error });
  }

  private handleFailure(group: TaskGroup, error: unknown) {
    this.emit({ type: 'error', payload: toErrorPayload(error, 'NETWORK') });
    if (this.group !== group) return;
    this.clearTimer();
    this.group = null;
    this.emit({ type: 'spv:stop', payload: { name: this.diagnosticName(), reason: error } });
  }

  private clearTimer() {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
  }

  private debug(scope: string, message: string, detail?: unknown) {
    this.emit({ type: 'debug', payload: { scope: `spv:${scope}`, message, detail } });
  }

  private emit(event: SpvEvent) {
    this.eventBus.emit(event);
    this.config.onEvent?.(event);
  }
}
