import { SpvError } from '../errors';
import type { ChainTip, Hash32, HeaderWithProof, MerkleProof, PeerRef, RequestOptions, SpvNetwork } from '../types';
import { assertHeaderRun, HeaderChain } from '../chain/headerChain';
import { hashHeader } from '../chain/blockHeader';
import { hashMerkleRoot } from '../merkle/merkleProof';
import { CHUNK_SIZE, chunkIndexOf } from '../spv/costModel';
import { isHash32, normalizeHash32 } from '../utils/hex';
import { AsyncRwLock } from '../utils/rwLock';
import type { ElectrumClient } from './electrumClient';

export interface ElectrumNetworkOptions {
  /** Highest height covered by the checkpoint. */
  maxCheckpoint: number;
  /** Merkle root over the header hashes of heights 0..maxCheckpoint. */
  checkpointRoot: Hash32;
  defaultPeer?: PeerRef | null;
}

/**
 * SpvNetwork backed by an Electrum server and an in-memory header chain.
 *
 * Headers below the checkpoint are only accepted with a proof that ties them
 * to `checkpointRoot`. Chain writes happen under `headerLock`.
 */
export class ElectrumNetwork implements SpvNetwork {
  readonly headerLock = new AsyncRwLock();
  private chain: HeaderChain;
  private peer: PeerRef | null;
  private readonly checkpoint: { height: number; root: Hash32 };
  private readonly inflightChunks = new Map<number, Promise<void>>();

  constructor(
    private readonly client: ElectrumClient,
    chain: HeaderChain,
    options: ElectrumNetworkOptions,
  ) {
    if (!Number.isSafeInteger(options.maxCheckpoint) || options.maxCheckpoint < 0) {
      throw new SpvError('CONFIG', 'Invalid maxCheckpoint', { maxCheckpoint: options.maxCheckpoint });
    }
    if (!isHash32(options.checkpointRoot)) {
      throw new SpvError('CONFIG', 'Invalid checkpointRoot', { checkpointRoot: options.checkpointRoot });
    }
    this.chain = chain;
    this.peer = options.defaultPeer ?? null;
    this.checkpoint = { height: options.maxCheckpoint, root: normalizeHash32(options.checkpointRoot) };
  }

  currentBestChainTip(): ChainTip {
    return this.chain;
  }

  /**
   * Switch to another chain (e.g. a heavier fork) once pending readers are done.
   */
  async setBestChainTip(chain: HeaderChain): Promise<void> {
    await this.headerLock.withWriteLock(() => {
      this.chain = chain;
    });
  }

  maxCheckpoint(): number {
    return this.checkpoint.height;
  }

  defaultPeer(): PeerRef | null {
    return this.peer;
  }

  setDefaultPeer(peer: PeerRef | null) {
    this.peer = peer;
  }

  requestMerkleProof(txHash: Hash32, height: number, options?: RequestOptions): Promise<MerkleProof> {
    return this.client.getMerkle(txHash, height, options);
  }

  async requestHeaderWithProof(height: number, options?: RequestOptions): Promise<HeaderWithProof> {
    if (height > this.checkpoint.height) {
      throw new SpvError('HEADER', 'Header proofs are only available below the checkpoint', { height, maxCheckpoint: this.checkpoint.height });
    }
    const res = await this.client.getBlockHeader(height, this.checkpoint.height, options);
    if (!res.branch || !res.root) return { header: res.header, proofWasProvided: false };
    this.assertCheckpointProof(hashHeader(res.header), height, res.branch, res.root);
    return { header: res.header, proofWasProvided: true };
  }

  /**
   * Download and store the chunk containing `height`. A chunk already being
   * downloaded is not requested twice; with `canReturnEarly` the call then
   * returns at once instead of waiting for it.
   */
  requestHeaderChunk(height: number, options: { canReturnEarly: boolean; signal?: AbortSignal }): Promise<void> {
    const index = chunkIndexOf(height);
    const existing = this.inflightChunks.get(index);
    if (existing) return options.canReturnEarly ? Promise.resolve() : existing;
    const task = this.downloadChunk(index, options.signal).finally(() => {
      this.inflightChunks.delete(index);
    });
    this.inflightChunks.set(index, task);
    return task;
  }

  private async downloadChunk(index: number, signal?: AbortSignal) {
    const start = index * CHUNK_SIZE;
    const cp = this.checkpoint.height;
    const inCheckpointRegion = start <= cp;
    const count = inCheckpointRegion ? Math.min(CHUNK_SIZE, cp - start + 1) : CHUNK_SIZE;
    const res = await this.client.getBlockHeaders(start, count, inCheckpointRegion ? cp : 0, { signal });
    const last = res.headers[res.headers.length - 1];
    if (!last) return;
    // the proof covers only the last header; the rest are tied to it by their links
    assertHeaderRun(res.headers);
    if (inCheckpointRegion) {
      if (!res.branch || !res.root) {
        throw new SpvError('HEADER', 'Chunk below checkpoint served without proof', { index, start, count });
      }
      this.assertCheckpointProof(hashHeader(last), last.blockHeight, res.branch, res.root);
    }
    await this.headerLock.withWriteLock(() => this.chain.saveHeaders(res.headers), signal);
  }

  private assertCheckpointProof(headerHash: Hash32, height: number, branch: Hash32[], root: Hash32) {
    const calculated = hashMerkleRoot(branch, headerHash, height);
    if (calculated !== root || root !== this.checkpoint.root) {
      throw new SpvError('HEADER', 'Header proof does not match checkpoint', {
        height,
        calculated,
        served: root,
        checkpointRoot: this.checkpoint.root,
      });
    }
  }
}
