import { vi } from 'vitest';
import { sha256 } from '@noble/hashes/sha256';
import { bytesToHex, utf8ToBytes } from '@noble/hashes/utils';
import { SpvError } from '../src/errors';
import { HeaderChain } from '../src/chain/headerChain';
import { hashHeader } from '../src/chain/blockHeader';
import { AsyncRwLock } from '../src/utils/rwLock';
import type { BlockHeader, ChainTip, Hash32, HeaderWithProof, MerkleProof, PeerRef, RequestOptions, SpvNetwork } from '../src/types';

export const ZERO_HASH = '0'.repeat(64);

/** Deterministic placeholder txid. */
export const txid = (label: string | number): Hash32 => bytesToHex(sha256(utf8ToBytes(`tx-${label}`)));

export const makeHeader = (blockHeight: number, prevBlockHash: Hash32, merkleRoot: Hash32 = txid(`root-${blockHeight}`)): BlockHeader => ({
  version: 1,
  prevBlockHash,
  merkleRoot,
  timestamp: 1_600_000_000 + blockHeight * 600,
  bits: 0x1d00ffff,
  nonce: blockHeight,
  blockHeight,
});

/**
 * Linked headers for heights 0..count-1; `roots` overrides the merkle root at given heights.
 */
export const buildHeaders = (count: number, roots?: ReadonlyMap<number, Hash32>): BlockHeader[] => {
  const out: BlockHeader[] = [];
  let prev = ZERO_HASH;
  for (let h = 0; h < count; h++) {
    const header = makeHeader(h, prev, roots?.get(h));
    out.push(header);
    prev = hashHeader(header);
  }
  return out;
};

export const chainOf = (headers: readonly BlockHeader[], checkpointHeight = 0): HeaderChain => {
  const chain = new HeaderChain({ checkpointHeight });
  chain.saveHeaders(headers);
  return chain;
};

export const deferred = <T>() => {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
};

/**
 * In-process SpvNetwork. Proofs and proven headers are served from maps;
 * an unknown tx rejects with NOT_FOUND like a real server.
 */
export class FakeNetwork implements SpvNetwork {
  readonly headerLock = new AsyncRwLock();
  readonly proofs = new Map<Hash32, MerkleProof>();
  readonly provenHeaders = new Map<number, HeaderWithProof>();
  peer: PeerRef | null = { id: 'peer-1' };

  constructor(
    public chain: ChainTip,
    private readonly checkpoint = 0,
  ) {}

  readonly requestMerkleProof = vi.fn(async (txHash: Hash32, height: number, _options?: RequestOptions): Promise<MerkleProof> => {
    const proof = this.proofs.get(txHash);
    if (!proof) throw new SpvError('NOT_FOUND', 'tx not found', { txHash, height });
    return proof;
  });

  readonly requestHeaderWithProof = vi.fn(async (height: number, _options?: RequestOptions): Promise<HeaderWithProof> => {
    const proven = this.provenHeaders.get(height);
    if (!proven) throw new SpvError('HEADER', 'no header', { height });
    return proven;
  });

  readonly requestHeaderChunk = vi.fn(async (_height: number, _options: { canReturnEarly: boolean; signal?: AbortSignal }): Promise<void> => undefined);

  currentBestChainTip(): ChainTip {
    return this.chain;
  }

  maxCheckpoint(): number {
    return this.checkpoint;
  }

  defaultPeer(): PeerRef | null {
    return this.peer;
  }
}
