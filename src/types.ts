import type { GracefulDisconnect } from './errors';

/** 32-byte hash as 64 lowercase hex chars, in display (byte-reversed) order. */
export type Hash32 = string;

export type MaybePromise<T> = T | Promise<T>;

/** Error codes used by SpvError. */
export type SpvErrorCode = 'CONFIG' | 'MERKLE' | 'HEADER' | 'NETWORK' | 'NOT_FOUND' | 'DISCONNECT' | 'ABORTED';

/** Serialized error payload used in events. */
export interface SpvErrorPayload {
  code: SpvErrorCode;
  message: string;
  detail?: unknown;
  cause?: unknown;
}

/** Decoded 80-byte block header plus the height it was read at. */
export interface BlockHeader {
  version: number;
  prevBlockHash: Hash32;
  merkleRoot: Hash32;
  timestamp: number;
  bits: number;
  nonce: number;
  blockHeight: number;
}

/** Merkle branch for one transaction as served by a peer. */
export interface MerkleProof {
  blockHeight: number;
  leafPosition: number;
  /** Sibling hashes, leaf level first. */
  branch: Hash32[];
}

/** Record committed to the wallet once a transaction is proven. */
export interface VerifiedTxInfo {
  height: number;
  timestamp: number;
  txPosition: number;
  headerHash: Hash32;
}

/**
 * Handle to one header chain. Compared by identity: a reorg hands out a
 * different object.
 */
export interface ChainTip {
  height(): number;
  readHeader(height: number): BlockHeader | undefined;
  commonAncestorHeight(other: ChainTip): number;
}

/** Opaque reference to one server connection. */
export interface PeerRef {
  readonly id: string;
}

export interface RequestOptions {
  /** Pin the request to this connection instead of the network's default. */
  peer?: PeerRef | null;
  signal?: AbortSignal;
}

export interface HeaderWithProof {
  header: BlockHeader;
  proofWasProvided: boolean;
}

/** Shared lock held by header sync/reorg writers; SPV only reads under it. */
export interface HeaderLock {
  withReadLock<T>(fn: () => MaybePromise<T>, signal?: AbortSignal): Promise<T>;
}

/** Network and chain collaborator consumed by the SPV job. */
export interface SpvNetwork {
  /** Chain currently considered best. */
  currentBestChainTip(): ChainTip;
  /** Highest height covered by the hard-coded checkpoint. */
  maxCheckpoint(): number;
  /** Connection individual-header requests get pinned to, if one is ready. */
  defaultPeer(): PeerRef | null;
  readonly headerLock: HeaderLock;
  /**
   * Fetch the Merkle branch for a transaction. Rejects with `SpvError('NOT_FOUND')`
   * when the server says the transaction is not at that height.
   */
  requestMerkleProof(txHash: Hash32, height: number, options?: RequestOptions): Promise<MerkleProof>;
  /** Fetch a header along with its proof of inclusion under the checkpoint. */
  requestHeaderWithProof(height: number, options?: RequestOptions): Promise<HeaderWithProof>;
  /** Download the retarget-period chunk containing `height`. */
  requestHeaderChunk(height: number, options: { canReturnEarly: boolean; signal?: AbortSignal }): Promise<void>;
}

/** Wallet collaborator consumed by the SPV job. */
export interface SpvWallet {
  /** Transactions awaiting proof, txHash -> mined height. */
  getUnverifiedTransactions(): MaybePromise<ReadonlyMap<Hash32, number>>;
  /** Store the verified record and drop the transaction from the unverified set. */
  addVerifiedTransaction(txHash: Hash32, info: VerifiedTxInfo): MaybePromise<void>;
  removeUnverifiedTransaction(txHash: Hash32, height: number): MaybePromise<void>;
  /** Move every transaction verified above `height` back to unverified; returns their ids. */
  undoVerificationsAbove(tip: ChainTip, height: number): MaybePromise<Hash32[]>;
  diagnosticName?(): string;
}

export interface ProtocolViolation {
  peer: PeerRef | null;
  error: GracefulDisconnect;
}

export interface SpvOptions {
  /** Interval between dispatch cycles (default 100ms). */
  pollMs?: number;
  /** Accept transactions whose Merkle proof fails to verify. Debugging only. */
  skipMerkleCheck?: boolean;
  onEvent?: (event: SpvEvent) => void;
  /** Called once per failed proof; the host should drop the connection. */
  onProtocolViolation?: (violation: ProtocolViolation) => void;
}

/** Union of all SPV event payloads. */
export type SpvEvent =
  | { type: 'spv:start'; payload: { name: string } }
  | { type: 'spv:stop'; payload: { name: string; reason?: unknown } }
  | { type: 'spv:requested'; payload: { txHash: Hash32; height: number; individualHeader: boolean } }
  | { type: 'spv:verified'; payload: { txHash: Hash32; height: number; merkleRoot: Hash32; checkSkipped: boolean } }
  | { type: 'spv:rejected'; payload: { txHash: Hash32; height: number } }
  | { type: 'spv:chunk'; payload: { txHash: Hash32; height: number; chunkIndex: number; heightsInPeriod: number } }
  | { type: 'spv:undo'; payload: { aboveHeight: number; txHashes: Hash32[] } }
  | { type: 'spv:disconnect'; payload: { peer: PeerRef | null; error: SpvErrorPayload } }
  | { type: 'debug'; payload: { scope: string; message: string; detail?: unknown } }
  | { type: 'error'; payload: SpvErrorPayload };
