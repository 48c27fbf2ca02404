import { SpvError } from '../errors';
import type { BlockHeader, Hash32, MerkleProof, PeerRef, RequestOptions, SpvEvent } from '../types';
import { deserializeHeader, HEADER_SIZE } from '../chain/blockHeader';
import { errorToDebug } from '../utils/debug';
import { isHash32, normalizeHash32 } from '../utils/hex';
import { toBoundedInt } from '../utils/options';
import { abortReason, signalAny, signalTimeout } from '../utils/signal';

const DEFAULT_REQUEST_TIMEOUT_MS = 20_000;

/**
 * Sends one JSON-RPC request over the host's connection and resolves with its `result`.
 * Must reject with ElectrumRpcError when the server answers with a JSON-RPC error object.
 */
export type ElectrumRpcCaller = (method: string, params: unknown[], options: { peer?: PeerRef | null; signal?: AbortSignal }) => Promise<unknown>;

/**
 * Error object returned by the server in a JSON-RPC response.
 */
export class ElectrumRpcError extends Error {
  readonly code: number;
  readonly data?: unknown;

  constructor(code: number, message: string, data?: unknown) {
    super(message);
    this.name = 'ElectrumRpcError';
    this.code = code;
    this.data = data;
  }
}

export interface ElectrumHeaderResponse {
  header: BlockHeader;
  branch?: Hash32[];
  root?: Hash32;
}

export interface ElectrumHeadersResponse {
  headers: BlockHeader[];
  max: number;
  /** Checkpoint proof for the last returned header. */
  branch?: Hash32[];
  root?: Hash32;
}

export interface ElectrumClientOptions {
  /** Per-request timeout (default 20s, min 1s). */
  requestTimeoutMs?: number;
}

type DebugEmitter = (event: Extract<SpvEvent, { type: 'debug' }>) => void;

const isRecord = (value: unknown): value is Record<string, unknown> => value != null && typeof value === 'object' && !Array.isArray(value);

const normalizeNonNegativeInt = (value: unknown, name: string, method: string): number => {
  if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < 0) {
    throw new SpvError('NETWORK', `Invalid ${name} in ${method} response`, { [name]: value });
  }
  return value;
};

const normalizeHash = (value: unknown, name: string, method: string): Hash32 => {
  if (!isHash32(value)) {
    throw new SpvError('NETWORK', `Invalid ${name} in ${method} response`, { [name]: value });
  }
  return normalizeHash32(value);
};

const normalizeBranch = (value: unknown, name: string, method: string): Hash32[] => {
  if (!Array.isArray(value)) {
    throw new SpvError('NETWORK', `Invalid ${name} in ${method} response: expected array`, { [name]: value });
  }
  return value.map((entry: unknown) => normalizeHash(entry, name, method));
};

const normalizeMerkleResponse = (raw: unknown): MerkleProof => {
  const method = 'blockchain.transaction.get_merkle';
  if (!isRecord(raw)) {
    throw new SpvError('NETWORK', `Invalid ${method} response`, { raw });
  }
  return {
    blockHeight: normalizeNonNegativeInt(raw.block_height, 'block_height', method),
    leafPosition: normalizeNonNegativeInt(raw.pos, 'pos', method),
    branch: normalizeBranch(raw.merkle, 'merkle', method),
  };
};

const parseHeader = (hex: unknown, height: number, method: string): BlockHeader => {
  if (typeof hex !== 'string') {
    throw new SpvError('NETWORK', `Invalid header in ${method} response`, { header: hex });
  }
  try {
    return deserializeHeader(hex, height);
  } catch (error) {
    throw new SpvError('NETWORK', `Invalid header in ${method} response`, { height }, error);
  }
};

const normalizeCheckpointProof = (raw: Record<string, unknown>, method: string): { branch?: Hash32[]; root?: Hash32 } => {
  if (raw.branch == null && raw.root == null) return {};
  return { branch: normalizeBranch(raw.branch, 'branch', method), root: normalizeHash(raw.root, 'root', method) };
};

/**
 * Typed Electrum protocol methods over a host-provided JSON-RPC caller.
 */
export class ElectrumClient {
  private readonly requestTimeoutMs: number;

  constructor(
    private readonly call: ElectrumRpcCaller,
    options?: ElectrumClientOptions,
    private readonly debugEmit?: DebugEmitter,
  ) {
    this.requestTimeoutMs = toBoundedInt(options?.requestTimeoutMs, DEFAULT_REQUEST_TIMEOUT_MS, { min: 1000 });
  }

  /**
   * `blockchain.transaction.get_merkle`. A server-side error means the tx is not
   * at that height and rejects with `SpvError('NOT_FOUND')`.
   */
  async getMerkle(txHash: Hash32, height: number, options?: RequestOptions): Promise<MerkleProof> {
    const raw = await this.request('blockchain.transaction.get_merkle', [txHash, height], options, 'NOT_FOUND');
    return normalizeMerkleResponse(raw);
  }

  /**
   * `blockchain.block.header`. With `cpHeight > 0` the server also proves the
   * header against the checkpoint at `cpHeight`.
   */
  async getBlockHeader(height: number, cpHeight: number, options?: RequestOptions): Promise<ElectrumHeaderResponse> {
    const method = 'blockchain.block.header';
    const raw = await this.request(method, [height, cpHeight], options, 'NETWORK');
    if (typeof raw === 'string') return { header: parseHeader(raw, height, method) };
    if (!isRecord(raw)) {
      throw new SpvError('NETWORK', `Invalid ${method} response`, { raw });
    }
    return { header: parseHeader(raw.header, height, method), ...normalizeCheckpointProof(raw, method) };
  }

  /**
   * `blockchain.block.headers`. The server may return fewer than `count` headers.
   */
  async getBlockHeaders(startHeight: number, count: number, cpHeight: number, options?: RequestOptions): Promise<ElectrumHeadersResponse> {
    const method = 'blockchain.block.headers';
    const raw = await this.request(method, [startHeight, count, cpHeight], options, 'NETWORK');
    if (!isRecord(raw)) {
      throw new SpvError('NETWORK', `Invalid ${method} response`, { raw });
    }
    const returned = normalizeNonNegativeInt(raw.count, 'count', method);
    const max = normalizeNonNegativeInt(raw.max, 'max', method);
    const hex = raw.hex;
    if (typeof hex !== 'string' || hex.length !== returned * HEADER_SIZE * 2) {
      throw new SpvError('NETWORK', `Invalid hex in ${method} response`, { count: returned, hexLength: typeof hex === 'string' ? hex.length : null });
    }
    if (returned > count) {
      throw new SpvError('NETWORK', `Too many headers in ${method} response`, { requested: count, returned });
    }
    const headers: BlockHeader[] = [];
    for (let i = 0; i < returned; i++) {
      const chunk = hex.slice(i * HEADER_SIZE * 2, (i + 1) * HEADER_SIZE * 2);
      headers.push(parseHeader(chunk, startHeight + i, method));
    }
    return { headers, max, ...normalizeCheckpointProof(raw, method) };
  }

  private async request(method: string, params: unknown[], options: RequestOptions | undefined, serverErrorCode: 'NOT_FOUND' | 'NETWORK'): Promise<unknown> {
    const peer = options?.peer ?? null;
    const signal = signalAny([options?.signal, signalTimeout(this.requestTimeoutMs)]);
    this.debugEmit?.({ type: 'debug', payload: { scope: 'electrum', message: 'request', detail: { method, params, peer: peer?.id ?? null } } });
    try {
      return await this.call(method, params, { peer, signal });
    } catch (error) {
      if (options?.signal?.aborted) throw abortReason(options.signal);
      this.debugEmit?.({ type: 'debug', payload: { scope: 'electrum', message: 'error', detail: { method, error: errorToDebug(error) } } });
      if (error instanceof ElectrumRpcError) {
        throw new SpvError(serverErrorCode, `Server returned error for ${method}`, { method, params, rpcCode: error.code, peer: peer?.id ?? null }, error);
      }
      const reason = signal?.aborted ? 'timeout' : 'transport_error';
      throw new SpvError('NETWORK', `${method} request failed`, { method, params, reason, requestTimeoutMs: this.requestTimeoutMs }, error);
    }
  }
}
