export type {
  Hash32,
  MaybePromise,
  SpvErrorCode,
  SpvErrorPayload,
  BlockHeader,
  MerkleProof,
  VerifiedTxInfo,
  ChainTip,
  PeerRef,
  RequestOptions,
  HeaderWithProof,
  HeaderLock,
  SpvNetwork,
  SpvWallet,
  ProtocolViolation,
  SpvOptions,
  SpvEvent,
} from './types';
export { SpvError, MerkleVerificationFailure, GracefulDisconnect, isNotFoundAtHeight, toErrorPayload } from './errors';
export type { MerkleFailureReason } from './errors';
export { Spv } from './spv/spv';
export type { VerifyTransactionOptions } from './spv/spv';
export { ProofStateStore } from './spv/proofState';
export { CHUNK_SIZE, checkpointBranchLength, chunkIndexOf, isChunkCheaper } from './spv/costModel';
export { MAX_MERKLE_BRANCH_LENGTH, hashMerkleRoot, verifyTxIsInBlock } from './merkle/merkleProof';
export { LocalMerkleTree } from './merkle/localMerkleTree';
export { HEADER_SIZE, deserializeHeader, hashHeader, headerToHex, serializeHeader } from './chain/blockHeader';
export { HeaderChain } from './chain/headerChain';
export { hashDecode, hashEncode, hashPair, sha256d } from './crypto/hash';
export { ElectrumClient, ElectrumRpcError } from './network/electrumClient';
export type { ElectrumClientOptions, ElectrumRpcCaller, ElectrumHeaderResponse, ElectrumHeadersResponse } from './network/electrumClient';
export { ElectrumNetwork } from './network/electrumNetwork';
export type { ElectrumNetworkOptions } from './network/electrumNetwork';
export { MemoryWallet } from './wallet/memoryWallet';
export { SpvEventBus } from './core/events';
export { AsyncRwLock } from './utils/rwLock';
export { TaskGroup } from './utils/taskGroup';
export type { TaskFn } from './utils/taskGroup';
