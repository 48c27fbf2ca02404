import type { PeerRef, SpvErrorCode, SpvErrorPayload } from './types';

/**
 * Typed SPV error with code, detail, and cause fields.
 */
export class SpvError extends Error implements SpvErrorPayload {
  code: SpvErrorCode;
  detail?: unknown;
  cause?: unknown;

  /**
   * Create a new SpvError with optional detail/cause.
   */
  constructor(code: SpvErrorCode, message: string, detail?: unknown, cause?: unknown) {
    super(message);
    this.name = 'SpvError';
    this.code = code;
    this.detail = detail;
    this.cause = cause;
  }

  toPayload(): SpvErrorPayload {
    return { code: this.code, message: this.message, detail: this.detail, cause: this.cause };
  }
}

export type MerkleFailureReason = 'missing_header' | 'branch_too_long' | 'root_mismatch' | 'malformed';

/**
 * A Merkle branch did not prove inclusion in the header at the given height.
 */
export class MerkleVerificationFailure extends SpvError {
  readonly reason: MerkleFailureReason;

  constructor(reason: MerkleFailureReason, message: string, detail?: unknown) {
    super('MERKLE', message, detail);
    this.name = 'MerkleVerificationFailure';
    this.reason = reason;
  }
}

/**
 * The serving peer broke the protocol and its connection should be closed.
 * Only the offending connection is affected.
 */
export class GracefulDisconnect extends SpvError {
  readonly peer: PeerRef | null;

  constructor(peer: PeerRef | null, cause: SpvError) {
    super('DISCONNECT', cause.message, { peer: peer?.id ?? null, reason: cause.code }, cause);
    this.name = 'GracefulDisconnect';
    this.peer = peer;
  }
}

/** True when the server reported the transaction absent at the requested height. */
export const isNotFoundAtHeight = (error: unknown): error is SpvError => error instanceof SpvError && error.code === 'NOT_FOUND';

/** Normalize any thrown value into an event payload. */
export const toErrorPayload = (error: unknown, fallback: SpvErrorCode): SpvErrorPayload => {
  if (error instanceof SpvError) return error.toPayload();
  const message = error instanceof Error ? error.message : String(error);
  return { code: fallback, message, cause: error };
};
