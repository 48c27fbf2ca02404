import { bytesToHex, hexToBytes } from '@noble/hashes/utils';
import { SpvError } from '../errors';
import { hashDecode, hashEncode, sha256d } from '../crypto/hash';
import type { BlockHeader, Hash32 } from '../types';

export const HEADER_SIZE = 80;

const writeU32 = (view: DataView, offset: number, value: number) => view.setUint32(offset, value >>> 0, true);

/**
 * Serialize a header into its 80-byte wire form.
 */
export const serializeHeader = (header: BlockHeader): Uint8Array => {
  const out = new Uint8Array(HEADER_SIZE);
  const view = new DataView(out.buffer);
  writeU32(view, 0, header.version);
  out.set(hashDecode(header.prevBlockHash), 4);
  out.set(hashDecode(header.merkleRoot), 36);
  writeU32(view, 68, header.timestamp);
  writeU32(view, 72, header.bits);
  writeU32(view, 76, header.nonce);
  return out;
};

/**
 * Parse an 80-byte header (raw bytes or hex) read at `blockHeight`.
 */
export const deserializeHeader = (raw: Uint8Array | string, blockHeight: number): BlockHeader => {
  let bytes: Uint8Array;
  try {
    bytes = typeof raw === 'string' ? hexToBytes(raw) : raw;
  } catch (error) {
    throw new SpvError('HEADER', 'Invalid header hex', { blockHeight }, error);
  }
  if (bytes.length !== HEADER_SIZE) {
    throw new SpvError('HEADER', 'Invalid header size', { blockHeight, size: bytes.length });
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  return {
    version: view.getUint32(0, true),
    prevBlockHash: hashEncode(bytes.subarray(4, 36)),
    merkleRoot: hashEncode(bytes.subarray(36, 68)),
    timestamp: view.getUint32(68, true),
    bits: view.getUint32(72, true),
    nonce: view.getUint32(76, true),
    blockHeight,
  };
};

/**
 * Block hash in display order.
 */
export const hashHeader = (header: BlockHeader): Hash32 => hashEncode(sha256d(serializeHeader(header)));

export const headerToHex = (header: BlockHeader): string => bytesToHex(serializeHeader(header));
