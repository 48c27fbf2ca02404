/** Headers per difficulty retarget period, and per downloadable chunk. */
export const CHUNK_SIZE = 2016;

const HASH_LEN = 32;
const BARE_HEADER_LEN = 80;

/**
 * Worst-case size in bytes of a checkpoint proof for a chain up to `maxCheckpoint`.
 */
export const checkpointBranchLength = (maxCheckpoint: number): number => HASH_LEN * Math.ceil(Math.log2(Math.max(0, maxCheckpoint) + 1));

/**
 * Whether downloading the whole chunk costs fewer bytes than fetching one
 * proven header for each of `headersInChunkPeriod` distinct heights.
 */
export const isChunkCheaper = (headersInChunkPeriod: number, maxCheckpoint: number): boolean => {
  const branchLen = checkpointBranchLength(maxCheckpoint);
  const rootLen = HASH_LEN;
  const chunkLen = CHUNK_SIZE * BARE_HEADER_LEN + branchLen + rootLen;
  const individualHeadersLen = headersInChunkPeriod * (branchLen + rootLen + BARE_HEADER_LEN);
  return chunkLen < individualHeadersLen;
};

/** Index of the retarget period containing `height`. */
export const chunkIndexOf = (height: number): number => Math.floor(height / CHUNK_SIZE);
