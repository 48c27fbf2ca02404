import { SpvError } from '../errors';
import type { BlockHeader, ChainTip } from '../types';
import { hashHeader } from './blockHeader';

/**
 * Throws unless `headers` (ascending) are consecutive heights, each linking to the one before.
 */
export const assertHeaderRun = (headers: readonly BlockHeader[]) => {
  for (let i = 1; i < headers.length; i++) {
    const prev = headers[i - 1]!;
    const header = headers[i]!;
    if (header.blockHeight !== prev.blockHeight + 1) {
      throw new SpvError('HEADER', 'Headers are not consecutive', { height: header.blockHeight, previous: prev.blockHeight });
    }
    if (hashHeader(prev) !== header.prevBlockHash.toLowerCase()) {
      throw new SpvError('HEADER', 'Header does not connect to its predecessor', { height: header.blockHeight, prevBlockHash: header.prevBlockHash });
    }
  }
};

/**
 * In-memory header chain with fork support.
 *
 * A fork shares every height below its `forkpoint` with its parent and owns
 * the headers from `forkpoint` upwards. Headers inside the checkpoint region
 * may be absent until a chunk or an individually-proven header fills them in;
 * `height()` never drops below the checkpoint.
 */
export class HeaderChain implements ChainTip {
  readonly parent: HeaderChain | null;
  readonly forkpoint: number;
  private readonly checkpointHeight: number;
  private readonly headers = new Map<number, BlockHeader>();
  private tip = -1;

  constructor(options?: { checkpointHeight?: number; parent?: HeaderChain; forkpoint?: number }) {
    this.parent = options?.parent ?? null;
    this.forkpoint = this.parent ? Math.max(0, Math.floor(options?.forkpoint ?? 0)) : 0;
    this.checkpointHeight = this.parent ? 0 : Math.max(0, Math.floor(options?.checkpointHeight ?? 0));
    if (this.parent && this.forkpoint > this.parent.height() + 1) {
      throw new SpvError('HEADER', 'Fork point is above parent tip', { forkpoint: this.forkpoint, parentHeight: this.parent.height() });
    }
  }

  /**
   * Highest known height: stored tip, checkpoint, or (for forks) the last shared height.
   */
  height(): number {
    const floor = this.parent ? this.forkpoint - 1 : this.checkpointHeight;
    return Math.max(this.tip, floor);
  }

  readHeader(height: number): BlockHeader | undefined {
    if (!Number.isInteger(height) || height < 0 || height > this.height()) return undefined;
    if (this.parent && height < this.forkpoint) return this.parent.readHeader(height);
    return this.headers.get(height);
  }

  /**
   * Store one header. Rejects a header that does not link to a stored predecessor
   * or that would replace a different stored header.
   */
  saveHeader(header: BlockHeader) {
    this.saveHeaders([header]);
  }

  /**
   * Store consecutive headers. The whole batch is checked before anything is
   * written, so a rejected batch leaves the chain unchanged.
   */
  saveHeaders(headers: readonly BlockHeader[]) {
    const sorted = [...headers].sort((a, b) => a.blockHeight - b.blockHeight);
    const first = sorted[0];
    if (!first) return;
    assertHeaderRun(sorted);
    const prev = first.blockHeight > 0 ? this.readHeader(first.blockHeight - 1) : undefined;
    if (prev && hashHeader(prev) !== first.prevBlockHash.toLowerCase()) {
      throw new SpvError('HEADER', 'Header does not connect to its predecessor', { height: first.blockHeight, prevBlockHash: first.prevBlockHash });
    }
    const last = sorted[sorted.length - 1]!;
    const next = this.readHeader(last.blockHeight + 1);
    if (next && next.prevBlockHash.toLowerCase() !== hashHeader(last)) {
      throw new SpvError('HEADER', 'Stored successor does not connect to header', { height: last.blockHeight });
    }
    let tip = this.height();
    for (const header of sorted) {
      this.assertStorable(header, tip);
      tip = Math.max(tip, header.blockHeight);
    }
    for (const header of sorted) {
      this.headers.set(header.blockHeight, header);
      if (header.blockHeight > this.tip) this.tip = header.blockHeight;
    }
  }

  private assertStorable(header: BlockHeader, tip: number) {
    const height = header.blockHeight;
    if (!Number.isInteger(height) || height < 0) {
      throw new SpvError('HEADER', 'Invalid header height', { height });
    }
    if (this.parent && height < this.forkpoint) {
      throw new SpvError('HEADER', 'Header below fork point', { height, forkpoint: this.forkpoint });
    }
    if (height > tip + 1) {
      throw new SpvError('HEADER', 'Header does not extend the chain', { height, tip });
    }
    const stored = this.headers.get(height);
    if (stored && hashHeader(stored) !== hashHeader(header)) {
      throw new SpvError('HEADER', 'Header conflicts with stored header', { height });
    }
  }

  /**
   * Start a competing branch whose first header is `header`.
   */
  fork(header: BlockHeader): HeaderChain {
    const child = new HeaderChain({ parent: this, forkpoint: header.blockHeight });
    child.saveHeader(header);
    return child;
  }

  /**
   * Map of every chain in this lineage to the highest height this lineage uses from it.
   */
  parentHeights(): Map<HeaderChain, number> {
    const result = new Map<HeaderChain, number>([[this, this.height()]]);
    let chain: HeaderChain = this;
    while (chain.parent) {
      result.set(chain.parent, chain.forkpoint - 1);
      chain = chain.parent;
    }
    return result;
  }

  /**
   * Height of the last block shared with `other`.
   */
  commonAncestorHeight(other: ChainTip): number {
    if (!(other instanceof HeaderChain)) {
      throw new SpvError('HEADER', 'Cannot compare against a foreign chain implementation');
    }
    const ours = this.parentHeights();
    const theirs = other.parentHeights();
    let last = 0;
    for (const [chain, height] of ours) {
      const theirHeight = theirs.get(chain);
      if (theirHeight == null) continue;
      last = Math.max(last, Math.min(height, theirHeight));
    }
    return last;
  }
}
