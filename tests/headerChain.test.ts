import { describe, expect, it } from 'vitest';
import { HeaderChain } from '../src/chain/headerChain';
import { hashHeader } from '../src/chain/blockHeader';
import type { ChainTip } from '../src/types';
import { buildHeaders, chainOf, makeHeader, txid, ZERO_HASH } from './helpers';

describe('HeaderChain', () => {
  const headers = buildHeaders(10);

  it('stores linked headers', () => {
    const chain = chainOf(headers.slice(0, 5));
    expect(chain.height()).toBe(4);
    expect(chain.readHeader(2)).toEqual(headers[2]);
    expect(chain.readHeader(5)).toBeUndefined();
  });

  it('reports the checkpoint height before any header is stored', () => {
    const chain = new HeaderChain({ checkpointHeight: 100 });
    expect(chain.height()).toBe(100);
    expect(chain.readHeader(50)).toBeUndefined();
  });

  it('rejects a header that does not connect', () => {
    const chain = chainOf(headers.slice(0, 2));
    expect(() => chain.saveHeader(makeHeader(2, ZERO_HASH))).toThrow('Header does not connect to its predecessor');
  });

  it('rejects a gap above the tip', () => {
    const chain = chainOf(headers.slice(0, 2));
    expect(() => chain.saveHeader(headers[5]!)).toThrow('Header does not extend the chain');
  });

  it('sorts headers before saving', () => {
    const chain = new HeaderChain();
    chain.saveHeaders([headers[2]!, headers[0]!, headers[1]!]);
    expect(chain.height()).toBe(2);
  });

  it('refuses to replace a stored header with a different one', () => {
    const chain = chainOf(headers.slice(0, 6));
    const other = makeHeader(5, hashHeader(headers[4]!), txid('other-5'));
    expect(() => chain.saveHeader(other)).toThrow('Header conflicts with stored header');
    expect(chain.readHeader(5)).toEqual(headers[5]);
    chain.saveHeader(headers[5]!);
    expect(chain.height()).toBe(5);
  });

  it('stores nothing from a batch that breaks partway', () => {
    const chain = chainOf(headers.slice(0, 3));
    const broken = makeHeader(5, ZERO_HASH);
    expect(() => chain.saveHeaders([headers[3]!, headers[4]!, broken])).toThrow('Header does not connect to its predecessor');
    expect(chain.height()).toBe(2);
    expect(chain.readHeader(3)).toBeUndefined();
  });

  it('rejects a header that its stored successor does not link to', () => {
    const chain = new HeaderChain({ checkpointHeight: 20 });
    chain.saveHeaders(headers.slice(6, 10));
    const other = makeHeader(5, hashHeader(headers[4]!), txid('other-5'));
    expect(() => chain.saveHeader(other)).toThrow('Stored successor does not connect to header');
    chain.saveHeader(headers[5]!);
    expect(chain.readHeader(5)).toEqual(headers[5]);
  });

  it('stores nothing from a batch with a gap', () => {
    const chain = chainOf(headers.slice(0, 3));
    expect(() => chain.saveHeaders([headers[3]!, headers[5]!])).toThrow('Headers are not consecutive');
    expect(chain.height()).toBe(2);
  });

  describe('forks', () => {
    const base = chainOf(headers);
    const alt = makeHeader(6, hashHeader(headers[5]!), txid('alt-6'));
    const fork = base.fork(alt);

    it('shares headers below the fork point', () => {
      expect(fork.height()).toBe(6);
      expect(fork.readHeader(5)).toEqual(headers[5]);
      expect(fork.readHeader(6)).toEqual(alt);
      expect(base.readHeader(6)).toEqual(headers[6]);
    });

    it('finds the last common height from either side', () => {
      expect(fork.commonAncestorHeight(base)).toBe(5);
      expect(base.commonAncestorHeight(fork)).toBe(5);
      expect(base.commonAncestorHeight(base)).toBe(9);
    });

    it('maps every chain in the lineage to the height used from it', () => {
      expect([...fork.parentHeights()]).toEqual([
        [fork, 6],
        [base, 5],
      ]);
    });

    it('returns 0 for unrelated chains', () => {
      expect(chainOf(headers.slice(0, 3)).commonAncestorHeight(base)).toBe(0);
    });

    it('rejects headers below the fork point', () => {
      expect(() => fork.saveHeader(headers[5]!)).toThrow('Header below fork point');
    });

    it('rejects a fork point above the parent tip', () => {
      expect(() => new HeaderChain({ parent: base, forkpoint: 11 })).toThrow('Fork point is above parent tip');
    });
  });

  it('refuses to compare with another ChainTip implementation', () => {
    const foreign: ChainTip = { height: () => 0, readHeader: () => undefined, commonAncestorHeight: () => 0 };
    expect(() => chainOf(headers).commonAncestorHeight(foreign)).toThrow('Cannot compare against a foreign chain implementation');
  });
});
