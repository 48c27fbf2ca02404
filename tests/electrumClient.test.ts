import { getEventListeners } from 'node:events';
import { describe, expect, it, vi } from 'vitest';
import { ElectrumClient, ElectrumRpcError, type ElectrumRpcCaller } from '../src/network/electrumClient';
import { headerToHex } from '../src/chain/blockHeader';
import { buildHeaders, txid } from './helpers';

const tx = txid('client');
const branch = [txid('b0'), txid('b1')];

const callerReturning = (result: unknown) => vi.fn<ElectrumRpcCaller>(async () => result);

describe('ElectrumClient.getMerkle', () => {
  it('normalizes a valid response', async () => {
    const call = callerReturning({ block_height: 100, pos: 5, merkle: branch.map((h) => h.toUpperCase()) });
    const client = new ElectrumClient(call);
    await expect(client.getMerkle(tx, 100)).resolves.toEqual({ blockHeight: 100, leafPosition: 5, branch });
    expect(call).toHaveBeenCalledWith('blockchain.transaction.get_merkle', [tx, 100], { peer: null, signal: expect.any(AbortSignal) });
  });

  it('forwards the pinned peer', async () => {
    const call = callerReturning({ block_height: 100, pos: 0, merkle: [] });
    await new ElectrumClient(call).getMerkle(tx, 100, { peer: { id: 'peer-7' } });
    expect(call.mock.calls[0]?.[2].peer).toEqual({ id: 'peer-7' });
  });

  it('maps a server error to NOT_FOUND', async () => {
    const call = vi.fn<ElectrumRpcCaller>(async () => {
      throw new ElectrumRpcError(1, 'tx not in block');
    });
    await expect(new ElectrumClient(call).getMerkle(tx, 100)).rejects.toMatchObject({
      name: 'SpvError',
      code: 'NOT_FOUND',
      message: 'Server returned error for blockchain.transaction.get_merkle',
    });
  });

  it('maps transport failures to NETWORK', async () => {
    const call = vi.fn<ElectrumRpcCaller>(async () => {
      throw new Error('socket closed');
    });
    await expect(new ElectrumClient(call).getMerkle(tx, 100)).rejects.toMatchObject({
      code: 'NETWORK',
      message: 'blockchain.transaction.get_merkle request failed',
      detail: expect.objectContaining({ reason: 'transport_error' }),
    });
  });

  it('rejects an invalid position', async () => {
    const call = callerReturning({ block_height: 100, pos: -1, merkle: [] });
    await expect(new ElectrumClient(call).getMerkle(tx, 100)).rejects.toMatchObject({
      code: 'NETWORK',
      message: 'Invalid pos in blockchain.transaction.get_merkle response',
    });
  });

  it('rejects a non-hash branch entry', async () => {
    const call = callerReturning({ block_height: 100, pos: 0, merkle: ['00'] });
    await expect(new ElectrumClient(call).getMerkle(tx, 100)).rejects.toMatchObject({
      code: 'NETWORK',
      message: 'Invalid merkle in blockchain.transaction.get_merkle response',
    });
  });

  it('rethrows the abort reason when the caller cancels', async () => {
    const controller = new AbortController();
    const call = vi.fn<ElectrumRpcCaller>(async () => {
      controller.abort(new Error('stopped'));
      throw new Error('socket closed');
    });
    await expect(new ElectrumClient(call).getMerkle(tx, 100, { signal: controller.signal })).rejects.toThrow('stopped');
  });

  it('leaves no abort listeners on a long-lived caller signal', async () => {
    const controller = new AbortController();
    const call = callerReturning({ block_height: 100, pos: 0, merkle: [] });
    const client = new ElectrumClient(call);
    for (let i = 0; i < 50; i++) await client.getMerkle(tx, 100, { signal: controller.signal });
    expect(call).toHaveBeenCalledTimes(50);
    expect(getEventListeners(controller.signal, 'abort')).toHaveLength(0);
  });

  it('passes on an abort of the caller signal to the request', async () => {
    const controller = new AbortController();
    const call = vi.fn<ElectrumRpcCaller>(async () => {
      controller.abort(new Error('stopped'));
      return { block_height: 100, pos: 0, merkle: [] };
    });
    await new ElectrumClient(call).getMerkle(tx, 100, { signal: controller.signal });
    expect(call.mock.calls[0]?.[2].signal?.aborted).toBe(true);
  });

  it('emits debug events', async () => {
    const debug = vi.fn();
    const call = callerReturning({ block_height: 1, pos: 0, merkle: [] });
    await new ElectrumClient(call, undefined, debug).getMerkle(tx, 1);
    expect(debug).toHaveBeenCalledWith({
      type: 'debug',
      payload: { scope: 'electrum', message: 'request', detail: { method: 'blockchain.transaction.get_merkle', params: [tx, 1], peer: null } },
    });
  });
});

describe('ElectrumClient headers', () => {
  const headers = buildHeaders(4);

  it('parses a bare header', async () => {
    const call = callerReturning(headerToHex(headers[2]!));
    await expect(new ElectrumClient(call).getBlockHeader(2, 0)).resolves.toEqual({ header: headers[2] });
    expect(call).toHaveBeenCalledWith('blockchain.block.header', [2, 0], expect.anything());
  });

  it('parses a header with checkpoint proof', async () => {
    const root = txid('root');
    const call = callerReturning({ header: headerToHex(headers[2]!), branch, root: root.toUpperCase() });
    await expect(new ElectrumClient(call).getBlockHeader(2, 3)).resolves.toEqual({ header: headers[2], branch, root });
  });

  it('splits a headers response', async () => {
    const hex = headers
      .slice(1)
      .map((h) => headerToHex(h))
      .join('');
    const call = callerReturning({ count: 3, hex, max: 2016 });
    const res = await new ElectrumClient(call).getBlockHeaders(1, 3, 0);
    expect(res.headers).toEqual(headers.slice(1));
    expect(res.max).toBe(2016);
    expect(res.branch).toBeUndefined();
  });

  it('rejects hex that does not match count', async () => {
    const call = callerReturning({ count: 2, hex: headerToHex(headers[0]!), max: 2016 });
    await expect(new ElectrumClient(call).getBlockHeaders(0, 2, 0)).rejects.toMatchObject({
      code: 'NETWORK',
      message: 'Invalid hex in blockchain.block.headers response',
    });
  });

  it('rejects more headers than requested', async () => {
    const hex = headers.map((h) => headerToHex(h)).join('');
    const call = callerReturning({ count: 4, hex, max: 2016 });
    await expect(new ElectrumClient(call).getBlockHeaders(0, 2, 0)).rejects.toMatchObject({
      message: 'Too many headers in blockchain.block.headers response',
    });
  });

  it('maps server errors on header requests to NETWORK', async () => {
    const call = vi.fn<ElectrumRpcCaller>(async () => {
      throw new ElectrumRpcError(-32600, 'height out of range');
    });
    await expect(new ElectrumClient(call).getBlockHeader(99, 0)).rejects.toMatchObject({
      code: 'NETWORK',
      detail: expect.objectContaining({ rpcCode: -32600 }),
    });
  });
});
