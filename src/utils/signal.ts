import { SpvError } from '../errors';

/**
 * Create an AbortSignal that fires after a timeout.
 */
export const signalTimeout = (ms: number): AbortSignal => AbortSignal.timeout(ms);

/**
 * Combine multiple signals into one that aborts on the first abort.
 */
export const signalAny = (signals: Array<AbortSignal | undefined>): AbortSignal | undefined => {
  const list = signals.filter((s): s is AbortSignal => s != null);
  if (!list.length) return undefined;
  if (list.length === 1) return list[0];
  return AbortSignal.any(list);
};

/**
 * Reason carried by an aborted signal, or a generic ABORTED error.
 */
export const abortReason = (signal: AbortSignal): unknown => signal.reason ?? new SpvError('ABORTED', 'Aborted');

/**
 * Throw if `signal` has already fired.
 */
export const throwIfAborted = (signal?: AbortSignal) => {
  if (signal?.aborted) throw abortReason(signal);
};
