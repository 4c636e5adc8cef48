import { GateClosedError } from '../errors';

/** Resolves after `ms`, or rejects with `GateClosedError` once `signal` aborts. */
export const sleep = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new GateClosedError('sleep aborted'));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new GateClosedError('sleep aborted'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener('abort', onAbort, { once: true });
  });
