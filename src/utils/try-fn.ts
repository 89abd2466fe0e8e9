/**
 * tryFn - run an operation and capture its outcome as a tuple instead of a throw.
 *
 * Used wherever a single item may fail without aborting the surrounding loop
 * (stylesheet fetches, image probes, HEAD requests, JSON-LD blocks, tables).
 *
 * The tuple narrows on its first element:
 *   - `[true, null, data]` when the operation succeeded
 *   - `[false, error, undefined]` when it threw or rejected
 */
import { PagelensError } from '../core/errors.js';

export type TryResult<T> =
  | readonly [ok: true, err: null, data: T]
  | readonly [ok: false, err: Error, data: undefined];

export async function tryFn<T>(fnOrPromise: (() => Promise<T>) | Promise<T>): Promise<TryResult<T>> {
  try {
    const data = typeof fnOrPromise === 'function' ? await fnOrPromise() : await fnOrPromise;
    return [true, null, data];
  } catch (error) {
    return [false, wrapUnknownError(error, 'Promise rejected'), undefined];
  }
}

export function tryFnSync<T>(fn: () => T): TryResult<T> {
  try {
    return [true, null, fn()];
  } catch (err) {
    return [false, wrapUnknownError(err, 'Synchronous function threw an error'), undefined];
  }
}

export default tryFn;

function wrapUnknownError(err: unknown, context: string): Error {
  if (err instanceof Error) return err;
  return new PagelensError(
    `${context}: ${String(err)}`,
    undefined,
    ['Inspect the original value being thrown.']
  );
}
