/**
 * @fileoverview Garbage collection helper for weak-reference tests
 *
 * V8 only exposes `gc` when started with `--expose-gc`. Setting the flag at
 * runtime makes it available to contexts created afterwards.
 */

import { setFlagsFromString } from 'v8';
import { runInNewContext } from 'vm';

setFlagsFromString('--expose-gc');
const gc: unknown = runInNewContext('gc');

/**
 * Let the current job finish (WeakRef targets stay alive until it does),
 * then run a full collection.
 */
export async function collectGarbage(): Promise<void> {
  if (typeof gc !== 'function') {
    throw new Error('gc is not exposed');
  }
  await new Promise((resolve) => setImmediate(resolve));
  gc();
  await new Promise((resolve) => setImmediate(resolve));
}
