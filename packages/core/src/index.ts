/**
 * refhold – reference-counted shared ownership
 *
 * - SharedHandle.of(value)           → owning handle, default destruction
 * - SharedHandle.withDisposer(v, fn) → owning handle, custom release
 * - SharedHandle.alias(owner, part)  → share a lifetime, expose another value
 * - WeakHandle.from(shared).lock()   → observe, promote while alive
 * - makeShared(Ctor, ...args)        → value built inside its own block
 */

import { heapStats, type HeapStats } from './internal';

export { SharedHandle } from './shared';
export { WeakHandle } from './weak';
export { makeShared } from './make-shared';

export {
  configure,
  getConfig,
  resetConfig,
  DEFAULT_CONFIG,
  type RefholdConfig,
  type ResolvedConfig,
  type DebugConfig,
} from './config';

export {
  RefholdError,
  AllocationError,
  EmptyHandleError,
  LifecycleError,
  ConfigError,
  type RefholdErrorCode,
} from './errors';

export { createLogger, type RefholdLogger, type BlockEvent } from './log';

export type { Disposable, Disposer, BlockKind, BlockPhase, HeapStats } from './internal';

/**
 * Snapshot of ownership block accounting.
 * `live` counts blocks not yet deallocated.
 */
export function getHeapStats(): HeapStats {
  return heapStats();
}
