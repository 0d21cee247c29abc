/**
 * Internal modules barrel export
 */

// Constants
export {
  HANDLE_STATE,
  KIND_DEFAULT,
  KIND_DISPOSER,
  KIND_IN_PLACE,
  PHASE_LIVE,
  PHASE_DISPOSING,
  PHASE_EXPIRING,
  PHASE_GONE,
  UNLIMITED_BLOCKS,
  LOG_PREFIX,
} from './constants';

// Heap
export { heapReserve, heapRelease, heapIsLive, heapStats, type HeapStats } from './heap';

// Ownership Block
export {
  isDisposable,
  destroyValue,
  blockCreateDefault,
  blockCreateDisposer,
  blockCreateInPlace,
  blockDispose,
  blockIncStrong,
  blockDecStrong,
  blockIncWeak,
  blockDecWeak,
  blockStrongCount,
  blockWeakCount,
} from './block';

// Types
export type {
  Disposable,
  Disposer,
  BlockKind,
  BlockPhase,
  DefaultBlock,
  DisposerBlock,
  InPlaceBlock,
  OwnershipBlock,
  HandleState,
  HandleLike,
} from './types';
