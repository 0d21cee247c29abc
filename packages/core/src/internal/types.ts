/**
 * Core type definitions
 */

import { HANDLE_STATE } from './constants';
import type {
  KIND_DEFAULT,
  KIND_DISPOSER,
  KIND_IN_PLACE,
  PHASE_LIVE,
  PHASE_DISPOSING,
  PHASE_EXPIRING,
  PHASE_GONE,
} from './constants';

// Value with its own teardown, run by default destruction
export interface Disposable {
  dispose(): void;
}

// Caller-supplied release logic
export type Disposer<T> = (value: T) => void;

export type BlockKind = typeof KIND_DEFAULT | typeof KIND_DISPOSER | typeof KIND_IN_PLACE;

export type BlockPhase =
  | typeof PHASE_LIVE
  | typeof PHASE_DISPOSING
  | typeof PHASE_EXPIRING
  | typeof PHASE_GONE;

interface BlockHeader {
  id: number;
  strong: number;
  weak: number;
  phase: BlockPhase;
}

// Owns a value; disposal is default destruction
export interface DefaultBlock extends BlockHeader {
  kind: typeof KIND_DEFAULT;
  target: unknown;
}

// Owns a value plus the disposer bound to it
export interface DisposerBlock extends BlockHeader {
  kind: typeof KIND_DISPOSER;
  target: unknown;
  release: () => void;
}

// Value constructed directly into the block
export interface InPlaceBlock extends BlockHeader {
  kind: typeof KIND_IN_PLACE;
  slot: unknown;
  constructed: boolean;
}

export type OwnershipBlock = DefaultBlock | DisposerBlock | InPlaceBlock;

// Shared by SharedHandle and WeakHandle
export interface HandleState<T> {
  block: OwnershipBlock | null;
  address: T | null;
}

// Anything carrying a (block, address) pair
export interface HandleLike {
  readonly [HANDLE_STATE]: HandleState<unknown>;
}
