/**
 * Ownership Block - strong/weak counts plus variant-specific disposal
 *
 * Lifecycle: live → (disposing) → expiring → gone, or live → gone when no
 * weak observer remains at the last strong release. Never moves backwards.
 */

import { LifecycleError } from '../errors';
import { getLogger } from '../log';
import {
  KIND_DEFAULT,
  KIND_DISPOSER,
  KIND_IN_PLACE,
  PHASE_LIVE,
  PHASE_DISPOSING,
  PHASE_EXPIRING,
  PHASE_GONE,
} from './constants';
import { heapReserve, heapRelease } from './heap';
import type {
  DefaultBlock,
  Disposable,
  Disposer,
  DisposerBlock,
  InPlaceBlock,
  OwnershipBlock,
} from './types';

const noop = () => {
  // nothing to release
};

export function isDisposable(value: unknown): value is Disposable {
  return (
    (typeof value === 'object' || typeof value === 'function') &&
    value !== null &&
    'dispose' in value &&
    typeof value.dispose === 'function'
  );
}

/** Default destruction: run the value's own teardown, if any. */
export function destroyValue(value: unknown): void {
  if (isDisposable(value)) value.dispose();
}

// =====================================================
// Creation
// =====================================================

function reserveOrCleanup(op: string, cleanup: () => void): number {
  try {
    return heapReserve(op);
  } catch (error) {
    getLogger().logFailure(op, error);
    cleanup();
    throw error;
  }
}

function constructOrRelease<T>(id: number, op: string, construct: () => T): T {
  try {
    return construct();
  } catch (error) {
    heapRelease(id);
    getLogger().logFailure(op, error);
    throw error;
  }
}

function allocated<B extends OwnershipBlock>(block: B): B {
  getLogger().logBlock('allocate', block);
  return block;
}

/**
 * Block owning `target`. If no block can be reserved, `target` is destroyed
 * before the failure propagates.
 */
export function blockCreateDefault(target: unknown, op: string): DefaultBlock {
  const id = reserveOrCleanup(op, () => destroyValue(target));
  return allocated<DefaultBlock>({
    id,
    strong: 1,
    weak: 0,
    phase: PHASE_LIVE,
    kind: KIND_DEFAULT,
    target,
  });
}

/**
 * Block owning `target` with a caller-supplied disposer. If no block can be
 * reserved, the disposer runs once on `target` before the failure propagates.
 */
export function blockCreateDisposer<T>(
  target: T | null,
  disposer: Disposer<T>,
  op: string
): DisposerBlock {
  const release = () => {
    if (target !== null) disposer(target);
  };
  const id = reserveOrCleanup(op, release);
  return allocated<DisposerBlock>({
    id,
    strong: 1,
    weak: 0,
    phase: PHASE_LIVE,
    kind: KIND_DISPOSER,
    target,
    release,
  });
}

/**
 * Reserve one block and construct the value into its slot.
 * A throwing constructor gives the reservation back.
 */
export function blockCreateInPlace<T>(
  construct: () => T,
  op: string
): { block: InPlaceBlock; value: T } {
  const id = reserveOrCleanup(op, noop);
  const value = constructOrRelease(id, op, construct);
  const block = allocated<InPlaceBlock>({
    id,
    strong: 1,
    weak: 0,
    phase: PHASE_LIVE,
    kind: KIND_IN_PLACE,
    slot: value,
    constructed: true,
  });
  return { block, value };
}

// =====================================================
// Disposal
// =====================================================

/** Dispose the managed value. The block itself stays allocated. */
export function blockDispose(block: OwnershipBlock): void {
  switch (block.kind) {
    case KIND_DEFAULT: {
      const { target } = block;
      block.target = null;
      destroyValue(target);
      break;
    }
    case KIND_DISPOSER: {
      const { release } = block;
      block.target = null;
      block.release = noop;
      release();
      break;
    }
    case KIND_IN_PLACE: {
      if (!block.constructed) break;
      const value = block.slot;
      block.slot = undefined;
      block.constructed = false;
      destroyValue(value);
      break;
    }
  }
}

function blockFree(block: OwnershipBlock): void {
  heapRelease(block.id);
  block.phase = PHASE_GONE;
  getLogger().logBlock('free', block);
}

// =====================================================
// Counting
// =====================================================

function lifecycleError(op: string, block: OwnershipBlock): LifecycleError {
  return new LifecycleError(
    op,
    `block#${String(block.id)} is ${block.phase} (strong=${String(block.strong)}, weak=${String(block.weak)})`
  );
}

export function blockIncStrong(block: OwnershipBlock): void {
  if (block.phase !== PHASE_LIVE) throw lifecycleError('blockIncStrong', block);
  block.strong++;
}

/**
 * Drop one strong reference. The last one disposes the value, then frees the
 * block unless weak observers remain. A throwing disposal still completes
 * the transition before the error propagates.
 */
export function blockDecStrong(block: OwnershipBlock): void {
  if (block.phase !== PHASE_LIVE || block.strong === 0) {
    throw lifecycleError('blockDecStrong', block);
  }
  block.strong--;
  if (block.strong !== 0) return;

  block.phase = PHASE_DISPOSING;
  try {
    blockDispose(block);
    getLogger().logBlock('dispose', block);
  } finally {
    block.phase = PHASE_EXPIRING;
    if (block.weak === 0) blockFree(block);
  }
}

export function blockIncWeak(block: OwnershipBlock): void {
  if (block.phase === PHASE_GONE) throw lifecycleError('blockIncWeak', block);
  block.weak++;
}

/**
 * Drop one weak reference. Frees the block when it was the last reference of
 * any kind. During disposal the strong side finishes the job instead.
 */
export function blockDecWeak(block: OwnershipBlock): void {
  if (block.phase === PHASE_GONE || block.weak === 0) {
    throw lifecycleError('blockDecWeak', block);
  }
  block.weak--;
  if (block.weak === 0 && block.phase === PHASE_EXPIRING) blockFree(block);
}

export function blockStrongCount(block: OwnershipBlock): number {
  return block.strong;
}

export function blockWeakCount(block: OwnershipBlock): number {
  return block.weak;
}
