/**
 * SharedHandle - owning reference-counted handle
 *
 * A handle is a (block, address) pair. `block` carries the lifetime,
 * `address` is what get()/deref() expose. Aliasing keeps them apart.
 */

import { EmptyHandleError } from './errors';
import {
  HANDLE_STATE,
  blockCreateDefault,
  blockCreateDisposer,
  blockIncStrong,
  blockDecStrong,
  blockStrongCount,
  blockWeakCount,
  type Disposer,
  type HandleLike,
  type HandleState,
  type OwnershipBlock,
} from './internal';

export class SharedHandle<T> {
  /** @internal */
  readonly [HANDLE_STATE]: HandleState<T> = { block: null, address: null };

  // =====================================================
  // Construction
  // =====================================================

  /** Empty handle: no block, no address, strongCount() === 0. */
  static empty<T>(): SharedHandle<T> {
    return new SharedHandle<T>();
  }

  /**
   * Start owning `value`. A null value still gets a block, so the handle
   * is non-empty (strongCount() === 1) while addressing nothing.
   */
  static of<T>(value: T | null): SharedHandle<T> {
    return adoptShared(blockCreateDefault(value, 'SharedHandle.of'), value);
  }

  /**
   * Start owning `value`, releasing it with `disposer` instead of default
   * destruction. The disposer is skipped for a null value.
   */
  static withDisposer<T>(value: T | null, disposer: Disposer<T>): SharedHandle<T> {
    return adoptShared(blockCreateDisposer(value, disposer, 'SharedHandle.withDisposer'), value);
  }

  /**
   * Share `owner`'s lifetime while exposing `address`, typically a part of
   * the owned value.
   */
  static alias<T, U>(owner: SharedHandle<U>, address: T | null): SharedHandle<T> {
    const { block } = owner[HANDLE_STATE];
    if (block !== null) blockIncStrong(block);
    return adoptShared(block, address);
  }

  static copy<T>(source: SharedHandle<T>): SharedHandle<T> {
    return new SharedHandle<T>().copyFrom(source);
  }

  static move<T>(source: SharedHandle<T>): SharedHandle<T> {
    return new SharedHandle<T>().moveFrom(source);
  }

  // =====================================================
  // Assignment
  // =====================================================

  /**
   * Share `source`'s block and address. When both already share a block
   * (self-assignment included) only the address is taken.
   */
  copyFrom<U extends T>(source: SharedHandle<U>): this {
    const state = this[HANDLE_STATE];
    const src = source[HANDLE_STATE];

    if (state.block === src.block) {
      state.address = src.address;
      return this;
    }

    const old = state.block;
    if (src.block !== null) blockIncStrong(src.block);
    state.block = src.block;
    state.address = src.address;
    if (old !== null) blockDecStrong(old);
    return this;
  }

  /**
   * Take over `source`'s block and address, leaving `source` empty.
   * When both shared a block, the source's reference goes back to it; the
   * count cannot reach zero since this handle still holds one.
   */
  moveFrom<U extends T>(source: SharedHandle<U>): this {
    const state = this[HANDLE_STATE];
    const src = source[HANDLE_STATE];
    if (src === state) return this;

    const old = state.block;
    state.block = src.block;
    state.address = src.address;
    src.block = null;
    src.address = null;
    if (old !== null) blockDecStrong(old);
    return this;
  }

  /**
   * Release current ownership, then optionally start owning `value`.
   * The new value is taken over even when releasing the old one throws;
   * that error propagates afterwards. If the new block cannot be allocated
   * the handle stays empty and the value has already been released.
   */
  reset(): void;
  reset(value: T | null): void;
  reset(value: T | null, disposer: Disposer<T>): void;
  reset(...args: [] | [value: T | null] | [value: T | null, disposer: Disposer<T>]): void {
    const state = this[HANDLE_STATE];
    const old = state.block;
    state.block = null;
    state.address = null;
    try {
      if (old !== null) blockDecStrong(old);
    } finally {
      this.adopt(args);
    }
  }

  private adopt(args: [] | [value: T | null] | [value: T | null, disposer: Disposer<T>]): void {
    if (args.length === 0) return;
    const state = this[HANDLE_STATE];

    if (args.length === 2) {
      const [value, disposer] = args;
      state.block = blockCreateDisposer(value, disposer, 'SharedHandle.reset');
      state.address = value;
      return;
    }

    const [value] = args;
    state.block = blockCreateDefault(value, 'SharedHandle.reset');
    state.address = value;
  }

  // =====================================================
  // Accessors
  // =====================================================

  get(): T | null {
    return this[HANDLE_STATE].address;
  }

  /** The addressed value; throws EmptyHandleError when there is none. */
  deref(): T {
    const { address } = this[HANDLE_STATE];
    if (address === null) throw new EmptyHandleError('SharedHandle.deref');
    return address;
  }

  hasValue(): boolean {
    return this[HANDLE_STATE].address !== null;
  }

  strongCount(): number {
    const { block } = this[HANDLE_STATE];
    return block === null ? 0 : blockStrongCount(block);
  }

  weakCount(): number {
    const { block } = this[HANDLE_STATE];
    return block === null ? 0 : blockWeakCount(block);
  }

  // =====================================================
  // Comparison
  // =====================================================

  /** Address equality; ignores which block either handle shares. */
  equals(other: SharedHandle<unknown>): boolean {
    return this[HANDLE_STATE].address === other[HANDLE_STATE].address;
  }

  /** Compare the address with a plain value. `is(null)` tests for null. */
  is(value: unknown): boolean {
    return this[HANDLE_STATE].address === value;
  }

  /** Block identity: true when both handles share one lifetime. */
  ownerEquals(other: HandleLike): boolean {
    return this[HANDLE_STATE].block === other[HANDLE_STATE].block;
  }

  toString(): string {
    const { block } = this[HANDLE_STATE];
    if (block === null) return 'SharedHandle(empty)';
    return `SharedHandle(block#${String(block.id)}, strong=${String(block.strong)}, weak=${String(block.weak)})`;
  }
}

/**
 * Wrap an already-counted block reference in a handle. The caller has
 * accounted for the strong reference this handle now holds.
 * @internal
 */
export function adoptShared<T>(block: OwnershipBlock | null, address: T | null): SharedHandle<T> {
  const handle = new SharedHandle<T>();
  const state = handle[HANDLE_STATE];
  state.block = block;
  state.address = address;
  return handle;
}
