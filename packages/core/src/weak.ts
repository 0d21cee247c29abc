/**
 * WeakHandle - non-owning observer of a SharedHandle's block
 */

import {
  HANDLE_STATE,
  blockIncStrong,
  blockIncWeak,
  blockDecWeak,
  blockStrongCount,
  type HandleState,
} from './internal';
import { SharedHandle, adoptShared } from './shared';

export class WeakHandle<T> {
  /** @internal */
  readonly [HANDLE_STATE]: HandleState<T> = { block: null, address: null };

  static from<T>(shared: SharedHandle<T>): WeakHandle<T> {
    return new WeakHandle<T>().observe(shared);
  }

  static copy<T>(source: WeakHandle<T>): WeakHandle<T> {
    return new WeakHandle<T>().copyFrom(source);
  }

  static move<T>(source: WeakHandle<T>): WeakHandle<T> {
    return new WeakHandle<T>().moveFrom(source);
  }

  /** Start observing `shared`'s block. */
  observe<U extends T>(shared: SharedHandle<U>): this {
    this.share(shared[HANDLE_STATE]);
    return this;
  }

  copyFrom<U extends T>(source: WeakHandle<U>): this {
    this.share(source[HANDLE_STATE]);
    return this;
  }

  /** Take over `source`'s observation, leaving `source` empty. */
  moveFrom<U extends T>(source: WeakHandle<U>): this {
    const state = this[HANDLE_STATE];
    const src = source[HANDLE_STATE];
    if (src === state) return this;

    const old = state.block;
    state.block = src.block;
    state.address = src.address;
    src.block = null;
    src.address = null;
    if (old !== null) blockDecWeak(old);
    return this;
  }

  reset(): void {
    const state = this[HANDLE_STATE];
    const old = state.block;
    state.block = null;
    state.address = null;
    if (old !== null) blockDecWeak(old);
  }

  /**
   * Promote to an owning handle. Empty when nothing is observed or the value
   * has already been disposed.
   */
  lock(): SharedHandle<T> {
    const { block, address } = this[HANDLE_STATE];
    if (block === null || blockStrongCount(block) === 0) return SharedHandle.empty<T>();
    blockIncStrong(block);
    return adoptShared(block, address);
  }

  expired(): boolean {
    return this.strongCount() === 0;
  }

  strongCount(): number {
    const { block } = this[HANDLE_STATE];
    return block === null ? 0 : blockStrongCount(block);
  }

  // Same block: only the address changes, no count moves
  private share<U extends T>(src: HandleState<U>): void {
    const state = this[HANDLE_STATE];
    if (state.block === src.block) {
      state.address = src.address;
      return;
    }

    const old = state.block;
    if (src.block !== null) blockIncWeak(src.block);
    state.block = src.block;
    state.address = src.address;
    if (old !== null) blockDecWeak(old);
  }
}
