/**
 * Benchmark: handle creation and sharing
 */

import { bench, describe } from 'vitest';
import { SharedHandle, WeakHandle, makeShared } from '../packages/core/src/index';

class Widget {
  constructor(readonly size: number) {}
}

// ===== Creation =====
describe('Create and release', () => {
  bench('SharedHandle.of', () => {
    const p = SharedHandle.of(new Widget(1));
    p.reset();
  });

  bench('makeShared', () => {
    const p = makeShared(Widget, 1);
    p.reset();
  });
});

// ===== Sharing =====
describe('Copy 100 times', () => {
  const owner = SharedHandle.of(new Widget(1));

  bench('SharedHandle.copy', () => {
    const copies: SharedHandle<Widget>[] = [];
    for (let i = 0; i < 100; i++) copies.push(SharedHandle.copy(owner));
    for (const copy of copies) copy.reset();
  });

  bench('WeakHandle.lock', () => {
    const weak = WeakHandle.from(owner);
    for (let i = 0; i < 100; i++) weak.lock().reset();
    weak.reset();
  });
});
