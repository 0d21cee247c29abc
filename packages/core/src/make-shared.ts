/**
 * makeShared - value and ownership block in a single allocation
 */

import { blockCreateInPlace } from './internal';
import { adoptShared, type SharedHandle } from './shared';

/**
 * Construct `new Ctor(...args)` directly into a fresh in-place block.
 *
 * @example
 * const widget = makeShared(Widget, 42);
 * widget.deref().size; // 42
 */
export function makeShared<T, A extends unknown[]>(
  Ctor: new (...args: A) => T,
  ...args: A
): SharedHandle<T> {
  const { block, value } = blockCreateInPlace(() => new Ctor(...args), 'makeShared');
  return adoptShared(block, value);
}
