/**
 * Tests for the ownership block state machine
 */

import { describe, it, expect, vi } from 'vitest';
import { LifecycleError } from '../errors';
import {
  blockCreateDefault,
  blockCreateDisposer,
  blockCreateInPlace,
  blockDecStrong,
  blockDecWeak,
  blockIncStrong,
  blockIncWeak,
  heapIsLive,
  isDisposable,
} from './index';

function disposable() {
  return { dispose: vi.fn() };
}

describe('Ownership block', () => {
  describe('creation', () => {
    it('should start live with one strong reference', () => {
      const block = blockCreateDefault({}, 'test');

      expect(block.strong).toBe(1);
      expect(block.weak).toBe(0);
      expect(block.phase).toBe('live');
      expect(block.kind).toBe('default');
      expect(heapIsLive(block.id)).toBe(true);
    });

    it('should construct in-place values into the slot', () => {
      const { block, value } = blockCreateInPlace(() => ({ n: 3 }), 'test');

      expect(block.kind).toBe('in-place');
      expect(block.slot).toBe(value);
      expect(block.constructed).toBe(true);
    });
  });

  describe('strong release', () => {
    it('should dispose and free when no weak reference remains', () => {
      const value = disposable();
      const block = blockCreateDefault(value, 'test');

      blockDecStrong(block);

      expect(value.dispose).toHaveBeenCalledTimes(1);
      expect(block.phase).toBe('gone');
      expect(heapIsLive(block.id)).toBe(false);
    });

    it('should only dispose on the last strong reference', () => {
      const value = disposable();
      const block = blockCreateDefault(value, 'test');
      blockIncStrong(block);

      blockDecStrong(block);
      expect(value.dispose).not.toHaveBeenCalled();

      blockDecStrong(block);
      expect(value.dispose).toHaveBeenCalledTimes(1);
    });

    it('should keep the block while weak observers remain', () => {
      const value = disposable();
      const block = blockCreateDefault(value, 'test');
      blockIncWeak(block);

      blockDecStrong(block);
      expect(value.dispose).toHaveBeenCalledTimes(1);
      expect(block.phase).toBe('expiring');
      expect(heapIsLive(block.id)).toBe(true);

      blockDecWeak(block);
      expect(block.phase).toBe('gone');
      expect(heapIsLive(block.id)).toBe(false);
      expect(value.dispose).toHaveBeenCalledTimes(1);
    });

    it('should finish the transition when disposal throws', () => {
      const block = blockCreateDisposer(
        { n: 1 },
        () => {
          throw new Error('release failed');
        },
        'test'
      );

      expect(() => blockDecStrong(block)).toThrow('release failed');
      expect(block.phase).toBe('gone');
      expect(heapIsLive(block.id)).toBe(false);
    });

    it('should free exactly once when a weak reference is dropped during disposal', () => {
      const holder: { block?: ReturnType<typeof blockCreateDisposer> } = {};
      const block = blockCreateDisposer(
        { n: 1 },
        () => {
          if (holder.block) blockDecWeak(holder.block);
        },
        'test'
      );
      holder.block = block;
      blockIncWeak(block);

      blockDecStrong(block);

      expect(block.weak).toBe(0);
      expect(block.phase).toBe('gone');
      expect(heapIsLive(block.id)).toBe(false);
    });
  });

  describe('disposal by variant', () => {
    it('should skip the disposer for a null value', () => {
      const disposer = vi.fn();
      const block = blockCreateDisposer<object>(null, disposer, 'test');

      blockDecStrong(block);

      expect(disposer).not.toHaveBeenCalled();
      expect(block.phase).toBe('gone');
    });

    it('should destroy in-place values and clear the slot', () => {
      const value = disposable();
      const { block } = blockCreateInPlace(() => value, 'test');

      blockDecStrong(block);

      expect(value.dispose).toHaveBeenCalledTimes(1);
      expect(block.slot).toBeUndefined();
      expect(block.constructed).toBe(false);
    });

    it('should leave values without dispose() alone', () => {
      const block = blockCreateDefault({ n: 1 }, 'test');

      expect(() => blockDecStrong(block)).not.toThrow();
      expect(block.phase).toBe('gone');
    });
  });

  describe('phase guards', () => {
    it('should refuse strong increments once the value is disposed', () => {
      const block = blockCreateDefault({}, 'test');
      blockIncWeak(block);
      blockDecStrong(block);

      expect(() => blockIncStrong(block)).toThrow(LifecycleError);
    });

    it('should refuse weak decrements on a freed block', () => {
      const block = blockCreateDefault({}, 'test');
      blockDecStrong(block);

      expect(() => blockDecWeak(block)).toThrow(LifecycleError);
      expect(() => blockDecStrong(block)).toThrow(LifecycleError);
    });

    it('should allow weak copies of an expiring block', () => {
      const block = blockCreateDefault({}, 'test');
      blockIncWeak(block);
      blockDecStrong(block);

      blockIncWeak(block);
      expect(block.weak).toBe(2);
    });
  });

  describe('isDisposable', () => {
    it('should recognise objects with a dispose method', () => {
      expect(isDisposable({ dispose: () => undefined })).toBe(true);
      expect(isDisposable({ dispose: 1 })).toBe(false);
      expect(isDisposable(null)).toBe(false);
      expect(isDisposable(42)).toBe(false);
    });
  });
});
