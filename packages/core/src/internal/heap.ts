/**
 * Block heap - allocation accounting for ownership blocks
 *
 * Every block creation reserves a slot, every deallocation returns it.
 * Reservation fails once `maxLiveBlocks` slots are held.
 */

import { currentConfig } from '../config';
import { AllocationError, LifecycleError } from '../errors';

export interface HeapStats {
  live: number;
  allocated: number;
  freed: number;
  failed: number;
}

const heap = {
  nextId: 1,
  live: new Set<number>(),
  allocated: 0,
  freed: 0,
  failed: 0,
};

/**
 * Reserve a slot for a new block and return its id.
 * Throws AllocationError when the heap is full.
 */
export function heapReserve(op: string): number {
  const limit = currentConfig().maxLiveBlocks;
  if (heap.live.size >= limit) {
    heap.failed++;
    throw new AllocationError(op, limit);
  }
  const id = heap.nextId++;
  heap.live.add(id);
  heap.allocated++;
  return id;
}

export function heapRelease(id: number): void {
  if (!heap.live.delete(id)) {
    throw new LifecycleError('heapRelease', `block#${String(id)} is not allocated`);
  }
  heap.freed++;
}

export function heapIsLive(id: number): boolean {
  return heap.live.has(id);
}

export function heapStats(): HeapStats {
  return {
    live: heap.live.size,
    allocated: heap.allocated,
    freed: heap.freed,
    failed: heap.failed,
  };
}
