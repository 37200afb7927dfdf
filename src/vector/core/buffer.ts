/**
 * Fixed-capacity slot storage owned by exactly one container.
 *
 * A Buffer knows nothing about size: every one of its `capacity` slots is
 * default-constructed at allocation and stays addressable until the buffer
 * is released. Capacity never changes; owners trade whole buffers through
 * swap() instead. There is no copy operation.
 */

import type { SlotCount } from '../../types/branded.ts';
import { isValidCount, slotCount, ZERO_COUNT } from '../../types/branded.ts';
import { AllocationError } from './errors.ts';

export class Buffer<T> {
  private slots: T[];
  private allocated: SlotCount;

  /**
   * Allocate `capacity` slots, each filled by `create`.
   * A capacity of 0 allocates nothing.
   */
  constructor(capacity: number, create: () => T) {
    this.slots = allocateSlots(capacity, create);
    this.allocated = slotCount(capacity);
  }

  /** Number of slots owned by this buffer */
  get capacity(): SlotCount {
    return this.allocated;
  }

  /**
   * Read slot `index`. Unchecked: the caller guarantees index < capacity.
   */
  get(index: number): T {
    return this.slots[index];
  }

  /**
   * Write slot `index`. Unchecked: the caller guarantees index < capacity.
   */
  set(index: number, value: T): void {
    this.slots[index] = value;
  }

  /**
   * Exchange storage and capacity with another buffer in O(1).
   */
  swap(other: Buffer<T>): void {
    const slots = this.slots;
    const allocated = this.allocated;
    this.slots = other.slots;
    this.allocated = other.allocated;
    other.slots = slots;
    other.allocated = allocated;
  }

  /**
   * Drop the storage. The buffer is left empty with capacity 0;
   * releasing an empty buffer does nothing.
   */
  release(): void {
    if (this.allocated === 0) return;
    this.slots = [];
    this.allocated = ZERO_COUNT;
  }
}

function allocateSlots<T>(capacity: number, create: () => T): T[] {
  if (!isValidCount(capacity)) {
    throw new AllocationError('Buffer', capacity);
  }
  if (capacity === 0) return [];

  let slots: T[];
  try {
    slots = new Array<T>(capacity);
  } catch (error) {
    throw new AllocationError('Buffer', capacity, { cause: error });
  }
  for (let i = 0; i < capacity; i++) {
    slots[i] = create();
  }
  return slots;
}
