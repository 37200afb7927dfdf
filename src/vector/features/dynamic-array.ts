/**
 * Growable contiguous sequence container.
 *
 * A DynamicArray owns exactly one Buffer. Slots [0, size) hold the
 * sequence; slots [size, capacity) are allocated but logically absent.
 * Every mutation either works in place or builds a larger Buffer, relocates
 * the live elements into it and swaps it in.
 *
 * Capacity policy: a full container grows 0 -> 1 -> 2 -> 4 -> ...,
 * so N appends to an empty container relocate fewer than 2N elements.
 *
 * Cursors (begin(), end(), insert(), erase()) are invalidated by any
 * reallocation, any shift (insert, erase) and any buffer exchange (swap,
 * take, moveAssign, copyAssign). Do not keep them across such calls.
 */

import type {
  ContractMode,
  DynamicArrayConfig,
  DynamicArrayInit,
  ElementTraits,
  Position,
  ReadonlyCursor,
  ReserveIntent,
  ResolvedDynamicArrayConfig,
} from '../../types/vector.ts';
import type { SlotCount, SlotIndex } from '../../types/branded.ts';
import {
  clampIndex,
  doubleCount,
  isValidCount,
  isValidIndex,
  slotCount,
  slotIndex,
  ZERO_COUNT,
  ZERO_INDEX,
} from '../../types/branded.ts';
import { Buffer } from '../core/buffer.ts';
import { resolveConfig } from '../core/config.ts';
import { expectContract, expectLiveCursor } from '../core/contracts.ts';
import { AllocationError, OutOfRangeError } from '../core/errors.ts';
import { isReserveIntent } from '../core/reserve.ts';
import { SlotCursor, type CursorHost } from './cursor.ts';
import { compareArrays, equal } from './compare.ts';

export class DynamicArray<T> implements CursorHost<T>, Iterable<T> {
  private buffer: Buffer<T>;
  private length: SlotCount;
  private epoch = 0;
  private readonly config: ResolvedDynamicArrayConfig<T>;

  private constructor(config: ResolvedDynamicArrayConfig<T>, buffer: Buffer<T>, length: SlotCount) {
    this.config = config;
    this.buffer = buffer;
    this.length = length;
  }

  // ===========================================================================
  // Construction
  // ===========================================================================

  /**
   * Empty container: size 0, capacity 0, no storage.
   */
  static empty<T>(config: DynamicArrayConfig<T>): DynamicArray<T> {
    const resolved = resolveConfig(config);
    return new DynamicArray(resolved, new Buffer(0, resolved.traits.create), ZERO_COUNT);
  }

  /**
   * Empty container with `intent.capacity` slots pre-allocated.
   */
  static withReserve<T>(intent: ReserveIntent, config: DynamicArrayConfig<T>): DynamicArray<T> {
    const resolved = resolveConfig(config);
    return new DynamicArray(resolved, new Buffer(intent.capacity, resolved.traits.create), ZERO_COUNT);
  }

  /**
   * `count` default-constructed elements; capacity equals size.
   */
  static withSize<T>(count: number, config: DynamicArrayConfig<T>): DynamicArray<T> {
    const resolved = resolveConfig(config);
    return new DynamicArray(resolved, new Buffer(count, resolved.traits.create), slotCount(count));
  }

  /**
   * `count` copies of `value`; capacity equals size.
   */
  static filled<T>(count: number, value: T, config: DynamicArrayConfig<T>): DynamicArray<T> {
    const resolved = resolveConfig(config);
    const buffer = new Buffer(count, resolved.traits.create);
    for (let i = 0; i < count; i++) {
      buffer.set(i, resolved.traits.copy(value));
    }
    return new DynamicArray(resolved, buffer, slotCount(count));
  }

  /**
   * `count` elements built from a value the caller gives up.
   *
   * The value is moved exactly once, into the last slot; every slot before
   * it receives a copy taken while the value is still intact. The caller
   * must treat `value` as consumed afterwards.
   */
  static filledByMove<T>(count: number, value: T, config: DynamicArrayConfig<T>): DynamicArray<T> {
    const resolved = resolveConfig(config);
    const buffer = new Buffer(count, resolved.traits.create);
    if (count > 0) {
      for (let i = 0; i < count - 1; i++) {
        buffer.set(i, resolved.traits.copy(value));
      }
      buffer.set(count - 1, resolved.traits.move(value));
    }
    return new DynamicArray(resolved, buffer, slotCount(count));
  }

  /**
   * Container holding copies of `items` in order; capacity equals size.
   */
  static fromList<T>(items: readonly T[], config: DynamicArrayConfig<T>): DynamicArray<T> {
    const resolved = resolveConfig(config);
    const buffer = new Buffer(items.length, resolved.traits.create);
    for (let i = 0; i < items.length; i++) {
      buffer.set(i, resolved.traits.copy(items[i]));
    }
    return new DynamicArray(resolved, buffer, slotCount(items.length));
  }

  /**
   * Literal-list construction.
   *
   * @example
   * ```typescript
   * const primes = DynamicArray.of({ traits: numberTraits }, 2, 3, 5, 7);
   * ```
   */
  static of<T>(config: DynamicArrayConfig<T>, ...items: T[]): DynamicArray<T> {
    return DynamicArray.fromList(items, config);
  }

  /**
   * Deep copy of `source` (same configuration, capacity equals size).
   * If copying an element throws, `source` is left untouched.
   */
  static copyOf<T>(source: DynamicArray<T>): DynamicArray<T> {
    return DynamicArray.copyWith(source, source.config);
  }

  /**
   * Take over the storage of `source`. `source` is left empty
   * (size 0, capacity 0) and must be treated as consumed. Never throws.
   */
  static take<T>(source: DynamicArray<T>): DynamicArray<T> {
    const result = new DynamicArray(source.config, new Buffer(0, source.config.traits.create), ZERO_COUNT);
    result.swap(source);
    return result;
  }

  private static copyWith<T>(
    source: DynamicArray<T>,
    config: ResolvedDynamicArrayConfig<T>
  ): DynamicArray<T> {
    const buffer = new Buffer(source.length, config.traits.create);
    for (let i = 0; i < source.length; i++) {
      buffer.set(i, config.traits.copy(source.buffer.get(i)));
    }
    return new DynamicArray(config, buffer, source.length);
  }

  // ===========================================================================
  // Assignment
  // ===========================================================================

  /**
   * Replace the contents with a copy of `source`.
   * The copy is built first and swapped in, so a failure while copying
   * leaves this container unchanged.
   */
  copyAssign(source: DynamicArray<T>): this {
    if (source === this) return this;
    const copy = DynamicArray.copyWith(source, this.config);
    this.swap(copy);
    return this;
  }

  /**
   * Replace the contents by taking the storage of `source`, which is left
   * empty. Never throws.
   */
  moveAssign(source: DynamicArray<T>): this {
    if (source === this) return this;
    this.buffer.release();
    this.buffer.swap(source.buffer);
    this.length = source.length;
    source.length = ZERO_COUNT;
    this.epoch++;
    source.epoch++;
    return this;
  }

  /**
   * Exchange size, capacity and storage with `other` in O(1).
   * No element is touched.
   */
  swap(other: DynamicArray<T>): void {
    if (other === this) return;
    this.buffer.swap(other.buffer);
    const length = this.length;
    this.length = other.length;
    other.length = length;
    this.epoch++;
    other.epoch++;
  }

  // ===========================================================================
  // Size and Capacity
  // ===========================================================================

  /** Number of elements in the sequence */
  get size(): SlotCount {
    return this.length;
  }

  /** Number of allocated slots */
  get capacity(): SlotCount {
    return this.buffer.capacity;
  }

  /** Storage generation; changes whenever outstanding cursors become invalid */
  get generation(): number {
    return this.epoch;
  }

  get contracts(): ContractMode {
    return this.config.contracts;
  }

  get traits(): ElementTraits<T> {
    return this.config.traits;
  }

  isEmpty(): boolean {
    return this.length === 0;
  }

  /**
   * Grow capacity to exactly `capacity` if it is larger than the current one.
   * Size is unchanged.
   */
  reserve(capacity: number): void {
    if (!isValidCount(capacity)) {
      throw new AllocationError('reserve', capacity);
    }
    if (capacity <= this.buffer.capacity) return;

    const next = new Buffer(capacity, this.config.traits.create);
    this.relocate(0, this.length, next, 0);
    this.adopt(next);
  }

  /**
   * Change the size.
   *
   * Shrinking only lowers the size; the excluded slots keep their contents
   * and are reused on growth. Growing default-constructs the new elements,
   * reallocating to max(size, 2 * capacity) when capacity runs out.
   */
  resize(size: number): void {
    if (!isValidCount(size)) {
      throw new AllocationError('resize', size);
    }
    const { create } = this.config.traits;

    if (size <= this.length) {
      this.length = slotCount(size);
      return;
    }

    if (size <= this.buffer.capacity) {
      for (let i: number = this.length; i < size; i++) {
        this.buffer.set(i, create());
      }
      this.length = slotCount(size);
      return;
    }

    // Slots past the live prefix are default-constructed by the allocation.
    const next = new Buffer(Math.max(size, this.buffer.capacity * 2), create);
    this.relocate(0, this.length, next, 0);
    this.adopt(next);
    this.length = slotCount(size);
  }

  /**
   * Set the size to 0. Capacity and storage are kept.
   */
  clear(): void {
    this.length = ZERO_COUNT;
  }

  // ===========================================================================
  // Element Access
  // ===========================================================================

  /**
   * Unchecked read. `index < size` is a precondition.
   */
  get(index: number): T {
    this.expect('get', isValidIndex(index) && index < this.length, () =>
      `index ${index} out of range for size ${this.length}`
    );
    return this.buffer.get(index);
  }

  /**
   * Unchecked write of a copy of `value`. `index < size` is a precondition.
   */
  set(index: number, value: T): void {
    const inRange = this.expect('set', isValidIndex(index) && index < this.length, () =>
      `index ${index} out of range for size ${this.length}`
    );
    if (!inRange) return;
    this.buffer.set(index, this.config.traits.copy(value));
  }

  /**
   * Checked read.
   * @throws OutOfRangeError if index >= size
   */
  at(index: number): T {
    if (!isValidIndex(index) || index >= this.length) {
      throw new OutOfRangeError('at', index, this.length);
    }
    return this.buffer.get(index);
  }

  /**
   * Checked write of a copy of `value`.
   * @throws OutOfRangeError if index >= size
   */
  setAt(index: number, value: T): void {
    if (!isValidIndex(index) || index >= this.length) {
      throw new OutOfRangeError('setAt', index, this.length);
    }
    this.buffer.set(index, this.config.traits.copy(value));
  }

  // ===========================================================================
  // Modifiers
  // ===========================================================================

  /** Append a copy of `value` */
  pushBack(value: T): void {
    this.append(this.config.traits.copy(value));
  }

  /** Append `value` by moving it in; the caller gives it up */
  pushBackMove(value: T): void {
    this.append(this.config.traits.move(value));
  }

  /**
   * Drop the last element. `size > 0` is a precondition.
   * The excluded slot keeps its contents.
   */
  popBack(): void {
    if (!this.expect('popBack', this.length > 0, () => 'container is empty')) return;
    this.length = slotCount(this.length - 1);
  }

  /**
   * Insert a copy of `value` before `position` (an offset in [0, size] or a
   * cursor of this container). Returns a cursor to the inserted element.
   */
  insert(position: Position<T>, value: T): SlotCursor<T> {
    const offset = this.resolvePosition('insert', position, this.length);
    return this.insertAt(offset, this.config.traits.copy(value));
  }

  /**
   * Insert `value` by moving it in. Same positions and result as insert().
   */
  insertMove(position: Position<T>, value: T): SlotCursor<T> {
    const offset = this.resolvePosition('insertMove', position, this.length);
    return this.insertAt(offset, this.config.traits.move(value));
  }

  /**
   * Remove the element at `position` (an offset in [0, size) or a cursor of
   * this container). Returns a cursor to the element that took its place,
   * or end() when the last element was removed.
   */
  erase(position: Position<T>): SlotCursor<T> {
    if (!this.expect('erase', this.length > 0, () => 'container is empty')) {
      return this.end();
    }
    const offset = this.resolvePosition('erase', position, this.length - 1);
    const { move } = this.config.traits;
    for (let i: number = offset; i < this.length - 1; i++) {
      this.buffer.set(i, move(this.buffer.get(i + 1)));
    }
    this.length = slotCount(this.length - 1);
    this.epoch++;
    return new SlotCursor(this, offset);
  }

  // ===========================================================================
  // Cursors and Iteration
  // ===========================================================================

  begin(): SlotCursor<T> {
    return new SlotCursor(this, ZERO_INDEX);
  }

  end(): SlotCursor<T> {
    return new SlotCursor(this, slotIndex(this.length));
  }

  cbegin(): ReadonlyCursor<T> {
    return this.begin();
  }

  cend(): ReadonlyCursor<T> {
    return this.end();
  }

  *[Symbol.iterator](): IterableIterator<T> {
    for (let i = 0; i < this.length; i++) {
      yield this.buffer.get(i);
    }
  }

  values(): IterableIterator<T> {
    return this[Symbol.iterator]();
  }

  /** Snapshot of the live elements */
  toArray(): T[] {
    const result: T[] = [];
    for (let i = 0; i < this.length; i++) {
      result.push(this.buffer.get(i));
    }
    return result;
  }

  // ===========================================================================
  // Comparison
  // ===========================================================================

  equals(other: DynamicArray<T>): boolean {
    return equal(this, other);
  }

  /** Lexicographic comparison: -1, 0 or 1 */
  compareTo(other: DynamicArray<T>): -1 | 0 | 1 {
    return compareArrays(this, other);
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private expect(op: string, holds: boolean, message: () => string): boolean {
    if (holds) return true;
    return expectContract(this.config.contracts, false, op, message());
  }

  private append(item: T): void {
    if (this.length === this.buffer.capacity) {
      const next = new Buffer(doubleCount(this.buffer.capacity), this.config.traits.create);
      this.relocate(0, this.length, next, 0);
      next.set(this.length, item);
      this.adopt(next);
    } else {
      this.buffer.set(this.length, item);
    }
    this.length = slotCount(this.length + 1);
  }

  private insertAt(offset: SlotIndex, item: T): SlotCursor<T> {
    if (this.length === this.buffer.capacity) {
      const next = new Buffer(doubleCount(this.buffer.capacity), this.config.traits.create);
      this.relocate(0, offset, next, 0);
      next.set(offset, item);
      this.relocate(offset, this.length, next, offset + 1);
      this.adopt(next);
    } else {
      // Walk backwards so no element is overwritten before it has moved.
      const { move } = this.config.traits;
      for (let i: number = this.length; i > offset; i--) {
        this.buffer.set(i, move(this.buffer.get(i - 1)));
      }
      this.buffer.set(offset, item);
      this.epoch++;
    }
    this.length = slotCount(this.length + 1);
    return new SlotCursor(this, offset);
  }

  /**
   * Move elements [from, to) of the current buffer into `target` at `at`.
   */
  private relocate(from: number, to: number, target: Buffer<T>, at: number): void {
    const { move } = this.config.traits;
    for (let i = from; i < to; i++) {
      target.set(at + i - from, move(this.buffer.get(i)));
    }
  }

  /**
   * Swap `next` in as the owned buffer and release the old one.
   */
  private adopt(next: Buffer<T>): void {
    this.buffer.swap(next);
    next.release();
    this.epoch++;
  }

  /**
   * Turn a position into an offset in [0, limit]. A broken precondition
   * either throws or, outside assert mode, clamps into range.
   */
  private resolvePosition(op: string, position: Position<T>, limit: number): SlotIndex {
    let offset: number;
    if (typeof position === 'number') {
      offset = position;
    } else {
      this.expect(op, position.belongsTo(this), () => 'cursor belongs to another container');
      expectLiveCursor(this.config.contracts, position.generation === this.epoch, op);
      offset = position.offset;
    }

    const inRange = isValidIndex(offset) && offset <= limit;
    if (this.expect(op, inRange, () => `position ${offset} outside [0, ${limit}]`)) {
      return slotIndex(offset);
    }
    return clampIndex(offset, limit);
  }
}

/**
 * Create a container from optional initial contents.
 *
 * - no `init`: empty
 * - a number N: N default-constructed elements
 * - reserve(N): empty with N slots pre-allocated
 * - an array: copies of its elements
 *
 * @example
 * ```typescript
 * const config = { traits: numberTraits };
 * createDynamicArray(config, 3).toArray();          // [0, 0, 0]
 * createDynamicArray(config, reserve(3)).capacity;  // 3
 * createDynamicArray(config, [1, 2]).toArray();     // [1, 2]
 * ```
 */
export function createDynamicArray<T>(
  config: DynamicArrayConfig<T>,
  init?: DynamicArrayInit<T>
): DynamicArray<T> {
  if (init === undefined) return DynamicArray.empty(config);
  if (typeof init === 'number') return DynamicArray.withSize(init, config);
  if (isReserveIntent(init)) return DynamicArray.withReserve(init, config);
  return DynamicArray.fromList(init, config);
}
