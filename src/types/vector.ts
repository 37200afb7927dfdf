/**
 * Core type definitions for the contig container.
 */

import type { SlotIndex, SlotCount } from './branded.ts';

// =============================================================================
// Element Traits
// =============================================================================

/**
 * Capabilities a container needs from its element type.
 *
 * TypeScript has no default constructors or move semantics, so the element
 * type describes them explicitly. Only the operations a caller actually
 * invokes use a given capability: ordering is needed only for lexicographic
 * comparison.
 */
export interface ElementTraits<T> {
  /** Default-construct a value (fills fresh and newly exposed slots) */
  readonly create: () => T;
  /** Copy a value for copy-in operations */
  readonly copy: (value: T) => T;
  /** Relocate a value for move-in operations, growth and shifts */
  readonly move: (value: T) => T;
  /** Element equality */
  readonly equals: (a: T, b: T) => boolean;
  /** Element ordering: negative if a < b, zero if equivalent, positive if a > b */
  readonly compare?: (a: T, b: T) => number;
}

/**
 * Input for defineTraits(): only `create` is mandatory.
 */
export type ElementTraitsInit<T> = Pick<ElementTraits<T>, 'create'> &
  Partial<Omit<ElementTraits<T>, 'create'>>;

// =============================================================================
// Configuration
// =============================================================================

/**
 * How precondition violations (unchecked index past size, insert/erase
 * position out of range, popBack on empty, stale cursor) are handled.
 *
 * - `assert`: throw a ContractViolationError
 * - `warn`: report with console.warn, then fall back to clamped behavior
 * - `off`: fall back silently
 */
export type ContractMode = 'assert' | 'warn' | 'off';

/**
 * Configuration for a DynamicArray.
 */
export interface DynamicArrayConfig<T> {
  /** Element capabilities */
  traits: ElementTraits<T>;
  /** Precondition handling (default: 'assert') */
  contracts?: ContractMode;
}

/**
 * Configuration with every default applied.
 */
export type ResolvedDynamicArrayConfig<T> = Required<DynamicArrayConfig<T>>;

// =============================================================================
// Reserve Intent
// =============================================================================

/**
 * Marker asking a container to pre-allocate capacity while keeping size zero.
 * Distinguishes "reserve N slots" from "N default elements".
 */
export interface ReserveIntent {
  readonly kind: 'reserve-intent';
  readonly capacity: SlotCount;
}

/**
 * Accepted initial contents for createDynamicArray():
 * a count of default elements, a reserve intent, or a literal list.
 */
export type DynamicArrayInit<T> = number | ReserveIntent | readonly T[];

// =============================================================================
// Cursors
// =============================================================================

/**
 * Read-only positional handle into a container.
 *
 * A cursor stays valid only until its owner reallocates, shifts elements or
 * exchanges its buffer. After that, reading through it is a contract
 * violation: check isValid() or obtain a fresh cursor.
 */
export interface ReadonlyCursor<T> {
  /** Offset of the addressed element */
  readonly offset: SlotIndex;
  /** Owner generation captured when the cursor was created */
  readonly generation: number;
  /** Element at the cursor */
  readonly value: T;
  /** Whether the cursor still refers to the owner's current storage */
  isValid(): boolean;
  /** Whether the cursor addresses its owner */
  belongsTo(owner: object): boolean;
  next(): ReadonlyCursor<T>;
  prev(): ReadonlyCursor<T>;
  advance(delta: number): ReadonlyCursor<T>;
  /** Signed distance from this cursor to `other` */
  distanceTo(other: ReadonlyCursor<T>): number;
  /** Same owner, same generation and same offset */
  equals(other: ReadonlyCursor<T>): boolean;
}

/**
 * Mutable positional handle into a container.
 */
export interface Cursor<T> extends ReadonlyCursor<T> {
  /** Overwrite the element at the cursor */
  set(value: T): void;
  next(): Cursor<T>;
  prev(): Cursor<T>;
  advance(delta: number): Cursor<T>;
}

/**
 * Position argument for insert/erase: a cursor or a raw offset.
 */
export type Position<T> = number | ReadonlyCursor<T>;
