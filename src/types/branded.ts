/**
 * Branded types for slot positions and slot counts.
 *
 * A dynamic array juggles two kinds of integers that are easy to mix up:
 * positions into its storage and counts of slots (size and capacity).
 * Branding keeps them apart at compile time.
 *
 * Usage:
 * ```typescript
 * const index = slotIndex(3);
 * const size = slotCount(4);
 *
 * // Type error: can't assign SlotCount to SlotIndex
 * const wrong: SlotIndex = size;
 * ```
 */

// =============================================================================
// Brand Symbol
// =============================================================================

/**
 * Unique symbol used for branding types.
 * This symbol is never used at runtime - it only exists for the type system.
 */
declare const brand: unique symbol;

/**
 * Generic brand interface.
 */
interface Brand<B> {
  readonly [brand]: B;
}

/**
 * Create a branded type from a base type.
 * The brand only exists at compile time - no runtime overhead.
 */
type Branded<T, B> = T & Brand<B>;

// =============================================================================
// Slot Types
// =============================================================================

/**
 * Position of a slot in a buffer or an element in a sequence (0-indexed).
 *
 * Use when:
 * - Addressing a slot of a Buffer
 * - Holding the offset of a cursor
 */
export type SlotIndex = Branded<number, 'SlotIndex'>;

/**
 * Number of slots (a size or a capacity).
 *
 * Semantically distinct from SlotIndex: an index is a position,
 * a count is an amount.
 */
export type SlotCount = Branded<number, 'SlotCount'>;

// =============================================================================
// Constructor Functions
// =============================================================================

/**
 * Create a SlotIndex from a number.
 * Use this for explicit conversions from raw numbers.
 */
export function slotIndex(value: number): SlotIndex {
  return value as SlotIndex;
}

/**
 * Create a SlotCount from a number.
 * Use this for explicit conversions from raw numbers.
 */
export function slotCount(value: number): SlotCount {
  return value as SlotCount;
}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if a value is a valid index (non-negative safe integer).
 */
export function isValidIndex(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

/**
 * Check if a value is a valid count (non-negative safe integer).
 */
export function isValidCount(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

// =============================================================================
// Arithmetic Helpers
// =============================================================================

/**
 * Add a delta to a SlotIndex.
 * Preserves the brand type.
 */
export function addIndex(index: SlotIndex, delta: number): SlotIndex {
  return (index + delta) as SlotIndex;
}

/**
 * Subtract two SlotIndices to get a numeric difference.
 */
export function diffIndex(a: SlotIndex, b: SlotIndex): number {
  return a - b;
}

/**
 * Growth step for a full container: 0 becomes 1, anything else doubles.
 */
export function doubleCount(count: SlotCount): SlotCount {
  return (count === 0 ? 1 : count * 2) as SlotCount;
}

// =============================================================================
// Comparison Helpers
// =============================================================================

/**
 * Compare two SlotIndices.
 * Returns negative if a < b, zero if equal, positive if a > b.
 */
export function compareIndices(a: SlotIndex, b: SlotIndex): number {
  return a - b;
}

/**
 * Clamp a raw position into [0, max].
 */
export function clampIndex(index: number, max: number): SlotIndex {
  const whole = Number.isFinite(index) ? Math.trunc(index) : 0;
  return Math.max(0, Math.min(max, whole)) as SlotIndex;
}

// =============================================================================
// Zero Constants
// =============================================================================

/**
 * Index zero - the first slot.
 */
export const ZERO_INDEX: SlotIndex = 0 as SlotIndex;

/**
 * Zero slots.
 */
export const ZERO_COUNT: SlotCount = 0 as SlotCount;
