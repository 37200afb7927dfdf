/**
 * contig - a growable contiguous sequence container
 *
 * Main entry point exporting core types, the container and its helpers.
 */

// =============================================================================
// Types
// =============================================================================

export type {
  ElementTraits,
  ElementTraitsInit,
  ContractMode,
  DynamicArrayConfig,
  ResolvedDynamicArrayConfig,
  ReserveIntent,
  DynamicArrayInit,
  ReadonlyCursor,
  Cursor,
  Position,
} from './types/index.ts';

// Branded slot types
export type { SlotIndex, SlotCount } from './types/index.ts';

export {
  slotIndex,
  slotCount,
  isValidIndex,
  isValidCount,
  clampIndex,
  ZERO_INDEX,
  ZERO_COUNT,
} from './types/index.ts';

// =============================================================================
// Container
// =============================================================================

export { DynamicArray, createDynamicArray, SlotCursor } from './vector/index.ts';
export type { CursorHost } from './vector/index.ts';

// =============================================================================
// Reserve Intent
// =============================================================================

export { reserve, isReserveIntent } from './vector/index.ts';

// =============================================================================
// Element Traits
// =============================================================================

export {
  defineTraits,
  structuredTraits,
  numberTraits,
  stringTraits,
  bigintTraits,
  booleanTraits,
} from './vector/index.ts';

// =============================================================================
// Comparison
// =============================================================================

export {
  equal,
  notEqual,
  lessThan,
  greaterThan,
  lessOrEqual,
  greaterOrEqual,
  compareArrays,
} from './vector/index.ts';

// =============================================================================
// Storage, Configuration and Errors
// =============================================================================

export { Buffer, DEFAULT_CONFIG, resolveConfig } from './vector/index.ts';

export {
  ContainerError,
  OutOfRangeError,
  ContractViolationError,
  CursorInvalidatedError,
  AllocationError,
  MissingCapabilityError,
  isContainerError,
} from './vector/index.ts';
export type { ContainerErrorCode } from './vector/index.ts';
