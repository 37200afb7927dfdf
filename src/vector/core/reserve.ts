/**
 * Reserve intent: "construct empty, but pre-allocate N slots".
 */

import type { ReserveIntent } from '../../types/vector.ts';
import { isValidCount, slotCount } from '../../types/branded.ts';
import { AllocationError } from './errors.ts';

/**
 * Create a reserve intent for DynamicArray.withReserve().
 *
 * @example
 * ```typescript
 * const ids = DynamicArray.withReserve(reserve(10), { traits: numberTraits });
 * ids.size;     // 0
 * ids.capacity; // 10
 * ```
 */
export function reserve(capacity: number): ReserveIntent {
  if (!isValidCount(capacity)) {
    throw new AllocationError('reserve', capacity);
  }
  return Object.freeze({ kind: 'reserve-intent', capacity: slotCount(capacity) });
}

/**
 * Type guard for reserve intents.
 */
export function isReserveIntent(value: unknown): value is ReserveIntent {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'kind' in value &&
    value.kind === 'reserve-intent' &&
    'capacity' in value &&
    typeof value.capacity === 'number' &&
    isValidCount(value.capacity)
  );
}
