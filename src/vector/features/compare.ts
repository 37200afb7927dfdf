/**
 * Sequence comparison.
 *
 * Equality is size plus element-wise equality in order. Ordering is
 * lexicographic over the element ordering; the remaining relations are
 * derived from `lessThan` and `equal` and run no algorithm of their own.
 */

import type { ElementTraits } from '../../types/vector.ts';
import { MissingCapabilityError } from '../core/errors.ts';
import type { DynamicArray } from './dynamic-array.ts';

function orderingOf<T>(traits: ElementTraits<T>, op: string): (a: T, b: T) => number {
  const { compare } = traits;
  if (compare === undefined) {
    throw new MissingCapabilityError(op, 'compare');
  }
  return compare;
}

export function equal<T>(lhs: DynamicArray<T>, rhs: DynamicArray<T>): boolean {
  if (lhs.size !== rhs.size) return false;
  const { equals } = lhs.traits;
  for (let i = 0; i < lhs.size; i++) {
    if (!equals(lhs.get(i), rhs.get(i))) return false;
  }
  return true;
}

export function notEqual<T>(lhs: DynamicArray<T>, rhs: DynamicArray<T>): boolean {
  return !equal(lhs, rhs);
}

/**
 * Lexicographic less-than: the first differing element decides; if one
 * sequence is a prefix of the other, the shorter one is less.
 *
 * @throws MissingCapabilityError if the element traits define no ordering
 */
export function lessThan<T>(lhs: DynamicArray<T>, rhs: DynamicArray<T>): boolean {
  const compare = orderingOf(lhs.traits, 'lessThan');
  const common = Math.min(lhs.size, rhs.size);
  for (let i = 0; i < common; i++) {
    const a = lhs.get(i);
    const b = rhs.get(i);
    if (compare(a, b) < 0) return true;
    if (compare(b, a) < 0) return false;
  }
  return lhs.size < rhs.size;
}

export function greaterThan<T>(lhs: DynamicArray<T>, rhs: DynamicArray<T>): boolean {
  return lessThan(rhs, lhs);
}

export function lessOrEqual<T>(lhs: DynamicArray<T>, rhs: DynamicArray<T>): boolean {
  return !greaterThan(lhs, rhs);
}

export function greaterOrEqual<T>(lhs: DynamicArray<T>, rhs: DynamicArray<T>): boolean {
  return !lessThan(lhs, rhs);
}

/**
 * Three-way lexicographic comparison.
 */
export function compareArrays<T>(lhs: DynamicArray<T>, rhs: DynamicArray<T>): -1 | 0 | 1 {
  if (lessThan(lhs, rhs)) return -1;
  if (lessThan(rhs, lhs)) return 1;
  return 0;
}
