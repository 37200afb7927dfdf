/**
 * Tests for sequence comparison.
 */

import { describe, it, expect } from 'vitest';
import { DynamicArray } from './dynamic-array.ts';
import {
  equal,
  notEqual,
  lessThan,
  greaterThan,
  lessOrEqual,
  greaterOrEqual,
  compareArrays,
} from './compare.ts';
import { defineTraits, numberTraits, stringTraits } from '../core/traits.ts';
import { reserve } from '../core/reserve.ts';
import { MissingCapabilityError } from '../core/errors.ts';

const numbers = { traits: numberTraits };
const list = (...items: number[]) => DynamicArray.fromList(items, numbers);

describe('equal', () => {
  it('should compare size and elements in order', () => {
    expect(equal(list(1, 2, 3), list(1, 2, 3))).toBe(true);
    expect(equal(list(1, 2, 3), list(1, 3, 2))).toBe(false);
    expect(equal(list(1, 2), list(1, 2, 3))).toBe(false);
    expect(equal(list(), list())).toBe(true);
  });

  it('should ignore capacity and slots past size', () => {
    const reserved = DynamicArray.withReserve(reserve(8), numbers);
    reserved.pushBack(1);
    const shrunk = list(1, 99);
    shrunk.popBack();
    expect(equal(reserved, shrunk)).toBe(true);
  });

  it('should use the element equality of the traits', () => {
    const caseless = { traits: defineTraits<string>({
      create: () => '',
      equals: (a, b) => a.toLowerCase() === b.toLowerCase(),
    }) };
    const left = DynamicArray.of(caseless, 'Ab', 'c');
    const right = DynamicArray.of(caseless, 'aB', 'C');
    expect(equal(left, right)).toBe(true);
    expect(left.equals(right)).toBe(true);
  });

  it('should derive notEqual by negation', () => {
    expect(notEqual(list(1), list(2))).toBe(true);
    expect(notEqual(list(1), list(1))).toBe(false);
  });
});

describe('ordering', () => {
  it('should order lexicographically by the first difference', () => {
    expect(lessThan(list(1, 2, 9), list(1, 3))).toBe(true);
    expect(lessThan(list(1, 3), list(1, 2, 9))).toBe(false);
  });

  it('should order a proper prefix first', () => {
    expect(lessThan(list(1, 2), list(1, 2, 0))).toBe(true);
    expect(lessThan(list(), list(0))).toBe(true);
    expect(lessThan(list(1, 2), list(1, 2))).toBe(false);
  });

  it('should derive the other relations', () => {
    const a = list(1, 2);
    const b = list(1, 5);
    expect(greaterThan(b, a)).toBe(true);
    expect(greaterThan(a, b)).toBe(false);
    expect(lessOrEqual(a, b)).toBe(true);
    expect(lessOrEqual(a, list(1, 2))).toBe(true);
    expect(lessOrEqual(b, a)).toBe(false);
    expect(greaterOrEqual(b, a)).toBe(true);
    expect(greaterOrEqual(a, list(1, 2))).toBe(true);
    expect(greaterOrEqual(a, b)).toBe(false);
  });

  it('should compare three ways', () => {
    expect(compareArrays(list(1), list(2))).toBe(-1);
    expect(compareArrays(list(2), list(2))).toBe(0);
    expect(compareArrays(list(3), list(2))).toBe(1);
    expect(list(1, 1).compareTo(list(1))).toBe(1);
  });

  it('should order strings by their element ordering', () => {
    const strings = { traits: stringTraits };
    expect(lessThan(DynamicArray.of(strings, 'apple'), DynamicArray.of(strings, 'banana'))).toBe(true);
  });

  it('should need an element ordering', () => {
    const unordered = { traits: defineTraits({ create: () => ({}) }) };
    const left = DynamicArray.withSize(1, unordered);
    const right = DynamicArray.withSize(1, unordered);
    expect(() => lessThan(left, right)).toThrow(MissingCapabilityError);
    expect(() => greaterOrEqual(left, right)).toThrow(
      "lessThan: element traits provide no 'compare'"
    );
  });
});
