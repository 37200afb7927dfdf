/**
 * Element traits: default construction, copy, move, equality and ordering
 * for the element type of a container.
 */

import type { ElementTraits, ElementTraitsInit } from '../../types/vector.ts';

function identity<T>(value: T): T {
  return value;
}

function naturalOrder<T extends number | string | bigint>(a: T, b: T): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Build element traits from a default constructor and optional overrides.
 *
 * Defaults: `copy` and `move` return the value unchanged, `equals` is
 * Object.is, and there is no ordering.
 *
 * @example
 * ```typescript
 * const pointTraits = defineTraits<Point>({
 *   create: () => ({ x: 0, y: 0 }),
 *   copy: (p) => ({ ...p }),
 *   equals: (a, b) => a.x === b.x && a.y === b.y,
 * });
 * ```
 */
export function defineTraits<T>(init: ElementTraitsInit<T>): ElementTraits<T> {
  const traits: ElementTraits<T> = {
    create: init.create,
    copy: init.copy ?? identity,
    move: init.move ?? identity,
    equals: init.equals ?? Object.is,
  };
  if (init.compare !== undefined) {
    return Object.freeze({ ...traits, compare: init.compare });
  }
  return Object.freeze(traits);
}

/**
 * Traits for objects copied with structuredClone.
 */
export function structuredTraits<T>(
  create: () => T,
  overrides: Partial<Pick<ElementTraits<T>, 'equals' | 'compare'>> = {}
): ElementTraits<T> {
  return defineTraits<T>({
    create,
    copy: (value) => structuredClone(value),
    ...overrides,
  });
}

// =============================================================================
// Primitive Traits
// =============================================================================

export const numberTraits: ElementTraits<number> = defineTraits<number>({
  create: () => 0,
  compare: naturalOrder,
});

export const stringTraits: ElementTraits<string> = defineTraits<string>({
  create: () => '',
  compare: naturalOrder,
});

export const bigintTraits: ElementTraits<bigint> = defineTraits<bigint>({
  create: () => 0n,
  compare: naturalOrder,
});

export const booleanTraits: ElementTraits<boolean> = defineTraits<boolean>({
  create: () => false,
  compare: (a, b) => Number(a) - Number(b),
});
