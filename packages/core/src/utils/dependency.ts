/**
 * Dependency comparison shared by `useMemo` and `memo`.
 *
 * Dependencies compare by value: arrays, plain objects, maps, sets and dates
 * are walked recursively; primitives compare like `Object.is`. Functions and
 * class instances compare by identity unless they are structurally equal.
 */

import { isDeepStrictEqual } from "node:util";

export function dependencyEquals(previous: unknown, next: unknown): boolean {
  return isDeepStrictEqual(previous, next);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && Object.getPrototypeOf(value) === Object.prototype;
}

/**
 * Copy a dependency deeply enough that mutating the caller's value afterwards
 * counts as a change. Values that are not plain data are kept by reference.
 */
export function snapshotDependency(dependency: unknown): unknown {
  return snapshot(dependency, new WeakMap());
}

function snapshot(value: unknown, seen: WeakMap<object, unknown>): unknown {
  if (typeof value !== "object" || value === null) {
    return value;
  }
  if (seen.has(value)) {
    return seen.get(value);
  }

  if (Array.isArray(value)) {
    const copy: unknown[] = [];
    seen.set(value, copy);
    for (const item of value) {
      copy.push(snapshot(item, seen));
    }
    return copy;
  }
  if (isPlainObject(value)) {
    const copy: Record<string, unknown> = {};
    seen.set(value, copy);
    for (const [key, item] of Object.entries(value)) {
      copy[key] = snapshot(item, seen);
    }
    return copy;
  }
  if (value instanceof Map) {
    const copy = new Map<unknown, unknown>();
    seen.set(value, copy);
    for (const [key, item] of value) {
      copy.set(snapshot(key, seen), snapshot(item, seen));
    }
    return copy;
  }
  if (value instanceof Set) {
    const copy = new Set<unknown>();
    seen.set(value, copy);
    for (const item of value) {
      copy.add(snapshot(item, seen));
    }
    return copy;
  }
  if (value instanceof Date) {
    return new Date(value.getTime());
  }
  return value;
}
