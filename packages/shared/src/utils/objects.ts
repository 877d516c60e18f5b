/**
 * Anything with a size: arrays, strings-as-collections excluded.
 */
export type Collection<T> = readonly T[] | ReadonlySet<T> | ReadonlyMap<unknown, T>;

/**
 * Return `value` unless it is `null` or `undefined`.
 */
export function getOrDefault<T>(value: T | null | undefined, defaultValue: T): T {
  return value ?? defaultValue;
}

/**
 * Like {@link getOrDefault}, but the default is computed only when needed.
 */
export function getOrDefaultLazy<T>(value: T | null | undefined, supplier: () => T): T {
  return value ?? supplier();
}

/**
 * Is the collection `null`, `undefined` or empty?
 */
export function isNullOrEmpty<T>(
  collection: Collection<T> | null | undefined
): collection is null | undefined {
  if (collection === null || collection === undefined) {
    return true;
  }
  return "length" in collection ? collection.length === 0 : collection.size === 0;
}
