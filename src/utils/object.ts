/**
 * Small helpers operating on plain objects. Every function stays pure so the
 * registry snapshots and trace records built from them remain predictable.
 */

/**
 * Returns a shallow copy of the provided record without `undefined` values.
 *
 * Used when building payloads from optional inputs (zod outputs, partial
 * overrides) so logged and serialised objects never carry `undefined` keys.
 */
export function omitUndefinedEntries<T extends Record<string, unknown>>(
  entries: T,
): Partial<{ [K in keyof T]: Exclude<T[K], undefined> }> {
  const result: Partial<{ [K in keyof T]: Exclude<T[K], undefined> }> = {};
  for (const [key, value] of Object.entries(entries)) {
    if (value !== undefined) {
      Object.assign(result, { [key]: value });
    }
  }
  return result;
}

/**
 * Recursively freezes plain objects and arrays, descending into map and set
 * entries. Registry and index snapshots are frozen before publication; the
 * containers themselves are exposed as `ReadonlyMap`/`ReadonlySet`.
 */
export function deepFreeze<T>(value: T): T {
  if (value === null || typeof value !== "object" || Object.isFrozen(value)) {
    return value;
  }
  if (value instanceof Map) {
    for (const entry of value.values()) {
      deepFreeze(entry);
    }
  } else if (value instanceof Set) {
    for (const entry of value.values()) {
      deepFreeze(entry);
    }
  } else {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
}
