/**
 * Recursively freeze a value so shared snapshots cannot be edited in place.
 * Sets and maps are frozen as objects; their contents are frozen too.
 */
export function deepFreeze<T>(value: T): T {
  if (value === null || typeof value !== 'object' || Object.isFrozen(value)) {
    return value;
  }

  Object.freeze(value);

  if (value instanceof Set || value instanceof Map) {
    for (const entry of value.values()) deepFreeze(entry);
    return value;
  }

  for (const entry of Object.values(value)) {
    deepFreeze(entry);
  }
  return value;
}
