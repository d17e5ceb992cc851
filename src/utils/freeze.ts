/**
 * Freezes a value and everything reachable from it. Compiled regexes are
 * left alone: their lastIndex has to stay writable.
 */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !(value instanceof RegExp)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}
