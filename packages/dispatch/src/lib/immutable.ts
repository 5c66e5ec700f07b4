/**
 * Recursively freeze plain objects and arrays in place. Returns the same value.
 */
export function deepFreeze<T>(value: T): T {
  freeze(value, new WeakSet<object>());
  return value;
}

function freeze(value: unknown, seen: WeakSet<object>): void {
  if (typeof value !== 'object' || value === null || seen.has(value)) return;
  seen.add(value);
  for (const child of Object.values(value)) {
    freeze(child, seen);
  }
  Object.freeze(value);
}
