/**
 * Recursively freeze plain objects and arrays. Buffers and typed arrays are left alone since
 * their elements cannot be frozen.
 */
export function deepFreeze<T>(value: T): Readonly<T> {
  if (typeof value !== 'object' || value === null || ArrayBuffer.isView(value) || Object.isFrozen(value)) {
    return value;
  }
  Object.freeze(value);
  for (const key of Object.keys(value)) {
    deepFreeze(Reflect.get(value, key));
  }
  return value;
}
