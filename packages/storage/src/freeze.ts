/**
 * Recursively freezes plain objects and arrays. Buffers and typed arrays are left as-is since
 * the runtime refuses to freeze array buffer views.
 */
export function deepFreeze<T>(value: T): T {
  if (value === null || typeof value !== "object" || ArrayBuffer.isView(value) || Object.isFrozen(value)) {
    return value
  }
  for (const key of Reflect.ownKeys(value)) {
    deepFreeze(Reflect.get(value, key))
  }
  return Object.freeze(value)
}
