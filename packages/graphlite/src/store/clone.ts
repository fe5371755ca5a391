/**
 * Deep clone a value (JSON-safe).
 */
export function clone<T>(value: T): T {
  if (value === null || value === undefined) return value
  return JSON.parse(JSON.stringify(value)) as T
}
