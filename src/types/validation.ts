/**
 * Ensures a value is defined, throwing if it is undefined or null.
 *
 * @param value - Value to check
 * @param fieldName - Name used in the error message
 * @returns The value, narrowed to exclude undefined and null
 */
export function ensureDefined<T>(value: T | undefined | null, fieldName: string): T {
  if (value === undefined || value === null) {
    throw new Error(`Expected ${fieldName} to be defined, but got ${value}`)
  }
  return value
}
