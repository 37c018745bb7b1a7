/**
 * Represents any valid JSON value.
 */
export type JSONValue = string | number | boolean | null | { [key: string]: JSONValue } | JSONValue[]

/**
 * A JSON Schema document describing a tool's input.
 */
export type JSONSchema = Record<string, unknown>

/**
 * Narrows an unknown value to a plain (non-array) object.
 *
 * @param value - Value to check
 * @returns True when the value is a non-null, non-array object
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
