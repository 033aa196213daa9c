import { z } from "@/schema/meta"
import { SchemaError } from "@/types"

export { warn, deprecationWarning } from "@/utils/warnings"

/**
 * The concrete type behind an optional schema, and which absent values it accepts
 */
export type OptionalSchema = {
  inner: z.ZodType
  /** Accepts null */
  nullable: boolean
  /** Accepts undefined (may be left out of an object) */
  undefinable: boolean
}

const isNullSchema = (schema: unknown): boolean => schema instanceof z.ZodNull || schema instanceof z.ZodUndefined

/**
 * Unwrap optional/nullable wrappers (and `T | null` unions, and lazy schemas) to get to the inner schema.
 * Returns undefined when the schema is not optional.
 *
 * Only "T or null" is an optional type: a union with more than one non-null member throws a {@link SchemaError}.
 */
export const unwrapOptional = (schema: z.ZodType): OptionalSchema | undefined => {
  let inner = schema
  let nullable = false
  let undefinable = false

  for (;;) {
    if (inner instanceof z.ZodOptional) {
      undefinable = true
      inner = (inner as z.ZodOptional<z.ZodType>).unwrap()
    } else if (inner instanceof z.ZodLazy) {
      inner = (inner as z.ZodLazy<z.ZodType>).unwrap()
    } else if (inner instanceof z.ZodNullable) {
      nullable = true
      inner = (inner as z.ZodNullable<z.ZodType>).unwrap()
    } else if (inner instanceof z.ZodUnion) {
      const options: readonly z.ZodType[] = (inner as z.ZodUnion<z.ZodType[]>).options
      const concrete = options.filter((option) => !isNullSchema(option))

      if (concrete.length !== 1 || concrete.length === options.length) {
        throw new SchemaError(
          `Unions must be exactly 'T or null', got ${concrete.length} non-null of ${options.length} alternatives`,
        )
      }

      for (const option of options) {
        if (option instanceof z.ZodNull) nullable = true
        if (option instanceof z.ZodUndefined) undefinable = true
      }
      inner = concrete[0]
    } else {
      break
    }
  }

  if (!nullable && !undefinable) return undefined

  return { inner, nullable, undefinable }
}

/**
 * Describe a runtime value for error messages, e.g. `'abc' (string)` or `[object Map] (Map)`
 */
export const describeValue = (value: unknown): string => {
  let shown: string
  if (typeof value === "string") {
    shown = `'${value}'`
  } else if (value instanceof Date) {
    shown = Number.isNaN(value.getTime()) ? "Invalid Date" : value.toISOString()
  } else if (Array.isArray(value) || isPlainObject(value)) {
    shown = truncate(safeStringify(value))
  } else {
    shown = String(value)
  }
  return `${shown} (${typeName(value)})`
}

/**
 * Name of a value's runtime type: `null`, `array`, `integer` or `float` for numbers, the class name for objects, or `typeof` otherwise
 */
export const typeName = (value: unknown): string => {
  if (value === null) return "null"
  if (Array.isArray(value)) return "array"
  if (typeof value === "number") return Number.isInteger(value) ? "integer" : "float"
  if (typeof value === "object") {
    const proto: unknown = Object.getPrototypeOf(value)
    if (proto === null || proto === Object.prototype) return "object"
    return value.constructor?.name || "object"
  }
  return typeof value
}

/**
 * Check for an object literal (prototype is Object.prototype or null)
 */
export const isPlainObject = (value: unknown): value is Record<string, unknown> => {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === null || proto === Object.prototype
}

/**
 * Append a key or index to a dotted path
 */
export const joinPath = (path: string, segment: string | number): string => (path === "" ? String(segment) : `${path}.${segment}`)

const safeStringify = (value: unknown): string => {
  try {
    return JSON.stringify(value) ?? String(value)
  } catch {
    return String(value)
  }
}

const truncate = (text: string, max = 80): string => (text.length > max ? `${text.slice(0, max - 3)}...` : text)
