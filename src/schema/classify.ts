import { z, isCalendarDateSchema } from "@/schema/meta"
import { type RecordSchema } from "@/schema/fields"
import { CalendarDate } from "@/temporal/calendar-date"
import { SchemaError } from "@/types"
import { isPlainObject, unwrapOptional } from "@/utils"

/**
 * The closed set of value kinds the engines know how to convert
 */
export type ValueKind =
  | "record"
  | "sequence"
  | "mapping"
  | "enum"
  | "identifier"
  | "timestamp"
  | "calendar-date"
  | "string"
  | "integer"
  | "float"
  | "boolean"
  | "null"

/**
 * Kinds that are written into their parent directly, without a work item of their own
 */
export type PrimitiveKind = "string" | "integer" | "float" | "boolean" | "null"

export type EnumValue = string | number | boolean | bigint | null | undefined

/**
 * A classified schema, carrying what each kind needs to convert its values
 */
export type SchemaNode =
  | { kind: "record"; schema: RecordSchema }
  | { kind: "sequence"; schema: z.ZodType; element: z.ZodType }
  | { kind: "enum"; schema: z.ZodType; values: readonly EnumValue[]; label: string }
  | { kind: Exclude<ValueKind, "record" | "sequence" | "enum">; schema: z.ZodType }

const PRIMITIVE_KINDS: ReadonlySet<ValueKind> = new Set<ValueKind>(["string", "integer", "float", "boolean", "null"])

export const isPrimitiveKind = (kind: ValueKind): kind is PrimitiveKind => PRIMITIVE_KINDS.has(kind)

const cache = new WeakMap<z.ZodType, SchemaNode>()

/**
 * Determine which value kind a schema denotes.
 *
 * Optional schemas (`T.nullable()`, `T.optional()`, `T | null`) need the value to decide between
 * `"null"` and the kind of `T`; classifying one without a value throws a {@link SchemaError}.
 *
 * @param schema - The Zod schema to classify
 * @param value - The data the schema is applied to, when known
 * @example
 * classify(z.array(z.string())) // "sequence"
 * classify(z.date().nullable(), null) // "null"
 * classify(z.date().nullable()) // throws SchemaError
 */
export function classify(schema: z.ZodType, ...value: [value?: unknown]): ValueKind {
  return inspect(schema, ...value).kind
}

/**
 * Classify a schema and return the details needed to convert its values.
 * Same rules as {@link classify}.
 */
export function inspect(schema: z.ZodType, ...value: [value?: unknown]): SchemaNode {
  const cached = cache.get(schema)
  if (cached) return cached

  if (schema instanceof z.ZodLazy) {
    return inspect((schema as z.ZodLazy<z.ZodType>).unwrap(), ...value)
  }

  const optional = unwrapOptional(schema)
  if (optional) {
    if (value.length === 0) {
      throw new SchemaError("Cannot tell null from a value for an optional schema without data")
    }
    const [data] = value
    if (data === null || data === undefined) return { kind: "null", schema }
    return inspect(optional.inner, data)
  }

  const node = inspectConcrete(schema)
  cache.set(schema, node)
  return node
}

/**
 * Classify a schema that is known not to be optional
 */
function inspectConcrete(schema: z.ZodType): SchemaNode {
  if (schema instanceof z.ZodObject) {
    return { kind: "record", schema }
  }

  if (schema instanceof z.ZodEnum) {
    const values: readonly EnumValue[] = schema.options
    return { kind: "enum", schema, values, label: enumLabel(schema, values) }
  }

  if (schema instanceof z.ZodLiteral) {
    const values: readonly EnumValue[] = [...schema.values]
    return { kind: "enum", schema, values, label: enumLabel(schema, values) }
  }

  if (schema instanceof z.ZodDate) {
    return { kind: "timestamp", schema }
  }

  if (isCalendarDateSchema(schema)) {
    return { kind: "calendar-date", schema }
  }

  if (schema instanceof z.ZodArray) {
    return { kind: "sequence", schema, element: (schema as z.ZodArray<z.ZodType>).element }
  }

  if (schema instanceof z.ZodRecord) {
    return { kind: "mapping", schema }
  }

  if (schema instanceof z.ZodUUID || schema instanceof z.ZodGUID) {
    return { kind: "identifier", schema }
  }

  if (schema instanceof z.ZodString) {
    return { kind: schema.format === "uuid" ? "identifier" : "string", schema }
  }

  if (schema instanceof z.ZodStringFormat) {
    return { kind: "string", schema }
  }

  if (schema instanceof z.ZodNumber) {
    return { kind: schema.isInt ? "integer" : "float", schema }
  }

  if (schema instanceof z.ZodBoolean) {
    return { kind: "boolean", schema }
  }

  if (schema instanceof z.ZodNull) {
    return { kind: "null", schema }
  }

  throw new SchemaError(`Schema type '${schema.def.type}' is not currently supported`)
}

const enumLabel = (schema: z.ZodType, values: readonly EnumValue[]): string =>
  schema.description ?? `Enum(${values.map(String).join("|")})`

/**
 * Determine the value kind of a runtime value, for marshalling without a schema.
 *
 * Plain objects are records whose fields are their own keys. Returns undefined for values
 * that have no JSON representation (functions, symbols, bigints, class instances other than
 * `Date` and `CalendarDate`, non-finite numbers).
 */
export function kindOf(value: unknown): ValueKind | undefined {
  if (value === null || value === undefined) return "null"

  switch (typeof value) {
    case "string":
      return "string"
    case "boolean":
      return "boolean"
    case "number":
      if (!Number.isFinite(value)) return undefined
      return Number.isInteger(value) ? "integer" : "float"
  }

  if (value instanceof Date) return "timestamp"
  if (value instanceof CalendarDate) return "calendar-date"
  if (Array.isArray(value)) return "sequence"
  if (isPlainObject(value)) return "record"

  return undefined
}
