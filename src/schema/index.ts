/**
 * Schema module - re-exports Zod with field extensions for marshalling
 *
 * - `.json("key")` - Use a different key for the field in JSON
 * - `.omitEmpty()` - Leave an optional field out of marshalled JSON when it is null or undefined
 * - `calendarDate()` - A date without time of day
 *
 * @example
 * ```ts
 * import { z, calendarDate } from "json-marshal"
 *
 * const Person = z.object({
 *   firstName: z.string().json("first_name"),
 *   nickname: z.string().nullable().omitEmpty(),
 *   born: calendarDate(),
 * })
 * ```
 */

// Import meta.ts to apply prototype extensions and re-export z
export { z, calendarDate, getFieldMeta, isCalendarDateSchema, type FieldMeta } from "@/schema/meta"

export { fieldsOf, type SchemaField, type RecordSchema } from "@/schema/fields"
export { classify, inspect, kindOf, isPrimitiveKind, type ValueKind, type PrimitiveKind, type SchemaNode, type EnumValue } from "@/schema/classify"
