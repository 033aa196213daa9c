import * as z from "zod"
import { CalendarDate } from "@/temporal/calendar-date"
import { SchemaError } from "@/types"

/**
 * Metadata stored on Zod schemas used as record fields
 */
export interface FieldMeta {
  /** Key used for the field in JSON, when it differs from the property name */
  key?: string
  /** Drop the field from marshalled output when it is optional and its value is null or undefined */
  omitEmpty?: boolean
  /** Marks a schema created by {@link calendarDate} */
  calendarDate?: boolean
}

/**
 * Key used to store field metadata in Zod's meta
 */
const MARSHAL_META_KEY = "__marshal" as const

interface ZodMetaWithMarshal {
  [MARSHAL_META_KEY]?: FieldMeta
}

// Module augmentation to add json() and omitEmpty() to all Zod types
declare module "zod" {
  interface ZodType<out Output, out Input, out Internals> {
    /**
     * Use a different key for this field in JSON.
     * @param key - The external key, must be non-empty
     * @example z.string().json("firstName") // property `first_name` is read from and written to "firstName"
     */
    json(key: string): this

    /**
     * Leave this field out of marshalled JSON when its value is null or undefined.
     * Only has an effect on optional fields; a required field is always written.
     * @example z.string().nullable().omitEmpty()
     */
    omitEmpty(): this
  }
}

function getCurrentFieldMeta(schema: z.ZodType): FieldMeta {
  const meta = schema.meta() as ZodMetaWithMarshal | undefined
  return meta?.[MARSHAL_META_KEY] ?? {}
}

/**
 * Create a new schema with updated field metadata
 */
function withFieldMeta<T extends z.ZodType>(schema: T, update: Partial<FieldMeta>): T {
  const current = getCurrentFieldMeta(schema)
  const existingMeta = (schema.meta() ?? {}) as ZodMetaWithMarshal

  return schema.meta({
    ...existingMeta,
    [MARSHAL_META_KEY]: { ...current, ...update },
  }) as T
}

const ZodTypeProto = z.ZodType.prototype as z.ZodType & {
  json(key: string): z.ZodType
  omitEmpty(): z.ZodType
}

ZodTypeProto.json = function (key: string) {
  if (typeof key !== "string" || key.length === 0) {
    throw new SchemaError("External JSON key must be a non-empty string")
  }
  return withFieldMeta(this, { key })
}

ZodTypeProto.omitEmpty = function () {
  return withFieldMeta(this, { omitEmpty: true })
}

/**
 * Get field metadata from a Zod schema, collected from every wrapper layer.
 *
 * `z.string().json("a").nullable()` and `z.string().nullable().json("a")` both carry the key `a`;
 * when several layers set the same property, the outermost wins.
 * @param schema - The field's Zod schema
 * @returns The merged metadata
 */
export function getFieldMeta(schema: z.ZodType): FieldMeta {
  const layers: FieldMeta[] = []
  let current: z.ZodType | undefined = schema

  while (current) {
    layers.push(getCurrentFieldMeta(current))
    current = unwrapLayer(current)
  }

  return layers.reduceRight<FieldMeta>((merged, layer) => ({ ...merged, ...layer }), {})
}

/**
 * One level of optional/nullable wrapping, or undefined when the schema isn't a wrapper
 */
function unwrapLayer(schema: z.ZodType): z.ZodType | undefined {
  if (schema instanceof z.ZodOptional) {
    return (schema as z.ZodOptional<z.ZodType>).unwrap()
  }
  if (schema instanceof z.ZodNullable) {
    return (schema as z.ZodNullable<z.ZodType>).unwrap()
  }
  return undefined
}

/**
 * Schema for a {@link CalendarDate} field (a date without time of day).
 * Marshals to `YYYY-MM-DD` (or the `dateFormat` option) and unmarshals back into a `CalendarDate`.
 *
 * @example
 * ```ts
 * const Event = z.object({ day: calendarDate().json("eventDay") })
 * ```
 */
export function calendarDate() {
  return withFieldMeta(z.instanceof(CalendarDate), { calendarDate: true })
}

/**
 * Check if a schema was created by {@link calendarDate}
 */
export function isCalendarDateSchema(schema: z.ZodType): boolean {
  return getCurrentFieldMeta(schema).calendarDate === true
}

export { z }
