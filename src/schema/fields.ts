import { z, getFieldMeta } from "@/schema/meta"
import { SchemaError } from "@/types"
import { type OptionalSchema, unwrapOptional, warn } from "@/utils"

/**
 * One declared field of a record schema
 */
export interface SchemaField {
  /** Property name in the record */
  name: string
  /** Key used in JSON, defaults to `name` */
  key: string
  /** The field's declared schema, including any optional wrapper */
  schema: z.ZodType
  /** The field accepts null or undefined */
  optional: boolean
  /** The field may be left out of an unmarshalled record (`.optional()`) */
  undefinable: boolean
  /** Leave the field out of marshalled JSON when it is empty */
  omitEmpty: boolean
}

/**
 * Any object schema, whatever its shape
 */
export type RecordSchema = z.ZodObject

const cache = new WeakMap<RecordSchema, readonly SchemaField[]>()

/**
 * List the fields of a record schema in declaration order.
 * Results are cached per schema instance, since schemas are immutable.
 * @param schema - The record's object schema
 */
export function fieldsOf(schema: RecordSchema): readonly SchemaField[] {
  const cached = cache.get(schema)
  if (cached) return cached

  const fields: SchemaField[] = []
  const seen = new Map<string, string>()

  for (const [name, value] of Object.entries(schema.shape)) {
    if (!(value instanceof z.ZodType)) continue

    const fieldSchema: z.ZodType = value
    const meta = getFieldMeta(fieldSchema)
    const key = meta.key ?? name
    const optional = optionalOf(fieldSchema, name, key)

    const previous = seen.get(key)
    if (previous !== undefined) {
      warn(`Fields '${previous}' and '${name}' share the JSON key '${key}'; the last one wins`, true)
    }
    seen.set(key, name)

    fields.push({
      name,
      key,
      schema: fieldSchema,
      optional: optional !== undefined,
      undefinable: optional?.undefinable === true && !optional.nullable,
      omitEmpty: meta.omitEmpty === true,
    })
  }

  cache.set(schema, fields)
  return fields
}

/**
 * Unwrap a field's optional type, tagging a rejected schema with the field it belongs to
 */
function optionalOf(schema: z.ZodType, name: string, key: string): OptionalSchema | undefined {
  try {
    return unwrapOptional(schema)
  } catch (error) {
    if (error instanceof SchemaError && !error.field) {
      throw new SchemaError(error.message, { name, key })
    }
    throw error
  }
}
