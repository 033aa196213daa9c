import { z } from "@/schema/meta"
import { fieldsOf, type RecordSchema, type SchemaField } from "@/schema/fields"
import { inspect, isPrimitiveKind, kindOf, type SchemaNode, type ValueKind } from "@/schema/classify"
import { CalendarDate } from "@/temporal/calendar-date"
import { formatCalendarDate, formatTimestamp } from "@/temporal/iso"
import { resolveOptions } from "@/engine/options"
import { type Expansion, type RecordEntry, Traversal, type WorkItem } from "@/engine/traversal"
import {
  type JsonValue,
  MarshalError,
  type MarshalOptions,
  type ResolvedTemporalOptions,
  SchemaError,
} from "@/types"
import { describeValue, isPlainObject, joinPath } from "@/utils"

/**
 * A value's kind, with the schema details when it was classified from a schema
 */
type Target = { kind: ValueKind; node: SchemaNode | undefined }

/**
 * Converts records (and anything else with a JSON form) into a JSON value tree.
 *
 * With a schema, fields are renamed to their external keys, omittable empty fields are dropped,
 * and values are checked against their declared kinds. Without one, the kind of each value is read
 * from the value itself and plain objects are written with their own keys.
 *
 * The input is only read, never modified.
 */
export class Marshaller extends Traversal<JsonValue> {
  readonly #options: ResolvedTemporalOptions

  constructor(options?: MarshalOptions) {
    super()
    this.#options = resolveOptions(options)
  }

  /**
   * Marshal a value, guided by `schema` when one is given
   */
  marshal(value: unknown, schema?: z.ZodType): JsonValue {
    return this.run(value, schema)
  }

  protected expand(item: WorkItem<JsonValue>): Expansion<JsonValue> {
    const { data, schema } = item.source
    const target = this.#classify(data, schema, item.path)

    switch (target.kind) {
      case "record":
        return { kind: "record", entries: this.#recordEntries(data, target.node, item.path) }

      case "sequence": {
        if (!Array.isArray(data)) {
          throw this.#mismatch("sequence", data, item.path)
        }
        const element = target.node?.kind === "sequence" ? target.node.element : undefined
        return { kind: "sequence", elements: data.map((value: unknown) => ({ data: value, schema: element })) }
      }

      case "mapping":
        if (!isPlainObject(data) || !isJsonValue(data)) {
          throw new MarshalError({ message: `Mapping ${describeValue(data)} is not JSON-safe`, path: item.path, value: data })
        }
        return { kind: "leaf", value: structuredClone(data) }

      default:
        return { kind: "leaf", value: this.#leaf(target, data, item.path) }
    }
  }

  protected assembleRecord(_item: WorkItem<JsonValue>, entries: [string, JsonValue][]): JsonValue {
    return Object.fromEntries(entries)
  }

  protected assembleSequence(_item: WorkItem<JsonValue>, elements: JsonValue[]): JsonValue {
    return elements
  }

  #classify(data: unknown, schema: z.ZodType | undefined, path: string): Target {
    if (!schema) {
      const kind = kindOf(data)
      if (!kind) {
        throw new MarshalError({ message: `Unable to marshal data ${describeValue(data)} to known type`, path, value: data })
      }
      return { kind, node: undefined }
    }

    try {
      const node = inspect(schema, data)
      return { kind: node.kind, node }
    } catch (error) {
      if (error instanceof SchemaError) {
        throw new MarshalError({ message: error.message, path, value: data, cause: error })
      }
      throw error
    }
  }

  #recordEntries(data: unknown, node: SchemaNode | undefined, path: string): RecordEntry<JsonValue>[] {
    if (typeof data !== "object" || data === null || Array.isArray(data)) {
      throw this.#mismatch("record", data, path)
    }

    const entries: RecordEntry<JsonValue>[] = []

    if (node?.kind !== "record") {
      // no schema: every own property with a value, under its own name
      for (const [name, value] of Object.entries(data)) {
        if (value === undefined) continue
        entries.push(this.#entry(name, name, value, undefined, path))
      }
      return entries
    }

    for (const field of this.#fields(node.schema, path)) {
      const value: unknown = Reflect.get(data, field.name)

      if (field.omitEmpty && field.optional && (value === null || value === undefined)) {
        continue
      }
      // `.optional()` fields left unset are not written, as with JSON.stringify
      if (field.undefinable && value === undefined) {
        continue
      }

      entries.push(this.#entry(field.key, field.name, value, field.schema, path))
    }

    return entries
  }

  #fields(schema: RecordSchema, path: string): readonly SchemaField[] {
    try {
      return fieldsOf(schema)
    } catch (error) {
      if (error instanceof SchemaError) {
        const fieldPath = error.field ? joinPath(path, error.field.name) : path
        throw new MarshalError({ message: error.message, path: fieldPath, cause: error })
      }
      throw error
    }
  }

  /**
   * Write primitives straight into the record; everything else becomes a child item
   */
  #entry(key: string, segment: string, value: unknown, schema: z.ZodType | undefined, path: string): RecordEntry<JsonValue> {
    const fieldPath = joinPath(path, segment)
    const target = this.#classify(value, schema, fieldPath)

    if (isPrimitiveKind(target.kind)) {
      return { key, ready: true, value: this.#leaf(target, value, fieldPath) }
    }

    return { key, ready: false, segment, child: { data: value, schema } }
  }

  #leaf(target: Target, data: unknown, path: string): JsonValue {
    switch (target.kind) {
      case "enum": {
        const values = target.node?.kind === "enum" ? target.node.values : undefined
        if (values && !values.some((value) => value === data)) {
          const label = target.node?.kind === "enum" ? target.node.label : "enum"
          throw new MarshalError({ message: `Unable to use data value ${describeValue(data)} as ${label}`, path, value: data })
        }
        if (typeof data === "string" || typeof data === "number" || typeof data === "boolean" || data === null) {
          return data
        }
        throw this.#mismatch("enum", data, path)
      }

      case "identifier":
        if (typeof data !== "string") throw this.#mismatch("UUID", data, path)
        return data

      case "timestamp": {
        if (!(data instanceof Date) || Number.isNaN(data.getTime())) {
          throw this.#mismatch("timestamp", data, path)
        }
        const date = data
        return this.#format(() => formatTimestamp(date, this.#options.datetimeFormat), data, path)
      }

      case "calendar-date": {
        if (!(data instanceof CalendarDate)) throw this.#mismatch("calendar date", data, path)
        const date = data
        return this.#format(() => formatCalendarDate(date, this.#options.dateFormat), data, path)
      }

      case "string":
        if (typeof data !== "string") throw this.#mismatch("string", data, path)
        return data

      case "integer":
        if (typeof data !== "number" || !Number.isInteger(data)) throw this.#mismatch("integer", data, path)
        return data

      case "float":
        if (typeof data !== "number" || !Number.isFinite(data)) throw this.#mismatch("float", data, path)
        return data

      case "boolean":
        if (typeof data !== "boolean") throw this.#mismatch("boolean", data, path)
        return data

      case "null":
        if (data !== null && data !== undefined) throw this.#mismatch("null", data, path)
        return null

      case "record":
      case "sequence":
      case "mapping":
        throw new Error(`'${target.kind}' is not a leaf kind`)
    }
  }

  #format(render: () => string, data: unknown, path: string): string {
    try {
      return render()
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      throw new MarshalError({ message: `Unable to format ${describeValue(data)}: ${reason}`, path, value: data, cause: error })
    }
  }

  #mismatch(expected: string, data: unknown, path: string): MarshalError {
    return new MarshalError({ message: `Expected ${expected}, got ${describeValue(data)}`, path, value: data })
  }
}

/**
 * Check that a value is made only of JSON types (plain objects, arrays, strings, finite numbers, booleans, null)
 */
export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null || typeof value === "string" || typeof value === "boolean") return true
  if (typeof value === "number") return Number.isFinite(value)
  if (Array.isArray(value)) return value.every(isJsonValue)
  if (isPlainObject(value)) return Object.values(value).every(isJsonValue)
  return false
}

/**
 * Marshal a value into a JSON value tree, ready for `JSON.stringify`.
 *
 * @example
 * ```ts
 * const Person = z.object({
 *   firstName: z.string().json("first_name"),
 *   nickname: z.string().nullable().omitEmpty(),
 *   born: calendarDate(),
 * })
 *
 * marshal({ firstName: "Ada", nickname: null, born: new CalendarDate(1815, 12, 10) }, Person)
 * // { first_name: "Ada", born: "1815-12-10" }
 * ```
 */
export function marshal(value: unknown, options?: MarshalOptions): JsonValue
/**
 * Marshal a record described by `schema`
 * @param value - The record to marshal
 * @param schema - The record's schema, supplying external keys and omit-if-empty flags
 * @param options - Formats for timestamps and calendar dates
 */
export function marshal<S extends z.ZodType>(value: z.output<S>, schema: S, options?: MarshalOptions): JsonValue
export function marshal(value: unknown, schemaOrOptions?: z.ZodType | MarshalOptions, options?: MarshalOptions): JsonValue {
  if (schemaOrOptions instanceof z.ZodType) {
    return new Marshaller(options).marshal(value, schemaOrOptions)
  }
  return new Marshaller(schemaOrOptions).marshal(value)
}
