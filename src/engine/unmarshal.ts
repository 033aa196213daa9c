import { z } from "@/schema/meta"
import { fieldsOf, type RecordSchema, type SchemaField } from "@/schema/fields"
import { inspect, isPrimitiveKind, type SchemaNode } from "@/schema/classify"
import { parseCalendarDate, parseTimestamp } from "@/temporal/iso"
import { resolveOptions } from "@/engine/options"
import { type Expansion, type RecordEntry, Traversal, type WorkItem } from "@/engine/traversal"
import { type ResolvedTemporalOptions, SchemaError, UnmarshalError, type UnmarshalOptions } from "@/types"
import { describeValue, isPlainObject, joinPath, unwrapOptional } from "@/utils"

/**
 * Converts a JSON value tree into typed records, guided by a schema.
 *
 * Incoming keys are mapped back to field names, keys the schema doesn't declare are dropped,
 * and every value is checked against its field's kind before it is converted. Timestamps,
 * calendar dates, UUIDs and enum members are parsed from their JSON form.
 *
 * The input tree is only read, never modified.
 */
export class Unmarshaller extends Traversal<unknown> {
  readonly #options: ResolvedTemporalOptions

  constructor(options?: UnmarshalOptions) {
    super()
    this.#options = resolveOptions(options)
  }

  /**
   * Unmarshal `json` into the type described by `schema`
   */
  unmarshal(json: unknown, schema: z.ZodType): unknown {
    return this.run(json, schema)
  }

  protected expand(item: WorkItem<unknown>): Expansion<unknown> {
    const { data, schema } = item.source
    if (!schema) {
      throw new UnmarshalError({ message: "No schema to unmarshal into", path: item.path, value: data })
    }

    const node = this.#inspect(schema, data, item.path)
    this.#validateShape(node, data, item.path)

    switch (node.kind) {
      case "record":
        return { kind: "record", entries: this.#recordEntries(node.schema, data, item.path) }

      case "sequence":
        return {
          kind: "sequence",
          elements: Array.isArray(data) ? data.map((value: unknown) => ({ data: value, schema: node.element })) : [],
        }

      case "mapping":
        return { kind: "leaf", value: structuredClone(this.#check(node.schema, data, item.path)) }

      default:
        return { kind: "leaf", value: this.#leaf(node, data, item.path) }
    }
  }

  protected assembleRecord(_item: WorkItem<unknown>, entries: [string, unknown][]): unknown {
    const record: Record<string, unknown> = {}
    for (const [name, value] of entries) {
      // fields that may be left out are left out, rather than set to undefined
      if (value !== undefined) record[name] = value
    }
    return record
  }

  protected assembleSequence(_item: WorkItem<unknown>, elements: unknown[]): unknown {
    return elements
  }

  #inspect(schema: z.ZodType, data: unknown, path: string): SchemaNode {
    try {
      return inspect(schema, data)
    } catch (error) {
      if (error instanceof SchemaError) {
        throw new UnmarshalError({ message: error.message, path, value: data, cause: error })
      }
      throw error
    }
  }

  /**
   * Check that the data has the runtime shape of its kind. Kinds that are parsed from another
   * JSON type (enum, identifier, timestamp, calendar-date, null) are checked by their converter.
   */
  #validateShape(node: SchemaNode, data: unknown, path: string): void {
    let valid: boolean
    switch (node.kind) {
      case "record":
      case "mapping":
        valid = isPlainObject(data)
        break
      case "sequence":
        valid = Array.isArray(data)
        break
      case "string":
        valid = typeof data === "string"
        break
      case "integer":
        valid = typeof data === "number" && Number.isInteger(data)
        break
      case "float":
        valid = typeof data === "number" && Number.isFinite(data)
        break
      case "boolean":
        valid = typeof data === "boolean"
        break
      default:
        return
    }

    if (!valid) {
      throw new UnmarshalError({
        message: `Invalid value for schema ${schemaLabel(node)}: got ${describeValue(data)}`,
        path,
        value: data,
      })
    }
  }

  #recordEntries(schema: RecordSchema, data: unknown, path: string): RecordEntry<unknown>[] {
    if (!isPlainObject(data)) return []

    const entries: RecordEntry<unknown>[] = []

    for (const field of this.#fields(schema, path)) {
      if (!Object.hasOwn(data, field.key)) {
        if (!field.optional) {
          const available = Object.keys(data)
          throw new UnmarshalError({
            message: `Expected json key '${field.key}' is not present (available keys: ${available.length > 0 ? available.join(", ") : "none"})`,
            path,
            value: data,
          })
        }
        entries.push({ key: field.name, ready: true, value: field.undefinable ? undefined : null })
        continue
      }

      const value = data[field.key]
      const fieldPath = joinPath(path, field.key)
      const node = this.#inspect(field.schema, value, fieldPath)

      if (isPrimitiveKind(node.kind)) {
        this.#validateShape(node, value, fieldPath)
        entries.push({ key: field.name, ready: true, value: this.#leaf(node, value, fieldPath) })
      } else {
        entries.push({ key: field.name, ready: false, segment: field.key, child: { data: value, schema: field.schema } })
      }
    }

    return entries
  }

  #fields(schema: RecordSchema, path: string): readonly SchemaField[] {
    try {
      return fieldsOf(schema)
    } catch (error) {
      if (error instanceof SchemaError) {
        const fieldPath = error.field ? joinPath(path, error.field.key) : path
        throw new UnmarshalError({ message: error.message, path: fieldPath, cause: error })
      }
      throw error
    }
  }

  #leaf(node: SchemaNode, data: unknown, path: string): unknown {
    switch (node.kind) {
      case "null": {
        if (data !== null && data !== undefined) {
          throw new UnmarshalError({ message: `Invalid value for schema null: got ${describeValue(data)}`, path, value: data })
        }
        // `.optional()` fields take null from JSON as undefined
        const optional = unwrapOptional(node.schema)
        return optional && !optional.nullable ? undefined : null
      }

      case "enum":
        if (!node.values.some((value) => value === data)) {
          throw new UnmarshalError({ message: `Unable to use data value ${describeValue(data)} as ${node.label}`, path, value: data })
        }
        return data

      case "identifier":
        if (typeof data !== "string" || !node.schema.safeParse(data).success) {
          throw new UnmarshalError({ message: `Unable to use data value ${describeValue(data)} as UUID`, path, value: data })
        }
        return data

      case "timestamp":
        return this.#parse("timestamp", data, path, (text) => parseTimestamp(text, this.#options.datetimeFormat))

      case "calendar-date":
        return this.#parse("calendar date", data, path, (text) => parseCalendarDate(text, this.#options.dateFormat))

      case "string":
      case "integer":
      case "float":
      case "boolean":
        // the kind matches; now apply the schema's own checks (min, max, regex, ...)
        return this.#check(node.schema, data, path)

      case "record":
      case "sequence":
      case "mapping":
        throw new Error(`'${node.kind}' is not a leaf kind`)
    }
  }

  #check(schema: z.ZodType, data: unknown, path: string): unknown {
    const result = schema.safeParse(data)
    if (!result.success) {
      const issue = result.error.issues[0]?.message ?? "invalid value"
      throw new UnmarshalError({ message: `Invalid value ${describeValue(data)}: ${issue}`, path, value: data, cause: result.error })
    }
    return result.data
  }

  #parse<T>(label: string, data: unknown, path: string, parse: (text: string) => T): T {
    if (typeof data !== "string") {
      throw new UnmarshalError({ message: `Unable to use data value ${describeValue(data)} as ${label}`, path, value: data })
    }

    try {
      return parse(data)
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      throw new UnmarshalError({
        message: `Unable to use data value ${describeValue(data)} as ${label}: ${reason}`,
        path,
        value: data,
        cause: error,
      })
    }
  }
}

const schemaLabel = (node: SchemaNode): string => (node.kind === "enum" ? node.label : node.kind)

/**
 * Unmarshal a JSON value tree into the type described by `schema`.
 *
 * @example
 * ```ts
 * const Item = z.object({
 *   id: z.uuid(),
 *   when: z.date().json("createdAt"),
 *   value: z.number().int().nullable(),
 * })
 *
 * unmarshal({ id: "7499af75-0d01-42a9-a6d7-1c45c1d22125", createdAt: "2020-06-22T08:55:05Z", value: null }, Item)
 * // { id: "7499af75-...", when: Date(2020-06-22T08:55:05.000Z), value: null }
 * ```
 */
export function unmarshal<S extends z.ZodType>(json: unknown, schema: S, options?: UnmarshalOptions): z.output<S> {
  // the traversal builds values of any shape; the schema walk above guarantees this one
  return new Unmarshaller(options).unmarshal(json, schema) as z.output<S>
}

/**
 * Wrap a function returning JSON (or a promise of JSON) so that it returns the unmarshalled result
 *
 * @example
 * ```ts
 * const fetchUser = unmarshalResponse(User, async (id: string) => (await fetch(`/users/${id}`)).json())
 * const user = await fetchUser("42") // typed as z.output<typeof User>
 * ```
 */
export function unmarshalResponse<S extends z.ZodType, A extends unknown[]>(
  schema: S,
  fn: (...args: A) => Promise<unknown>,
  options?: UnmarshalOptions,
): (...args: A) => Promise<z.output<S>>
export function unmarshalResponse<S extends z.ZodType, A extends unknown[]>(
  schema: S,
  fn: (...args: A) => unknown,
  options?: UnmarshalOptions,
): (...args: A) => z.output<S>
export function unmarshalResponse<S extends z.ZodType, A extends unknown[]>(
  schema: S,
  fn: (...args: A) => unknown,
  options?: UnmarshalOptions,
): (...args: A) => z.output<S> | Promise<z.output<S>> {
  return (...args: A) => {
    const response = fn(...args)
    if (response instanceof Promise) {
      return response.then((json: unknown) => unmarshal(json, schema, options))
    }
    return unmarshal(response, schema, options)
  }
}
