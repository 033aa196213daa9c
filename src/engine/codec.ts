import type { z } from "@/schema/meta"
import { marshal } from "@/engine/marshal"
import { unmarshal } from "@/engine/unmarshal"
import type { JsonValue, MarshalOptions, UnmarshalOptions } from "@/types"

/**
 * A schema bound to its formatting options, converting in both directions
 */
export interface Codec<S extends z.ZodType> {
  readonly schema: S
  marshal(value: z.output<S>): JsonValue
  unmarshal(json: unknown): z.output<S>
  /** Marshal and serialize with `JSON.stringify` */
  stringify(value: z.output<S>, space?: number): string
  /** `JSON.parse` and unmarshal */
  parse(text: string): z.output<S>
}

/**
 * Bind a schema and its options once, for repeated conversions
 *
 * @example
 * ```ts
 * const people = createCodec(z.array(Person), { dateFormat: "%d/%m/%Y" })
 * const text = people.stringify(list)
 * const again = people.parse(text)
 * ```
 */
export function createCodec<S extends z.ZodType>(schema: S, options: MarshalOptions & UnmarshalOptions = {}): Codec<S> {
  return {
    schema,
    marshal: (value) => marshal(value, schema, options),
    unmarshal: (json) => unmarshal(json, schema, options),
    stringify: (value, space) => JSON.stringify(marshal(value, schema, options), null, space),
    parse: (text) => {
      const json: unknown = JSON.parse(text)
      return unmarshal(json, schema, options)
    },
  }
}
