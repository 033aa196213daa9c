/**
 * json-marshal
 *
 * Converts typed records to JSON value trees and back, guided by Zod schemas.
 * Fields can be renamed in JSON, left out when empty, and typed as timestamps, calendar dates,
 * UUIDs or enums, which are written as strings and parsed back on the way in.
 *
 * @example
 * ```ts
 * import { z, marshal, unmarshal, calendarDate, CalendarDate } from "json-marshal"
 *
 * const Event = z.object({
 *   id: z.uuid(),
 *   name: z.string(),
 *   day: calendarDate().json("eventDay"),
 *   startsAt: z.date().json("starts_at"),
 *   note: z.string().nullable().omitEmpty(),
 * })
 *
 * const json = marshal(
 *   {
 *     id: "7499af75-0d01-42a9-a6d7-1c45c1d22125",
 *     name: "Launch",
 *     day: new CalendarDate(2020, 6, 22),
 *     startsAt: new Date("2020-06-22T08:55:05Z"),
 *     note: null,
 *   },
 *   Event,
 * )
 * // { id: "7499af75-...", name: "Launch", eventDay: "2020-06-22", starts_at: "2020-06-22T08:55:05+00:00" }
 *
 * const event = unmarshal(json, Event) // back to the record, `note: null`
 * ```
 */

// Schema - re-export Zod with field extensions
export * from "./schema"

// Marshalling and unmarshalling
export * from "./engine"

// Dates and times
export * from "./temporal"

// Errors and shared types
export {
  SchemaError,
  MarshalError,
  UnmarshalError,
  type JsonValue,
  type JsonObject,
  type MarshalOptions,
  type UnmarshalOptions,
  type TemporalOptions,
} from "./types"
