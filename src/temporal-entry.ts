/**
 * json-marshal/temporal
 *
 * Date and time helpers used for timestamps and calendar dates, usable on their own.
 *
 * @example
 * ```ts
 * import { strftime, parseTimestamp } from "json-marshal/temporal"
 *
 * strftime(parseTimestamp("2020-06-22T08:55:05Z"), "%d/%m/%Y %H:%M") // "22/06/2020 08:55"
 * ```
 */

export * from "@/temporal"
