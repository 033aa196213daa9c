/**
 * json-marshal/schema
 *
 * Zod extensions for describing marshalled records, without the engines.
 *
 * This module provides:
 * - `z` - Zod, extended with `.json(key)` and `.omitEmpty()`
 * - `calendarDate()` - Schema for dates without time of day
 * - `classify`, `kindOf`, `fieldsOf` - Inspect how a schema or value will be converted
 *
 * @example
 * ```ts
 * import { z, classify } from "json-marshal/schema"
 *
 * classify(z.array(z.string())) // "sequence"
 * ```
 */

export * from "@/schema"
