/**
 * A JSON-compatible value tree, as produced by `JSON.parse` and accepted by `JSON.stringify`
 */
export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject

/**
 * A JSON object with string keys
 */
export type JsonObject = { [key: string]: JsonValue }

/**
 * Formatting options shared by both directions
 */
export type TemporalOptions = {
  /**
   * strftime-style pattern used for timestamps (`Date`).
   * Defaults to ISO-8601 (`YYYY-MM-DDTHH:MM:SS+00:00`).
   * @example "%d/%m/%Y %H:%M:%S"
   */
  datetimeFormat?: string
  /**
   * strftime-style pattern used for calendar dates.
   * Defaults to ISO-8601 (`YYYY-MM-DD`).
   */
  dateFormat?: string
  /** @deprecated use `datetimeFormat` */
  datetimeFmt?: string
  /** @deprecated use `dateFormat` */
  dateFmt?: string
}

export type MarshalOptions = TemporalOptions

export type UnmarshalOptions = TemporalOptions

/**
 * Options after defaults and deprecated names have been resolved
 */
export type ResolvedTemporalOptions = {
  datetimeFormat: string | undefined
  dateFormat: string | undefined
}

/**
 * Error thrown when a schema uses a construct that cannot be converted
 * (for example a union of several non-null types, or `z.any()`).
 */
export class SchemaError extends Error {
  override name = "SchemaError" as const

  /** The record field whose schema was rejected, when there is one */
  public readonly field: { name: string; key: string } | undefined

  constructor(message: string, field?: { name: string; key: string }) {
    super(message)
    this.field = field

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SchemaError)
    }
  }
}

type ConversionErrorOptions = {
  message: string
  /** Dotted path of the offending node, empty for the root */
  path: string
  /** The offending value, if there is one */
  value?: unknown
  cause?: unknown
}

/**
 * Error thrown when a value cannot be marshalled into JSON.
 */
export class MarshalError extends Error {
  override name = "MarshalError" as const

  public override readonly cause: unknown

  /** Dotted path of the offending node, empty for the root */
  public readonly path: string

  public readonly value: unknown

  constructor(options: ConversionErrorOptions) {
    super(`${options.message} at ${displayPath(options.path)}`)
    this.cause = options.cause
    this.path = options.path
    this.value = options.value

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MarshalError)
    }
  }
}

/**
 * Error thrown when a JSON tree does not match the schema it is unmarshalled into.
 */
export class UnmarshalError extends Error {
  override name = "UnmarshalError" as const

  public override readonly cause: unknown

  /** Dotted path of the offending node, empty for the root */
  public readonly path: string

  public readonly value: unknown

  constructor(options: ConversionErrorOptions) {
    super(`${options.message} at ${displayPath(options.path)}`)
    this.cause = options.cause
    this.path = options.path
    this.value = options.value

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UnmarshalError)
    }
  }
}

const displayPath = (path: string): string => (path === "" ? "<root>" : `'${path}'`)
