import { CalendarDate, pad } from "@/temporal/calendar-date"
import { parseOffset, strftime, strftimeDate, strptime, toInstant } from "@/temporal/strftime"

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/

const ISO_DATETIME = /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d{1,9}))?)?)?([+-]\d{2}:?\d{2})?$/

/**
 * Format an instant as `YYYY-MM-DDTHH:MM:SS+00:00`, or with a strftime pattern when one is given.
 * Milliseconds are appended (`.mmm`) only when they are non-zero.
 */
export function formatTimestamp(date: Date, format?: string): string {
  if (Number.isNaN(date.getTime())) {
    throw new RangeError("Cannot format an invalid Date")
  }

  if (format) return strftime(date, format)

  const calendar = CalendarDate.fromDate(date)
  const time = [date.getUTCHours(), date.getUTCMinutes(), date.getUTCSeconds()].map((part) => pad(part, 2)).join(":")
  const millis = date.getUTCMilliseconds()

  return `${calendar.toString()}T${time}${millis === 0 ? "" : `.${pad(millis, 3)}`}+00:00`
}

/**
 * Parse a timestamp string into an instant.
 *
 * Without a format, ISO-8601 is expected. A trailing `Z` is read as `+00:00`, and a timestamp
 * without any offset is taken to be in UTC. Sub-millisecond digits are truncated.
 */
export function parseTimestamp(text: string, format?: string): Date {
  if (format) return toInstant(strptime(text, format))

  const normalized = text.endsWith("Z") ? `${text.slice(0, -1)}+00:00` : text
  const match = ISO_DATETIME.exec(normalized)
  if (!match) {
    throw new RangeError(`'${text}' is not an ISO-8601 timestamp`)
  }

  const [, year, month, day, hour = "0", minute = "0", second = "0", fraction = "", offset] = match
  const date = new CalendarDate(Number(year), Number(month), Number(day))

  if (Number(hour) > 23 || Number(minute) > 59 || Number(second) > 59) {
    throw new RangeError(`'${text}' has a time of day out of range`)
  }

  return toInstant({
    year: date.year,
    month: date.month,
    day: date.day,
    hour: Number(hour),
    minute: Number(minute),
    second: Number(second),
    millisecond: Number(fraction.padEnd(3, "0").slice(0, 3)),
    offsetMinutes: offset === undefined ? 0 : parseOffset(offset),
  })
}

/**
 * Format a calendar date as `YYYY-MM-DD`, or with a strftime pattern when one is given
 */
export function formatCalendarDate(date: CalendarDate, format?: string): string {
  return format ? strftimeDate(date, format) : date.toString()
}

/**
 * Parse a calendar date from `YYYY-MM-DD`, or with a strptime pattern when one is given.
 * Time and offset components matched by the pattern are ignored.
 */
export function parseCalendarDate(text: string, format?: string): CalendarDate {
  if (format) {
    const fields = strptime(text, format)
    return new CalendarDate(fields.year, fields.month, fields.day)
  }

  const match = ISO_DATE.exec(text)
  if (!match) {
    throw new RangeError(`'${text}' is not an ISO-8601 calendar date`)
  }

  const [, year, month, day] = match
  return new CalendarDate(Number(year), Number(month), Number(day))
}
