import { CalendarDate, daysInMonth, pad, utcInstant } from "@/temporal/calendar-date"

const WEEKDAYS = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"] as const
const MONTHS = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
] as const

/**
 * Date and time components read from a string by {@link strptime}
 */
export type DateTimeFields = {
  year: number
  month: number
  day: number
  hour: number
  minute: number
  second: number
  millisecond: number
  /** Offset from UTC in minutes, 0 when the pattern carries none */
  offsetMinutes: number
}

/**
 * Format an instant with a strftime pattern. All components are read in UTC.
 *
 * Supported directives: `%a %A %b %B %d %f %H %I %j %m %M %p %S %w %y %Y %z %Z %%`.
 *
 * @example strftime(new Date("2020-06-22T08:55:05Z"), "%d/%m/%Y %H:%M") // "22/06/2020 08:55"
 */
export function strftime(date: Date, pattern: string): string {
  const hour = date.getUTCHours()
  const calendar = CalendarDate.fromDate(date)

  return replaceDirectives(pattern, (directive) => {
    switch (directive) {
      case "a":
        return WEEKDAYS[date.getUTCDay()].slice(0, 3)
      case "A":
        return WEEKDAYS[date.getUTCDay()]
      case "b":
        return MONTHS[date.getUTCMonth()].slice(0, 3)
      case "B":
        return MONTHS[date.getUTCMonth()]
      case "d":
        return pad(date.getUTCDate(), 2)
      case "f":
        return pad(date.getUTCMilliseconds() * 1000, 6)
      case "H":
        return pad(hour, 2)
      case "I":
        return pad(hour % 12 || 12, 2)
      case "j":
        return pad(calendar.dayOfYear, 3)
      case "m":
        return pad(date.getUTCMonth() + 1, 2)
      case "M":
        return pad(date.getUTCMinutes(), 2)
      case "p":
        return hour < 12 ? "AM" : "PM"
      case "S":
        return pad(date.getUTCSeconds(), 2)
      case "w":
        return String(date.getUTCDay())
      case "y":
        return pad(date.getUTCFullYear() % 100, 2)
      case "Y":
        return pad(date.getUTCFullYear(), 4)
      case "z":
        return "+0000"
      case "Z":
        return "UTC"
      case "%":
        return "%"
      default:
        throw new RangeError(`Unsupported format directive '%${directive}' in '${pattern}'`)
    }
  })
}

/**
 * Format a calendar date with a strftime pattern. Time directives render as midnight.
 */
export function strftimeDate(date: CalendarDate, pattern: string): string {
  return strftime(date.toDate(), pattern)
}

type Capture = {
  source: string
  apply: (fields: ParseState, text: string) => void
}

type ParseState = Partial<DateTimeFields> & {
  hour12?: number
  pm?: boolean
  dayOfYear?: number
}

const monthIndex = (text: string): number =>
  MONTHS.findIndex((month) => month.toLowerCase().startsWith(text.toLowerCase()) && text.length >= 3) + 1

const CAPTURES: Record<string, Capture> = {
  Y: { source: "\\d{4}", apply: (s, t) => (s.year = Number(t)) },
  y: {
    source: "\\d{2}",
    apply: (s, t) => {
      const short = Number(t)
      s.year = short < 69 ? 2000 + short : 1900 + short
    },
  },
  m: { source: "\\d{1,2}", apply: (s, t) => (s.month = Number(t)) },
  d: { source: "\\d{1,2}", apply: (s, t) => (s.day = Number(t)) },
  H: { source: "\\d{1,2}", apply: (s, t) => (s.hour = Number(t)) },
  I: { source: "\\d{1,2}", apply: (s, t) => (s.hour12 = Number(t)) },
  M: { source: "\\d{1,2}", apply: (s, t) => (s.minute = Number(t)) },
  S: { source: "\\d{1,2}", apply: (s, t) => (s.second = Number(t)) },
  f: { source: "\\d{1,6}", apply: (s, t) => (s.millisecond = Math.floor(Number(t.padEnd(6, "0")) / 1000)) },
  j: { source: "\\d{1,3}", apply: (s, t) => (s.dayOfYear = Number(t)) },
  p: { source: "[AaPp][Mm]", apply: (s, t) => (s.pm = t.toLowerCase() === "pm") },
  b: { source: "[A-Za-z]{3}", apply: (s, t) => (s.month = monthIndex(t)) },
  B: { source: "[A-Za-z]{3,9}", apply: (s, t) => (s.month = monthIndex(t)) },
  a: { source: "[A-Za-z]{3}", apply: () => undefined },
  A: { source: "[A-Za-z]{6,9}", apply: () => undefined },
  w: { source: "[0-6]", apply: () => undefined },
  z: { source: "Z|[+-]\\d{2}:?\\d{2}", apply: (s, t) => (s.offsetMinutes = parseOffset(t)) },
  Z: { source: "UTC|GMT|Z", apply: (s) => (s.offsetMinutes = s.offsetMinutes ?? 0) },
}

/**
 * Read date and time components from `text` using a strptime pattern.
 * The whole string must match. Throws a `RangeError` when it doesn't, or when the components are out of range.
 *
 * @example strptime("22/06/2020", "%d/%m/%Y") // { year: 2020, month: 6, day: 22, hour: 0, ... }
 */
export function strptime(text: string, pattern: string): DateTimeFields {
  const captures: Capture[] = []
  let source = ""

  for (let i = 0; i < pattern.length; i++) {
    const char = pattern[i]

    if (char !== "%") {
      source += char.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
      continue
    }

    const directive = pattern[++i]
    if (directive === "%") {
      source += "%"
      continue
    }

    const capture = directive === undefined ? undefined : CAPTURES[directive]
    if (!capture) {
      throw new RangeError(`Unsupported format directive '%${directive ?? ""}' in '${pattern}'`)
    }

    captures.push(capture)
    source += `(${capture.source})`
  }

  const match = new RegExp(`^${source}$`).exec(text)
  if (!match) {
    throw new RangeError(`'${text}' does not match format '${pattern}'`)
  }

  const state: ParseState = {}
  captures.forEach((capture, index) => capture.apply(state, match[index + 1] ?? ""))

  return completeFields(state, text)
}

/**
 * Parse a UTC offset such as `Z`, `+05:30` or `-0800` into minutes
 */
export function parseOffset(text: string): number {
  if (text === "Z") return 0

  const match = /^([+-])(\d{2}):?(\d{2})$/.exec(text)
  if (!match) throw new RangeError(`Invalid UTC offset '${text}'`)

  const [, sign, hours, minutes] = match
  const total = Number(hours) * 60 + Number(minutes)
  if (Number(hours) > 23 || Number(minutes) > 59) throw new RangeError(`Invalid UTC offset '${text}'`)

  return sign === "-" ? -total : total
}

/**
 * The instant described by a set of fields, honouring their UTC offset
 */
export function toInstant(fields: DateTimeFields): Date {
  const local = utcInstant(
    fields.year,
    fields.month,
    fields.day,
    fields.hour,
    fields.minute,
    fields.second,
    fields.millisecond,
  )
  return new Date(local.getTime() - fields.offsetMinutes * 60_000)
}

function completeFields(state: ParseState, text: string): DateTimeFields {
  const year = state.year ?? 1900
  let month = state.month ?? 1
  let day = state.day ?? 1

  if (state.month === 0) {
    throw new RangeError(`Unknown month name in '${text}'`)
  }

  if (state.dayOfYear !== undefined && state.month === undefined && state.day === undefined) {
    // resolve %j into a month and day
    let remaining = state.dayOfYear
    month = 1
    while (month <= 12 && remaining > daysInMonth(year, month)) {
      remaining -= daysInMonth(year, month)
      month++
    }
    day = remaining
  }

  let hour = state.hour ?? 0
  if (state.hour12 !== undefined) {
    if (state.hour12 < 1 || state.hour12 > 12) throw new RangeError(`Hour ${state.hour12} is out of range 1..12`)
    hour = (state.hour12 % 12) + (state.pm ? 12 : 0)
  }

  const minute = state.minute ?? 0
  const second = state.second ?? 0

  // validates year, month and day
  new CalendarDate(year, month, day)

  if (hour > 23) throw new RangeError(`Hour ${hour} is out of range 0..23`)
  if (minute > 59) throw new RangeError(`Minute ${minute} is out of range 0..59`)
  if (second > 59) throw new RangeError(`Second ${second} is out of range 0..59`)

  return {
    year,
    month,
    day,
    hour,
    minute,
    second,
    millisecond: state.millisecond ?? 0,
    offsetMinutes: state.offsetMinutes ?? 0,
  }
}

function replaceDirectives(pattern: string, render: (directive: string) => string): string {
  let output = ""

  for (let i = 0; i < pattern.length; i++) {
    const char = pattern[i]
    if (char !== "%") {
      output += char
      continue
    }

    const directive = pattern[++i]
    if (directive === undefined) {
      throw new RangeError(`Format '${pattern}' ends with a lone '%'`)
    }
    output += render(directive)
  }

  return output
}
