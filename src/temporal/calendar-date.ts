const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31] as const

export const isLeapYear = (year: number): boolean => (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0

export const daysInMonth = (year: number, month: number): number =>
  month === 2 && isLeapYear(year) ? 29 : (DAYS_IN_MONTH[month - 1] ?? 0)

/**
 * A date without a time of day or time zone (year, month 1-12, day 1-31).
 *
 * JavaScript's `Date` is an instant, so calendar dates get their own value type.
 * Instances are immutable and compare with {@link CalendarDate.equals}.
 *
 * @example
 * ```ts
 * const d = new CalendarDate(2020, 6, 22)
 * d.toString() // "2020-06-22"
 * ```
 */
export class CalendarDate {
  readonly year: number
  readonly month: number
  readonly day: number

  constructor(year: number, month: number, day: number) {
    if (!Number.isInteger(year) || year < 1 || year > 9999) {
      throw new RangeError(`Year ${year} is out of range 1..9999`)
    }
    if (!Number.isInteger(month) || month < 1 || month > 12) {
      throw new RangeError(`Month ${month} is out of range 1..12`)
    }
    const maxDay = daysInMonth(year, month)
    if (!Number.isInteger(day) || day < 1 || day > maxDay) {
      throw new RangeError(`Day ${day} is out of range 1..${maxDay} for ${year}-${pad(month, 2)}`)
    }

    this.year = year
    this.month = month
    this.day = day
  }

  /**
   * The calendar date of an instant, read in UTC
   */
  static fromDate(date: Date): CalendarDate {
    return new CalendarDate(date.getUTCFullYear(), date.getUTCMonth() + 1, date.getUTCDate())
  }

  /**
   * Midnight UTC of this date
   */
  toDate(): Date {
    return utcInstant(this.year, this.month, this.day, 0, 0, 0, 0)
  }

  /** 0 = Sunday ... 6 = Saturday */
  get weekday(): number {
    return this.toDate().getUTCDay()
  }

  /** 1-based day of the year */
  get dayOfYear(): number {
    let total = this.day
    for (let m = 1; m < this.month; m++) total += daysInMonth(this.year, m)
    return total
  }

  equals(other: CalendarDate): boolean {
    return this.year === other.year && this.month === other.month && this.day === other.day
  }

  /**
   * ISO-8601 calendar date (`YYYY-MM-DD`)
   */
  toString(): string {
    return `${pad(this.year, 4)}-${pad(this.month, 2)}-${pad(this.day, 2)}`
  }

  toJSON(): string {
    return this.toString()
  }
}

/**
 * Build a `Date` from UTC components. Unlike `Date.UTC`, years 0-99 are not shifted into the 1900s.
 */
export function utcInstant(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  second: number,
  millisecond: number,
): Date {
  const date = new Date(0)
  date.setUTCFullYear(year, month - 1, day)
  date.setUTCHours(hour, minute, second, millisecond)
  return date
}

export const pad = (value: number, width: number): string => String(value).padStart(width, "0")
