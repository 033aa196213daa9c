import { describe, it, expect } from "vitest"
import { CalendarDate, daysInMonth, isLeapYear } from "@/temporal/calendar-date"
import { parseOffset, strftime, strptime } from "@/temporal/strftime"
import { formatCalendarDate, formatTimestamp, parseCalendarDate, parseTimestamp } from "@/temporal/iso"

describe("CalendarDate", () => {
  it("should format as YYYY-MM-DD", () => {
    expect(new CalendarDate(2020, 6, 2).toString()).toBe("2020-06-02")
    expect(new CalendarDate(33, 1, 1).toString()).toBe("0033-01-01")
  })

  it("should reject days that don't exist", () => {
    expect(() => new CalendarDate(2021, 2, 29)).toThrow("Day 29 is out of range 1..28 for 2021-02")
    expect(() => new CalendarDate(2021, 13, 1)).toThrow("Month 13 is out of range 1..12")
  })

  it("should know leap years", () => {
    expect([isLeapYear(2000), isLeapYear(1900), isLeapYear(2024), isLeapYear(2023)]).toEqual([true, false, true, false])
    expect(daysInMonth(2024, 2)).toBe(29)
  })

  it("should compute weekday and day of year", () => {
    const date = new CalendarDate(2020, 6, 22)
    expect(date.weekday).toBe(1)
    expect(date.dayOfYear).toBe(174)
  })

  it("should read the UTC date of an instant", () => {
    expect(CalendarDate.fromDate(new Date("2020-06-22T23:30:00-02:00")).toString()).toBe("2020-06-23")
  })

  it("should compare by value", () => {
    expect(new CalendarDate(2020, 1, 1).equals(new CalendarDate(2020, 1, 1))).toBe(true)
    expect(new CalendarDate(2020, 1, 1).equals(new CalendarDate(2020, 1, 2))).toBe(false)
  })
})

describe("timestamps", () => {
  it("should format in UTC with a +00:00 offset", () => {
    expect(formatTimestamp(new Date(Date.UTC(2020, 5, 22, 8, 55, 5)))).toBe("2020-06-22T08:55:05+00:00")
  })

  it("should include milliseconds only when non-zero", () => {
    expect(formatTimestamp(new Date(Date.UTC(2020, 5, 22, 8, 55, 5, 40)))).toBe("2020-06-22T08:55:05.040+00:00")
  })

  it("should parse a trailing Z as UTC", () => {
    expect(parseTimestamp("2020-06-22T08:55:05Z").toISOString()).toBe("2020-06-22T08:55:05.000Z")
  })

  it("should apply the offset", () => {
    expect(parseTimestamp("2020-06-22T10:55:05+02:00").toISOString()).toBe("2020-06-22T08:55:05.000Z")
    expect(parseTimestamp("2020-06-22T08:55:05.123456-0130").toISOString()).toBe("2020-06-22T10:25:05.123Z")
  })

  it("should read a timestamp without offset as UTC", () => {
    expect(parseTimestamp("2020-06-22 08:55").toISOString()).toBe("2020-06-22T08:55:00.000Z")
    expect(parseTimestamp("2020-06-22").toISOString()).toBe("2020-06-22T00:00:00.000Z")
  })

  it("should reject malformed timestamps", () => {
    expect(() => parseTimestamp("22/06/2020")).toThrow("'22/06/2020' is not an ISO-8601 timestamp")
    expect(() => parseTimestamp("2020-06-22T25:00:00Z")).toThrow("'2020-06-22T25:00:00Z' has a time of day out of range")
  })

  it("should reject invalid dates", () => {
    expect(() => formatTimestamp(new Date(Number.NaN))).toThrow("Cannot format an invalid Date")
  })

  it("should use a strftime pattern when one is given", () => {
    const date = new Date(Date.UTC(2020, 5, 22, 8, 55, 5))
    expect(formatTimestamp(date, "%d/%m/%Y %H:%M:%S")).toBe("22/06/2020 08:55:05")
    expect(parseTimestamp("22/06/2020 08:55:05", "%d/%m/%Y %H:%M:%S").getTime()).toBe(date.getTime())
  })
})

describe("calendar dates", () => {
  it("should format and parse ISO dates", () => {
    expect(formatCalendarDate(new CalendarDate(1999, 12, 31))).toBe("1999-12-31")
    expect(parseCalendarDate("2024-02-29")).toEqual(new CalendarDate(2024, 2, 29))
  })

  it("should reject malformed dates", () => {
    expect(() => parseCalendarDate("2024-2-29")).toThrow("'2024-2-29' is not an ISO-8601 calendar date")
    expect(() => parseCalendarDate("2023-02-29")).toThrow("Day 29 is out of range 1..28 for 2023-02")
  })

  it("should use a pattern when one is given", () => {
    expect(formatCalendarDate(new CalendarDate(2010, 2, 1), "%d %B %Y")).toBe("01 February 2010")
    expect(parseCalendarDate("01 Feb 2010", "%d %b %Y")).toEqual(new CalendarDate(2010, 2, 1))
  })
})

describe("strftime", () => {
  const date = new Date(Date.UTC(2021, 0, 3, 15, 4, 5, 6))

  it("should render names and 12-hour clock", () => {
    expect(strftime(date, "%a %A %b %B %I:%M %p")).toBe("Sun Sunday Jan January 03:04 PM")
  })

  it("should render numeric directives", () => {
    expect(strftime(date, "%y|%j|%w|%f|%z|%Z|%%")).toBe("21|003|0|006000|+0000|UTC|%")
  })

  it("should reject unknown directives", () => {
    expect(() => strftime(date, "%Q")).toThrow("Unsupported format directive '%Q' in '%Q'")
  })
})

describe("strptime", () => {
  it("should read every component", () => {
    expect(strptime("2020-06-22 08:55:05.250 +0100", "%Y-%m-%d %H:%M:%S.%f %z")).toEqual({
      year: 2020,
      month: 6,
      day: 22,
      hour: 8,
      minute: 55,
      second: 5,
      millisecond: 250,
      offsetMinutes: 60,
    })
  })

  it("should default missing components", () => {
    expect(strptime("08:30", "%H:%M")).toEqual({
      year: 1900,
      month: 1,
      day: 1,
      hour: 8,
      minute: 30,
      second: 0,
      millisecond: 0,
      offsetMinutes: 0,
    })
  })

  it("should resolve 12-hour times and two-digit years", () => {
    const fields = strptime("12/31/99 12:15 AM", "%m/%d/%y %I:%M %p")
    expect([fields.year, fields.month, fields.day, fields.hour, fields.minute]).toEqual([1999, 12, 31, 0, 15])
    expect(strptime("01/01/20 01:00 pm", "%m/%d/%y %I:%M %p").hour).toBe(13)
    expect(strptime("01/01/20 01:00 pm", "%m/%d/%y %I:%M %p").year).toBe(2020)
  })

  it("should resolve the day of the year", () => {
    const fields = strptime("2024 060", "%Y %j")
    expect([fields.month, fields.day]).toEqual([2, 29])
  })

  it("should reject text that doesn't match", () => {
    expect(() => strptime("2020/06/22", "%Y-%m-%d")).toThrow("'2020/06/22' does not match format '%Y-%m-%d'")
  })

  it("should reject components out of range", () => {
    expect(() => strptime("2020-02-30", "%Y-%m-%d")).toThrow("Day 30 is out of range 1..29 for 2020-02")
    expect(() => strptime("24:00", "%H:%M")).toThrow("Hour 24 is out of range 0..23")
  })
})

describe("parseOffset", () => {
  it("should parse offsets into minutes", () => {
    expect(parseOffset("Z")).toBe(0)
    expect(parseOffset("+05:30")).toBe(330)
    expect(parseOffset("-0800")).toBe(-480)
  })

  it("should reject malformed offsets", () => {
    expect(() => parseOffset("+5")).toThrow("Invalid UTC offset '+5'")
  })
})
