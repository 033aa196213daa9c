export { CalendarDate, daysInMonth, isLeapYear } from "@/temporal/calendar-date"
export { strftime, strftimeDate, strptime, parseOffset, toInstant, type DateTimeFields } from "@/temporal/strftime"
export { formatTimestamp, parseTimestamp, formatCalendarDate, parseCalendarDate } from "@/temporal/iso"
