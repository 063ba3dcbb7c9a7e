import {
  differenceInCalendarDays,
  endOfMonth,
  format,
  isValid,
  parse,
  parseISO,
} from "date-fns";

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const ISO_MONTH = /^\d{4}-\d{2}$/;
const LONG_DATE_FORMAT = "MMMM d yyyy"; // "August 25 2025"

/** Parse a `YYYY-MM-DD` date at local midnight. */
export function parseIsoDate(value: string): Date | undefined {
  if (!ISO_DATE.test(value)) {
    return undefined;
  }
  const date = parseISO(value);
  return isValid(date) ? date : undefined;
}

/** Parse a funding date: long form first ("August 25 2025"), then `YYYY-MM-DD`. */
export function parseFundingDate(value: string): Date | undefined {
  const date = parse(value.trim().replace(/,/g, ""), LONG_DATE_FORMAT, new Date(0));
  if (isValid(date)) {
    return date;
  }
  return parseIsoDate(value.trim());
}

export function toIsoDate(date: Date): string {
  return format(date, "yyyy-MM-dd");
}

export function toIsoMonth(date: Date): string {
  return format(date, "yyyy-MM");
}

/** Last second of a `YYYY-MM` month. */
export function monthEnd(month: string): Date | undefined {
  if (!ISO_MONTH.test(month)) {
    return undefined;
  }
  const first = parseISO(`${month}-01`);
  return isValid(first) ? endOfMonth(first) : undefined;
}

/** Whole calendar days from `from` to `to`, both `YYYY-MM-DD`. */
export function daysBetween(from: string, to: string): number {
  return differenceInCalendarDays(parseISO(to), parseISO(from));
}
