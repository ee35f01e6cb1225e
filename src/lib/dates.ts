import { addDays as addCalendarDays, differenceInCalendarDays, format, isValid, parseISO } from "date-fns";

/* Calendar dates travel as "YYYY-MM-DD" strings and are parsed in local time,
   so day arithmetic never shifts across a UTC boundary. */

export type DateISO = string;

const DATE_ISO_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export const isDateISO = (value: string): boolean =>
  DATE_ISO_PATTERN.test(value) && isValid(parseISO(value));

export const toDate = (dateISO: DateISO): Date => parseISO(dateISO);

export const toDateISO = (date: Date): DateISO => format(date, "yyyy-MM-dd");

export const todayISO = (): DateISO => toDateISO(new Date());

export const addDays = (dateISO: DateISO, offset: number): DateISO =>
  toDateISO(addCalendarDays(toDate(dateISO), offset));

// daysBetween(a, b) is b - a in whole calendar days.
export const daysBetween = (from: DateISO, to: DateISO): number =>
  differenceInCalendarDays(toDate(to), toDate(from));

export const compareDates = (a: DateISO, b: DateISO): number => (a < b ? -1 : a > b ? 1 : 0);

export const dateRange = (startISO: DateISO, days: number): DateISO[] =>
  Array.from({ length: Math.max(0, days) }, (_, index) => addDays(startISO, index));

export const formatDate = (dateISO: DateISO, pattern: string): string => format(toDate(dateISO), pattern);
