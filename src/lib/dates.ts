import { addDays, differenceInCalendarDays, format, getISOWeek, isValid, parseISO } from 'date-fns';

/** Calendar dates are carried as `YYYY-MM-DD` strings everywhere (see db.ts). */
export type IsoDate = string;

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function isIsoDate(value: string): boolean {
  return ISO_DATE_PATTERN.test(value) && isValid(parseISO(value));
}

export function toIsoDate(date: Date): IsoDate {
  return format(date, 'yyyy-MM-dd');
}

export function parseIsoDate(value: IsoDate): Date {
  const parsed = parseISO(value);
  if (!ISO_DATE_PATTERN.test(value) || !isValid(parsed)) {
    throw new Error(`INVALID_ISO_DATE: ${value}`);
  }
  return parsed;
}

export function addIsoDays(value: IsoDate, days: number): IsoDate {
  return toIsoDate(addDays(parseIsoDate(value), days));
}

/** Whole days from `from` to `to` (positive when `to` is later). */
export function diffIsoDays(to: IsoDate, from: IsoDate): number {
  return differenceInCalendarDays(parseIsoDate(to), parseIsoDate(from));
}

/** 0 = Monday … 6 = Sunday. */
export function mondayBasedWeekday(value: IsoDate): number {
  return (parseIsoDate(value).getDay() + 6) % 7;
}

export function isoWeekOfYear(value: IsoDate): number {
  return getISOWeek(parseIsoDate(value));
}

export function calendarParts(value: IsoDate): { year: number; month: number; day: number } {
  const date = parseIsoDate(value);
  return { year: date.getFullYear(), month: date.getMonth() + 1, day: date.getDate() };
}
