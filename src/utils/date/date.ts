import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import { DateString } from './types';

dayjs.extend(utc);

export function formatDate(date: Date): DateString {
  return dayjs.utc(date).format('YYYY-MM-DD') as DateString;
}

/**
 * Parses a date or ISO timestamp string.
 *
 * @throws Error if the string is not a valid date
 */
export function parseDate(date: string): Date {
  const d = new Date(date);
  if (isNaN(d.getTime())) {
    throw new Error(`Invalid date '${date}'`);
  }
  return d;
}

/**
 * Midnight UTC of the current day
 */
export function startOfToday(): Date {
  return dayjs.utc().startOf('day').toDate();
}

export function maxDate(date1: Date, date2: Date): Date {
  return date1.getTime() >= date2.getTime() ? date1 : date2;
}

export function isBefore(date1: Date, date2: Date): boolean {
  return dayjs.utc(date1).isBefore(dayjs.utc(date2), 'day');
}

export function isSame(date1: Date, date2: Date): boolean {
  return dayjs.utc(date1).isSame(dayjs.utc(date2), 'day');
}

export function isBeforeOrSame(date1: Date, date2: Date): boolean {
  return isBefore(date1, date2) || isSame(date1, date2);
}

export function isAfter(date1: Date, date2: Date): boolean {
  return dayjs.utc(date1).isAfter(dayjs.utc(date2), 'day');
}

export function isAfterOrSame(date1: Date, date2: Date): boolean {
  return isAfter(date1, date2) || isSame(date1, date2);
}
