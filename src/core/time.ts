/**
 * Time utilities for consistent date handling
 */

import {
  differenceInCalendarDays,
  format,
  isValid,
  parseISO,
  startOfDay,
  subDays,
} from 'date-fns';
import type { HistoryPeriod } from './config';

export function formatDate(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

/** Parses YYYY-MM-DD or a full ISO timestamp; null when unparseable. */
export function parseDate(dateStr: string | null | undefined): Date | null {
  if (!dateStr) return null;
  const parsed = parseISO(dateStr);
  return isValid(parsed) ? parsed : null;
}

/**
 * Calendar days from `now` until `target`. Negative when the date has passed.
 */
export function daysUntil(target: Date | string, now: Date = new Date()): number | null {
  const date = typeof target === 'string' ? parseDate(target) : target;
  if (!date || !isValid(date)) return null;
  return differenceInCalendarDays(startOfDay(date), startOfDay(now));
}

/** Scan record id: YYYYMMDD_HHMMSS_<suffix>. */
export function getScanId(date: Date, suffix: string): string {
  return `${format(date, 'yyyyMMdd_HHmmss')}_${suffix}`;
}

export function daysAgo(days: number, now: Date = new Date()): Date {
  return subDays(now, days);
}

/** Option expiry as the OCC YYMMDD segment. */
export function formatOccDate(expiry: string): string | null {
  const date = parseDate(expiry);
  return date ? format(date, 'yyMMdd') : null;
}

export const PERIOD_DAYS: Record<HistoryPeriod, number> = {
  '1mo': 30,
  '3mo': 90,
  '6mo': 180,
  '1y': 365,
  '2y': 730,
  '5y': 1825,
};
