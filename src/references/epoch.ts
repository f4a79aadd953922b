/**
 * Epoch Ranking
 *
 * Publication dates folded into one integer for chronological ordering.
 * The value only orders records; it is not a real calendar day count.
 */

import { getDay, getMonth, getMonthNumber, getYear, parseLeadingInteger } from './fields.js';
import type { TaggedRecord } from './types.js';

const BASE_YEAR = 1900;
const DAYS_PER_MONTH = 31;
const DAYS_PER_YEAR = 12 * DAYS_PER_MONTH;

/**
 * day + 31*month + 372*(year-1900). Missing parts count as year 1900,
 * month 0, day 0.
 */
export function getEpoch(record: TaggedRecord): number {
  const year = parseLeadingInteger(getYear(record)) ?? BASE_YEAR;
  const day = parseLeadingInteger(getDay(record)) ?? 0;
  const month = getMonthNumber(getMonth(record));

  return day + DAYS_PER_MONTH * month + DAYS_PER_YEAR * (year - BASE_YEAR);
}

/**
 * Order items newest first. Items with equal epochs keep their input order.
 */
export function sortByEpochDescending<T>(items: readonly T[], recordOf: (item: T) => TaggedRecord): T[] {
  return items
    .map((item, index) => ({ item, index, epoch: getEpoch(recordOf(item)) }))
    .sort((a, b) => b.epoch - a.epoch || a.index - b.index)
    .map(({ item }) => item);
}
