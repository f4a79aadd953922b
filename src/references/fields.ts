/**
 * Record Field Extractor
 *
 * Pure lookups over a tagged record. Nothing here throws: a missing or
 * malformed field comes back as an empty string.
 */

import { FieldTag } from './types.js';
import type { FieldCursorResult, FieldTagValue, TaggedRecord } from './types.js';

const TAG_LENGTH = 3;

/**
 * Month abbreviations as they appear at the start of a `PD` field.
 * Matching is case-sensitive.
 */
export const MONTH_ABBREVIATIONS = [
  'JAN', 'FEB', 'MAR', 'APR', 'MAY', 'JUN',
  'JUL', 'AUG', 'SEP', 'OCT', 'NOV', 'DEC',
] as const;

export type MonthAbbreviation = (typeof MONTH_ABBREVIATIONS)[number];

const MAX_DAY = 31;

/**
 * The 3-character tag of a line, right-padded with spaces when the line is shorter.
 */
export function tagOf(line: string): string {
  return line.slice(0, TAG_LENGTH).padEnd(TAG_LENGTH, ' ');
}

/**
 * Line content after the tag, without trailing padding.
 */
export function contentOf(line: string): string {
  return line.slice(TAG_LENGTH).trimEnd();
}

/**
 * Return the next line at or after `cursor` that belongs to a run of `tag`
 * lines (the tagged line itself plus any continuation lines following it).
 */
function nextInRun(record: TaggedRecord, cursor: number, tag: FieldTagValue): FieldCursorResult {
  let inRun = false;

  for (let i = 0; i < record.length; i++) {
    const lineTag = tagOf(record[i]);
    if (lineTag === tag) {
      inRun = true;
    } else if (lineTag !== FieldTag.CONTINUATION) {
      inRun = false;
    }

    if (inRun && i >= cursor) {
      return { value: contentOf(record[i]), cursor: i + 1 };
    }
  }

  return { value: '', cursor };
}

/**
 * Content of the last line carrying `tag`; later lines override earlier ones.
 */
function lastValue(record: TaggedRecord, tag: FieldTagValue): string {
  let value = '';
  for (const line of record) {
    if (tagOf(line) === tag) value = contentOf(line);
  }
  return value;
}

export function nextAuthor(record: TaggedRecord, cursor: number): FieldCursorResult {
  return nextInRun(record, cursor, FieldTag.AUTHOR);
}

/**
 * Next title line. Callers join successive lines with single spaces.
 */
export function nextTitle(record: TaggedRecord, cursor: number): FieldCursorResult {
  return nextInRun(record, cursor, FieldTag.TITLE);
}

function* walkRun(
  record: TaggedRecord,
  next: (record: TaggedRecord, cursor: number) => FieldCursorResult
): Generator<string> {
  let cursor = 0;
  for (;;) {
    const result = next(record, cursor);
    if (result.value === '') return;
    yield result.value;
    cursor = result.cursor;
  }
}

/**
 * Author lines in order. Stops at the first blank entry.
 */
export function authors(record: TaggedRecord): Generator<string> {
  return walkRun(record, nextAuthor);
}

/**
 * Title lines in order. Stops at the first blank entry.
 */
export function titleLines(record: TaggedRecord): Generator<string> {
  return walkRun(record, nextTitle);
}

/**
 * Journal/source name, including the continuation lines of its run.
 */
export function getSource(record: TaggedRecord): string {
  let source = '';

  for (let i = 0; i < record.length; i++) {
    if (tagOf(record[i]) !== FieldTag.SOURCE) continue;

    const parts = [contentOf(record[i])];
    for (let j = i + 1; j < record.length && tagOf(record[j]) === FieldTag.CONTINUATION; j++) {
      parts.push(contentOf(record[j]).trimStart());
    }
    source = parts.join(' ');
  }

  return source;
}

export function getYear(record: TaggedRecord): string {
  return lastValue(record, FieldTag.YEAR);
}

export function getVolume(record: TaggedRecord): string {
  return lastValue(record, FieldTag.VOLUME);
}

export function getIssue(record: TaggedRecord): string {
  return lastValue(record, FieldTag.ISSUE);
}

/**
 * Page range "BP-EP", the begin page alone, or the article number when
 * no begin page is recorded.
 */
export function getPages(record: TaggedRecord): string {
  const beginPage = lastValue(record, FieldTag.BEGIN_PAGE);
  const endPage = lastValue(record, FieldTag.END_PAGE);
  const articleNumber = lastValue(record, FieldTag.ARTICLE_NUMBER);

  if (beginPage !== '') {
    return endPage !== '' ? `${beginPage}-${endPage}` : beginPage;
  }
  return articleNumber;
}

function isMonthAbbreviation(value: string): value is MonthAbbreviation {
  return (MONTH_ABBREVIATIONS as readonly string[]).includes(value);
}

/**
 * Three-letter month from the `PD` field, or '' when it is not one of
 * MONTH_ABBREVIATIONS.
 */
export function getMonth(record: TaggedRecord): MonthAbbreviation | '' {
  const month = lastValue(record, FieldTag.DATE).slice(0, 3);
  return isMonthAbbreviation(month) ? month : '';
}

/**
 * 1-12 for a recognised month abbreviation, 0 otherwise.
 */
export function getMonthNumber(month: string): number {
  return isMonthAbbreviation(month) ? MONTH_ABBREVIATIONS.indexOf(month) + 1 : 0;
}

/**
 * First whitespace- or comma-separated token of a field as a signed integer.
 */
export function parseLeadingInteger(value: string): number | undefined {
  const token = value.trim().split(/[\s,]+/)[0];
  if (!/^[+-]?\d+$/.test(token)) return undefined;
  return Number.parseInt(token, 10);
}

/**
 * Text of the `PD` field after the month ("OCT 27" gives " 27").
 * Empty unless it starts with an integer in [0, 31].
 */
export function getDay(record: TaggedRecord): string {
  const day = lastValue(record, FieldTag.DATE).slice(3);
  const parsed = parseLeadingInteger(day);

  if (parsed === undefined || parsed < 0 || parsed > MAX_DAY) return '';
  return day;
}
