/**
 * Test Data Builders
 *
 * Factory functions for creating tagged records with sensible defaults.
 * Override any field by passing a partial object; pass `undefined` to
 * leave a field out of the record.
 */

import {
  TEST_AUTHOR,
  TEST_BEGIN_PAGE,
  TEST_END_PAGE,
  TEST_ISSUE,
  TEST_SOURCE,
  TEST_TITLE,
  TEST_VOLUME,
  TEST_YEAR,
} from './constants.js';

export interface RecordFields {
  authors?: string[];
  title?: string[];
  source?: string[];
  date?: string;
  year?: string;
  volume?: string;
  issue?: string;
  beginPage?: string;
  endPage?: string;
  articleNumber?: string;
  doi?: string;
}

const DEFAULT_FIELDS: RecordFields = {
  authors: [TEST_AUTHOR],
  title: [TEST_TITLE],
  source: [TEST_SOURCE],
  year: TEST_YEAR,
  volume: TEST_VOLUME,
  issue: TEST_ISSUE,
  beginPage: TEST_BEGIN_PAGE,
  endPage: TEST_END_PAGE,
};

/**
 * Tagged lines for a multi-valued field: the first value carries the tag,
 * the rest are continuation lines.
 */
function taggedRun(tag: string, values: string[] | undefined): string[] {
  if (!values) return [];
  return values.map((value, index) => `${index === 0 ? tag : '   '}${value}`);
}

function taggedLine(tag: string, value: string | undefined): string[] {
  return value === undefined ? [] : [`${tag}${value}`];
}

/**
 * Build a tagged record. Lines come out in export order:
 * AU, TI, SO, PD, PY, VL, IS, BP, EP, AR, DI.
 */
export function buildRecord(overrides: Partial<RecordFields> = {}): string[] {
  const fields = { ...DEFAULT_FIELDS, ...overrides };

  return [
    ...taggedRun('AU ', fields.authors),
    ...taggedRun('TI ', fields.title),
    ...taggedRun('SO ', fields.source),
    ...taggedLine('PD ', fields.date),
    ...taggedLine('PY ', fields.year),
    ...taggedLine('VL ', fields.volume),
    ...taggedLine('IS ', fields.issue),
    ...taggedLine('BP ', fields.beginPage),
    ...taggedLine('EP ', fields.endPage),
    ...taggedLine('AR ', fields.articleNumber),
    ...taggedLine('DI ', fields.doi),
  ];
}
