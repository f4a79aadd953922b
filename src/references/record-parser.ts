/**
 * Tagged Record File Parser
 *
 * Splits an exported tagged-record file into records:
 *
 *   FN Export File
 *   VR 1.0
 *   PT J
 *   AU Kohn, W
 *      Sham, LJ
 *   ...
 *   ER
 *   EF
 *
 * Record lines are kept verbatim so the field extractors see the original
 * tags and continuation lines.
 */

import { contentOf, tagOf } from './fields.js';
import { FieldTag } from './types.js';
import type { ParsedRecord } from './types.js';

/** File header tags, not part of any record */
const HEADER_TAGS = new Set(['FN ', 'VR ']);
const END_OF_RECORD = 'ER ';
const END_OF_FILE = 'EF ';

function toParsedRecord(lines: string[]): ParsedRecord {
  let doi = '';
  for (const line of lines) {
    if (tagOf(line) === FieldTag.DOI) doi = contentOf(line).trim();
  }
  return { record: Object.freeze([...lines]), doi };
}

export function parseTaggedRecords(text: string): ParsedRecord[] {
  const records: ParsedRecord[] = [];
  let current: string[] = [];

  const flush = (): void => {
    if (current.length > 0) records.push(toParsedRecord(current));
    current = [];
  };

  for (const line of text.split(/\r?\n/)) {
    if (line.trim() === '') continue;

    const tag = tagOf(line);
    if (HEADER_TAGS.has(tag)) continue;
    if (tag === END_OF_RECORD || tag === END_OF_FILE) {
      flush();
      continue;
    }

    current.push(line);
  }

  // Last record may lack its ER line
  flush();
  return records;
}
