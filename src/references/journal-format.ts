/**
 * Journal-Style Text Renderer
 *
 * Prints cited references newest first as plain-text paragraphs:
 *
 *   Author, A.; Author, B. Journal, 12 (3), 100-110 (2001).
 *   Title of the article.
 *   https://doi.org/10.1000/example
 *
 * Lines are indented by one space and kept within the column budget.
 */

import { authors, getIssue, getPages, getSource, getVolume, getYear, titleLines } from './fields.js';
import { rankByEpoch } from './registry.js';
import type { ReferenceRegistry } from './registry.js';
import { DEFAULT_JOURNAL_FORMAT_OPTIONS, MIN_JOURNAL_LINE_WIDTH } from './types.js';
import type { JournalFormatOptions, TaggedRecord } from './types.js';

const INDENT = ' ';

/**
 * Accumulates output lines and tracks the current column.
 */
class LineWriter {
  readonly lines: string[] = [];
  private current = INDENT;

  constructor(private readonly width: number) {}

  get column(): number {
    return this.current.length;
  }

  get atLineStart(): boolean {
    return this.current === INDENT;
  }

  fits(text: string): boolean {
    return this.current.length + text.length <= this.width;
  }

  write(text: string): void {
    this.current += text;
  }

  endLine(): void {
    if (this.atLineStart) return;
    this.lines.push(this.current.trimEnd());
    this.current = INDENT;
  }
}

/**
 * "source, volume (issue), pages (year)." with empty parts and their
 * separators left out.
 */
export function formatJournalLine(record: TaggedRecord): string {
  const volume = getVolume(record);
  const issue = getIssue(record);
  const year = getYear(record);

  let volumeIssue = volume;
  if (issue !== '') {
    volumeIssue = volume !== '' ? `${volume} (${issue})` : `(${issue})`;
  }

  let journal = [getSource(record), volumeIssue, getPages(record)]
    .filter((part) => part !== '')
    .join(', ');
  if (year !== '') {
    journal = journal !== '' ? `${journal} (${year})` : `(${year})`;
  }

  return journal !== '' ? `${journal}.` : '';
}

function writeAuthors(writer: LineWriter, names: string[]): void {
  names.forEach((name, index) => {
    if (index === 0) {
      writer.write(name);
    } else if (writer.fits(`; ${name};`)) {
      // room is kept for the ';' or '.' that closes the name
      writer.write(`; ${name}`);
    } else {
      writer.write(';');
      writer.endLine();
      writer.write(name);
    }
  });

  if (names.length > 0) writer.write('. ');
}

function writeJournal(writer: LineWriter, journal: string, width: number): void {
  if (journal === '') return;

  if (!writer.fits(journal) && !writer.atLineStart) {
    writer.endLine();
  }

  // Too long for a fresh line too: cut at a fixed offset
  const hardSplit = Math.max(1, width - 2);
  let rest = journal;
  while (!writer.fits(rest)) {
    writer.write(rest.slice(0, hardSplit));
    writer.endLine();
    rest = rest.slice(hardSplit);
  }
  writer.write(rest);
}

function writeWrapped(writer: LineWriter, text: string): void {
  for (const word of text.split(/\s+/).filter((w) => w !== '')) {
    if (writer.atLineStart) {
      writer.write(word);
    } else if (writer.fits(` ${word}`)) {
      writer.write(` ${word}`);
    } else {
      writer.endLine();
      writer.write(word);
    }
  }
}

function assertLineWidth(lineWidth: number): void {
  if (!Number.isInteger(lineWidth) || lineWidth < MIN_JOURNAL_LINE_WIDTH) {
    throw new RangeError(
      `Line width must be an integer of at least ${MIN_JOURNAL_LINE_WIDTH}, got ${lineWidth}`
    );
  }
}

/**
 * Lines for one reference, without the blank separator line.
 */
export function formatJournalEntry(
  registry: ReferenceRegistry,
  handle: number,
  options: JournalFormatOptions = DEFAULT_JOURNAL_FORMAT_OPTIONS
): string[] {
  assertLineWidth(options.lineWidth);
  const record = registry.record(handle);
  const writer = new LineWriter(options.lineWidth);

  writeAuthors(writer, Array.from(authors(record), (name) => name.trim()));
  writeJournal(writer, formatJournalLine(record), options.lineWidth);
  writer.endLine();

  const title = Array.from(titleLines(record), (line) => line.trim()).join(' ');
  if (title !== '') {
    writeWrapped(writer, `${title}.`);
    writer.endLine();
  }

  const doi = registry.doi(handle).trim();
  if (doi !== '') {
    writer.lines.push(`${INDENT}${options.doiUrlPrefix}${doi}`);
  }

  return writer.lines;
}

/**
 * Every cited reference, newest first, each followed by a blank line.
 */
export function renderCitedReferences(
  registry: ReferenceRegistry,
  options: JournalFormatOptions = DEFAULT_JOURNAL_FORMAT_OPTIONS
): string {
  assertLineWidth(options.lineWidth);
  const lines: string[] = [];

  for (const handle of rankByEpoch(registry)) {
    if (!registry.isCited(handle)) continue;
    lines.push(...formatJournalEntry(registry, handle, options), '');
  }

  return lines.map((line) => `${line}\n`).join('');
}
