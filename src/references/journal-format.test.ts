/**
 * Unit tests for the journal-style text renderer
 *
 * Expected lines are traced by hand against the 71-column budget with a
 * one-space indent.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { formatJournalEntry, formatJournalLine, renderCitedReferences } from './journal-format.js';
import { ReferenceRegistry } from './registry.js';
import { KOHN_SHAM_DOI, KOHN_SHAM_RECORD } from './__tests__/fixtures.js';
import { buildRecord, DOI_URL_PREFIX, JOURNAL_LINE_WIDTH, TEST_DOI } from '../test-helpers/index.js';

describe('formatJournalLine', () => {
  it('formats source, volume, issue, pages and year', () => {
    expect(formatJournalLine(buildRecord())).toBe('JOURNAL OF TESTING, 12 (3), 100-110 (2001).');
  });

  it('drops missing parts with their separators', () => {
    const record = buildRecord({
      source: ['J TEST'],
      volume: undefined,
      issue: undefined,
      beginPage: undefined,
      endPage: undefined,
    });
    expect(formatJournalLine(record)).toBe('J TEST (2001).');
  });

  it('keeps an issue without a volume', () => {
    const record = buildRecord({
      source: ['J TEST'],
      volume: undefined,
      issue: '5',
      beginPage: '7',
      endPage: undefined,
    });
    expect(formatJournalLine(record)).toBe('J TEST, (5), 7 (2001).');
  });

  it('uses the article number as pages', () => {
    const record = buildRecord({ beginPage: undefined, endPage: undefined, articleNumber: 'e12345' });
    expect(formatJournalLine(record)).toBe('JOURNAL OF TESTING, 12 (3), e12345 (2001).');
  });

  it('is empty when the record has no journal fields', () => {
    expect(formatJournalLine(['AU Smith, J'])).toBe('');
  });
});

describe('formatJournalEntry', () => {
  let registry: ReferenceRegistry;

  beforeEach(() => {
    registry = new ReferenceRegistry();
  });

  it('keeps a short entry on two lines', () => {
    const handle = registry.add(buildRecord());

    expect(formatJournalEntry(registry, handle)).toEqual([
      ' Smith, J. JOURNAL OF TESTING, 12 (3), 100-110 (2001).',
      ' A test article.',
    ]);
  });

  it('moves the journal to its own line when it does not fit, and links the DOI', () => {
    const handle = registry.add(KOHN_SHAM_RECORD, KOHN_SHAM_DOI);

    expect(formatJournalEntry(registry, handle)).toEqual([
      ' Kohn, W; Sham, LJ.',
      ' PHYSICAL REVIEW SERIES II, 140 (4A), A1133-A1138 (1965).',
      ' Self-consistent equations including exchange and correlation effects.',
      ' https://doi.org/10.1103/PhysRev.140.A1133',
    ]);
  });

  it('wraps long author lists onto indented lines', () => {
    const authorNames = Array.from({ length: 10 }, (_, i) => `Author${String.fromCharCode(65 + i)}, XY`);
    const handle = registry.add(buildRecord({ authors: authorNames }));

    expect(formatJournalEntry(registry, handle)).toEqual([
      ' AuthorA, XY; AuthorB, XY; AuthorC, XY; AuthorD, XY; AuthorE, XY;',
      ' AuthorF, XY; AuthorG, XY; AuthorH, XY; AuthorI, XY; AuthorJ, XY.',
      ' JOURNAL OF TESTING, 12 (3), 100-110 (2001).',
      ' A test article.',
    ]);
  });

  it('wraps before an author whose closing separator would pass the last column', () => {
    const handle = registry.add(
      buildRecord({ authors: ['Abcdefghij, X', `${'B'.repeat(52)}, Y`, 'Cole, Z'] })
    );
    const lines = formatJournalEntry(registry, handle);

    expect(lines.slice(0, 2)).toEqual([
      ' Abcdefghij, X;',
      ` ${'B'.repeat(52)}, Y; Cole, Z.`,
    ]);
    expect(Math.max(...lines.map((line) => line.length))).toBeLessThanOrEqual(JOURNAL_LINE_WIDTH);
  });

  it('lets the last author end with its period exactly at the last column', () => {
    const handle = registry.add(buildRecord({ authors: ['Abcdefghij, X', `${'B'.repeat(51)}, Y`] }));
    const lines = formatJournalEntry(registry, handle);

    expect(lines[0]).toBe(` Abcdefghij, X; ${'B'.repeat(51)}, Y.`);
    expect(lines[0]).toHaveLength(JOURNAL_LINE_WIDTH);
    expect(lines[1]).toBe(' JOURNAL OF TESTING, 12 (3), 100-110 (2001).');
  });

  it('rejects a line width that is too small or not an integer', () => {
    const handle = registry.add(buildRecord());

    for (const lineWidth of [0, -5, 19, 40.5]) {
      expect(() =>
        formatJournalEntry(registry, handle, { lineWidth, doiUrlPrefix: DOI_URL_PREFIX })
      ).toThrow(RangeError);
    }
    expect(() =>
      renderCitedReferences(registry, { lineWidth: 0, doiUrlPrefix: DOI_URL_PREFIX })
    ).toThrow(RangeError);
  });

  it('hard-splits a journal string longer than a whole line', () => {
    const handle = registry.add(buildRecord({ source: ['A'.repeat(80)] }));

    expect(formatJournalEntry(registry, handle)).toEqual([
      ' Smith, J.',
      ` ${'A'.repeat(69)}`,
      ` ${'A'.repeat(11)}, 12 (3), 100-110 (2001).`,
      ' A test article.',
    ]);
  });

  it('joins title lines and word-wraps the result', () => {
    const handle = registry.add(
      buildRecord({
        title: [
          'Alpha beta gamma delta epsilon zeta eta theta iota kappa lambda mu nu xi',
          'omicron pi rho sigma tau',
        ],
      })
    );

    expect(formatJournalEntry(registry, handle).slice(1)).toEqual([
      ' Alpha beta gamma delta epsilon zeta eta theta iota kappa lambda mu nu',
      ' xi omicron pi rho sigma tau.',
    ]);
  });

  it('omits the title line when there is no title', () => {
    const handle = registry.add(buildRecord({ title: undefined }));
    expect(formatJournalEntry(registry, handle)).toEqual([
      ' Smith, J. JOURNAL OF TESTING, 12 (3), 100-110 (2001).',
    ]);
  });

  it('uses the configured DOI prefix and splits at the configured width', () => {
    const handle = registry.add(buildRecord(), TEST_DOI);

    expect(
      formatJournalEntry(registry, handle, { lineWidth: 40, doiUrlPrefix: 'https://dx.example.org/' })
    ).toEqual([
      ' Smith, J.',
      ' JOURNAL OF TESTING, 12 (3), 100-110 (2',
      ' 001).',
      ' A test article.',
      ' https://dx.example.org/10.1000/test.2001.001',
    ]);
  });
});

describe('renderCitedReferences', () => {
  it('renders only cited references, newest first, separated by blank lines', () => {
    const registry = new ReferenceRegistry();
    const old = registry.add(buildRecord({ authors: ['Old, A'], year: '1999' }));
    const recent = registry.add(buildRecord({ authors: ['New, B'], year: '2005', date: 'MAR' }));
    registry.add(buildRecord({ authors: ['Skipped, C'], year: '2010' }));
    registry.cite(old);
    registry.cite(recent);

    expect(renderCitedReferences(registry)).toBe(
      ' New, B. JOURNAL OF TESTING, 12 (3), 100-110 (2005).\n' +
        ' A test article.\n' +
        '\n' +
        ' Old, A. JOURNAL OF TESTING, 12 (3), 100-110 (1999).\n' +
        ' A test article.\n' +
        '\n'
    );
  });

  it('renders nothing when nothing is cited', () => {
    const registry = new ReferenceRegistry();
    registry.add(buildRecord());
    expect(renderCitedReferences(registry)).toBe('');
  });

  it('defaults to the 71-column layout', () => {
    const registry = new ReferenceRegistry();
    registry.cite(registry.add(KOHN_SHAM_RECORD, KOHN_SHAM_DOI));

    const lines = renderCitedReferences(registry, {
      lineWidth: JOURNAL_LINE_WIDTH,
      doiUrlPrefix: DOI_URL_PREFIX,
    }).split('\n');
    expect(Math.max(...lines.map((line) => line.length))).toBeLessThanOrEqual(JOURNAL_LINE_WIDTH);
    expect(lines).toContain(` ${DOI_URL_PREFIX}${KOHN_SHAM_DOI}`);
  });
});
