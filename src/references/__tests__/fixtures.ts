/**
 * Test Fixtures for Reference Registry Tests
 *
 * Hand-written tagged records and export files.
 */

/**
 * Record with multi-line author, title and source runs.
 */
export const KOHN_SHAM_RECORD: readonly string[] = [
  'PT J',
  'AU Kohn, W',
  '   Sham, LJ',
  'TI Self-consistent equations including',
  '   exchange and correlation effects',
  'SO PHYSICAL REVIEW',
  '   SERIES II',
  'VL 140',
  'IS 4A',
  'BP A1133',
  'EP A1138',
  'PY 1965',
  'PD NOV 15',
];

export const KOHN_SHAM_DOI = '10.1103/PhysRev.140.A1133';

/**
 * Export file with header, two records, a blank separator and the EF marker.
 */
export const SAMPLE_EXPORT_FILE = [
  'FN Export File',
  'VR 1.0',
  'PT J',
  'AU Kohn, W',
  '   Sham, LJ',
  'PY 1965',
  `DI ${KOHN_SHAM_DOI}`,
  'ER',
  '',
  'PT J',
  'AU Becke, AD',
  'PY 1993',
  'ER',
  'EF',
].join('\n');

/**
 * Export file whose second record has a two-digit year.
 */
export const EXPORT_FILE_WITH_BAD_YEAR = [
  'AU Becke, AD',
  'TI Density-functional thermochemistry',
  'SO JOURNAL OF CHEMICAL PHYSICS',
  'PY 1993',
  'ER',
  'AU Lee, C',
  'PY 88',
  'ER',
  'AU Perdew, JP',
  'SO PHYSICAL REVIEW LETTERS',
  'PY 1996',
  'PD OCT 28',
  'ER',
].join('\n');
