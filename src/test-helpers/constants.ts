/**
 * Test Constants
 *
 * Centralized constants used across test files to avoid magic numbers
 * and improve maintainability.
 */

// Registry sizes
export const SMALL_TEST_CAPACITY = 2;
export const DEFAULT_TEST_CAPACITY = 1024;

// Output formatting
export const JOURNAL_LINE_WIDTH = 71;
export const DOI_URL_PREFIX = 'https://doi.org/';
export const TEST_DOI = '10.1000/test.2001.001';

// Default record field values used by buildRecord()
export const TEST_AUTHOR = 'Smith, J';
export const TEST_TITLE = 'A test article';
export const TEST_SOURCE = 'JOURNAL OF TESTING';
export const TEST_YEAR = '2001';
export const TEST_VOLUME = '12';
export const TEST_ISSUE = '3';
export const TEST_BEGIN_PAGE = '100';
export const TEST_END_PAGE = '110';

// Citation key shape for a valid record
export const CITATION_KEY_PATTERN = /^[A-Za-z]+[0-9]{4}[a-z]?$/;
