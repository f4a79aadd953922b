/**
 * Citation Key Generator
 *
 * Derives short keys such as "Kohn1965" or "Kohn1965a" from the first
 * author's surname and the publication year.
 */

import { getYear, nextAuthor } from './fields.js';
import { DegenerateKeyError, InvalidYearError, MissingAuthorError } from './errors.js';
import type { TaggedRecord } from './types.js';

const YEAR_LENGTH = 4;
const MIN_KEY_LENGTH = YEAR_LENGTH + 1;
const KEY_CHARACTERS = /[0-9A-Za-z]/;
const MAX_SUFFIXES = 26;

/**
 * Keep only ASCII letters and digits, in order.
 */
export function filterKeyCharacters(value: string): string {
  return Array.from(value)
    .filter((ch) => KEY_CHARACTERS.test(ch))
    .join('');
}

/**
 * Number of issued keys whose prefix of the candidate's length equals the
 * candidate, ignoring case.
 */
export function countKeyCollisions(candidate: string, issuedKeys: Iterable<string>): number {
  const wanted = candidate.toUpperCase();
  let matches = 0;

  for (const key of issuedKeys) {
    if (key.slice(0, candidate.length).toUpperCase() === wanted) matches++;
  }

  return matches;
}

/**
 * Build the citation key for a new record.
 *
 * A candidate colliding with n earlier keys gets the n-th lowercase letter
 * appended. The suffixed key is not checked again, so a collision with an
 * already-suffixed key of a different base length is not resolved.
 */
export function generateCitationKey(record: TaggedRecord, issuedKeys: Iterable<string>): string {
  const firstAuthor = nextAuthor(record, 0).value;
  const commaIndex = firstAuthor.indexOf(',');
  const surname = commaIndex >= 0 ? firstAuthor.slice(0, commaIndex) : firstAuthor;
  if (surname.trim() === '') {
    throw new MissingAuthorError();
  }

  const year = getYear(record);
  if (year.length !== YEAR_LENGTH) {
    throw new InvalidYearError(year);
  }

  const candidate = filterKeyCharacters(surname + year);
  if (candidate.length < MIN_KEY_LENGTH) {
    throw new DegenerateKeyError(candidate, 'no usable surname characters');
  }

  const matches = countKeyCollisions(candidate, issuedKeys);
  if (matches === 0) return candidate;
  if (matches > MAX_SUFFIXES) {
    throw new DegenerateKeyError(
      candidate,
      `disambiguation suffixes a-z are used up (${matches} keys share this prefix)`
    );
  }

  return candidate + String.fromCharCode('a'.charCodeAt(0) + matches - 1);
}
