/**
 * Reference Registry Types
 *
 * Core type definitions for tagged bibliographic records and the
 * references the registry builds from them.
 */

/**
 * A bibliographic entry in the tagged fixed-prefix format.
 *
 * Characters 1-3 of each line hold the field tag, the rest is content.
 * A line whose tag is three spaces continues the previous tagged field.
 */
export type TaggedRecord = readonly string[];

/**
 * Field tags understood by the extractors. Unknown tags are ignored.
 */
export const FieldTag = {
  AUTHOR: 'AU ',
  TITLE: 'TI ',
  SOURCE: 'SO ',
  YEAR: 'PY ',
  DATE: 'PD ',
  VOLUME: 'VL ',
  ISSUE: 'IS ',
  BEGIN_PAGE: 'BP ',
  END_PAGE: 'EP ',
  ARTICLE_NUMBER: 'AR ',
  DOI: 'DI ',
  CONTINUATION: '   ',
} as const;

export type FieldTagValue = (typeof FieldTag)[keyof typeof FieldTag];

/**
 * Result of a cursor-driven extraction (nextAuthor, nextTitle).
 * `value` is empty and `cursor` unchanged once the field is exhausted.
 */
export interface FieldCursorResult {
  value: string;
  cursor: number;
}

/**
 * A stored reference. Only `cited` changes after creation.
 */
export interface Reference {
  /** 1-based, dense, never reused within a registry lifetime */
  handle: number;
  record: TaggedRecord;
  /** DOI without the resolver prefix; empty when unknown */
  doi: string;
  cited: boolean;
  citationKey: string;
}

/**
 * A record read from an exported tagged-record file, with the DOI lifted
 * from its `DI` line when present.
 */
export interface ParsedRecord {
  record: TaggedRecord;
  doi: string;
}

/**
 * Registry configuration options
 */
export interface ReferenceRegistryOptions {
  /** Maximum number of references the registry accepts */
  capacity: number;
}

/**
 * Journal renderer options
 */
export interface JournalFormatOptions {
  /** Column budget per output line, indentation included */
  lineWidth: number;

  /** Prefix that turns a DOI into a resolvable link */
  doiUrlPrefix: string;
}

export const DEFAULT_REGISTRY_OPTIONS: ReferenceRegistryOptions = {
  capacity: 1024,
};

/** Narrowest column budget the journal renderer accepts */
export const MIN_JOURNAL_LINE_WIDTH = 20;

export const DEFAULT_JOURNAL_FORMAT_OPTIONS: JournalFormatOptions = {
  lineWidth: 71,
  doiUrlPrefix: 'https://doi.org/',
};
