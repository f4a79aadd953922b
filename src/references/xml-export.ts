/**
 * XML Renderer
 *
 * Exports every reference, cited or not, as a root-less sequence of
 * <REFERENCE> elements. Callers add a document root when they need one.
 */

import {
  authors,
  getDay,
  getIssue,
  getMonth,
  getPages,
  getSource,
  getVolume,
  getYear,
  titleLines,
} from './fields.js';
import type { ReferenceRegistry } from './registry.js';
import { escapeXml } from '../utils/xml.js';

const REFERENCE_INDENT = ' ';
const FIELD_INDENT = '  ';

function element(name: string, value: string): string {
  return `${FIELD_INDENT}<${name}>${escapeXml(value)}</${name}>`;
}

/**
 * Lines of one <REFERENCE> element.
 */
export function formatReferenceXml(registry: ReferenceRegistry, handle: number): string[] {
  const record = registry.record(handle);
  const title = Array.from(titleLines(record), (line) => line.trim()).join(' ');

  return [
    `${REFERENCE_INDENT}<REFERENCE key="${escapeXml(registry.citationKey(handle))}">`,
    ...Array.from(authors(record), (name) => element('AUTHOR', name.trim())),
    element('DOI', registry.doi(handle).trim()),
    element('SOURCE', getSource(record)),
    element('VOLUME', getVolume(record)),
    element('ISSUE', getIssue(record)),
    element('PAGES', getPages(record)),
    element('YEAR', getYear(record)),
    element('MONTH', getMonth(record)),
    element('DAY', getDay(record).trimStart()),
    element('TITLE', title),
    `${REFERENCE_INDENT}</REFERENCE>`,
  ];
}

/**
 * All references in handle order.
 */
export function exportReferencesAsXml(registry: ReferenceRegistry): string {
  return registry
    .handles()
    .flatMap((handle) => formatReferenceXml(registry, handle))
    .map((line) => `${line}\n`)
    .join('');
}
