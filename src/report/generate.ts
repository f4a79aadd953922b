/**
 * Report Generation
 *
 * Loads an exported tagged-record file into a fresh registry, cites the
 * requested references and renders them.
 */

import {
  ReferenceRegistry,
  exportReferencesAsXml,
  loadReferences,
  parseTaggedRecords,
  renderCitedReferences,
} from '../references/index.js';
import type { AppConfig } from '../config/index.js';

export type ReportConfig = Pick<AppConfig, 'capacity' | 'citeKeys' | 'outputFormat' | 'journal'>;

export interface ReportResult {
  output: string;
  loaded: number;
  skipped: number;
  cited: number;
  /** Requested keys that matched no loaded reference */
  unknownKeys: string[];
}

export function generateReport(config: ReportConfig, text: string): ReportResult {
  const registry = new ReferenceRegistry({ capacity: config.capacity });
  const { handles, skipped } = loadReferences(registry, parseTaggedRecords(text));

  const unknownKeys: string[] = [];
  if (config.citeKeys.length === 0) {
    handles.forEach((handle) => registry.cite(handle));
  } else {
    for (const key of config.citeKeys) {
      const handle = registry.handleForKey(key);
      if (handle === undefined) {
        console.warn(`[Report] Unknown citation key: ${key}`);
        unknownKeys.push(key);
        continue;
      }
      registry.cite(handle);
    }
  }

  const output =
    config.outputFormat === 'xml'
      ? `<REFERENCES>\n${exportReferencesAsXml(registry)}</REFERENCES>\n`
      : renderCitedReferences(registry, config.journal);

  return {
    output,
    loaded: handles.length,
    skipped: skipped.length,
    cited: registry.citedHandles().length,
    unknownKeys,
  };
}
