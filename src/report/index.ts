export { generateReport } from './generate.js';
export type { ReportConfig, ReportResult } from './generate.js';
