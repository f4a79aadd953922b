#!/usr/bin/env node
import 'dotenv/config';
import { readFile, writeFile } from 'fs/promises';
import { validateEnv, buildConfig } from './config/index.js';
import { generateReport } from './report/index.js';

async function main(): Promise<void> {
  const CONFIG = buildConfig(validateEnv());

  const text = await readFile(CONFIG.referencesFile, 'utf-8');
  const report = generateReport(CONFIG, text);

  if (!CONFIG.outputFile) {
    process.stdout.write(report.output);
    return;
  }

  await writeFile(CONFIG.outputFile, report.output, 'utf-8');
  console.log(
    `[Report] ${report.loaded} references loaded, ${report.skipped} skipped, ` +
      `${report.cited} cited -> ${CONFIG.outputFile} (${CONFIG.outputFormat})`
  );
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
