/**
 * Environment Variable Validation
 *
 * Validates and types all environment variables at startup using Zod.
 * This ensures invalid config values are caught early with clear error messages.
 */

import { z } from 'zod';
import { resolve } from 'path';
import { MIN_JOURNAL_LINE_WIDTH } from '../references/index.js';

/**
 * Report output formats
 */
const OutputFormatSchema = z.enum(['journal', 'xml']);

const positiveInteger = z
  .string()
  .regex(/^\d+$/)
  .transform(Number)
  .refine((n) => n > 0, 'must be greater than zero');

/**
 * Environment variable schema with defaults and validation
 */
const envSchema = z.object({
  // Input
  REFERENCES_FILE: z.string().min(1).default('references.txt'),
  CITE_KEYS: z.string().default(''),

  // Registry
  MAX_REFERENCES: positiveInteger.default('1024'),

  // Output
  OUTPUT_FORMAT: OutputFormatSchema.default('journal'),
  LINE_WIDTH: positiveInteger
    .refine((n) => n >= MIN_JOURNAL_LINE_WIDTH, `must be at least ${MIN_JOURNAL_LINE_WIDTH}`)
    .default('71'),
  DOI_URL_PREFIX: z.string().url().default('https://doi.org/'),
  OUTPUT_FILE: z.string().optional(),
});

/**
 * Parsed and validated environment type
 */
export type ValidatedEnv = z.infer<typeof envSchema>;

/**
 * Validate environment variables at startup.
 * Throws with detailed messages logged if validation fails.
 */
export function validateEnv(): ValidatedEnv {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    console.error('[Config] Environment variable validation failed:');
    for (const issue of result.error.issues) {
      console.error(`  - ${issue.path.join('.')}: ${issue.message}`);
    }
    throw new Error('Invalid environment configuration. See errors above.');
  }

  return result.data;
}

/**
 * Build the CONFIG object from validated environment variables.
 */
export function buildConfig(env: ValidatedEnv) {
  return {
    referencesFile: resolve(process.cwd(), env.REFERENCES_FILE),
    // Empty means "cite everything that was loaded"
    citeKeys: env.CITE_KEYS.split(',')
      .map((key) => key.trim())
      .filter((key) => key !== ''),

    capacity: env.MAX_REFERENCES,

    outputFormat: env.OUTPUT_FORMAT,
    journal: {
      lineWidth: env.LINE_WIDTH,
      doiUrlPrefix: env.DOI_URL_PREFIX,
    },
    // Empty means stdout
    outputFile: env.OUTPUT_FILE ? resolve(process.cwd(), env.OUTPUT_FILE) : '',
  };
}

export type AppConfig = ReturnType<typeof buildConfig>;
