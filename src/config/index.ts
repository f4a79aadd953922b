export { validateEnv, buildConfig } from './env.js';
export type { ValidatedEnv, AppConfig } from './env.js';
