// packages/core/src/config/index.ts -- barrel re-export

export { DEFAULT_CONFIG } from './defaults.js';
export { projectConfigSchema, validateConfig } from './schema.js';
export type { ProjectConfigInput } from './schema.js';
export { loadConfig, writeConfig, deepMerge } from './loader.js';
export type { ConfigOverrides } from './loader.js';
