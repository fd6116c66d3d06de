// packages/core/src/config/index.ts -- barrel re-export

export { DEFAULT_CONFIG } from './defaults.js';
export { clientConfigSchema, validateConfig } from './schema.js';
export type { ClientConfigInput } from './schema.js';
export { loadConfig, writeConfig, deepMerge, CONFIG_FILENAME } from './loader.js';
export { resolveConnection, selectProfile, ENV_HOST, ENV_PORT, ENV_USER, ENV_PASSWORD } from './profiles.js';
