export { ConfigLoader, CONFIG_FILE_NAMES } from './loader.js';
export type { ResolveConfigOptions, ResolvedConfig } from './loader.js';
export { validateConfig } from './validator.js';
