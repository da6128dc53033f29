export { ConfigError } from '../errors.js';
export {
  DEFAULT_CONFIG_FILE,
  BACKUP_DIR_NAME,
  parseConfig,
  defaultConfig,
  loadConfig,
  mergeConfig,
  saveConfig,
} from './loader.js';
export type { SaveConfigOptions } from './loader.js';
export { pdfHarvestConfigSchema, DEFAULT_USER_AGENT, DEFAULT_ACCEPT } from './schema.js';
export type { PdfHarvestConfig, BrowserEngine } from './schema.js';
export {
  generateRandomUserAgent,
  generateSmartHeaders,
  generateDynamicConfig,
  applyConfigTemplate,
  isTemplateName,
  CONFIG_TEMPLATES,
  BROWSER_TYPES,
  LANGUAGES,
} from './dynamic.js';
export type {
  BrowserType,
  Language,
  RandomSource,
  TemplateName,
  DynamicConfigOptions,
} from './dynamic.js';
