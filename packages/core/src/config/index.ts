export {
  loadConfig, parseConfig, defaultConfig, resolveDataFile, expandHome,
  getDefaultConfigPath, getConfigDir, getDefaultDataFile, KelvinConfigSchema, DEFAULT_THAW_DAYS,
} from './config.js';
export type { KelvinConfig } from './config.js';
