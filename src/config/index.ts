/**
 * Configuration module exports
 */

export {
  CONFIG_FILE_NAME,
  DEFAULT_AUTOLOAD_PATHS,
  defaultProjectConfig,
  loadProjectConfig,
  parseProjectConfig,
} from './ProjectConfig.js';
export type { ProjectConfig } from './ProjectConfig.js';
