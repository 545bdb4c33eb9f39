/**
 * @connect-migrator/cli
 */

export {
  configFileSchema,
  expandEnvPlaceholders,
  loadConfig,
  resolveConfig,
  type CliConfig,
  type ConfigFile,
} from './config.js';
export { readJsonFile, type JsonFileOptions } from './json-file.js';
export { runTranslation, type RunOptions } from './run.js';
