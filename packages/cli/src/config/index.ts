export { tocmarkConfigSchema, type TocmarkConfig, type LoadedConfig } from './types.js';

export {
  getGlobalConfigDir,
  getGlobalConfigPath,
  getRepoLocalConfigPath,
  findConfigPath,
} from './paths.js';

export { loadConfig, loadConfigFromPath } from './store.js';
