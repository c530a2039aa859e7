export {
  loadYamlFile,
  resolveConfigPath,
  clearConfigCache,
  DEFAULT_CONFIG_FILENAME,
  CONFIG_PATH_ENV,
} from './yaml-config.js';
