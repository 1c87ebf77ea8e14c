export { loadConfig, saveConfig, type LoadConfigOptions } from "./loader.js";
export {
  CONFIG_FILE_NAME,
  configFilePath,
  DEFAULT_ROOT_PATH,
  expandHomePath,
  resolveRootPath,
} from "./paths.js";
