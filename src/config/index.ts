export {
  CONFIG_PATH_ENV,
  DATA_DIR_ENV,
  loadMeshConfig,
  validateConfig,
  getConfigValue,
  setConfigValue,
} from "./manager.js";
export type { ConfigChange, ConfigIssue } from "./manager.js";
