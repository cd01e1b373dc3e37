export { HARK_DIR, CONFIG_FILE, ensureHarkDir } from './paths.js';
export {
  loadConfig,
  saveConfig,
  updateConfig,
  setRuntimeOverride,
  resolveOllamaSettings,
  DEFAULT_OLLAMA_MODEL,
  type HarkConfig,
  type OllamaSettings
} from './manager.js';
export { getPackageVersion } from './version.js';
export { DEFAULT_RUNTIME_CONFIG, applyRuntimeConfigUpdate, type RuntimeConfig } from './runtime.js';
export { isRuntimeConfigKey, parseConfigValue, validateRuntimeValue } from './validator.js';
