export {
  DEFAULT_POLICY,
  DEFAULT_SYSTEM_PROMPT,
  DEFAULT_CONFIG_PATHS,
  defaultConfig,
  type AppConfig
} from './defaults.js';
export { ConfigError, loadConfig, loadPolicy, parseConfig, parsePolicy } from './load.js';
