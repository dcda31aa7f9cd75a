export {
  loadConfig,
  parseListenAddress,
  ConfigError,
  DEFAULT_HTTP_ADDR,
  DEFAULT_LOG_LEVEL,
} from './config.js';
export type { AppConfig, ListenAddress, LogLevel } from './config.js';
