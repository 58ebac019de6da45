export { configureLogger, resetLogger, getLogger, formatMessage, toJsonLine } from './logger.js'
export type { LoggerConfig, Logger } from './logger.js'
export {
  ROOT_CATEGORY,
  VALID_LOG_LEVELS,
  VALID_ENVIRONMENTS,
  isLogLevel,
  validateLogLevel,
  validateEnvironment,
} from './constants.js'
export type { LogLevel, Environment } from './constants.js'
