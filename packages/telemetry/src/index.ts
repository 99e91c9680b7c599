export { configureLogger, getLogger } from './logger.js'
/** @internal Reset all logger state. For test teardown only. */
export { resetLogger } from './logger.js'
export type { LoggerConfig } from './logger.js'
export {
  ROOT_CATEGORY,
  VALID_LOG_LEVELS,
  VALID_ENVIRONMENTS,
  validateLogLevel,
  validateEnvironment,
} from './constants.js'
export type { LogLevel, Environment } from './constants.js'
