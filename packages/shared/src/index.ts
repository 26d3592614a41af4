/**
 * Shared package
 * Environment access, structured logging and schema validation helpers
 */

export { getEnv, getEnvRecord, isProduction } from './env'
export {
  createLogger,
  getLogLevel,
  type LogLevel,
  type Logger,
  type LoggerConfig,
} from './logger'
export {
  expectValid,
  formatZodError,
  isValidationError,
  ValidationError,
} from './validation'
