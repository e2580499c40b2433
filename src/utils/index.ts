/**
 * Utility module exports.
 */

export {
  logger,
  configureLogger,
  resetLogger,
  debug,
  info,
  warn,
  error,
  success,
  failure,
  table,
  type LogLevel,
  type LoggerConfig,
} from "./logging.js";

export { parseBoolean, parseAssignment } from "./parse.js";

export {
  ENV_FORMATS,
  isEnvFormat,
  shellQuote,
  dotenvQuote,
  formatShell,
  formatDotenv,
  formatEnvironment,
  type EnvFormat,
} from "./env-format.js";
