/**
 * Tessera - Core Module
 *
 * Re-exports errors, recovery hints and configuration.
 */

// Errors and Recovery
export {
  RecoveryHint,
  Recovery,
  TraversalError,
  StyleError,
  ScriptError,
  RenderError,
  AppLoadError,
  type AppError,
  isAppError,
  describeRecovery,
  describeError,
  logError,
} from "./errors"

// Configuration
export {
  ServerConfig,
  DEFAULT_PORT,
  DEFAULT_ASSET_BASE,
  loadServerConfig,
  withConfiguredLogLevel,
} from "./config"
