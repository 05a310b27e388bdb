/**
 * Tessera - Server Configuration
 *
 * Read through Effect Config so values come from the environment by default
 * and from any ConfigProvider in tests.
 */
import { Config, ConfigError, Effect, Logger, LogLevel } from "effect"

export interface ServerConfig {
  readonly port: number
  readonly assetBase: string
  readonly logLevel: LogLevel.LogLevel
}

export const DEFAULT_PORT = 3000
export const DEFAULT_ASSET_BASE = "/_tessera"

export const ServerConfig = Config.all({
  port: Config.integer("PORT").pipe(Config.withDefault(DEFAULT_PORT)),
  assetBase: Config.string("TESSERA_ASSET_BASE").pipe(
    Config.withDefault(DEFAULT_ASSET_BASE),
  ),
  logLevel: Config.logLevel("TESSERA_LOG_LEVEL").pipe(
    Config.withDefault(LogLevel.Info),
  ),
})

export const loadServerConfig: Effect.Effect<ServerConfig, ConfigError.ConfigError> =
  ServerConfig

/**
 * Apply the configured minimum log level to an effect
 */
export const withConfiguredLogLevel = <A, E, R>(
  config: ServerConfig,
  effect: Effect.Effect<A, E, R>,
): Effect.Effect<A, E, R> =>
  effect.pipe(Logger.withMinimumLogLevel(config.logLevel))
