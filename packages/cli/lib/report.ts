/**
 * Log a command failure before it reaches the runtime.
 */
import { Effect } from "effect"
import { isAppError, logError } from "tessera"

export const reportFailure = (error: unknown): Effect.Effect<void> =>
  isAppError(error) ? logError(error) : Effect.logError(String(error))
