/**
 * Tessera - Typed Errors with Recovery Hints
 *
 * All errors are Data.TaggedError with explicit recovery guidance.
 * Errors raised inside the render passes are programming errors: they are
 * thrown synchronously and only the page pipeline, the server and the CLI
 * turn them into values.
 */
import { Data, Effect } from "effect"

// ============================================================================
// Recovery Hints
// ============================================================================

/**
 * Recovery hints tell error handlers what a caller can do about an error.
 * Every render defect escalates: a broken tree is fixed in code.
 */
export type RecoveryHint = Data.TaggedEnum<{
  /** Escalate to the operator - cannot auto-recover */
  Escalate: {
    readonly message: string
    readonly code: string
  }
}>

export const RecoveryHint = Data.taggedEnum<RecoveryHint>()

export const Recovery = {
  escalate: (message: string, code: string) =>
    RecoveryHint.Escalate({ message, code }),
}

// ============================================================================
// Typed Errors
// ============================================================================

/**
 * Tree traversal defects: expanding a primitive, a component that expands
 * into itself, or a value that is neither primitive nor component.
 */
export class TraversalError extends Data.TaggedError("TraversalError")<{
  readonly reason: "primitive-expansion" | "self-expansion" | "unclassified-node"
  readonly node: string
  readonly recovery: RecoveryHint
}> {}

/**
 * Style pipeline defects
 */
export class StyleError extends Data.TaggedError("StyleError")<{
  readonly reason: "unregistered-modifier" | "fingerprint-collision"
  readonly detail: string
  readonly recovery: RecoveryHint
}> {}

/**
 * Client script defects
 */
export class ScriptError extends Data.TaggedError("ScriptError")<{
  readonly reason: "invalid-identifier"
  readonly name: string
  readonly recovery: RecoveryHint
}> {}

/**
 * Render errors - any defect raised while rendering a page
 */
export class RenderError extends Data.TaggedError("RenderError")<{
  readonly component: string
  readonly cause: unknown
  readonly recovery: RecoveryHint
}> {}

/**
 * App module could not be loaded (CLI)
 */
export class AppLoadError extends Data.TaggedError("AppLoadError")<{
  readonly entry: string
  readonly cause: unknown
  readonly recovery: RecoveryHint
}> {}

// ============================================================================
// Union Type for All App Errors
// ============================================================================

export type AppError =
  | TraversalError
  | StyleError
  | ScriptError
  | RenderError
  | AppLoadError

const APP_ERROR_TAGS: ReadonlySet<string> = new Set([
  "TraversalError",
  "StyleError",
  "ScriptError",
  "RenderError",
  "AppLoadError",
])

export const isAppError = (value: unknown): value is AppError =>
  value instanceof Error && "_tag" in value && typeof value._tag === "string" && APP_ERROR_TAGS.has(value._tag)

// ============================================================================
// Error Handling Utilities
// ============================================================================

export const describeRecovery = (hint: RecoveryHint): string =>
  RecoveryHint.$match(hint, {
    Escalate: (e) => `Escalate(${e.code}: ${e.message})`,
  })

/**
 * Short human-readable summary of an error, including a wrapped cause
 */
export const describeError = (error: AppError): string => {
  const base = `[${error._tag}] ${describeRecovery(error.recovery)}`
  if (error._tag === "RenderError" || error._tag === "AppLoadError") {
    const cause = error.cause
    if (isAppError(cause)) return `${base} <- ${describeError(cause)}`
    if (cause instanceof Error) return `${base} <- ${cause.message}`
  }
  return base
}

/**
 * Log error with full context for debugging
 */
export const logError = (error: AppError): Effect.Effect<void> =>
  Effect.logError(describeError(error)).pipe(
    Effect.annotateLogs({ errorTag: error._tag }),
  )
