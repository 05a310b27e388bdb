/**
 * Load an app module from disk.
 *
 * The entry's default export must be an app created with `defineApp`.
 */
import { resolve } from "node:path"
import { pathToFileURL } from "node:url"
import { Effect } from "effect"
import { AppLoadError, Recovery, type App } from "tessera"

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null

const isPageLike = (value: unknown): boolean =>
  isRecord(value) && typeof value["body"] === "function"

export const isApp = (value: unknown): value is App =>
  isRecord(value) && Array.isArray(value["pages"]) && value["pages"].every(isPageLike)

const notAnApp = (entry: string, cause: unknown) =>
  new AppLoadError({
    entry,
    cause,
    recovery: Recovery.escalate(
      `${entry} must default-export an app created with defineApp`,
      "APP_LOAD_ERROR",
    ),
  })

/**
 * Pick the app out of an imported module namespace.
 */
export const appFromModule = (entry: string, mod: unknown): Effect.Effect<App, AppLoadError> => {
  const candidate = isRecord(mod) ? mod["default"] : undefined
  return isApp(candidate)
    ? Effect.succeed(candidate)
    : Effect.fail(notAnApp(entry, new Error("default export is not an app")))
}

/**
 * Import `entry` (relative to `cwd`) and return its app.
 */
export const loadApp = (entry: string, cwd: string = process.cwd()): Effect.Effect<App, AppLoadError> =>
  Effect.tryPromise({
    try: (): Promise<unknown> => import(pathToFileURL(resolve(cwd, entry)).href),
    catch: (cause) =>
      new AppLoadError({
        entry,
        cause,
        recovery: Recovery.escalate(`Could not import ${entry}`, "APP_LOAD_ERROR"),
      }),
  }).pipe(
    Effect.flatMap((mod) => appFromModule(entry, mod)),
    Effect.tap((app) => Effect.logDebug(`Loaded ${entry} (${app.pages.length} pages)`)),
  )
