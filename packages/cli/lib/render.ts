/**
 * Render one route of an app to a complete document.
 */
import { Data, Effect, Option } from "effect"
import { findPage, renderPageEffect, Recovery, type App, type RecoveryHint, type RenderError } from "tessera"

export class RouteNotFoundError extends Data.TaggedError("RouteNotFoundError")<{
  readonly path: string
  readonly recovery: RecoveryHint
}> {}

export const renderRoute = (
  app: App,
  path: string,
  assetBase?: string,
): Effect.Effect<string, RouteNotFoundError | RenderError> =>
  Option.match(findPage(app, path), {
    onNone: () =>
      Effect.fail(
        new RouteNotFoundError({
          path,
          recovery: Recovery.escalate(`No page answers ${path}`, "ROUTE_NOT_FOUND"),
        }),
      ),
    onSome: (page) =>
      renderPageEffect(page, { metadata: app.metadata, theme: app.theme, assetBase }),
  })
