/**
 * Tessera - HTTP Adapter
 *
 * Thin Hono glue: exact-path GET routes, one per page. Rendering defects
 * are logged and answered with a generic 500.
 *
 * @example
 * const app = defineApp({ pages: [home] })
 * serve(createServer(app), { port: 3000 })
 */
import { Hono } from "hono"
import { serve as serveNode } from "@hono/node-server"
import { Effect, Exit, Logger, LogLevel } from "effect"
import { logError } from "./core/errors"
import { DEFAULT_ASSET_BASE, DEFAULT_PORT } from "./core/config"
import { type App, renderPageEffect } from "./page"

export interface ServerOptions {
  readonly assetBase?: string
  /** Minimum level for logs written while rendering a request. Defaults to Info. */
  readonly logLevel?: LogLevel.LogLevel
}

export const createServer = (app: App, options: ServerOptions = {}): Hono => {
  const server = new Hono()
  const assetBase = options.assetBase ?? DEFAULT_ASSET_BASE
  const logLevel = options.logLevel ?? LogLevel.Info

  for (const page of app.pages) {
    if (page.path === undefined) continue
    server.get(page.path, async (c) => {
      const exit = await Effect.runPromiseExit(
        renderPageEffect(page, { metadata: app.metadata, theme: app.theme, assetBase }).pipe(
          Effect.tapError(logError),
          Effect.annotateLogs({ method: c.req.method, path: c.req.path }),
          Logger.withMinimumLogLevel(logLevel),
        ),
      )
      return Exit.isSuccess(exit) ? c.html(exit.value) : c.text("Internal Server Error", 500)
    })
  }

  server.notFound((c) => c.text("Not Found", 404))

  return server
}

export interface ServeOptions {
  readonly port?: number
  readonly hostname?: string
}

export interface RunningServer {
  readonly port: number
  stop(): Promise<void>
}

/**
 * Start a Node HTTP server for the app.
 */
export const serve = (server: Hono, options: ServeOptions = {}): RunningServer => {
  const port = options.port ?? DEFAULT_PORT
  const hostname = options.hostname ?? "0.0.0.0"
  const nodeServer = serveNode({ fetch: server.fetch, port, hostname })
  console.log(`🧩 Tessera running at http://localhost:${port}`)

  return {
    port,
    stop: () =>
      new Promise<void>((resolve, reject) => {
        nodeServer.close((error) => (error ? reject(error) : resolve()))
      }),
  }
}
