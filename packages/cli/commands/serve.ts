/**
 * `tessera serve` command
 *
 * Serves every page of an app module until interrupted.
 */
import { Args, Command, Options } from "@effect/cli"
import { Effect, Option } from "effect"
import { createServer, loadServerConfig, serve, withConfiguredLogLevel } from "tessera"
import { loadApp } from "../lib/load"
import { reportFailure } from "../lib/report"

const entryArg = Args.file({ name: "entry", exists: "yes" }).pipe(
  Args.withDescription("App module whose default export is a defineApp(...) app")
)

const portOption = Options.integer("port").pipe(
  Options.withAlias("p"),
  Options.withDescription("Port to listen on (defaults to PORT, then 3000)"),
  Options.optional
)

export const serveCommand = Command.make(
  "serve",
  { entry: entryArg, port: portOption },
  ({ entry, port }) =>
    Effect.gen(function* () {
      const config = yield* loadServerConfig
      const program = Effect.gen(function* () {
        const app = yield* loadApp(entry)
        const listenPort = Option.getOrElse(port, () => config.port)
        const server = createServer(app, { assetBase: config.assetBase, logLevel: config.logLevel })

        yield* Effect.acquireRelease(
          Effect.sync(() => serve(server, { port: listenPort })),
          (running) =>
            Effect.promise(() => running.stop()).pipe(
              Effect.tap(() => Effect.logInfo("Server stopped"))
            )
        )
        yield* Effect.logInfo(`Serving ${app.pages.length} pages from ${entry}`)
        yield* Effect.never
      })
      yield* withConfiguredLogLevel(config, Effect.scoped(program))
    }).pipe(Effect.tapError(reportFailure))
).pipe(Command.withDescription("Serve an app over HTTP"))
