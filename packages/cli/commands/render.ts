/**
 * `tessera render` command
 *
 * Renders one page of an app module to stdout or a file.
 */
import { Args, Command, Options } from "@effect/cli"
import { FileSystem } from "@effect/platform"
import { Console, Effect, Option } from "effect"
import { loadServerConfig, withConfiguredLogLevel } from "tessera"
import { loadApp } from "../lib/load"
import { renderRoute } from "../lib/render"
import { reportFailure } from "../lib/report"

const entryArg = Args.file({ name: "entry", exists: "yes" }).pipe(
  Args.withDescription("App module whose default export is a defineApp(...) app")
)

const pathOption = Options.text("path").pipe(
  Options.withDescription("Request path of the page to render"),
  Options.withDefault("/")
)

const outOption = Options.file("out").pipe(
  Options.withAlias("o"),
  Options.withDescription("Write the document to this file instead of stdout"),
  Options.optional
)

export const renderCommand = Command.make(
  "render",
  { entry: entryArg, path: pathOption, out: outOption },
  ({ entry, path, out }) =>
    Effect.gen(function* () {
      const config = yield* loadServerConfig
      const program = Effect.gen(function* () {
        const app = yield* loadApp(entry)
        const html = yield* renderRoute(app, path, config.assetBase)

        if (Option.isSome(out)) {
          const fs = yield* FileSystem.FileSystem
          yield* fs.writeFileString(out.value, html)
          yield* Console.error(`✓ Wrote ${path} to ${out.value}`)
        } else {
          yield* Console.log(html)
        }
      })
      yield* withConfiguredLogLevel(config, program)
    }).pipe(Effect.tapError(reportFailure))
).pipe(Command.withDescription("Render a page of an app to HTML"))
