#!/usr/bin/env node
/**
 * Tessera CLI
 *
 * Usage:
 *   tessera render app.ts                  # Render "/" to stdout
 *   tessera render app.ts --path /about -o about.html
 *   tessera serve app.ts --port 8080       # Serve every page
 */
import { Command } from "@effect/cli"
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect } from "effect"
import { renderCommand } from "./commands/render"
import { serveCommand } from "./commands/serve"

// ============================================================================
// Root Command
// ============================================================================

const rootCommand = Command.make("tessera").pipe(
  Command.withDescription("Tessera CLI - render declarative UI trees to HTML"),
  Command.withSubcommands([renderCommand, serveCommand])
)

// ============================================================================
// Run CLI
// ============================================================================

const cli = Command.run(rootCommand, {
  name: "tessera",
  version: "v0.1.0",
})

cli(process.argv).pipe(
  Effect.provide(NodeContext.layer),
  NodeRuntime.runMain
)
