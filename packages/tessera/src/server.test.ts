import { afterEach, describe, it, expect, vi } from "vitest"
import { LogLevel } from "effect"
import { DEFAULT_ASSET_BASE } from "./core/config"
import { defineApp, definePage, renderPage } from "./page"
import { createServer } from "./server"
import { UI } from "./ui/builder"
import type { Component } from "./ui/nodes"

const loop: Component = { name: "Loop", body: () => loop }

const home = definePage({ path: "/", metadata: { title: "Home" }, body: () => UI.p("Welcome") })
const broken = definePage({ path: "/broken", body: () => UI.div(loop) })
const app = defineApp({ metadata: { site: "Acme" }, pages: [home, broken] })

describe("createServer", () => {
  it("serves the rendered document for a page path", async () => {
    const response = await createServer(app).request("/")
    expect(response.status).toBe(200)
    expect(response.headers.get("content-type")).toContain("text/html")
    expect(await response.text()).toBe(
      renderPage(home, { metadata: app.metadata, theme: app.theme, assetBase: DEFAULT_ASSET_BASE }),
    )
  })

  it("answers unknown paths with 404", async () => {
    const response = await createServer(app).request("/missing")
    expect(response.status).toBe(404)
    expect(await response.text()).toBe("Not Found")
  })

  it("answers render failures with a generic 500", async () => {
    const response = await createServer(app).request("/broken")
    expect(response.status).toBe(500)
    expect(await response.text()).toBe("Internal Server Error")
  })

  it("only answers GET", async () => {
    const response = await createServer(app).request("/", { method: "POST" })
    expect(response.status).toBe(404)
  })

  describe("request logging", () => {
    afterEach(() => {
      vi.restoreAllMocks()
    })

    const renderedLines = (log: { mock: { calls: unknown[][] } }) =>
      log.mock.calls.filter((args) => String(args[0]).includes("page rendered"))

    it("writes render statistics at the debug level", async () => {
      const log = vi.spyOn(console, "log").mockImplementation(() => undefined)
      const response = await createServer(app, { logLevel: LogLevel.Debug }).request("/")
      expect(response.status).toBe(200)
      expect(renderedLines(log)).toHaveLength(1)
    })

    it("leaves debug statistics out at the default level", async () => {
      const log = vi.spyOn(console, "log").mockImplementation(() => undefined)
      await createServer(app).request("/")
      expect(renderedLines(log)).toHaveLength(0)
    })
  })
})
