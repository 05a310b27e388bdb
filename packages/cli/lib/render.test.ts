import { describe, it, expect } from "vitest"
import { Effect, Exit } from "effect"
import { UI, defineApp, definePage, type Component } from "tessera"
import { renderRoute } from "./render"
import { appFromModule, isApp } from "./load"
import site from "../../../examples/site"

const loop: Component = { name: "Loop", body: () => loop }

const app = defineApp({
  theme: null,
  metadata: { site: "Docs" },
  pages: [
    definePage({ path: "/", metadata: { title: "Home" }, body: () => UI.p("Welcome") }),
    definePage({ path: "/broken", body: () => UI.div(loop) }),
  ],
})

describe("renderRoute", () => {
  it("renders the page registered for a path", async () => {
    const html = await Effect.runPromise(renderRoute(app, "/"))
    expect(html).toContain("<title>Home | Docs</title>\n")
    expect(html).toContain("<body>\n<p>Welcome</p>\n</body>")
  })

  it("fails with RouteNotFoundError for unknown paths", async () => {
    const exit = await Effect.runPromiseExit(renderRoute(app, "/missing"))
    expect(Exit.isFailure(exit)).toBe(true)
    if (Exit.isFailure(exit) && exit.cause._tag === "Fail") {
      expect(exit.cause.error._tag).toBe("RouteNotFoundError")
    }
  })

  it("turns render defects into RenderError", async () => {
    const result = await Effect.runPromise(Effect.either(renderRoute(app, "/broken")))
    expect(result._tag).toBe("Left")
    if (result._tag === "Left") {
      expect(result.left._tag).toBe("RenderError")
    }
  })
})

describe("example site", () => {
  it("writes the counter label into the page after each action", async () => {
    const html = await Effect.runPromise(renderRoute(site, "/"))
    expect(html).toContain('<output id="clicks">Clicked 0 times</output>')
    expect(html).toContain(
      'function increment() { count.value = (count.value + 1); document.getElementById("clicks").textContent = label.value; }',
    )
    expect(html).toContain('function reset() { count.value = 0; document.getElementById("clicks").textContent = label.value; }')
  })
})

describe("loading app modules", () => {
  it("recognises apps by their pages", () => {
    expect(isApp(app)).toBe(true)
    expect(isApp({ pages: [{ path: "/" }] })).toBe(false)
    expect(isApp(null)).toBe(false)
  })

  it("takes the default export", async () => {
    const loaded = await Effect.runPromise(appFromModule("site.ts", { default: app }))
    expect(loaded).toBe(app)
  })

  it("rejects modules without an app default export", async () => {
    const result = await Effect.runPromise(Effect.either(appFromModule("site.ts", { app })))
    expect(result._tag).toBe("Left")
    if (result._tag === "Left") {
      expect(result.left._tag).toBe("AppLoadError")
      expect(result.left.entry).toBe("site.ts")
    }
  })
})
