import { describe, it, expect, expectTypeOf } from "vitest"
import { ScriptError } from "../core/errors"
import { UI, on, style } from "../ui/builder"
import { text } from "../ui/nodes"
import { emitScript, extractEventBindings } from "./emitter"
import { $ } from "./expression"
import { Signal } from "./protocol"

const catchScript = (fn: () => unknown): ScriptError => {
  try {
    fn()
  } catch (error) {
    if (error instanceof ScriptError) return error
    throw error
  }
  throw new Error("expected a ScriptError")
}

describe("extractEventBindings", () => {
  it("records bindings against their wrapper's position", () => {
    const tree = UI.div(
      UI.styled(UI.p("a"), style.padding(4)),
      UI.styled(UI.button("b"), on("click", "pick"), on("mouseover", "peek")),
    )
    expect(extractEventBindings(tree)).toEqual([
      { elementIndex: 1, event: "click", handler: "pick" },
      { elementIndex: 1, event: "mouseover", handler: "peek" },
    ])
  })
})

describe("emitScript", () => {
  it("emits nothing for a page without reactivity", () => {
    expect(emitScript({}, text("static"))).toBe("")
    expect(emitScript({ signals: {} }, UI.styled(UI.p("x"), style.padding(1)))).toBe("")
  })

  it("declares fields in order, then wires listeners", () => {
    const page = {
      signals: {
        count: Signal.state(0),
        doubled: Signal.computed($.mul($.signal("count"), $.num(2))),
        increment: Signal.action($.increment("count")),
        noop: Signal.action(),
      },
    }
    const tree = UI.styled(UI.button("+"), on("click", "increment"))
    expect(emitScript(page, tree)).toBe(
      [
        "<script>",
        "const count = Tessera.state(0);",
        "const doubled = Tessera.computed(() => (count.value * 2));",
        "function increment() { count.value = (count.value + 1); }",
        "function noop() {}",
        `document.querySelector('[data-s~="0"]')?.addEventListener("click", increment);`,
        "</script>",
      ].join("\n"),
    )
  })

  it("serializes initial values safely", () => {
    const page = { signals: { note: Signal.state("a</b"), open: Signal.state(false) } }
    expect(emitScript(page, text("x"))).toBe(
      ["<script>", 'const note = Tessera.state("a\\u003c/b");', "const open = Tessera.state(false);", "</script>"].join(
        "\n",
      ),
    )
  })

  it("takes only initial values that have a literal form", () => {
    expectTypeOf(Signal.state).parameter(0).toEqualTypeOf<string | number | boolean | bigint>()
    expect(emitScript({ signals: { total: Signal.state(12n) } }, text("x"))).toBe(
      ["<script>", "const total = Tessera.state(12);", "</script>"].join("\n"),
    )
  })

  it("rejects field names that are not identifiers", () => {
    const error = catchScript(() => emitScript({ signals: { "my-count": Signal.state(0) } }, text("x")))
    expect(error.reason).toBe("invalid-identifier")
    expect(error.name).toBe("my-count")
  })

  it("rejects invalid names referenced from expressions and handlers", () => {
    const computed = { signals: { ok: Signal.computed($.signal("bad name")) } }
    expect(catchScript(() => emitScript(computed, text("x"))).name).toBe("bad name")

    const tree = UI.styled(UI.button("x"), on("click", "do it"))
    expect(catchScript(() => emitScript({}, tree)).name).toBe("do it")
  })
})
