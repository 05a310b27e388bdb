import { describe, it, expect } from "vitest"
import { StyleError } from "../core/errors"
import { on, style } from "../ui/builder"
import { color } from "../ui/modifiers"
import { declaration } from "./declaration"
import { colorValue, declarationSet, declarationsFor } from "./emitter"

describe("declarationsFor", () => {
  it("uses the shorthand when no edges are given", () => {
    expect(declarationsFor(style.padding(16))).toEqual([declaration("padding", "16px")])
    expect(declarationsFor(style.margin(0))).toEqual([declaration("margin", "0px")])
  })

  it("emits one longhand per distinct edge, in the order given", () => {
    expect(declarationsFor(style.padding(4, "top", "leading", "top"))).toEqual([
      declaration("padding-top", "4px"),
      declaration("padding-inline-start", "4px"),
    ])
    expect(declarationsFor(style.margin(2, "vertical", "horizontal"))).toEqual([
      declaration("margin-block", "2px"),
      declaration("margin-inline", "2px"),
    ])
  })

  it("formats borders with an optional radius", () => {
    expect(declarationsFor(style.border(1, color.border, { radius: 4 }))).toEqual([
      declaration("border", "1px solid var(--color-border)"),
      declaration("border-radius", "4px"),
    ])
    expect(declarationsFor(style.border(2, color.accent, { style: "dashed", edges: ["bottom"] }))).toEqual([
      declaration("border-bottom", "2px dashed var(--color-accent)"),
    ])
  })

  it("expands flex and grid layouts", () => {
    expect(declarationsFor(style.flex("column", { gap: 8 }))).toEqual([
      declaration("display", "flex"),
      declaration("flex-direction", "column"),
      declaration("flex-wrap", "nowrap"),
      declaration("gap", "8px"),
    ])
    expect(declarationsFor(style.grid(3, { rows: 2 }))).toEqual([
      declaration("display", "grid"),
      declaration("grid-template-columns", "repeat(3, 1fr)"),
      declaration("grid-template-rows", "repeat(2, 1fr)"),
    ])
  })

  it("resolves font families and weights", () => {
    expect(declarationsFor(style.font({ family: { custom: "Inter", fallback: "system" }, weight: "semibold" }))).toEqual([
      declaration("font-family", '"Inter", system-ui, -apple-system, sans-serif'),
      declaration("font-weight", "600"),
    ])
    expect(declarationsFor(style.font({ family: "mono", size: 14 }))).toEqual([
      declaration("font-family", "var(--font-mono)"),
      declaration("font-size", "14px"),
    ])
  })

  it("clamps lines with the webkit box declarations", () => {
    expect(declarationsFor(style.textStyle({ lineClamp: 2 }))).toEqual([
      declaration("display", "-webkit-box"),
      declaration("-webkit-box-orient", "vertical"),
      declaration("-webkit-line-clamp", "2"),
      declaration("overflow", "hidden"),
    ])
  })

  it("formats timing values in seconds", () => {
    expect(declarationsFor(style.transition("opacity", 0.2, { delay: 0.1 }))).toEqual([
      declaration("transition-property", "opacity"),
      declaration("transition-duration", "0.2s"),
      declaration("transition-delay", "0.1s"),
    ])
    expect(declarationsFor(style.animation("spin", 1, { iterationCount: "infinite" }))).toEqual([
      declaration("animation", "spin 1s infinite"),
    ])
  })

  it("gives behavior annotations no declarations", () => {
    expect(declarationsFor(style.accessibility({ label: "Close" }))).toEqual([])
    expect(declarationsFor(on("click", "close"))).toEqual([])
  })

  it("throws for a modifier without a registered conversion", () => {
    let caught: unknown
    try {
      declarationsFor(JSON.parse('{"_tag":"Blink"}'))
    } catch (error) {
      caught = error
    }
    expect(caught).toBeInstanceOf(StyleError)
    if (caught instanceof StyleError) {
      expect(caught.reason).toBe("unregistered-modifier")
      expect(caught.detail).toBe("Blink")
    }
  })
})

describe("colorValue", () => {
  it("maps every token kind", () => {
    expect(colorValue(color.accent)).toBe("var(--color-accent)")
    expect(colorValue(color.palette("blue", 500))).toBe("var(--color-blue-500)")
    expect(colorValue(color.oklch(0.5, 0.1, 200))).toBe("oklch(0.5 0.1 200)")
    expect(colorValue(color.custom("brand", 300))).toBe("var(--color-brand-300)")
  })
})

describe("declarationSet", () => {
  it("concatenates declarations in annotation order", () => {
    expect(declarationSet([style.opacity(0.5), on("click", "go"), style.background(color.surface)])).toEqual([
      declaration("opacity", "0.5"),
      declaration("background-color", "var(--color-surface)"),
    ])
  })
})
