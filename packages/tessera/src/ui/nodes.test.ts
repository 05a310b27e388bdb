import { describe, it, expect } from "vitest"
import { TraversalError } from "../core/errors"
import { style } from "./builder"
import {
  type Component,
  defineComponent,
  describeNode,
  either,
  element,
  expand,
  isComponent,
  isPrimitive,
  resolve,
  text,
  withModifier,
} from "./nodes"

const catchTraversal = (fn: () => unknown): TraversalError => {
  try {
    fn()
  } catch (error) {
    if (error instanceof TraversalError) return error
    throw error
  }
  throw new Error("expected a TraversalError")
}

describe("expand", () => {
  it("returns a component's body", () => {
    const greeting: Component = { name: "Greeting", body: () => text("hi") }
    expect(expand(greeting)).toEqual(text("hi"))
  })

  it("refuses to expand a primitive", () => {
    const error = catchTraversal(() => expand(text("a")))
    expect(error.reason).toBe("primitive-expansion")
    expect(error.node).toBe("Text")
  })

  it("detects a component that expands into itself", () => {
    const loop: Component = { name: "Loop", body: () => loop }
    const error = catchTraversal(() => expand(loop))
    expect(error.reason).toBe("self-expansion")
    expect(error.node).toBe("Component(Loop)")
  })
})

describe("resolve", () => {
  it("expands nested components until a primitive", () => {
    const inner: Component = { body: () => text("deep") }
    const outer: Component = { body: () => inner }
    expect(resolve(outer)).toEqual(text("deep"))
  })

  it("rejects values that are neither primitive nor component", () => {
    const odd: Component = { name: "Odd", body: () => JSON.parse('{"_tag":"Blink"}') }
    const error = catchTraversal(() => resolve(odd))
    expect(error.reason).toBe("unclassified-node")
    expect(error.node).toBe("Blink")
  })
})

describe("classification", () => {
  it("tells components from primitives", () => {
    const card: Component = { body: () => text("x") }
    expect(isComponent(card)).toBe(true)
    expect(isPrimitive(card)).toBe(false)
    expect(isPrimitive(text("x"))).toBe(true)
    expect(describeNode(card)).toBe("Component(anonymous)")
  })
})

describe("constructors", () => {
  it("keeps only the active branch of a conditional", () => {
    const node = either(false, text("yes"), text("no"))
    expect(node._tag).toBe("Conditional")
    if (node._tag === "Conditional") {
      expect(node.branch._tag).toBe("Second")
      expect(node.branch.node).toEqual(text("no"))
    }
  })

  it("nests repeated modifiers with the last applied outermost", () => {
    const inner = withModifier(text("x"), style.padding(4))
    const outer = withModifier(inner, style.margin(8))
    expect(outer._tag).toBe("Modified")
    if (outer._tag === "Modified") {
      expect(outer.modifiers.map((m) => m._tag)).toEqual(["Margin"])
      expect(outer.content).toBe(inner)
    }
  })

  it("builds named component factories", () => {
    const Badge = defineComponent("Badge", (props: { label: string }) => element("span", {}, text(props.label)))
    const badge = Badge({ label: "new" })
    expect(badge.name).toBe("Badge")
    expect(resolve(badge)).toEqual(element("span", {}, text("new")))
  })
})
