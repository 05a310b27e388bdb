import { describe, it, expect } from "vitest"
import { style } from "./builder"
import { type Primitive, either, element, forEach, fragment, modified, optional, text, voidElement } from "./nodes"
import { children, countNodes, walk } from "./traverse"

const label = (node: Primitive): string => (node._tag === "Text" ? `Text(${node.content})` : node._tag)

describe("walk", () => {
  it("visits resolved primitives in pre-order with depth", () => {
    const tree = element(
      "div",
      {},
      fragment(text("a"), modified(text("b"), [style.padding(1)]), either(false, text("x"), text("y"))),
    )
    const visited: string[] = []
    walk(tree, (node, depth) => {
      visited.push(`${depth}:${label(node)}`)
    })
    expect(visited).toEqual([
      "0:Element",
      "1:Tuple",
      "2:Text(a)",
      "2:Modified",
      "3:Text(b)",
      "2:Conditional",
      "3:Text(y)",
    ])
  })

  it("walks through components", () => {
    const tree = fragment({ body: () => text("inside") }, text("after"))
    const visited: string[] = []
    walk(tree, (node) => {
      visited.push(label(node))
    })
    expect(visited).toEqual(["Tuple", "Text(inside)", "Text(after)"])
  })
})

describe("children", () => {
  it("renders ForEach items in source order", () => {
    const list = forEach(["a", "b"], (item, index) => text(`${index}:${item}`))
    expect(children(list)).toEqual([text("0:a"), text("1:b")])
  })

  it("gives void elements and empty optionals no children", () => {
    expect(children(voidElement("br"))).toEqual([])
    expect(children(optional(null))).toEqual([])
    expect(children(optional(text("z")))).toEqual([text("z")])
  })
})

describe("countNodes", () => {
  it("counts every resolved primitive", () => {
    expect(countNodes(element("p", {}, fragment(text("a"), text("b"))))).toBe(4)
  })
})
