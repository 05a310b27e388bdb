/**
 * Tessera - Traversal Contract
 *
 * The single place that decides child order for every primitive shape.
 * Style collection, markup and binding extraction all go through
 * `resolve` + `children`, so they visit the same nodes in the same
 * pre-order, left-to-right sequence.
 */
import { Branch, Primitive, type Node, resolve } from "./nodes"

const activeBranch = (branch: Branch): Node =>
  Branch.$match(branch, {
    First: ({ node }) => node,
    Second: ({ node }) => node,
  })

const renderEach = (size: number, render: (index: number) => Node): Node[] =>
  Array.from({ length: size }, (_, index) => render(index))

/**
 * Ordered structural children of a primitive.
 */
export const children = (node: Primitive): readonly Node[] =>
  Primitive.$match(node, {
    Empty: () => [],
    Text: () => [],
    Element: ({ content, isVoid }) => (isVoid ? [] : [content]),
    Tuple: ({ children }) => children,
    Conditional: ({ branch }) => [activeBranch(branch)],
    Optional: ({ wrapped }) => (wrapped === null ? [] : [wrapped]),
    ForEach: ({ size, render }) => renderEach(size, render),
    Array: ({ children }) => children,
    Modified: ({ content }) => [content],
  })

export type Visitor = (node: Primitive, depth: number) => void

/**
 * Pre-order, depth-first, left-to-right walk over resolved primitives.
 */
export const walk = (root: Node, visit: Visitor): void => {
  const go = (node: Node, depth: number): void => {
    const primitive = resolve(node)
    visit(primitive, depth)
    for (const child of children(primitive)) {
      go(child, depth + 1)
    }
  }
  go(root, 0)
}

/**
 * Count resolved primitives, mostly for logging pass statistics.
 */
export const countNodes = (root: Node): number => {
  let count = 0
  walk(root, () => {
    count++
  })
  return count
}
