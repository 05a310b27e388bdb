/**
 * Tessera - UI Algebraic Data Types
 *
 * The tree is open: a Node is either one of the closed Primitive shapes
 * below, or a Component that any caller can define by giving it a `body`.
 * Consumers only ever dispatch on Primitive and reach it from a Component
 * through `expand`/`resolve`.
 */
import { Data } from "effect"
import { TraversalError, Recovery } from "../core/errors"
import type { Modifier } from "./modifiers"

// ============================================================================
// Element Attributes
// ============================================================================

/**
 * `true` renders the bare attribute name, `false` omits it.
 */
export type AttributeValue = string | boolean

export type Attributes = Readonly<Record<string, AttributeValue>>

// ============================================================================
// Conditional Branch
// ============================================================================

export type Branch = Data.TaggedEnum<{
  First: { readonly node: Node }
  Second: { readonly node: Node }
}>

export const Branch = Data.taggedEnum<Branch>()

// ============================================================================
// Primitive Shapes - closed, exhaustively matched by every consumer
// ============================================================================

export type Primitive = Data.TaggedEnum<{
  /** Renders nothing */
  Empty: { readonly _empty?: undefined }

  /** Text content (escaped) */
  Text: { readonly content: string }

  /** Catalog element with a fixed tag shape and a single content child */
  Element: {
    readonly tag: string
    readonly attributes: Attributes
    readonly content: Node
    readonly isVoid: boolean
  }

  /** Fixed-arity ordered children */
  Tuple: { readonly children: readonly Node[] }

  /** Exactly one of two branches is present */
  Conditional: { readonly branch: Branch }

  /** Zero or one child */
  Optional: { readonly wrapped: Node | null }

  /** Runtime-sized source collection mapped lazily to children */
  ForEach: {
    readonly size: number
    readonly render: (index: number) => Node
  }

  /** Runtime-sized, already materialized children */
  Array: { readonly children: readonly Node[] }

  /** Inner node plus an ordered annotation list */
  Modified: {
    readonly content: Node
    readonly modifiers: readonly Modifier[]
  }
}>

export const Primitive = Data.taggedEnum<Primitive>()

export type PrimitiveTag = Primitive["_tag"]

const PRIMITIVE_TAGS: ReadonlySet<string> = new Set<PrimitiveTag>([
  "Empty",
  "Text",
  "Element",
  "Tuple",
  "Conditional",
  "Optional",
  "ForEach",
  "Array",
  "Modified",
])

// ============================================================================
// Components - the open half of the tree
// ============================================================================

/**
 * A user-defined node. `body` is its one-step expansion and must be pure:
 * every render pass expands it again.
 */
export interface Component {
  readonly name?: string
  body(): Node
}

export type Node = Primitive | Component

// ============================================================================
// Classification
// ============================================================================

export const isComponent = (node: Node): node is Component => "body" in node

export const isPrimitive = (node: Node): node is Primitive =>
  !("body" in node) && PRIMITIVE_TAGS.has(node._tag)

export const describeNode = (node: Node): string =>
  isComponent(node) ? `Component(${node.name ?? "anonymous"})` : node._tag

/**
 * One-step expansion of a component. Expanding a primitive is a defect.
 */
export const expand = (node: Node): Node => {
  if (!isComponent(node)) {
    throw new TraversalError({
      reason: "primitive-expansion",
      node: describeNode(node),
      recovery: Recovery.escalate("Primitive nodes have no body", "PRIMITIVE_EXPANSION"),
    })
  }
  const next = node.body()
  if (next === node) {
    throw new TraversalError({
      reason: "self-expansion",
      node: describeNode(node),
      recovery: Recovery.escalate("Component body returned the component itself", "SELF_EXPANSION"),
    })
  }
  return next
}

/**
 * Expand components until a primitive is reached.
 */
export const resolve = (node: Node): Primitive => {
  let current = node
  while (isComponent(current)) {
    current = expand(current)
  }
  if (!PRIMITIVE_TAGS.has(current._tag)) {
    throw new TraversalError({
      reason: "unclassified-node",
      node: String(current._tag),
      recovery: Recovery.escalate("Node is neither a primitive nor a component", "UNCLASSIFIED_NODE"),
    })
  }
  return current
}

// ============================================================================
// Constructors
// ============================================================================

export const empty = (): Primitive => Primitive.Empty({})

export const text = (content: string): Primitive => Primitive.Text({ content })

export const element = (
  tag: string,
  attributes: Attributes = {},
  content: Node = empty(),
): Primitive => Primitive.Element({ tag, attributes, content, isVoid: false })

export const voidElement = (tag: string, attributes: Attributes = {}): Primitive =>
  Primitive.Element({ tag, attributes, content: empty(), isVoid: true })

export const fragment = (...children: readonly Node[]): Primitive =>
  Primitive.Tuple({ children })

export const either = (condition: boolean, first: Node, second: Node): Primitive =>
  Primitive.Conditional({
    branch: condition ? Branch.First({ node: first }) : Branch.Second({ node: second }),
  })

export const optional = (wrapped: Node | null | undefined): Primitive =>
  Primitive.Optional({ wrapped: wrapped ?? null })

export const forEach = <T>(
  items: readonly T[],
  render: (item: T, index: number) => Node,
): Primitive =>
  Primitive.ForEach({
    size: items.length,
    render: (index) => render(items[index], index),
  })

export const array = (children: readonly Node[]): Primitive =>
  Primitive.Array({ children })

export const modified = (content: Node, modifiers: readonly Modifier[]): Primitive =>
  Primitive.Modified({ content, modifiers })

/**
 * Wrap a node in a new Modified layer. The wrapped node is never mutated,
 * so repeated application nests, outermost = last applied.
 */
export const withModifier = (node: Node, modifier: Modifier): Primitive =>
  modified(node, [modifier])

// ============================================================================
// Components
// ============================================================================

/**
 * Build a component factory from a render function.
 *
 * @example
 * const Card = defineComponent("Card", (props: { title: string }) =>
 *   UI.section(UI.h2(props.title)),
 * )
 */
export const defineComponent = <P>(
  name: string,
  render: (props: P) => Node,
): ((props: P) => Component) =>
  (props) => ({ name, body: () => render(props) })
