/**
 * Tessera - Markup Renderer
 *
 * Pass 2 of a page render. Exhaustive Primitive → HTML conversion; every
 * Modified node takes the next document-order position (the same counter
 * the binding extractor keeps) and hands its class, ARIA and position
 * attributes down to the first element its content produces.
 */
import { Option } from "effect"
import { type ClassLookup, noClassLookup } from "../css/collector"
import { type Modifier, isAccessibility, isEventBinding } from "./modifiers"
import { Branch, Primitive, type AttributeValue, type Attributes, type Node, resolve } from "./nodes"
import { children } from "./traverse"

// ============================================================================
// HTML Escaping
// ============================================================================

const ESCAPE_MAP: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
}

/** Element text context */
export const escapeHtml = (str: string): string =>
  str.replace(/[&<>]/g, (char) => ESCAPE_MAP[char] ?? char)

/** Double-quoted attribute context */
export const escapeAttr = (str: string): string =>
  str.replace(/[&<>"]/g, (char) => ESCAPE_MAP[char] ?? char)

// ============================================================================
// Attribute Rendering
// ============================================================================

/** Attribute that marks an element for the client script: space-separated positions */
export const POSITION_ATTRIBUTE = "data-s"

export const renderAttrs = (attrs: Attributes): string => {
  const parts: string[] = []
  for (const [name, value] of Object.entries(attrs)) {
    if (value === true) {
      parts.push(name)
    } else if (value !== false) {
      parts.push(`${name}="${escapeAttr(value)}"`)
    }
  }
  return parts.length > 0 ? " " + parts.join(" ") : ""
}

// ============================================================================
// Pending wrapper attributes
// ============================================================================

interface Pending {
  readonly classes: readonly string[]
  readonly positions: readonly number[]
  readonly aria: Attributes
}

const NO_PENDING: Pending = { classes: [], positions: [], aria: {} }

const isPendingEmpty = (p: Pending): boolean =>
  p.classes.length === 0 && p.positions.length === 0 && Object.keys(p.aria).length === 0

const ariaFor = (modifiers: readonly Modifier[]): Attributes => {
  const aria: Record<string, AttributeValue> = {}
  for (const modifier of modifiers) {
    if (!isAccessibility(modifier)) continue
    if (modifier.label !== undefined) aria["aria-label"] = modifier.label
    if (modifier.hidden !== undefined) aria["aria-hidden"] = modifier.hidden ? "true" : "false"
    if (modifier.role !== undefined) aria["role"] = modifier.role
  }
  return aria
}

/**
 * Merge a wrapper's own attributes into what its ancestors handed down.
 * The inner wrapper comes first, so classes read innermost → outermost;
 * for ARIA the outermost value wins.
 */
const mergePending = (own: Pending, outer: Pending): Pending => ({
  classes: [...own.classes, ...outer.classes],
  positions: [...own.positions, ...outer.positions],
  aria: { ...own.aria, ...outer.aria },
})

const applyPending = (attrs: Attributes, pending: Pending): Attributes => {
  if (isPendingEmpty(pending)) return attrs
  const merged: Record<string, AttributeValue> = { ...attrs }
  if (pending.classes.length > 0) {
    const existing = attrs["class"]
    const base = typeof existing === "string" && existing.length > 0 ? [existing] : []
    merged["class"] = [...base, ...pending.classes].join(" ")
  }
  Object.assign(merged, pending.aria)
  if (pending.positions.length > 0) {
    merged[POSITION_ATTRIBUTE] = pending.positions.join(" ")
  }
  return merged
}

// ============================================================================
// Main Renderer
// ============================================================================

export interface RenderOptions {
  /** Class lookup over the rule table built by the style collector */
  readonly classLookup?: ClassLookup
}

/**
 * Render a node tree to an HTML fragment.
 */
export const renderMarkup = (root: Node, options: RenderOptions = {}): string => {
  const lookup = options.classLookup ?? noClassLookup
  let position = 0

  const renderChildren = (node: Primitive): string => children(node).map((c) => go(c, NO_PENDING)).join("")

  const wrap = (tag: string, inner: string, pending: Pending): string =>
    `<${tag}${renderAttrs(applyPending({}, pending))}>${inner}</${tag}>`

  const go = (node: Node, pending: Pending): string => {
    const primitive = resolve(node)
    return Primitive.$match(primitive, {
      Empty: () => "",

      Text: ({ content }) =>
        isPendingEmpty(pending) ? escapeHtml(content) : wrap("span", escapeHtml(content), pending),

      Element: ({ tag, attributes, content, isVoid }) => {
        const attrStr = renderAttrs(applyPending(attributes, pending))
        if (isVoid) return `<${tag}${attrStr}>`
        return `<${tag}${attrStr}>${go(content, NO_PENDING)}</${tag}>`
      },

      Tuple: (n) => (isPendingEmpty(pending) ? renderChildren(n) : wrap("div", renderChildren(n), pending)),

      Array: (n) => (isPendingEmpty(pending) ? renderChildren(n) : wrap("div", renderChildren(n), pending)),

      ForEach: (n) => (isPendingEmpty(pending) ? renderChildren(n) : wrap("div", renderChildren(n), pending)),

      Conditional: ({ branch }) =>
        Branch.$match(branch, {
          First: ({ node: active }) => go(active, pending),
          Second: ({ node: active }) => go(active, pending),
        }),

      Optional: ({ wrapped }) => (wrapped === null ? "" : go(wrapped, pending)),

      Modified: ({ content, modifiers }) => {
        const index = position++
        const own: Pending = {
          classes: Option.toArray(lookup(modifiers)),
          positions: modifiers.some(isEventBinding) ? [index] : [],
          aria: ariaFor(modifiers),
        }
        return go(content, mergePending(own, pending))
      },
    })
  }

  return go(root, NO_PENDING)
}

// ============================================================================
// Pretty Printer (for debugging)
// ============================================================================

/**
 * Pretty print a resolved tree, one primitive per line
 */
export const prettyPrint = (root: Node, indent = 0): string => {
  const primitive = resolve(root)
  const pad = "  ".repeat(indent)
  const label = Primitive.$match(primitive, {
    Empty: () => "Empty",
    Text: ({ content }) => `Text(${JSON.stringify(content)})`,
    Element: ({ tag }) => `Element(${tag})`,
    Tuple: ({ children }) => `Tuple(${children.length})`,
    Conditional: ({ branch }) => `Conditional(${branch._tag})`,
    Optional: ({ wrapped }) => `Optional(${wrapped === null ? "none" : "some"})`,
    ForEach: ({ size }) => `ForEach(${size})`,
    Array: ({ children }) => `Array(${children.length})`,
    Modified: ({ modifiers }) => `Modified[${modifiers.map((m) => m._tag).join(", ")}]`,
  })
  const lines = [pad + label, ...children(primitive).map((c) => prettyPrint(c, indent + 1))]
  return lines.join("\n")
}
