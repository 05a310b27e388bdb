/**
 * Tessera - Annotation to CSS conversion
 *
 * A fixed table keyed by modifier tag. Both the style collector and the
 * class lookup go through `declarationSet`, so the two passes can only ever
 * see the same ordered declarations for the same annotation list.
 */
import type { Data } from "effect"
import { StyleError, Recovery } from "../core/errors"
import {
  Modifier,
  ColorToken,
  type Edge,
  type FontFamily,
  type FontWeight,
  type ModifierTag,
} from "../ui/modifiers"
import { type CSSDeclaration, declaration, num, px, seconds } from "./declaration"

// ============================================================================
// Token Formatting
// ============================================================================

export const colorValue = (token: ColorToken): string =>
  ColorToken.$match(token, {
    Semantic: ({ role }) => `var(--color-${role})`,
    Palette: ({ hue, shade }) => `var(--color-${hue}-${shade})`,
    Oklch: ({ l, c, h }) => `oklch(${num(l)} ${num(c)} ${num(h)})`,
    Custom: ({ name, shade }) => `var(--color-${name}-${shade})`,
  })

export const edgeSuffix = (edge: Edge): string => {
  switch (edge) {
    case "top":
      return "top"
    case "bottom":
      return "bottom"
    case "leading":
      return "inline-start"
    case "trailing":
      return "inline-end"
    case "horizontal":
      return "inline"
    case "vertical":
      return "block"
  }
}

export const fontFamilyValue = (family: FontFamily): string => {
  if (typeof family !== "string") {
    return `"${family.custom}", ${fontFamilyValue(family.fallback)}`
  }
  return family === "system" ? "system-ui, -apple-system, sans-serif" : `var(--font-${family})`
}

const FONT_WEIGHTS: Readonly<Record<FontWeight, string>> = {
  thin: "100",
  light: "300",
  regular: "400",
  medium: "500",
  semibold: "600",
  bold: "700",
  black: "900",
}

/** Given edges in order, duplicates dropped */
const uniqueEdges = (edges: readonly Edge[]): readonly Edge[] => [...new Set(edges)]

const spacing = (base: string, value: number, edges: readonly Edge[]): CSSDeclaration[] =>
  edges.length === 0
    ? [declaration(base, px(value))]
    : uniqueEdges(edges).map((edge) => declaration(`${base}-${edgeSuffix(edge)}`, px(value)))

/** Push a declaration only when the value is present */
const optional = <T>(
  out: CSSDeclaration[],
  property: string,
  value: T | undefined,
  format: (v: T) => string,
): void => {
  if (value !== undefined) out.push(declaration(property, format(value)))
}

const same = (v: string): string => v

// ============================================================================
// Conversion Table
// ============================================================================

type Conversions = {
  readonly [K in ModifierTag]: (m: Data.TaggedEnum.Value<Modifier, K>) => CSSDeclaration[]
}

const CONVERSIONS: Conversions = {
  Padding: ({ value, edges }) => spacing("padding", value, edges),
  Margin: ({ value, edges }) => spacing("margin", value, edges),

  Background: ({ color }) => [declaration("background-color", colorValue(color))],

  BackgroundImage: (m) => {
    const out: CSSDeclaration[] = []
    optional(out, "background-image", m.image, same)
    optional(out, "background-size", m.size, same)
    optional(out, "background-position", m.position, same)
    optional(out, "background-repeat", m.repeat, same)
    optional(out, "background-clip", m.clip, same)
    return out
  },

  Border: ({ width, style, color, edges, radius }) => {
    const shorthand = `${px(width)} ${style} ${colorValue(color)}`
    const out =
      edges.length === 0
        ? [declaration("border", shorthand)]
        : uniqueEdges(edges).map((edge) => declaration(`border-${edgeSuffix(edge)}`, shorthand))
    optional(out, "border-radius", radius, px)
    return out
  },

  Radius: ({ value }) => [declaration("border-radius", px(value))],

  Font: (m) => {
    const out: CSSDeclaration[] = []
    optional(out, "font-family", m.family, fontFamilyValue)
    optional(out, "font-size", m.size, px)
    optional(out, "font-weight", m.weight, (w) => FONT_WEIGHTS[w])
    optional(out, "letter-spacing", m.tracking, px)
    optional(out, "line-height", m.lineHeight, num)
    optional(out, "color", m.color, colorValue)
    return out
  },

  TextStyle: (m) => {
    const out: CSSDeclaration[] = []
    optional(out, "text-align", m.align, same)
    optional(out, "text-transform", m.transform, same)
    optional(out, "text-decoration", m.decoration, same)
    optional(out, "text-wrap", m.wrap, same)
    optional(out, "white-space", m.whiteSpace, same)
    optional(out, "text-overflow", m.overflow, same)
    optional(out, "overflow-wrap", m.overflowWrap, same)
    optional(out, "word-break", m.wordBreak, same)
    optional(out, "hyphens", m.hyphens, same)
    if (m.lineClamp !== undefined) {
      out.push(
        declaration("display", "-webkit-box"),
        declaration("-webkit-box-orient", "vertical"),
        declaration("-webkit-line-clamp", String(m.lineClamp)),
        declaration("overflow", "hidden"),
      )
    }
    optional(out, "text-indent", m.indent, px)
    return out
  },

  Opacity: ({ value }) => [declaration("opacity", num(value))],

  Shadow: ({ x, y, blur, spread, color }) => [
    declaration("box-shadow", `${px(x)} ${px(y)} ${px(blur)} ${px(spread)} ${colorValue(color)}`),
  ],

  Size: (m) => {
    const out: CSSDeclaration[] = []
    optional(out, "width", m.width, px)
    optional(out, "min-width", m.minWidth, px)
    optional(out, "max-width", m.maxWidth, px)
    optional(out, "height", m.height, px)
    optional(out, "min-height", m.minHeight, px)
    optional(out, "max-height", m.maxHeight, px)
    return out
  },

  AspectRatio: ({ ratio }) => [declaration("aspect-ratio", num(ratio))],

  Hidden: () => [declaration("display", "none")],

  Display: ({ mode }) => [declaration("display", mode)],

  Overflow: ({ x, y }) => {
    const out: CSSDeclaration[] = []
    optional(out, "overflow-x", x, same)
    optional(out, "overflow-y", y, same)
    return out
  },

  Flex: ({ direction, wrap, justify, align, gap }) => {
    const out = [
      declaration("display", "flex"),
      declaration("flex-direction", direction),
      declaration("flex-wrap", wrap ? "wrap" : "nowrap"),
    ]
    optional(out, "justify-content", justify, same)
    optional(out, "align-items", align, same)
    optional(out, "gap", gap, px)
    return out
  },

  Grid: ({ columns, rows, gap, autoFlow }) => {
    const out = [
      declaration("display", "grid"),
      declaration("grid-template-columns", `repeat(${columns}, 1fr)`),
    ]
    optional(out, "grid-template-rows", rows, (r) => `repeat(${r}, 1fr)`)
    optional(out, "gap", gap, px)
    optional(out, "grid-auto-flow", autoFlow, same)
    return out
  },

  Position: ({ mode, top, bottom, leading, trailing }) => {
    const out = [declaration("position", mode)]
    optional(out, "top", top, px)
    optional(out, "bottom", bottom, px)
    optional(out, "inset-inline-start", leading, px)
    optional(out, "inset-inline-end", trailing, px)
    return out
  },

  ZIndex: ({ value }) => [declaration("z-index", String(Math.trunc(value)))],

  Cursor: ({ style }) => [declaration("cursor", style)],

  UserSelect: ({ mode }) => [declaration("user-select", mode)],

  Transform: ({ value }) => [declaration("transform", value)],

  Transition: ({ property, duration, timing, delay }) => {
    const out = [
      declaration("transition-property", property),
      declaration("transition-duration", seconds(duration)),
    ]
    optional(out, "transition-timing-function", timing, same)
    optional(out, "transition-delay", delay, seconds)
    return out
  },

  Animation: (m) => {
    const parts = [m.name, seconds(m.duration)]
    if (m.timing !== undefined) parts.push(m.timing)
    if (m.delay !== undefined) parts.push(seconds(m.delay))
    if (m.iterationCount !== undefined) parts.push(m.iterationCount)
    if (m.direction !== undefined) parts.push(m.direction)
    if (m.fillMode !== undefined) parts.push(m.fillMode)
    return [declaration("animation", parts.join(" "))]
  },

  // Behavior annotations carry no style
  Accessibility: () => [],
  EventBinding: () => [],
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Declarations for a single annotation. An annotation whose tag has no
 * registered conversion is a defect in the catalog and throws.
 */
export const declarationsFor = (modifier: Modifier): CSSDeclaration[] => {
  if (!Object.prototype.hasOwnProperty.call(CONVERSIONS, modifier._tag)) {
    throw new StyleError({
      reason: "unregistered-modifier",
      detail: String(modifier._tag),
      recovery: Recovery.escalate(
        `No CSS conversion registered for modifier "${String(modifier._tag)}"`,
        "UNREGISTERED_MODIFIER",
      ),
    })
  }
  return Modifier.$match(modifier, CONVERSIONS)
}

/**
 * The ordered declaration set for one node's annotation list, in list order.
 */
export const declarationSet = (modifiers: readonly Modifier[]): CSSDeclaration[] =>
  modifiers.flatMap(declarationsFor)
