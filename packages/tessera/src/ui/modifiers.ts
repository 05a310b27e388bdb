/**
 * Tessera - Annotations
 *
 * Style and behavior values attached to nodes through a Modified wrapper.
 * Each is plain immutable data; conversion to CSS lives in css/emitter.
 */
import { Data } from "effect"

// ============================================================================
// Design Tokens
// ============================================================================

export type PaletteHue =
  | "neutral"
  | "blue"
  | "red"
  | "green"
  | "amber"
  | "sky"
  | "slate"
  | "cyan"
  | "emerald"

export type SemanticRole =
  | "surface"
  | "text"
  | "border"
  | "accent"
  | "muted"
  | "destructive"
  | "success"

export type ColorToken = Data.TaggedEnum<{
  Semantic: { readonly role: SemanticRole }
  Palette: { readonly hue: PaletteHue; readonly shade: number }
  Oklch: { readonly l: number; readonly c: number; readonly h: number }
  Custom: { readonly name: string; readonly shade: number }
}>

export const ColorToken = Data.taggedEnum<ColorToken>()

/** Shorthand color constructors */
export const color = {
  surface: ColorToken.Semantic({ role: "surface" }),
  text: ColorToken.Semantic({ role: "text" }),
  border: ColorToken.Semantic({ role: "border" }),
  accent: ColorToken.Semantic({ role: "accent" }),
  muted: ColorToken.Semantic({ role: "muted" }),
  destructive: ColorToken.Semantic({ role: "destructive" }),
  success: ColorToken.Semantic({ role: "success" }),
  palette: (hue: PaletteHue, shade: number) => ColorToken.Palette({ hue, shade }),
  oklch: (l: number, c: number, h: number) => ColorToken.Oklch({ l, c, h }),
  custom: (name: string, shade: number) => ColorToken.Custom({ name, shade }),
}

export type Edge = "top" | "bottom" | "leading" | "trailing" | "horizontal" | "vertical"

export type FontFamily =
  | "system"
  | "sans"
  | "mono"
  | "serif"
  | "brand"
  | { readonly custom: string; readonly fallback: FontFamily }

export type FontWeight = "thin" | "light" | "regular" | "medium" | "semibold" | "bold" | "black"

export type BorderStyle = "solid" | "dashed" | "dotted" | "double" | "none"

export type DisplayMode = "block" | "inline" | "inline-block" | "flex" | "inline-flex" | "grid" | "contents" | "none"

export type OverflowMode = "visible" | "hidden" | "clip" | "scroll" | "auto"

export type FlexDirection = "row" | "row-reverse" | "column" | "column-reverse"

export type FlexJustify = "flex-start" | "center" | "flex-end" | "space-between" | "space-around" | "space-evenly"

export type FlexAlign = "flex-start" | "center" | "flex-end" | "stretch" | "baseline"

export type GridAutoFlow = "row" | "column" | "dense" | "row dense" | "column dense"

export type PositionMode = "static" | "relative" | "absolute" | "fixed" | "sticky"

export type CursorStyle = "auto" | "default" | "pointer" | "text" | "move" | "not-allowed" | "grab" | "grabbing" | "wait"

export type UserSelectMode = "auto" | "none" | "text" | "all"

export type BackgroundRepeat = "repeat" | "no-repeat" | "repeat-x" | "repeat-y" | "space" | "round"

export type TextStyleOptions = {
  readonly align?: "start" | "center" | "end" | "justify"
  readonly transform?: "none" | "uppercase" | "lowercase" | "capitalize"
  readonly decoration?: "none" | "underline" | "line-through" | "overline"
  readonly wrap?: "wrap" | "nowrap" | "balance" | "pretty"
  readonly whiteSpace?: "normal" | "nowrap" | "pre" | "pre-wrap" | "pre-line" | "break-spaces"
  readonly overflow?: "clip" | "ellipsis"
  readonly overflowWrap?: "normal" | "break-word" | "anywhere"
  readonly wordBreak?: "normal" | "break-all" | "keep-all" | "break-word"
  readonly hyphens?: "none" | "manual" | "auto"
  readonly lineClamp?: number
  readonly indent?: number
}

export type FontOptions = {
  readonly family?: FontFamily
  readonly size?: number
  readonly weight?: FontWeight
  readonly tracking?: number
  readonly lineHeight?: number
  readonly color?: ColorToken
}

export type SizeOptions = {
  readonly width?: number
  readonly minWidth?: number
  readonly maxWidth?: number
  readonly height?: number
  readonly minHeight?: number
  readonly maxHeight?: number
}

// ============================================================================
// Modifier ADT
// ============================================================================

export type Modifier = Data.TaggedEnum<{
  Padding: { readonly value: number; readonly edges: readonly Edge[] }
  Margin: { readonly value: number; readonly edges: readonly Edge[] }
  Background: { readonly color: ColorToken }
  BackgroundImage: {
    readonly image?: string
    readonly size?: string
    readonly position?: string
    readonly repeat?: BackgroundRepeat
    readonly clip?: string
  }
  Border: {
    readonly width: number
    readonly style: BorderStyle
    readonly color: ColorToken
    readonly edges: readonly Edge[]
    readonly radius?: number
  }
  Radius: { readonly value: number }
  Font: FontOptions
  TextStyle: TextStyleOptions
  Opacity: { readonly value: number }
  Shadow: {
    readonly x: number
    readonly y: number
    readonly blur: number
    readonly spread: number
    readonly color: ColorToken
  }
  Size: SizeOptions
  AspectRatio: { readonly ratio: number }
  Hidden: { readonly _hidden?: undefined }
  Display: { readonly mode: DisplayMode }
  Overflow: { readonly x?: OverflowMode; readonly y?: OverflowMode }
  Flex: {
    readonly direction: FlexDirection
    readonly wrap: boolean
    readonly justify?: FlexJustify
    readonly align?: FlexAlign
    readonly gap?: number
  }
  Grid: {
    readonly columns: number
    readonly rows?: number
    readonly gap?: number
    readonly autoFlow?: GridAutoFlow
  }
  Position: {
    readonly mode: PositionMode
    readonly top?: number
    readonly bottom?: number
    readonly leading?: number
    readonly trailing?: number
  }
  ZIndex: { readonly value: number }
  Cursor: { readonly style: CursorStyle }
  UserSelect: { readonly mode: UserSelectMode }
  Transform: { readonly value: string }
  Transition: {
    readonly property: string
    readonly duration: number
    readonly timing?: string
    readonly delay?: number
  }
  Animation: {
    readonly name: string
    readonly duration: number
    readonly timing?: string
    readonly delay?: number
    readonly iterationCount?: string
    readonly direction?: string
    readonly fillMode?: string
  }

  /** Behavior: ARIA attributes on the rendered element */
  Accessibility: {
    readonly label?: string
    readonly hidden?: boolean
    readonly role?: string
  }

  /** Behavior: attach a client listener that calls a page action */
  EventBinding: { readonly event: string; readonly handler: string }
}>

export const Modifier = Data.taggedEnum<Modifier>()

export type ModifierTag = Modifier["_tag"]

export const isEventBinding = (
  modifier: Modifier,
): modifier is Data.TaggedEnum.Value<Modifier, "EventBinding"> =>
  modifier._tag === "EventBinding"

export const isAccessibility = (
  modifier: Modifier,
): modifier is Data.TaggedEnum.Value<Modifier, "Accessibility"> =>
  modifier._tag === "Accessibility"
