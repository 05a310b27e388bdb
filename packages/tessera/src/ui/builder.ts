/**
 * Tessera - UI Builder API
 *
 * Ergonomic constructors for node trees: the element catalog, structural
 * composition helpers, and annotation constructors.
 */
import { Modifier, type ColorToken, type Edge } from "./modifiers"
import type {
  BackgroundRepeat,
  BorderStyle,
  CursorStyle,
  DisplayMode,
  FlexAlign,
  FlexDirection,
  FlexJustify,
  FontOptions,
  GridAutoFlow,
  OverflowMode,
  PositionMode,
  SizeOptions,
  TextStyleOptions,
  UserSelectMode,
} from "./modifiers"
import {
  type AttributeValue,
  type Attributes,
  type Node,
  type Primitive,
  array,
  either,
  element,
  empty,
  forEach,
  fragment,
  modified,
  optional,
  text,
  voidElement,
} from "./nodes"

// ============================================================================
// Types for Builder
// ============================================================================

export type Children = Node | string | number | boolean | null | undefined | readonly Children[]

export interface ElementConfig {
  readonly attrs: Attributes
}

// ============================================================================
// Child Normalization
// ============================================================================

const normalizeChild = (child: Children): Node[] => {
  if (child === null || child === undefined || typeof child === "boolean") {
    return []
  }
  if (typeof child === "string") {
    return [text(child)]
  }
  if (typeof child === "number") {
    return [text(String(child))]
  }
  if (isChildList(child)) {
    return child.flatMap(normalizeChild)
  }
  return [child]
}

const isChildList = (value: unknown): value is readonly Children[] => Array.isArray(value)

/** A single child stays as-is; several become a Tuple */
const toContent = (nodes: readonly Node[]): Node => {
  if (nodes.length === 0) return empty()
  if (nodes.length === 1) return nodes[0]
  return fragment(...nodes)
}

/**
 * Normalize loose children into one node.
 */
export const node = (...children: Children[]): Node => toContent(children.flatMap(normalizeChild))

// ============================================================================
// Element Factory
// ============================================================================

const isElementConfig = (value: ElementConfig | Children): value is ElementConfig =>
  typeof value === "object" &&
  value !== null &&
  !isChildList(value) &&
  !("_tag" in value) &&
  !("body" in value)

const createElement = (
  tag: string,
  configOrChild?: ElementConfig | Children,
  ...restChildren: Children[]
): Node => {
  if (configOrChild !== undefined && isElementConfig(configOrChild)) {
    return element(tag, configOrChild.attrs, node(...restChildren))
  }
  const allChildren = configOrChild !== undefined ? [configOrChild, ...restChildren] : restChildren
  return element(tag, {}, node(...allChildren))
}

const container =
  (tag: string) =>
  (config?: ElementConfig | Children, ...children: Children[]): Node =>
    createElement(tag, config, ...children)

export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6

export type ButtonType = "button" | "submit" | "reset"

export type InputType =
  | "text"
  | "email"
  | "password"
  | "number"
  | "search"
  | "tel"
  | "url"
  | "checkbox"
  | "radio"
  | "hidden"
  | "date"

export interface InputConfig {
  readonly type?: InputType
  readonly name?: string
  readonly id?: string
  readonly placeholder?: string
  readonly value?: string
  readonly required?: boolean
  readonly disabled?: boolean
  readonly readonly?: boolean
}

// ============================================================================
// UI Namespace - Main API
// ============================================================================

/**
 * UI builder namespace providing the element catalog
 */
export const UI = {
  // Core constructors
  text: (content: string): Node => text(content),
  empty: (): Node => empty(),
  fragment: (...children: Children[]): Node => fragment(...children.flatMap(normalizeChild)),

  /** Transparent grouping: children render without a wrapper */
  group: (...children: Children[]): Node => fragment(...children.flatMap(normalizeChild)),

  // Conditional rendering
  when: (condition: boolean, then: Children, otherwise?: Children): Node =>
    either(condition, node(then), node(otherwise)),

  show: (condition: boolean, content: Children): Node => optional(condition ? node(content) : null),

  maybe: <T>(value: T | null | undefined, render: (v: T) => Node): Node =>
    optional(value === null || value === undefined ? null : render(value)),

  // Sequences
  each: <T>(items: readonly T[], render: (item: T, index: number) => Node): Node =>
    forEach(items, render),

  list: (children: readonly Node[]): Node => array(children),

  // Generic element
  el: createElement,

  // ========================================================================
  // Layout
  // ========================================================================

  stack: container("div"),
  div: container("div"),
  span: container("span"),
  main: container("main"),
  section: container("section"),
  article: container("article"),
  header: container("header"),
  footer: container("footer"),
  aside: container("aside"),
  nav: container("nav"),

  // ========================================================================
  // Content
  // ========================================================================

  heading: (level: HeadingLevel, ...children: Children[]): Node =>
    createElement(`h${level}`, undefined, ...children),
  h1: container("h1"),
  h2: container("h2"),
  h3: container("h3"),
  h4: container("h4"),
  h5: container("h5"),
  h6: container("h6"),
  p: container("p"),
  strong: container("strong"),
  em: container("em"),
  small: container("small"),
  code: container("code"),
  pre: container("pre"),
  blockquote: container("blockquote"),
  hr: (attrs: Attributes = {}): Node => voidElement("hr", attrs),
  br: (): Node => voidElement("br"),
  img: (src: string, alt: string, attrs: Attributes = {}): Node =>
    voidElement("img", { src, alt, ...attrs }),

  // ========================================================================
  // Lists
  // ========================================================================

  ul: container("ul"),
  ol: container("ol"),
  li: container("li"),

  // ========================================================================
  // Controls
  // ========================================================================

  button: (label: Children, type: ButtonType = "button", attrs: Attributes = {}): Node =>
    element("button", { type, ...attrs }, node(label)),

  link: (href: string, ...children: Children[]): Node =>
    element("a", { href }, node(...children)),

  form: (
    config: { readonly action?: string; readonly method?: "get" | "post" },
    ...children: Children[]
  ): Node => {
    const attrs: Record<string, string> = {}
    if (config.action !== undefined) attrs["action"] = config.action
    if (config.method !== undefined) attrs["method"] = config.method
    return element("form", attrs, node(...children))
  },

  label: (forId: string, ...children: Children[]): Node =>
    element("label", { for: forId }, node(...children)),

  input: (config: InputConfig = {}): Node => {
    const attrs: Record<string, AttributeValue> = { type: config.type ?? "text" }
    if (config.name !== undefined) attrs["name"] = config.name
    if (config.id !== undefined) attrs["id"] = config.id
    if (config.placeholder !== undefined) attrs["placeholder"] = config.placeholder
    if (config.value !== undefined) attrs["value"] = config.value
    attrs["required"] = config.required ?? false
    attrs["disabled"] = config.disabled ?? false
    attrs["readonly"] = config.readonly ?? false
    return voidElement("input", attrs)
  },

  // ========================================================================
  // Annotations
  // ========================================================================

  /** One Modified wrapper carrying the annotations in the given order */
  styled: (content: Children, ...modifiers: Modifier[]): Primitive => modified(node(content), modifiers),
}

// ============================================================================
// Annotation Constructors
// ============================================================================

/**
 * Modifier constructors, for use with `UI.styled`/`withModifier`.
 *
 * @example
 * UI.styled(UI.p("Hi"), style.padding(16), style.background(color.surface))
 */
export const style = {
  padding: (value: number, ...edges: Edge[]): Modifier => Modifier.Padding({ value, edges }),
  margin: (value: number, ...edges: Edge[]): Modifier => Modifier.Margin({ value, edges }),
  background: (color: ColorToken): Modifier => Modifier.Background({ color }),
  backgroundImage: (options: {
    readonly image?: string
    readonly size?: string
    readonly position?: string
    readonly repeat?: BackgroundRepeat
    readonly clip?: string
  }): Modifier => Modifier.BackgroundImage(options),
  border: (
    width: number,
    color: ColorToken,
    options: { readonly style?: BorderStyle; readonly edges?: readonly Edge[]; readonly radius?: number } = {},
  ): Modifier =>
    Modifier.Border({
      width,
      color,
      style: options.style ?? "solid",
      edges: options.edges ?? [],
      ...(options.radius !== undefined ? { radius: options.radius } : {}),
    }),
  radius: (value: number): Modifier => Modifier.Radius({ value }),
  font: (options: FontOptions): Modifier => Modifier.Font(options),
  textStyle: (options: TextStyleOptions): Modifier => Modifier.TextStyle(options),
  opacity: (value: number): Modifier => Modifier.Opacity({ value }),
  shadow: (x: number, y: number, blur: number, spread: number, color: ColorToken): Modifier =>
    Modifier.Shadow({ x, y, blur, spread, color }),
  frame: (options: SizeOptions): Modifier => Modifier.Size(options),
  aspectRatio: (ratio: number): Modifier => Modifier.AspectRatio({ ratio }),
  hidden: (): Modifier => Modifier.Hidden({}),
  display: (mode: DisplayMode): Modifier => Modifier.Display({ mode }),
  overflow: (x?: OverflowMode, y?: OverflowMode): Modifier =>
    Modifier.Overflow({ ...(x !== undefined ? { x } : {}), ...(y !== undefined ? { y } : {}) }),
  flex: (
    direction: FlexDirection,
    options: {
      readonly wrap?: boolean
      readonly justify?: FlexJustify
      readonly align?: FlexAlign
      readonly gap?: number
    } = {},
  ): Modifier => Modifier.Flex({ direction, ...options, wrap: options.wrap ?? false }),
  grid: (
    columns: number,
    options: { readonly rows?: number; readonly gap?: number; readonly autoFlow?: GridAutoFlow } = {},
  ): Modifier => Modifier.Grid({ columns, ...options }),
  position: (
    mode: PositionMode,
    offsets: {
      readonly top?: number
      readonly bottom?: number
      readonly leading?: number
      readonly trailing?: number
    } = {},
  ): Modifier => Modifier.Position({ mode, ...offsets }),
  zIndex: (value: number): Modifier => Modifier.ZIndex({ value }),
  cursor: (cursorStyle: CursorStyle): Modifier => Modifier.Cursor({ style: cursorStyle }),
  userSelect: (mode: UserSelectMode): Modifier => Modifier.UserSelect({ mode }),
  transform: (value: string): Modifier => Modifier.Transform({ value }),
  transition: (
    property: string,
    duration: number,
    options: { readonly timing?: string; readonly delay?: number } = {},
  ): Modifier => Modifier.Transition({ property, duration, ...options }),
  animation: (
    name: string,
    duration: number,
    options: {
      readonly timing?: string
      readonly delay?: number
      readonly iterationCount?: string
      readonly direction?: string
      readonly fillMode?: string
    } = {},
  ): Modifier => Modifier.Animation({ name, duration, ...options }),
  accessibility: (options: {
    readonly label?: string
    readonly hidden?: boolean
    readonly role?: string
  }): Modifier => Modifier.Accessibility(options),
}

// ============================================================================
// Event Binding Helper
// ============================================================================

/**
 * Bind a DOM event on the rendered element to a page action.
 *
 * @example
 * UI.styled(UI.button("+1"), on("click", "increment"))
 */
export const on = (event: string, handler: string | { readonly name: string }): Modifier =>
  Modifier.EventBinding({ event, handler: typeof handler === "string" ? handler : handler.name })
