/**
 * Tessera - UI Module
 *
 * Re-exports the node model, modifiers, builder, traversal and renderer.
 */

// Node model
export {
  type AttributeValue,
  type Attributes,
  Branch,
  Primitive,
  type PrimitiveTag,
  type Component,
  type Node,
  isComponent,
  isPrimitive,
  describeNode,
  expand,
  resolve,
  empty,
  text,
  element,
  voidElement,
  fragment,
  either,
  optional,
  forEach,
  array,
  modified,
  withModifier,
  defineComponent,
} from "./nodes"

// Modifiers
export {
  ColorToken,
  color,
  type PaletteHue,
  type SemanticRole,
  type Edge,
  type FontFamily,
  type FontWeight,
  type TextStyleOptions,
  type FontOptions,
  type SizeOptions,
  Modifier,
  type ModifierTag,
  isEventBinding,
  isAccessibility,
} from "./modifiers"

// Builder API
export { UI, style, on, node, type Children, type InputConfig } from "./builder"

// Traversal
export { children, walk, countNodes, type Visitor } from "./traverse"

// Renderer
export {
  escapeHtml,
  escapeAttr,
  POSITION_ATTRIBUTE,
  renderAttrs,
  renderMarkup,
  prettyPrint,
  type RenderOptions,
} from "./render"
