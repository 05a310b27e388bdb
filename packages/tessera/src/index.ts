/**
 * Tessera - Declarative server-rendered UI
 *
 * Describe a page as a tree of nodes, attach style and behaviour modifiers,
 * and render it to a complete HTML document with a deduplicated stylesheet
 * and a small reactive client script.
 *
 * @example
 * ```typescript
 * import { UI, style, on, $, Signal, definePage, defineApp, createServer, serve } from "tessera"
 *
 * const home = definePage({
 *   path: "/",
 *   metadata: { title: "Counter" },
 *   signals: {
 *     count: Signal.state(0),
 *     increment: Signal.action($.increment("count")),
 *   },
 *   body: () =>
 *     UI.stack(
 *       UI.h1("Counter"),
 *       UI.styled(UI.button("+1"), style.padding(8), on("click", "increment")),
 *     ),
 * })
 *
 * serve(createServer(defineApp({ pages: [home] })), { port: 3000 })
 * ```
 */

// Core - Errors and Configuration
export {
  RecoveryHint,
  Recovery,
  TraversalError,
  StyleError,
  ScriptError,
  RenderError,
  AppLoadError,
  type AppError,
  isAppError,
  describeRecovery,
  describeError,
  logError,
  ServerConfig,
  DEFAULT_PORT,
  DEFAULT_ASSET_BASE,
  loadServerConfig,
  withConfiguredLogLevel,
} from "./core"

// UI - Nodes, Modifiers, Builder, Renderer
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
  UI,
  style,
  on,
  node,
  type Children,
  type InputConfig,
  children,
  walk,
  countNodes,
  type Visitor,
  escapeHtml,
  escapeAttr,
  POSITION_ATTRIBUTE,
  renderAttrs,
  renderMarkup,
  prettyPrint,
  type RenderOptions,
} from "./ui"

// CSS - Declarations, Fingerprints, Collector
export {
  type CSSDeclaration,
  declarationsFor,
  declarationSet,
  fingerprint,
  type Rule,
  RuleTable,
  collectStyles,
  renderStylesheet,
  classLookup,
  type ClassLookup,
} from "./css"

// Signals - Reactive fields and client script
export {
  Expression,
  compileExpr,
  $,
  ReactiveField,
  type ReactiveFields,
  Signal,
  type HasSignals,
  RUNTIME_GLOBAL,
  type EventBindingRecord,
  extractEventBindings,
  emitScript,
  formatJSValue,
} from "./signals"

// Document - Metadata, Themes, Assembler
export {
  assemble,
  type DocumentParts,
  DEFAULT_TITLE_SEPARATOR,
  composeTitle,
  mergeMetadata,
  titleOf,
  type Metadata,
  type MetadataPatch,
  DefaultTheme,
  decodeTheme,
  emitThemeCSS,
  type Theme,
  type ThemePatch,
} from "./document"

// Pages and Apps
export {
  type Page,
  type PageConfig,
  definePage,
  type App,
  type AppConfig,
  defineApp,
  findPage,
  type RenderPageOptions,
  type CompiledPage,
  bootstrapScripts,
  compilePage,
  renderPage,
  renderPageEffect,
} from "./page"

// HTTP
export { createServer, serve, type ServerOptions, type ServeOptions, type RunningServer } from "./server"
