/**
 * Tessera - Page Pipeline
 *
 * Evaluates a page's body once, then runs the three passes over the same
 * tree: styles (pass 1), markup with the class lookup (pass 2), client
 * script (pass 3), and assembles the document.
 */
import { Effect, Option } from "effect"
import { RenderError, Recovery } from "./core/errors"
import { DEFAULT_ASSET_BASE } from "./core/config"
import { classLookup, collectStyles, renderStylesheet } from "./css/collector"
import { assemble } from "./document/assembler"
import { type Metadata, type MetadataPatch, mergeMetadata, serializeStructuredData, titleOf } from "./document/metadata"
import { DefaultTheme, type Theme, emitThemeCSS } from "./document/theme"
import { emitScript } from "./signals/emitter"
import type { HasSignals, ReactiveFields } from "./signals/protocol"
import type { Component, Node } from "./ui/nodes"
import { renderMarkup } from "./ui/render"

// ============================================================================
// Page & App
// ============================================================================

export interface Page extends Component, HasSignals {
  /** Exact request path this page answers, e.g. "/" or "/about" */
  readonly path?: string
  readonly metadata?: MetadataPatch
}

export interface PageConfig {
  readonly name?: string
  readonly path?: string
  readonly metadata?: MetadataPatch
  readonly signals?: ReactiveFields
  readonly body: () => Node
}

export const definePage = (config: PageConfig): Page => ({
  name: config.name ?? config.path ?? "page",
  path: config.path,
  metadata: config.metadata,
  signals: config.signals,
  body: config.body,
})

export interface App {
  readonly pages: readonly Page[]
  readonly metadata?: Metadata
  readonly theme?: Theme
}

export interface AppConfig {
  readonly pages: readonly Page[]
  readonly metadata?: Metadata
  /** Defaults to DefaultTheme; pass null for no theme stylesheet */
  readonly theme?: Theme | null
}

export const defineApp = (config: AppConfig): App => ({
  pages: config.pages,
  metadata: config.metadata,
  theme: config.theme === null ? undefined : (config.theme ?? DefaultTheme),
})

export const findPage = (app: App, path: string): Option.Option<Page> =>
  Option.fromNullable(app.pages.find((page) => page.path === path))

// ============================================================================
// Rendering
// ============================================================================

export interface RenderPageOptions {
  readonly metadata?: Metadata
  readonly theme?: Theme
  /** URL prefix of the client runtime scripts */
  readonly assetBase?: string
}

export interface CompiledPage {
  readonly document: string
  readonly markup: string
  readonly stylesheet: string
  readonly script: string
  readonly ruleCount: number
}

export const bootstrapScripts = (assetBase: string): readonly string[] => [
  `<script src="${assetBase}/signal-runtime.js"></script>`,
  `<script src="${assetBase}/tessera-runtime.js"></script>`,
]

/**
 * Run all three passes and keep their outputs alongside the document.
 */
export const compilePage = (page: Page, options: RenderPageOptions = {}): CompiledPage => {
  const root = page.body()

  const table = collectStyles(root)
  const markup = renderMarkup(root, { classLookup: classLookup(table) })
  const script = emitScript(page, root)

  const stylesheet = renderStylesheet(table)
  const metadata = mergeMetadata(options.metadata ?? {}, page.metadata)
  const scripts = script.length > 0 ? [...bootstrapScripts(options.assetBase ?? DEFAULT_ASSET_BASE), script] : []

  const document = assemble({
    title: titleOf(metadata),
    description: metadata.description,
    keywords: metadata.keywords,
    structuredData: (metadata.structuredData ?? []).map(serializeStructuredData),
    themeName: options.theme?.name,
    themeCSS: options.theme === undefined ? "" : emitThemeCSS(options.theme),
    componentCSS: stylesheet,
    body: markup,
    scripts,
  })

  return { document, markup, stylesheet, script, ruleCount: table.size }
}

export const renderPage = (page: Page, options: RenderPageOptions = {}): string =>
  compilePage(page, options).document

/**
 * Effect wrapper: logs pass statistics and turns any defect raised while
 * rendering into a RenderError.
 */
export const renderPageEffect = (
  page: Page,
  options: RenderPageOptions = {},
): Effect.Effect<string, RenderError> => {
  const component = page.name ?? page.path ?? "page"
  return Effect.try({
    try: () => compilePage(page, options),
    catch: (cause) =>
      new RenderError({
        component,
        cause,
        recovery: Recovery.escalate(`Failed to render page: ${component}`, "RENDER_ERROR"),
      }),
  }).pipe(
    Effect.tap((compiled) =>
      Effect.logDebug("page rendered").pipe(
        Effect.annotateLogs({
          page: component,
          rules: compiled.ruleCount,
          scripted: compiled.script.length > 0,
          bytes: compiled.document.length,
        }),
      ),
    ),
    Effect.map((compiled) => compiled.document),
  )
}
