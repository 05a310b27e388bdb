/**
 * Tessera - Page Metadata
 *
 * Application-wide metadata with per-page patches layered on top.
 */
import { Option } from "effect"

export const DEFAULT_TITLE_SEPARATOR = " | "

export interface Metadata {
  readonly site?: string
  readonly title?: string
  readonly titleSeparator?: string
  readonly description?: string
  readonly keywords?: readonly string[]
  /** JSON-LD payloads, serialized into ld+json scripts */
  readonly structuredData?: readonly unknown[]
}

/** Page-level overrides; any field present replaces the application value */
export type MetadataPatch = Partial<Metadata>

export const mergeMetadata = (base: Metadata, patch: MetadataPatch = {}): Metadata => ({
  site: patch.site ?? base.site,
  title: patch.title ?? base.title,
  titleSeparator: patch.titleSeparator ?? base.titleSeparator,
  description: patch.description ?? base.description,
  keywords: patch.keywords ?? base.keywords,
  structuredData: patch.structuredData ?? base.structuredData,
})

const present = (value: string | undefined): Option.Option<string> =>
  value === undefined || value.length === 0 ? Option.none() : Option.some(value)

/**
 * Both present → "page<separator>site"; one present → that one; neither → none.
 */
export const composeTitle = (
  pageTitle: string | undefined,
  separator: string,
  site: string | undefined,
): Option.Option<string> => {
  const page = present(pageTitle)
  const siteName = present(site)
  if (Option.isSome(page) && Option.isSome(siteName)) {
    return Option.some(`${page.value}${separator}${siteName.value}`)
  }
  return Option.orElse(page, () => siteName)
}

export const titleOf = (metadata: Metadata): Option.Option<string> =>
  composeTitle(metadata.title, metadata.titleSeparator ?? DEFAULT_TITLE_SEPARATOR, metadata.site)

/** JSON for an ld+json script body; `<` is escaped so the payload cannot end the tag */
export const serializeStructuredData = (payload: unknown): string =>
  (JSON.stringify(payload) ?? "null").replace(/</g, "\\u003c")
