/**
 * Tessera - Document Assembler
 *
 * Pure string composition of the three pass outputs plus metadata.
 */
import { Option } from "effect"
import { escapeAttr, escapeHtml } from "../ui/render"

export interface DocumentParts {
  readonly title: Option.Option<string>
  readonly description?: string
  readonly keywords?: readonly string[]
  /** Already-serialized JSON-LD payloads */
  readonly structuredData?: readonly string[]
  readonly themeName?: string
  readonly themeCSS?: string
  readonly componentCSS?: string
  readonly body: string
  /** Complete script tags, in order */
  readonly scripts?: readonly string[]
}

const styleTag = (css: string | undefined): string =>
  css === undefined || css.length === 0 ? "" : `<style>\n${css}</style>\n`

export const assemble = (parts: DocumentParts): string => {
  const themeAttr = parts.themeName === undefined ? "" : ` data-theme="${escapeAttr(parts.themeName)}"`
  let out = `<!DOCTYPE html>\n<html lang="en"${themeAttr}>\n<head>\n`
  out += `<meta charset="utf-8">\n`
  out += `<meta name="viewport" content="width=device-width, initial-scale=1">\n`

  if (Option.isSome(parts.title)) {
    out += `<title>${escapeHtml(parts.title.value)}</title>\n`
  }
  if (parts.description !== undefined && parts.description.length > 0) {
    out += `<meta name="description" content="${escapeAttr(parts.description)}">\n`
  }
  const keywords = parts.keywords ?? []
  if (keywords.length > 0) {
    out += `<meta name="keywords" content="${keywords.map(escapeAttr).join(", ")}">\n`
  }

  out += styleTag(parts.themeCSS)
  out += styleTag(parts.componentCSS)

  for (const payload of parts.structuredData ?? []) {
    out += `<script type="application/ld+json">${payload}</script>\n`
  }

  out += `</head>\n<body>\n${parts.body}\n`
  for (const script of parts.scripts ?? []) {
    out += `${script}\n`
  }
  out += `</body>\n</html>\n`
  return out
}
