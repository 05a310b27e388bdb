/**
 * Tessera - Themes
 *
 * Design tokens rendered as CSS custom properties ahead of the component
 * stylesheet. Theme documents (JSON) are validated with Effect Schema.
 */
import { readFileSync } from "node:fs"
import { Effect, Schema } from "effect"
import type { ParseResult } from "effect"
import { colorValue } from "../css/emitter"
import { num, px } from "../css/declaration"
import { ColorToken } from "../ui/modifiers"

// ============================================================================
// Types
// ============================================================================

export interface ThemePatch {
  readonly colorRoles?: Readonly<Record<string, ColorToken>>
  readonly fontFamilies?: Readonly<Record<string, string>>
  readonly typeScaleBase?: number
  readonly typeScaleRatio?: number
  readonly spacingUnit?: number
  readonly radiusBase?: number
}

export interface Theme {
  /** Emitted as `data-theme` on <html> when set */
  readonly name?: string
  readonly colorRoles: Readonly<Record<string, ColorToken>>
  readonly fontFamilies: Readonly<Record<string, string>>
  readonly typeScaleBase: number
  readonly typeScaleRatio: number
  readonly spacingUnit: number
  readonly radiusBase: number
  /** Applied under prefers-color-scheme: dark */
  readonly dark?: ThemePatch
  /** Applied under [data-theme="<name>"] */
  readonly named?: Readonly<Record<string, ThemePatch>>
}

// ============================================================================
// Theme Documents
// ============================================================================

const Hue = Schema.Literal("neutral", "blue", "red", "green", "amber", "sky", "slate", "cyan", "emerald")
const Role = Schema.Literal("surface", "text", "border", "accent", "muted", "destructive", "success")

const ColorJson = Schema.Union(
  Schema.Struct({ l: Schema.Number, c: Schema.Number, h: Schema.Number }),
  Schema.Struct({ hue: Hue, shade: Schema.Number }),
  Schema.Struct({ role: Role }),
  Schema.Struct({ custom: Schema.String, shade: Schema.Number }),
)

type ColorJson = typeof ColorJson.Type

const toColorToken = (json: ColorJson): ColorToken => {
  if ("l" in json) return ColorToken.Oklch(json)
  if ("hue" in json) return ColorToken.Palette({ hue: json.hue, shade: json.shade })
  if ("role" in json) return ColorToken.Semantic({ role: json.role })
  return ColorToken.Custom({ name: json.custom, shade: json.shade })
}

const ColorMap = Schema.Record({ key: Schema.String, value: ColorJson })
const FontMap = Schema.Record({ key: Schema.String, value: Schema.String })

const PatchJson = Schema.Struct({
  colorRoles: Schema.optional(ColorMap),
  fontFamilies: Schema.optional(FontMap),
  typeScaleBase: Schema.optional(Schema.Number),
  typeScaleRatio: Schema.optional(Schema.Number),
  spacingUnit: Schema.optional(Schema.Number),
  radiusBase: Schema.optional(Schema.Number),
})

const ThemeJson = Schema.Struct({
  name: Schema.optional(Schema.String),
  colorRoles: ColorMap,
  fontFamilies: FontMap,
  typeScaleBase: Schema.Number,
  typeScaleRatio: Schema.Number,
  spacingUnit: Schema.Number,
  radiusBase: Schema.Number,
  dark: Schema.optional(PatchJson),
  named: Schema.optional(Schema.Record({ key: Schema.String, value: PatchJson })),
})

const mapColors = (
  colors: Readonly<Record<string, ColorJson>>,
): Readonly<Record<string, ColorToken>> =>
  Object.fromEntries(Object.entries(colors).map(([role, json]) => [role, toColorToken(json)]))

const toPatch = (json: typeof PatchJson.Type): ThemePatch => ({
  ...json,
  colorRoles: json.colorRoles === undefined ? undefined : mapColors(json.colorRoles),
})

const toTheme = (json: typeof ThemeJson.Type): Theme => ({
  ...json,
  colorRoles: mapColors(json.colorRoles),
  dark: json.dark === undefined ? undefined : toPatch(json.dark),
  named:
    json.named === undefined
      ? undefined
      : Object.fromEntries(Object.entries(json.named).map(([name, patch]) => [name, toPatch(patch)])),
})

/**
 * Validate an untrusted theme document.
 */
export const decodeTheme = (input: unknown): Effect.Effect<Theme, ParseResult.ParseError> =>
  Schema.decodeUnknown(ThemeJson)(input).pipe(Effect.map(toTheme))

const loadBundledTheme = (): Theme =>
  toTheme(
    Schema.decodeUnknownSync(ThemeJson)(
      JSON.parse(readFileSync(new URL("./default-theme.json", import.meta.url), "utf8")),
    ),
  )

/** Built-in light theme with a dark patch */
export const DefaultTheme: Theme = loadBundledTheme()

// ============================================================================
// CSS Emission
// ============================================================================

const colorLines = (roles: Readonly<Record<string, ColorToken>>, indent: string): string =>
  Object.keys(roles)
    .sort()
    .map((key) => `${indent}--color-${key}: ${colorValue(roles[key])};\n`)
    .join("")

const fontLines = (families: Readonly<Record<string, string>>, indent: string): string =>
  Object.keys(families)
    .sort()
    .map((key) => `${indent}--font-${key}: ${families[key]};\n`)
    .join("")

const patchLines = (patch: ThemePatch, indent: string): string => {
  let out = ""
  if (patch.colorRoles !== undefined) out += colorLines(patch.colorRoles, indent)
  if (patch.fontFamilies !== undefined) out += fontLines(patch.fontFamilies, indent)
  if (patch.typeScaleBase !== undefined) out += `${indent}--type-scale-base: ${px(patch.typeScaleBase)};\n`
  if (patch.typeScaleRatio !== undefined) out += `${indent}--type-scale-ratio: ${num(patch.typeScaleRatio)};\n`
  if (patch.spacingUnit !== undefined) out += `${indent}--spacing-unit: ${px(patch.spacingUnit)};\n`
  if (patch.radiusBase !== undefined) out += `${indent}--radius-base: ${px(patch.radiusBase)};\n`
  return out
}

/**
 * `:root` custom properties, then the dark-scheme block, then one
 * `[data-theme]` block per named patch in name order.
 */
export const emitThemeCSS = (theme: Theme): string => {
  let out = ":root {\n"
  out += colorLines(theme.colorRoles, "  ")
  out += fontLines(theme.fontFamilies, "  ")
  out += `  --type-scale-base: ${px(theme.typeScaleBase)};\n`
  out += `  --type-scale-ratio: ${num(theme.typeScaleRatio)};\n`
  out += `  --spacing-unit: ${px(theme.spacingUnit)};\n`
  out += `  --radius-base: ${px(theme.radiusBase)};\n`
  out += "}\n"

  if (theme.dark !== undefined) {
    out += "@media (prefers-color-scheme: dark) {\n"
    out += "  :root {\n"
    out += patchLines(theme.dark, "    ")
    out += "  }\n"
    out += "}\n"
  }

  const named = theme.named ?? {}
  for (const name of Object.keys(named).sort()) {
    out += `[data-theme="${name}"] {\n`
    out += patchLines(named[name], "  ")
    out += "}\n"
  }

  return out
}
