export { assemble, type DocumentParts } from "./assembler"
export {
  DEFAULT_TITLE_SEPARATOR,
  composeTitle,
  mergeMetadata,
  serializeStructuredData,
  titleOf,
  type Metadata,
  type MetadataPatch,
} from "./metadata"
export { DefaultTheme, decodeTheme, emitThemeCSS, type Theme, type ThemePatch } from "./theme"
