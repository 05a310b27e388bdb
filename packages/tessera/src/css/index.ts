/**
 * Tessera - CSS Module
 */

export {
  type CSSDeclaration,
  declaration,
  renderDeclaration,
  sameDeclarations,
  num,
  px,
  seconds,
} from "./declaration"
export { colorValue, edgeSuffix, fontFamilyValue, declarationsFor, declarationSet } from "./emitter"
export { CLASS_PREFIX, fnv1a64, serializeDeclarations, fingerprint } from "./fingerprint"
export {
  type Rule,
  RuleTable,
  collectModifiers,
  collectStyles,
  renderStylesheet,
  type ClassLookup,
  classLookup,
  noClassLookup,
} from "./collector"
