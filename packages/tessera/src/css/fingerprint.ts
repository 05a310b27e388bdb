/**
 * Tessera - Content fingerprints
 *
 * 64-bit FNV-1a over an unambiguous serialization of the ordered
 * declarations, printed in base 36. Pure: no seed, no process state, so the
 * collection pass and the class lookup always agree.
 */
import type { CSSDeclaration } from "./declaration"

export const CLASS_PREFIX = "s-"

const FNV_OFFSET = 0xcbf29ce484222325n
const FNV_PRIME = 0x100000001b3n
const MASK_64 = 0xffffffffffffffffn

const encoder = new TextEncoder()

export const fnv1a64 = (input: string): bigint => {
  let hash = FNV_OFFSET
  for (const byte of encoder.encode(input)) {
    hash ^= BigInt(byte)
    hash = (hash * FNV_PRIME) & MASK_64
  }
  return hash
}

/** JSON keeps property/value boundaries unambiguous */
export const serializeDeclarations = (declarations: readonly CSSDeclaration[]): string =>
  JSON.stringify(declarations.map((d) => [d.property, d.value]))

export const fingerprint = (declarations: readonly CSSDeclaration[]): string =>
  `${CLASS_PREFIX}${fnv1a64(serializeDeclarations(declarations)).toString(36)}`
