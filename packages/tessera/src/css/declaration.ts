/**
 * Tessera - CSS Declarations
 */

/** One ordered (property, value) pair */
export interface CSSDeclaration {
  readonly property: string
  readonly value: string
}

export const declaration = (property: string, value: string): CSSDeclaration => ({
  property,
  value,
})

export const renderDeclaration = (d: CSSDeclaration): string => `${d.property}: ${d.value}`

export const sameDeclarations = (
  a: readonly CSSDeclaration[],
  b: readonly CSSDeclaration[],
): boolean =>
  a.length === b.length &&
  a.every((d, i) => d.property === b[i].property && d.value === b[i].value)

// ============================================================================
// Value Formatting
// ============================================================================

/** Whole numbers print without a decimal point */
export const num = (value: number): string => (Object.is(value, -0) ? "0" : String(value))

export const px = (value: number): string => `${num(value)}px`

export const seconds = (value: number): string => `${num(value)}s`
