/**
 * Tessera - Style Collector
 *
 * Pass 1 of a page render: walk the tree, turn each Modified node's
 * annotation list into a declaration set and record one rule per distinct
 * set. The same table then backs the class lookup used by the markup pass.
 */
import { Option } from "effect"
import { StyleError, Recovery } from "../core/errors"
import type { Modifier } from "../ui/modifiers"
import type { Node } from "../ui/nodes"
import { walk } from "../ui/traverse"
import { type CSSDeclaration, renderDeclaration, sameDeclarations } from "./declaration"
import { declarationSet } from "./emitter"
import { fingerprint } from "./fingerprint"

// ============================================================================
// Rule Table
// ============================================================================

export interface Rule {
  readonly className: string
  readonly declarations: readonly CSSDeclaration[]
}

/**
 * Class name -> declarations, in first-encounter order.
 */
export class RuleTable {
  private readonly rules = new Map<string, readonly CSSDeclaration[]>()

  get size(): number {
    return this.rules.size
  }

  has(className: string): boolean {
    return this.rules.has(className)
  }

  get(className: string): Option.Option<readonly CSSDeclaration[]> {
    return Option.fromNullable(this.rules.get(className))
  }

  /**
   * Idempotent for equal content. Two different sets hashing to the same
   * class name is a fingerprint collision and throws.
   */
  insert(className: string, declarations: readonly CSSDeclaration[]): void {
    const existing = this.rules.get(className)
    if (existing === undefined) {
      this.rules.set(className, declarations)
      return
    }
    if (!sameDeclarations(existing, declarations)) {
      throw new StyleError({
        reason: "fingerprint-collision",
        detail: className,
        recovery: Recovery.escalate(
          `Class ${className} already holds a different declaration set`,
          "FINGERPRINT_COLLISION",
        ),
      })
    }
  }

  entries(): readonly Rule[] {
    return [...this.rules].map(([className, declarations]) => ({ className, declarations }))
  }
}

// ============================================================================
// Collection
// ============================================================================

/**
 * Add the rule for one annotation list, returning its class name when the
 * declaration set is non-empty.
 */
export const collectModifiers = (
  table: RuleTable,
  modifiers: readonly Modifier[],
): Option.Option<string> => {
  const declarations = declarationSet(modifiers)
  if (declarations.length === 0) return Option.none()
  const className = fingerprint(declarations)
  table.insert(className, declarations)
  return Option.some(className)
}

export const collectStyles = (root: Node): RuleTable => {
  const table = new RuleTable()
  walk(root, (node) => {
    if (node._tag === "Modified") {
      collectModifiers(table, node.modifiers)
    }
  })
  return table
}

// ============================================================================
// Output
// ============================================================================

export const renderStylesheet = (table: RuleTable): string =>
  table
    .entries()
    .map(
      ({ className, declarations }) =>
        `.${className} {\n${declarations.map((d) => `  ${renderDeclaration(d)};\n`).join("")}}\n`,
    )
    .join("")

/**
 * The markup pass's view of the table: recompute the set and fingerprint
 * for an annotation list and answer only with classes the table holds.
 */
export type ClassLookup = (modifiers: readonly Modifier[]) => Option.Option<string>

export const classLookup =
  (table: RuleTable): ClassLookup =>
  (modifiers) => {
    const declarations = declarationSet(modifiers)
    if (declarations.length === 0) return Option.none()
    const className = fingerprint(declarations)
    return table.has(className) ? Option.some(className) : Option.none()
  }

export const noClassLookup: ClassLookup = () => Option.none()
