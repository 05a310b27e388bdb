/**
 * Tessera - Reactive Binding Extractor
 *
 * Pass 3 of a page render: gather the page's declared fields and the event
 * bindings in the tree, and emit the client script that wires them up.
 */
import { ScriptError, Recovery } from "../core/errors"
import { isEventBinding } from "../ui/modifiers"
import type { Node } from "../ui/nodes"
import { POSITION_ATTRIBUTE } from "../ui/render"
import { walk } from "../ui/traverse"
import { compileExpr, referencedSignals } from "./expression"
import { type HasSignals, extractActions, extractComputeds, extractStates } from "./protocol"
import { formatJSValue, isIdentifier } from "./values"

/** Global the client runtime installs */
export const RUNTIME_GLOBAL = "Tessera"

export interface EventBindingRecord {
  readonly elementIndex: number
  readonly event: string
  readonly handler: string
}

/**
 * Walk the tree counting Modified nodes in document order; every
 * EventBinding annotation is recorded against its wrapper's position.
 */
export const extractEventBindings = (root: Node): readonly EventBindingRecord[] => {
  const bindings: EventBindingRecord[] = []
  let position = 0
  walk(root, (node) => {
    if (node._tag !== "Modified") return
    const elementIndex = position++
    for (const modifier of node.modifiers) {
      if (isEventBinding(modifier)) {
        bindings.push({ elementIndex, event: modifier.event, handler: modifier.handler })
      }
    }
  })
  return bindings
}

const requireIdentifier = (name: string): string => {
  if (!isIdentifier(name)) {
    throw new ScriptError({
      reason: "invalid-identifier",
      name,
      recovery: Recovery.escalate(
        `"${name}" cannot be used as a client script identifier`,
        "INVALID_IDENTIFIER",
      ),
    })
  }
  return name
}

/** `[data-s~="N"]`: positions are space-separated tokens on the element */
export const positionSelector = (index: number): string => `[${POSITION_ATTRIBUTE}~="${index}"]`

/**
 * Emit the page script, or "" when the page declares nothing reactive and
 * the tree has no bindings.
 */
export const emitScript = (page: HasSignals, root: Node): string => {
  const states = extractStates(page)
  const computeds = extractComputeds(page)
  const actions = extractActions(page)
  const bindings = extractEventBindings(root)

  if (states.length + computeds.length + actions.length + bindings.length === 0) {
    return ""
  }

  const lines: string[] = []

  for (const { name, initial } of states) {
    lines.push(`const ${requireIdentifier(name)} = ${RUNTIME_GLOBAL}.state(${formatJSValue(initial)});`)
  }

  for (const { name, expr } of computeds) {
    referencedSignals(expr).forEach(requireIdentifier)
    lines.push(`const ${requireIdentifier(name)} = ${RUNTIME_GLOBAL}.computed(() => ${compileExpr(expr)});`)
  }

  for (const { name, body } of actions) {
    body.flatMap(referencedSignals).forEach(requireIdentifier)
    const statements = body.map((statement) => ` ${compileExpr(statement)};`).join("")
    lines.push(`function ${requireIdentifier(name)}() {${statements.length > 0 ? `${statements} ` : ""}}`)
  }

  for (const { elementIndex, event, handler } of bindings) {
    lines.push(
      `document.querySelector('${positionSelector(elementIndex)}')?.addEventListener(${formatJSValue(event)}, ${requireIdentifier(handler)});`,
    )
  }

  return `<script>\n${lines.join("\n")}\n</script>`
}
