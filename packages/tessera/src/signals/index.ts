/**
 * Tessera - Signals Module
 *
 * Reactive field declarations, expressions and the client script emitter.
 */

export {
  type BinaryOp,
  Expression,
  compileExpr,
  referencedSignals,
  $,
} from "./expression"

export {
  type StateValue,
  ReactiveField,
  type ReactiveFields,
  Signal,
  type StateField,
  type ComputedField,
  type ActionField,
  type HasSignals,
  extractStates,
  extractComputeds,
  extractActions,
} from "./protocol"

export {
  RUNTIME_GLOBAL,
  type EventBindingRecord,
  extractEventBindings,
  positionSelector,
  emitScript,
} from "./emitter"

export { quoteJS, formatJSValue, isIdentifier } from "./values"
