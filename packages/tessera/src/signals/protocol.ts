/**
 * Tessera - Reactive Field Protocol
 *
 * Pages declare their client-side fields explicitly: a record from field
 * name to a State, Computed or Action marker. Record order is declaration
 * order and is the order the script emits them in.
 *
 * @example
 * const signals = {
 *   count: Signal.state(0),
 *   doubled: Signal.computed($.mul($.signal("count"), $.num(2))),
 *   increment: Signal.action($.increment("count")),
 * }
 */
import { Data } from "effect"
import type { Expression } from "./expression"

export type StateValue = string | number | boolean | bigint

export type ReactiveField = Data.TaggedEnum<{
  /** Reactive cell with a serializable initial value */
  State: { readonly initial: unknown }
  /** Derived cell, recomputed on the client */
  Computed: { readonly expr: Expression }
  /** Client function; an empty body emits a stub */
  Action: { readonly body: readonly Expression[] }
}>

export const ReactiveField = Data.taggedEnum<ReactiveField>()

export type ReactiveFields = Readonly<Record<string, ReactiveField>>

export const Signal = {
  state: (initial: StateValue): ReactiveField => ReactiveField.State({ initial }),
  computed: (expr: Expression): ReactiveField => ReactiveField.Computed({ expr }),
  action: (...body: Expression[]): ReactiveField => ReactiveField.Action({ body }),
}

// ============================================================================
// Field Discovery
// ============================================================================

export interface StateField {
  readonly name: string
  readonly initial: unknown
}

export interface ComputedField {
  readonly name: string
  readonly expr: Expression
}

export interface ActionField {
  readonly name: string
  readonly body: readonly Expression[]
}

/** Anything that declares reactive fields, typically a Page */
export interface HasSignals {
  readonly signals?: ReactiveFields
}

const fieldsOf = (owner: HasSignals): ReadonlyArray<readonly [string, ReactiveField]> =>
  Object.entries(owner.signals ?? {})

export const extractStates = (owner: HasSignals): readonly StateField[] =>
  fieldsOf(owner).flatMap<StateField>(([name, field]) =>
    field._tag === "State" ? [{ name, initial: field.initial }] : [],
  )

export const extractComputeds = (owner: HasSignals): readonly ComputedField[] =>
  fieldsOf(owner).flatMap<ComputedField>(([name, field]) =>
    field._tag === "Computed" ? [{ name, expr: field.expr }] : [],
  )

export const extractActions = (owner: HasSignals): readonly ActionField[] =>
  fieldsOf(owner).flatMap<ActionField>(([name, field]) =>
    field._tag === "Action" ? [{ name, body: field.body }] : [],
  )
