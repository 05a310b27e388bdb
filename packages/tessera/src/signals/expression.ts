/**
 * Tessera - Client-side reactive expressions
 *
 * Expressions represent client-side JavaScript used by computed fields and
 * action bodies. They compile to strings but keep their structure until then.
 */
import { Data } from "effect"
import { formatJSValue } from "./values"

export type BinaryOp =
  | "&&"
  | "||"
  | "==="
  | "!=="
  | ">"
  | "<"
  | ">="
  | "<="
  | "+"
  | "-"
  | "*"
  | "/"
  | "%"
  | "??"

export type Expression = Data.TaggedEnum<{
  /** Literal JavaScript source, emitted as-is */
  Literal: { readonly value: string }
  /** Reference to a declared state or computed field */
  Signal: { readonly name: string }
  Binary: {
    readonly left: Expression
    readonly op: BinaryOp
    readonly right: Expression
  }
  Unary: { readonly op: "!" | "-" | "+" | "typeof"; readonly expr: Expression }
  Ternary: {
    readonly condition: Expression
    readonly then: Expression
    readonly else: Expression
  }
  Call: {
    readonly fn: string
    readonly args: readonly Expression[]
  }
  Member: {
    readonly object: Expression
    readonly property: string
  }
  /** Write to a state field */
  Assign: {
    readonly name: string
    readonly value: Expression
  }
}>

export const Expression = Data.taggedEnum<Expression>()

/** Compile expression to JavaScript source */
export const compileExpr = (e: Expression): string =>
  Expression.$match(e, {
    Literal: ({ value }) => value,
    Signal: ({ name }) => `${name}.value`,
    Binary: ({ left, op, right }) => `(${compileExpr(left)} ${op} ${compileExpr(right)})`,
    Unary: ({ op, expr }) => (op === "typeof" ? `typeof (${compileExpr(expr)})` : `${op}(${compileExpr(expr)})`),
    Ternary: ({ condition, then, else: otherwise }) =>
      `(${compileExpr(condition)} ? ${compileExpr(then)} : ${compileExpr(otherwise)})`,
    Call: ({ fn, args }) => `${fn}(${args.map(compileExpr).join(", ")})`,
    Member: ({ object, property }) => `${compileExpr(object)}.${property}`,
    Assign: ({ name, value }) => `${name}.value = ${compileExpr(value)}`,
  })

/** Names of every field an expression reads or writes */
export const referencedSignals = (e: Expression): readonly string[] => {
  const names = new Set<string>()
  const visit = (x: Expression): void =>
    Expression.$match(x, {
      Literal: () => {},
      Signal: ({ name }) => {
        names.add(name)
      },
      Binary: ({ left, right }) => {
        visit(left)
        visit(right)
      },
      Unary: ({ expr }) => visit(expr),
      Ternary: ({ condition, then, else: otherwise }) => {
        visit(condition)
        visit(then)
        visit(otherwise)
      },
      Call: ({ args }) => args.forEach(visit),
      Member: ({ object }) => visit(object),
      Assign: ({ name, value }) => {
        names.add(name)
        visit(value)
      },
    })
  visit(e)
  return [...names]
}

// ============================================================================
// Expression Helpers
// ============================================================================

const binary =
  (op: BinaryOp) =>
  (left: Expression, right: Expression): Expression =>
    Expression.Binary({ left, op, right })

export const $ = {
  /** Reference a field by name */
  signal: (name: string): Expression => Expression.Signal({ name }),

  /** Raw JavaScript source */
  expr: (value: string): Expression => Expression.Literal({ value }),

  // Literals go through the script serializer
  str: (value: string): Expression => Expression.Literal({ value: formatJSValue(value) }),
  num: (value: number): Expression => Expression.Literal({ value: formatJSValue(value) }),
  bool: (value: boolean): Expression => Expression.Literal({ value: formatJSValue(value) }),
  null: (): Expression => Expression.Literal({ value: "null" }),

  // Boolean
  and: binary("&&"),
  or: binary("||"),
  not: (e: Expression): Expression => Expression.Unary({ op: "!", expr: e }),

  // Comparison
  eq: binary("==="),
  neq: binary("!=="),
  gt: binary(">"),
  gte: binary(">="),
  lt: binary("<"),
  lte: binary("<="),

  // Arithmetic
  add: binary("+"),
  sub: binary("-"),
  mul: binary("*"),
  div: binary("/"),
  mod: binary("%"),
  coalesce: binary("??"),
  neg: (e: Expression): Expression => Expression.Unary({ op: "-", expr: e }),

  // Control flow
  if: (condition: Expression, then: Expression, otherwise: Expression): Expression =>
    Expression.Ternary({ condition, then, else: otherwise }),

  call: (fn: string, ...args: Expression[]): Expression => Expression.Call({ fn, args }),
  member: (object: Expression, property: string): Expression => Expression.Member({ object, property }),
  template: (...parts: Expression[]): Expression =>
    parts.reduce((acc, part) => Expression.Binary({ left: acc, op: "+", right: part }), $str("")),

  // Writes
  set: (name: string, value: Expression): Expression => Expression.Assign({ name, value }),
  increment: (name: string, by = 1): Expression =>
    Expression.Assign({
      name,
      value: Expression.Binary({
        left: Expression.Signal({ name }),
        op: "+",
        right: Expression.Literal({ value: formatJSValue(by) }),
      }),
    }),
  toggle: (name: string): Expression =>
    Expression.Assign({ name, value: Expression.Unary({ op: "!", expr: Expression.Signal({ name }) }) }),
}

function $str(value: string): Expression {
  return Expression.Literal({ value: formatJSValue(value) })
}
