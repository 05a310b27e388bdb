/**
 * Tessera - Script value serialization
 *
 * Values end up inside a <script> body, so every string goes through the
 * same escaping and nothing is ever interpolated raw.
 */

const SCRIPT_ESCAPES: Record<string, string> = {
  "\\": "\\\\",
  '"': '\\"',
  "\n": "\\n",
  "\r": "\\r",
  "<": "\\u003c",
}

/** Double-quoted script string literal; `<` is escaped so "</script>" cannot close the tag */
export const quoteJS = (value: string): string =>
  `"${value.replace(/[\\"\n\r<]/g, (char) => SCRIPT_ESCAPES[char] ?? char)}"`

/**
 * Strings are quoted and escaped, booleans and numbers are literals,
 * anything else falls back to a quoted description.
 */
export const formatJSValue = (value: unknown): string => {
  if (typeof value === "string") return quoteJS(value)
  if (typeof value === "boolean") return value ? "true" : "false"
  if (typeof value === "number" && Number.isFinite(value)) {
    return Object.is(value, -0) ? "0" : String(value)
  }
  if (typeof value === "bigint") return value.toString()
  return quoteJS(String(value))
}

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/

const RESERVED = new Set([
  "break", "case", "catch", "class", "const", "continue", "debugger", "default", "delete",
  "do", "else", "enum", "export", "extends", "false", "finally", "for", "function", "if",
  "import", "in", "instanceof", "let", "new", "null", "return", "super", "switch", "this",
  "throw", "true", "try", "typeof", "var", "void", "while", "with", "yield", "await",
])

export const isIdentifier = (name: string): boolean => IDENTIFIER.test(name) && !RESERVED.has(name)
