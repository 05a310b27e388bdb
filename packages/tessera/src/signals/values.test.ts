import { describe, it, expect } from "vitest"
import { formatJSValue, isIdentifier, quoteJS } from "./values"

describe("formatJSValue", () => {
  it("quotes and escapes strings", () => {
    expect(formatJSValue('say "hi"\n')).toBe('"say \\"hi\\"\\n"')
    expect(quoteJS("a\\b\r")).toBe('"a\\\\b\\r"')
  })

  it("escapes < so a string cannot close the script tag", () => {
    expect(formatJSValue("</script>")).toBe('"\\u003c/script>"')
  })

  it("prints booleans and numbers as literals", () => {
    expect(formatJSValue(true)).toBe("true")
    expect(formatJSValue(false)).toBe("false")
    expect(formatJSValue(42)).toBe("42")
    expect(formatJSValue(1.5)).toBe("1.5")
    expect(formatJSValue(-0)).toBe("0")
    expect(formatJSValue(10n)).toBe("10")
  })

  it("quotes anything else by its description", () => {
    expect(formatJSValue(null)).toBe('"null"')
    expect(formatJSValue(Number.NaN)).toBe('"NaN"')
  })
})

describe("isIdentifier", () => {
  it("accepts plain identifiers", () => {
    expect(isIdentifier("count")).toBe(true)
    expect(isIdentifier("$el")).toBe(true)
    expect(isIdentifier("_private2")).toBe(true)
  })

  it("rejects malformed names and reserved words", () => {
    expect(isIdentifier("1st")).toBe(false)
    expect(isIdentifier("my-count")).toBe(false)
    expect(isIdentifier("")).toBe(false)
    expect(isIdentifier("class")).toBe(false)
  })
})
