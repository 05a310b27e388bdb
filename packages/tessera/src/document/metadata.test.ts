import { describe, it, expect } from "vitest"
import { Option } from "effect"
import { composeTitle, mergeMetadata, serializeStructuredData, titleOf } from "./metadata"

describe("composeTitle", () => {
  it("joins page and site titles", () => {
    expect(composeTitle("Home", " | ", "Acme")).toEqual(Option.some("Home | Acme"))
  })

  it("falls back to whichever title is present", () => {
    expect(composeTitle("Home", " | ", undefined)).toEqual(Option.some("Home"))
    expect(composeTitle(undefined, " | ", "Acme")).toEqual(Option.some("Acme"))
    expect(composeTitle("", " | ", "Acme")).toEqual(Option.some("Acme"))
  })

  it("is absent when neither title is set", () => {
    expect(Option.isNone(composeTitle(undefined, " | ", ""))).toBe(true)
  })
})

describe("mergeMetadata", () => {
  it("lets page fields replace application fields", () => {
    const merged = mergeMetadata({ site: "Acme", title: "Acme", description: "Tools" }, { title: "About" })
    expect(merged.site).toBe("Acme")
    expect(merged.title).toBe("About")
    expect(merged.description).toBe("Tools")
  })

  it("uses the configured separator", () => {
    expect(titleOf({ site: "Acme", title: "About", titleSeparator: " · " })).toEqual(Option.some("About · Acme"))
    expect(titleOf({ site: "Acme", title: "About" })).toEqual(Option.some("About | Acme"))
  })
})

describe("serializeStructuredData", () => {
  it("escapes < in the payload", () => {
    expect(serializeStructuredData({ name: "</script>" })).toBe('{"name":"\\u003c/script>"}')
  })
})
