import { describe, it, expect } from "vitest"
import {
  AppLoadError,
  Recovery,
  RenderError,
  ScriptError,
  TraversalError,
  describeError,
  describeRecovery,
  isAppError,
} from "./errors"

const selfExpansion = new TraversalError({
  reason: "self-expansion",
  node: "Component(Loop)",
  recovery: Recovery.escalate("Component body returned the component itself", "SELF_EXPANSION"),
})

describe("describeError", () => {
  it("includes the wrapped cause", () => {
    const error = new RenderError({
      component: "home",
      cause: selfExpansion,
      recovery: Recovery.escalate("Failed to render page: home", "RENDER_ERROR"),
    })
    expect(describeError(error)).toBe(
      "[RenderError] Escalate(RENDER_ERROR: Failed to render page: home) <- [TraversalError] Escalate(SELF_EXPANSION: Component body returned the component itself)",
    )
  })

  it("describes an escalation by code and message", () => {
    expect(describeRecovery(Recovery.escalate("Rename the field", "INVALID_IDENTIFIER"))).toBe(
      "Escalate(INVALID_IDENTIFIER: Rename the field)",
    )
  })

  it("uses the message of a plain wrapped cause", () => {
    const error = new AppLoadError({
      entry: "site.ts",
      cause: new Error("no default export"),
      recovery: Recovery.escalate("Could not load site.ts", "APP_LOAD_ERROR"),
    })
    expect(describeError(error)).toBe("[AppLoadError] Escalate(APP_LOAD_ERROR: Could not load site.ts) <- no default export")
  })

  it("stops at the hint for errors without a cause", () => {
    const error = new ScriptError({
      reason: "invalid-identifier",
      name: "a-b",
      recovery: Recovery.escalate("Invalid identifier: a-b", "INVALID_IDENTIFIER"),
    })
    expect(describeError(error)).toBe("[ScriptError] Escalate(INVALID_IDENTIFIER: Invalid identifier: a-b)")
  })
})

describe("isAppError", () => {
  it("recognises tagged app errors only", () => {
    expect(isAppError(selfExpansion)).toBe(true)
    expect(isAppError(new Error("plain"))).toBe(false)
    expect(isAppError({ _tag: "StyleError" })).toBe(false)
  })
})
