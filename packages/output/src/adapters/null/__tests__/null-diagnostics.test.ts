import { NullDiagnostics } from "../null-diagnostics"

describe("NullDiagnostics", () => {
  it("never throws for any method", () => {
    const diagnostics = new NullDiagnostics()

    expect(() => diagnostics.debug("x")).not.toThrow()
    expect(() => diagnostics.info("x")).not.toThrow()
    expect(() => diagnostics.warn("x", { err: new Error("boom") })).not.toThrow()
    expect(() => diagnostics.error("x")).not.toThrow()
  })
})
