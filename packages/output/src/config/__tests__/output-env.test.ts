import { InvalidConfigError } from "../../core/errors"
import { loadOutputConfig } from "../output-env"

describe("loadOutputConfig", () => {
  it("returns defaults for an empty environment", () => {
    expect(loadOutputConfig({})).toEqual({
      quiet: false,
      silent: false,
      diagnosticsLevel: "warn",
    })
  })

  it("reads level, verbosity and flags", () => {
    const config = loadOutputConfig({
      CLOUT_LEVEL: "debug",
      CLOUT_VERBOSE: "2",
      CLOUT_QUIET: "true",
      CLOUT_SILENT: "no",
      CLOUT_DIAGNOSTICS_LEVEL: "debug",
    })

    expect(config).toEqual({
      level: "debug",
      verbosity: 2,
      quiet: true,
      silent: false,
      diagnosticsLevel: "debug",
    })
  })

  it("treats blank values as unset", () => {
    expect(loadOutputConfig({ CLOUT_LEVEL: "", CLOUT_VERBOSE: " ", NO_COLOR: "" })).toEqual({
      quiet: false,
      silent: false,
      diagnosticsLevel: "warn",
    })
  })

  it("ignores unrelated variables", () => {
    expect(loadOutputConfig({ HOME: "/home/test", PATH: "/usr/bin" })).toEqual({
      quiet: false,
      silent: false,
      diagnosticsLevel: "warn",
    })
  })

  describe("color mode", () => {
    it("disables color for a non-empty NO_COLOR", () => {
      expect(loadOutputConfig({ NO_COLOR: "1" }).colorMode).toBe("never")
    })

    it("forces color for FORCE_COLOR, even an empty one", () => {
      expect(loadOutputConfig({ FORCE_COLOR: "1" }).colorMode).toBe("always")
      expect(loadOutputConfig({ FORCE_COLOR: "" }).colorMode).toBe("always")
    })

    it("disables color for FORCE_COLOR=0 or false", () => {
      expect(loadOutputConfig({ FORCE_COLOR: "0" }).colorMode).toBe("never")
      expect(loadOutputConfig({ FORCE_COLOR: "false" }).colorMode).toBe("never")
    })

    it("prefers FORCE_COLOR over NO_COLOR", () => {
      expect(loadOutputConfig({ FORCE_COLOR: "1", NO_COLOR: "1" }).colorMode).toBe("always")
    })

    it("prefers CLOUT_COLOR over everything", () => {
      expect(loadOutputConfig({ CLOUT_COLOR: "auto", FORCE_COLOR: "0" }).colorMode).toBe(
        "auto",
      )
    })

    it("leaves the mode unset without any color variable", () => {
      expect(loadOutputConfig({}).colorMode).toBeUndefined()
    })
  })

  describe("validation", () => {
    it("rejects an unknown level name", () => {
      expect(() => loadOutputConfig({ CLOUT_LEVEL: "loud" })).toThrow(InvalidConfigError)
    })

    it("names the offending variable", () => {
      expect(() => loadOutputConfig({ CLOUT_VERBOSE: "-1" })).toThrow(/CLOUT_VERBOSE/)
    })

    it("rejects a non-numeric verbosity", () => {
      expect(() => loadOutputConfig({ CLOUT_VERBOSE: "lots" })).toThrow(InvalidConfigError)
    })

    it("rejects an unrecognized boolean", () => {
      expect(() => loadOutputConfig({ CLOUT_QUIET: "maybe" })).toThrow(InvalidConfigError)
    })

    it("rejects an unknown color mode", () => {
      expect(() => loadOutputConfig({ CLOUT_COLOR: "sometimes" })).toThrow(InvalidConfigError)
    })
  })
})
