import { formatMessage } from "../format-message"

describe("formatMessage", () => {
  it("returns the template untouched without arguments", () => {
    expect(formatMessage("100% done", [])).toBe("100% done")
  })

  it("substitutes positional placeholders", () => {
    expect(formatMessage("copied %d files to %s", [3, "dist"])).toBe("copied 3 files to dist")
  })

  it("renders %j as JSON", () => {
    expect(formatMessage("payload %j", [{ id: 1 }])).toBe('payload {"id":1}')
  })

  it("appends arguments without a placeholder", () => {
    expect(formatMessage("done", ["in", 2, "steps"])).toBe("done in 2 steps")
  })

  it("collapses %% to a single percent sign when formatting", () => {
    expect(formatMessage("%d%% complete", [40])).toBe("40% complete")
  })
})
