import { Writable } from "node:stream"
import pino from "pino"
import { WriteFailedError } from "../../../core/errors"
import { createPinoDiagnostics, PinoDiagnostics } from "../pino-diagnostics"

function makeLineDestination() {
  const lines: string[] = []

  const destination = new Writable({
    write(chunk, _encoding, callback) {
      const line = chunk.toString("utf8").trim()
      if (line) lines.push(line)
      callback()
    },
  })

  return { lines, destination }
}

describe("PinoDiagnostics behavior", () => {
  it("writes JSON tagged with the component", () => {
    const { lines, destination } = makeLineDestination()

    const diagnostics = new PinoDiagnostics({ destination }, { level: "debug" })
    diagnostics.debug("output installed", { threshold: "info", useColor: false })

    expect(lines).toHaveLength(1)

    const [payload] = lines.map((line) => JSON.parse(line))

    expect(payload).toMatchObject({
      level: 20,
      msg: "output installed",
      component: "clout",
      threshold: "info",
      useColor: false,
    })
  })

  it("suppresses debug and info at the default warn level", () => {
    const { lines, destination } = makeLineDestination()

    const diagnostics = new PinoDiagnostics({ destination })
    diagnostics.debug("quiet")
    diagnostics.info("quiet")
    diagnostics.warn("loud")
    diagnostics.error("louder")

    expect(lines.map((l) => JSON.parse(l).msg)).toEqual(["loud", "louder"])
  })

  it("serializes err with its cause", () => {
    const { lines, destination } = makeLineDestination()

    const diagnostics = new PinoDiagnostics({ destination })
    diagnostics.warn("output write failed", { err: new WriteFailedError(new Error("EPIPE")) })

    const [payload] = lines.map((line) => JSON.parse(line))

    expect(payload?.level).toBe(40)
    expect(payload?.err).toMatchObject({
      type: "WriteFailedError",
      message: "failed to write output: EPIPE",
      code: "write_failed",
    })
  })

  it("derives from a base logger when one is provided", () => {
    const { lines, destination } = makeLineDestination()
    const base = pino({ level: "info" }, destination).child({ app: "deploy-tool" })

    const diagnostics = new PinoDiagnostics({ base })
    diagnostics.info("hello")

    const [payload] = lines.map((line) => JSON.parse(line))

    expect(payload).toMatchObject({
      msg: "hello",
      app: "deploy-tool",
      component: "clout",
    })
  })

  it("createPinoDiagnostics() honors the requested level", () => {
    const { lines, destination } = makeLineDestination()

    const diagnostics = createPinoDiagnostics({ destination }, { level: "error" })
    diagnostics.warn("dropped")
    diagnostics.error("kept")

    expect(lines.map((l) => JSON.parse(l).msg)).toEqual(["kept"])
  })
})
