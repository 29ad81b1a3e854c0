import { Writable } from "node:stream"

import { StreamSink, type TextStream } from "../stream-sink"

describe("StreamSink behavior", () => {
  it("treats a stream without isTTY as not a terminal", () => {
    const stream: TextStream = { write: () => true, on: () => undefined }

    expect(new StreamSink(stream).isTerminal()).toBe(false)
  })

  it("forwards the stream's write error to the listener", () => {
    const failure = new Error("EPIPE")
    const stream: TextStream = {
      write: (_chunk, callback) => {
        callback(failure)
        return false
      },
      on: () => undefined,
    }
    const onError = vi.fn()

    new StreamSink(stream).write("x\n", onError)

    expect(onError).toHaveBeenCalledWith(failure)
  })

  it("ignores a successful write callback", () => {
    const stream: TextStream = {
      write: (_chunk, callback) => {
        callback(null)
        return true
      },
      on: () => undefined,
    }
    const onError = vi.fn()

    new StreamSink(stream).write("x\n", onError)

    expect(onError).not.toHaveBeenCalled()
  })

  it("listens for error events once per stream", () => {
    const on = vi.fn()
    const stream: TextStream = { write: () => true, on }

    new StreamSink(stream)
    new StreamSink(stream)

    expect(on).toHaveBeenCalledTimes(1)
    expect(on).toHaveBeenCalledWith("error", expect.any(Function))
  })

  it("reports a failed write on a real stream through the callback only", async () => {
    const epipe = Object.assign(new Error("write EPIPE"), { code: "EPIPE" })
    const stream = new Writable({
      write(_chunk, _encoding, callback) {
        callback(epipe)
      },
    })
    const onError = vi.fn()

    new StreamSink(stream).write("x\n", onError)

    await vi.waitFor(() => expect(stream.closed).toBe(true))
    expect(onError).toHaveBeenCalledTimes(1)
    expect(onError).toHaveBeenCalledWith(epipe)
  })

  it("defaults to process.stdout", () => {
    const spy = vi.spyOn(process.stdout, "write").mockImplementation(() => true)

    new StreamSink().write("hello\n", vi.fn())

    expect(spy).toHaveBeenCalledWith("hello\n", expect.any(Function))
  })
})
