import type { OutputSink, WriteErrorListener } from "../../ports/output-sink"

/**
 * The subset of a Node writable stream the sink relies on.
 * `process.stdout` and `process.stderr` satisfy it.
 */
export type TextStream = {
  write(chunk: string, callback: (err?: Error | null) => void): boolean
  on(event: "error", listener: (err: Error) => void): unknown
  readonly isTTY?: boolean
}

// Failed writes reach the write callback as well; the event only needs a listener
// so the stream does not rethrow it as uncaught.
const ignoreStreamError = (): void => {}
const guarded = new WeakSet<TextStream>()

export class StreamSink implements OutputSink {
  constructor(private readonly stream: TextStream = process.stdout) {
    if (!guarded.has(stream)) {
      stream.on("error", ignoreStreamError)
      guarded.add(stream)
    }
  }

  isTerminal(): boolean {
    return this.stream.isTTY === true
  }

  write(chunk: string, onError: WriteErrorListener): void {
    this.stream.write(chunk, (err) => {
      if (err) onError(err)
    })
  }
}

export function createStdoutSink(): OutputSink {
  return new StreamSink(process.stdout)
}
