import type { OutputSink, WriteErrorListener } from "../../ports/output-sink"

export type MemorySinkOptions = {
  /** What `isTerminal()` reports. Defaults to `false`. */
  terminal?: boolean
}

/**
 * Keeps every chunk in memory. Useful for tests and for callers that want
 * to capture output instead of printing it.
 */
export class MemorySink implements OutputSink {
  private readonly chunks: string[] = []
  private readonly terminal: boolean
  private failure: { error: unknown; async: boolean } | undefined

  constructor(options: MemorySinkOptions = {}) {
    this.terminal = options.terminal ?? false
  }

  isTerminal(): boolean {
    return this.terminal
  }

  write(chunk: string, onError: WriteErrorListener): void {
    const failure = this.failure

    if (!failure) {
      this.chunks.push(chunk)
      return
    }

    if (failure.async) {
      queueMicrotask(() => onError(failure.error))
      return
    }

    throw failure.error
  }

  /**
   * Make subsequent writes fail, either by throwing or by reporting
   * through the error listener on a later microtask.
   */
  failWith(error: unknown, opts: { async?: boolean } = {}): void {
    this.failure = { error, async: opts.async ?? false }
  }

  recover(): void {
    this.failure = undefined
  }

  read(): string[] {
    return [...this.chunks]
  }

  text(): string {
    return this.chunks.join("")
  }

  clear(): void {
    this.chunks.length = 0
  }
}
