export type WriteErrorListener = (err: unknown) => void

/**
 * The single destination for rendered output.
 *
 * A sink receives whole chunks (one per emitted message) and never splits
 * or reorders them.
 */
export interface OutputSink {
  /**
   * Whether the destination is an interactive terminal.
   * Queried once, when an output state is installed.
   */
  isTerminal(): boolean

  /**
   * Write a chunk.
   *
   * Failures may surface synchronously (a throw) or later through
   * `onError`, depending on the underlying destination.
   */
  write(chunk: string, onError: WriteErrorListener): void
}
