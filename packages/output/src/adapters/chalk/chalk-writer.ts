import { Chalk, type ChalkInstance } from "chalk"
import type { OutputSink, WriteErrorListener } from "../../ports/output-sink"
import type { Style } from "../../ports/style"
import type { StyledWriter } from "../../ports/styled-writer"

export type ChalkWriterDeps = {
  sink: OutputSink
  /** Receives failures the sink reports after `flush()` has returned. */
  onAsyncError: WriteErrorListener
}

/** Basic 16-color ANSI support covers every level style. */
const ANSI_BASIC = 1

export class ChalkWriter implements StyledWriter {
  readonly useColor: boolean
  private readonly chalk: ChalkInstance
  private style: Style | undefined
  private pending = ""

  constructor(
    private readonly deps: ChalkWriterDeps,
    useColor: boolean,
  ) {
    this.useColor = useColor
    this.chalk = new Chalk({ level: useColor ? ANSI_BASIC : 0 })
  }

  setStyle(style: Style): void {
    this.style = style
  }

  write(text: string): void {
    this.pending += this.paint(text)
  }

  endLine(): void {
    this.pending += "\n"
  }

  reset(): void {
    this.style = undefined
  }

  flush(): void {
    const chunk = this.pending
    this.pending = ""

    if (chunk) this.deps.sink.write(chunk, this.deps.onAsyncError)
  }

  private paint(text: string): string {
    if (!this.useColor || !this.style) return text

    let painter = this.chalk
    if (this.style.color) painter = painter[this.style.color]
    if (this.style.bold) painter = painter.bold

    return painter === this.chalk ? text : painter(text)
  }
}
