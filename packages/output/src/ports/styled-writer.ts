import type { Style } from "./style"

/**
 * A color-capable writer bound to one sink.
 *
 * Text written between `setStyle()` and `reset()` carries the style when
 * color is enabled. Nothing reaches the sink until `flush()`, which hands
 * everything buffered since the previous flush over as one chunk.
 */
export interface StyledWriter {
  readonly useColor: boolean

  setStyle(style: Style): void
  write(text: string): void
  endLine(): void
  reset(): void

  /**
   * @throws whatever the sink throws synchronously; the buffer is cleared
   * either way.
   */
  flush(): void
}
