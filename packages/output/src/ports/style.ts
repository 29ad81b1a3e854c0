export type StyleColor =
  | "black"
  | "red"
  | "green"
  | "yellow"
  | "blue"
  | "magenta"
  | "cyan"
  | "white"

export type Style = Readonly<{
  color?: StyleColor
  bold?: boolean
}>
