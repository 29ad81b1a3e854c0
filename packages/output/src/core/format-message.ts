import { format } from "node:util"

/**
 * printf-style formatting: `%s`, `%d`, `%i`, `%f`, `%j`, `%o`, `%O` and `%%`.
 * Arguments without a placeholder are appended, separated by spaces.
 */
export function formatMessage(template: string, args: readonly unknown[]): string {
  if (args.length === 0) return template

  return format(template, ...args)
}
