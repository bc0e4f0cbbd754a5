/**
 * Split text into lines, keeping each line's terminator
 *
 * @example
 * splitLines("a\nb\r\nc") // ["a\n", "b\r\n", "c"]
 */
export function splitLines(text: string): string[] {
  return text.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}
