import type { ParseError } from "./parse-error.js"
import { describeParseError } from "./parse-error.js"

// CHANGE: render a window of source bytes around a parse failure
// WHY: point at the failing byte with a caret under an escaped context line
// QUOTE(TZ): "a caret printed beneath the failure offset"
// REF: req-diagnostics-1
// SOURCE: n/a
// FORMAT THEOREM: ∀b,o,w: caretColumn(render(b,o,w)) = width(escape(b[start..o)))
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: the window never exceeds w bytes
// COMPLEXITY: O(w)

export const DEFAULT_CONTEXT_WINDOW = 60

export interface ContextWindow {
  readonly start: number
  readonly end: number
  readonly line: string
  readonly caretColumn: number
}

const namedEscapes: Readonly<Record<number, string>> = {
  0x09: "\\t",
  0x0a: "\\n",
  0x0b: "\\v",
  0x0c: "\\f",
  0x0d: "\\r"
}

export const escapeByte = (byte: number): string => {
  const named = namedEscapes[byte]
  if (named !== undefined) {
    return named
  }
  if (byte < 0x20 || byte >= 0x7f) {
    return `\\x${byte.toString(16).padStart(2, "0")}`
  }
  return String.fromCharCode(byte)
}

/**
 * Slice the bytes around `offset` and escape them for a single-line display.
 *
 * @param bytes - Whole source.
 * @param offset - Failure offset; may equal bytes.length at end of input.
 * @param window - Total number of bytes to show, half before the offset.
 * @returns The escaped line and the column of the failing byte in it.
 *
 * @pure true
 * @complexity O(window)
 */
export const renderContext = (bytes: Uint8Array, offset: number, window: number): ContextWindow => {
  const clamped = Math.min(Math.max(offset, 0), bytes.length)
  const before = Math.floor(window / 2)
  const start = Math.max(0, clamped - before)
  const end = Math.min(bytes.length, clamped + (window - before))
  let line = ""
  let caretColumn = 0
  for (let index = start; index < end; index++) {
    if (index === clamped) {
      caretColumn = line.length
    }
    line += escapeByte(bytes[index] ?? 0)
  }
  if (clamped >= end) {
    caretColumn = line.length
  }
  return { start, end, line, caretColumn }
}

/**
 * Human-readable report of a parse failure.
 *
 * @pure true
 * @invariant last line contains exactly one caret
 */
export const renderDiagnostic = (error: ParseError, bytes: Uint8Array, window: number): string => {
  const context = renderContext(bytes, error.offset, window)
  return [
    describeParseError(error),
    "context:",
    context.line,
    `${" ".repeat(context.caretColumn)}^`
  ].join("\n")
}
