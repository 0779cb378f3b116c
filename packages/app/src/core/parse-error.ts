import { Match } from "effect"

// CHANGE: typed parse failures carrying the byte offset of the failure
// WHY: the parser returns errors to its caller instead of terminating the process
// QUOTE(TZ): "replace 'terminate process' with 'return a typed error up the call stack'"
// REF: req-parse-errors-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ ParseError: 0 ≤ e.offset ≤ |input|
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: every ParseError kind maps to a distinct exit code
// COMPLEXITY: O(1)/O(1)

export type Production = "value" | "object" | "array" | "string" | "number" | "literal" | "whitespace"

export type Expectation =
  | "value"
  | "quote"
  | "colon"
  | "comma-or-brace"
  | "literal"
  | "number"
  | "end-of-input"
  | "single-byte"

export type UnexpectedEndOfInput = {
  readonly _tag: "UnexpectedEndOfInput"
  readonly offset: number
  readonly production: Production
}

export type UnexpectedCharacter = {
  readonly _tag: "UnexpectedCharacter"
  readonly offset: number
  readonly production: Production
  readonly expected: Expectation
  readonly found: number
}

export type DuplicateKey = {
  readonly _tag: "DuplicateKey"
  readonly offset: number
  readonly key: string
}

export type AllocationFailure = {
  readonly _tag: "AllocationFailure"
  readonly offset: number
  readonly reason: string
}

export type DepthLimitExceeded = {
  readonly _tag: "DepthLimitExceeded"
  readonly offset: number
  readonly limit: number
}

export type ParseError =
  | UnexpectedEndOfInput
  | UnexpectedCharacter
  | DuplicateKey
  | AllocationFailure
  | DepthLimitExceeded

export const unexpectedEndOfInput = (offset: number, production: Production): UnexpectedEndOfInput => ({
  _tag: "UnexpectedEndOfInput",
  offset,
  production
})

export const unexpectedCharacter = (
  offset: number,
  production: Production,
  expected: Expectation,
  found: number
): UnexpectedCharacter => ({
  _tag: "UnexpectedCharacter",
  offset,
  production,
  expected,
  found
})

export const duplicateKey = (offset: number, key: string): DuplicateKey => ({
  _tag: "DuplicateKey",
  offset,
  key
})

export const allocationFailure = (offset: number, reason: string): AllocationFailure => ({
  _tag: "AllocationFailure",
  offset,
  reason
})

export const depthLimitExceeded = (offset: number, limit: number): DepthLimitExceeded => ({
  _tag: "DepthLimitExceeded",
  offset,
  limit
})

export const parseErrorExitCode = (error: ParseError): number =>
  Match.value(error).pipe(
    Match.tag("UnexpectedEndOfInput", () => 200),
    Match.tag("UnexpectedCharacter", () => 201),
    Match.tag("DuplicateKey", () => 202),
    Match.tag("AllocationFailure", () => 203),
    Match.tag("DepthLimitExceeded", () => 204),
    Match.exhaustive
  )

const expectationText: Record<Expectation, string> = {
  value: "a value",
  quote: "'\"'",
  colon: "':'",
  "comma-or-brace": "',' or '}'",
  literal: "'true', 'false' or 'null'",
  number: "a number",
  "end-of-input": "end of input",
  "single-byte": "a single-byte character"
}

/**
 * Render a byte for a message: printable ASCII quoted, anything else as hex.
 *
 * @pure true
 */
export const describeByte = (byte: number): string =>
  byte >= 0x20 && byte < 0x7f
    ? `'${String.fromCharCode(byte)}'`
    : `0x${byte.toString(16).padStart(2, "0")}`

export const describeParseError = (error: ParseError): string =>
  Match.value(error).pipe(
    Match.tag("UnexpectedEndOfInput", (value) =>
      `(${value.production}) unexpected end of input at index ${value.offset}`),
    Match.tag("UnexpectedCharacter", (value) =>
      `(${value.production}) expected ${expectationText[value.expected]} but found ${
        describeByte(value.found)
      } at index ${value.offset}`),
    Match.tag("DuplicateKey", (value) => `(object) duplicate key "${value.key}" at index ${value.offset}`),
    Match.tag("AllocationFailure", (value) => `allocation failed at index ${value.offset}: ${value.reason}`),
    Match.tag("DepthLimitExceeded", (value) =>
      `nesting depth exceeds ${value.limit} at index ${value.offset}`),
    Match.exhaustive
  )
