import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { escapeByte, renderContext, renderDiagnostic } from "../../src/core/diagnostics.js"
import { parseText } from "../../src/core/parse.js"

const bytesOf = (text: string): Uint8Array => new TextEncoder().encode(text)

describe("renderContext", () => {
  it.effect("places the caret under the failing byte", () =>
    Effect.sync(() => {
      expect(renderContext(bytesOf(`{"a" 1}`), 5, 60)).toEqual({
        start: 0,
        end: 7,
        line: `{"a" 1}`,
        caretColumn: 5
      })
    }))

  it.effect("renders control characters as two-character escapes", () =>
    Effect.sync(() => {
      const context = renderContext(bytesOf("[1,\n x]"), 5, 60)
      expect(context.line).toBe("[1,\\n x]")
      expect(context.caretColumn).toBe(6)
    }))

  it.effect("shows half the window on each side", () =>
    Effect.sync(() => {
      expect(renderContext(bytesOf("abcdefghijklmnopqrstuvwxyz"), 13, 10)).toEqual({
        start: 8,
        end: 18,
        line: "ijklmnopqr",
        caretColumn: 5
      })
    }))

  it.effect("points past the last byte at end of input", () =>
    Effect.sync(() => {
      expect(renderContext(bytesOf(`{"a":`), 5, 60)).toEqual({
        start: 0,
        end: 5,
        line: `{"a":`,
        caretColumn: 5
      })
    }))

  it.effect("escapes other non-printable bytes as hex", () =>
    Effect.sync(() => {
      expect(escapeByte(0x01)).toBe("\\x01")
      expect(escapeByte(0x7f)).toBe("\\x7f")
      expect(escapeByte(0x0d)).toBe("\\r")
      expect(escapeByte(0x41)).toBe("A")
    }))
})

describe("renderDiagnostic", () => {
  it.effect("combines the message, the context line and the caret", () =>
    Effect.sync(() => {
      const source = `{"a" 1}`
      const parsed = parseText(source)
      expect(Either.isLeft(parsed)).toBe(true)
      if (Either.isLeft(parsed)) {
        expect(renderDiagnostic(parsed.left, bytesOf(source), 60)).toBe(
          [
            "(object) expected ':' but found '1' at index 5",
            "context:",
            `{"a" 1}`,
            "     ^"
          ].join("\n")
        )
      }
    }))
})
