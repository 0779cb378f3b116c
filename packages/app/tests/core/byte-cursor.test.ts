import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import {
  END_OF_INPUT,
  makeCursor,
  peekByte,
  readByte,
  remainingBytes,
  seekTo,
  tell,
  unreadByte
} from "../../src/core/byte-cursor.js"

describe("byte cursor", () => {
  it.effect("reads, pushes back and reaches end of input", () =>
    Effect.sync(() => {
      const cursor = makeCursor(new Uint8Array([0x61, 0x62]))
      expect(readByte(cursor)).toBe(0x61)
      unreadByte(cursor, 0x61)
      expect(tell(cursor)).toBe(0)
      expect(readByte(cursor)).toBe(0x61)
      expect(peekByte(cursor)).toBe(0x62)
      expect(readByte(cursor)).toBe(0x62)
      expect(readByte(cursor)).toBe(END_OF_INPUT)
      unreadByte(cursor, END_OF_INPUT)
      expect(tell(cursor)).toBe(2)
      expect(remainingBytes(cursor)).toBe(0)
    }))

  it.effect("seeks only within the input", () =>
    Effect.sync(() => {
      const cursor = makeCursor(new Uint8Array([1, 2, 3]))
      expect(seekTo(cursor, 3)).toBe(true)
      expect(seekTo(cursor, 4)).toBe(false)
      expect(seekTo(cursor, -1)).toBe(false)
      expect(tell(cursor)).toBe(3)
      expect(seekTo(cursor, 1)).toBe(true)
      expect(readByte(cursor)).toBe(2)
    }))
})
