// CHANGE: introduce a seekable byte cursor with single-byte pushback
// WHY: the grammar productions consume one byte at a time and occasionally return it
// QUOTE(TZ): "a cursor over a byte stream with single-byte pushback"
// REF: req-cursor-1
// SOURCE: n/a
// FORMAT THEOREM: ∀c: unread(read(c)) restores c.offset
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: 0 ≤ offset ≤ bytes.length
// COMPLEXITY: O(1)/O(1)

export const END_OF_INPUT = -1

export interface ByteCursor {
  readonly bytes: Uint8Array
  offset: number
}

export const makeCursor = (bytes: Uint8Array): ByteCursor => ({ bytes, offset: 0 })

export const tell = (cursor: ByteCursor): number => cursor.offset

export const remainingBytes = (cursor: ByteCursor): number => cursor.bytes.length - cursor.offset

/**
 * Consume one byte.
 *
 * @returns The byte value, or END_OF_INPUT when the cursor is exhausted.
 *
 * @pure false
 * @complexity O(1)
 */
export const readByte = (cursor: ByteCursor): number => {
  const byte = cursor.bytes[cursor.offset]
  if (byte === undefined) {
    return END_OF_INPUT
  }
  cursor.offset += 1
  return byte
}

export const peekByte = (cursor: ByteCursor): number => cursor.bytes[cursor.offset] ?? END_OF_INPUT

// Pushback after END_OF_INPUT is a no-op: nothing was consumed.
export const unreadByte = (cursor: ByteCursor, byte: number): void => {
  if (byte !== END_OF_INPUT && cursor.offset > 0) {
    cursor.offset -= 1
  }
}

export const seekTo = (cursor: ByteCursor, offset: number): boolean => {
  if (!Number.isInteger(offset) || offset < 0 || offset > cursor.bytes.length) {
    return false
  }
  cursor.offset = offset
  return true
}
