import * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { Allocation, Arena, ArenaFailure } from "./arena.js"
import { adopt, allocate, grow, makeArena, release } from "./arena.js"
import type { ByteCursor } from "./byte-cursor.js"
import { END_OF_INPUT, makeCursor, peekByte, readByte, seekTo, tell, unreadByte } from "./byte-cursor.js"
import type { JsonValue } from "./json-value.js"
import { arrayValue, booleanValue, nullValue, numberValue, objectValue, stringValue } from "./json-value.js"
import type { ObjectMap } from "./object-map.js"
import { DEFAULT_BUCKET_COUNT, insertMember, isBucketCount, makeObjectMap, MAX_BUCKET_COUNT } from "./object-map.js"
import type { ParseError, Production } from "./parse-error.js"
import {
  allocationFailure,
  depthLimitExceeded,
  duplicateKey,
  unexpectedCharacter,
  unexpectedEndOfInput
} from "./parse-error.js"

// CHANGE: recursive-descent JSON decoder over a byte cursor
// WHY: build a typed value tree one byte at a time, with every allocation accounted in one arena
// QUOTE(TZ): "one entry point per JSON grammar production"
// REF: req-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀b: parse(b) = Right(d) → b is a value followed only by whitespace
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: on Left the arena has been released; no partial tree escapes
// COMPLEXITY: O(n) time, O(depth) heap for open containers

export interface ParseSettings {
  readonly bucketCount: number
  readonly maxDepth: number
  readonly maxArenaBytes: number | undefined
}

export const defaultParseSettings: ParseSettings = {
  bucketCount: DEFAULT_BUCKET_COUNT,
  maxDepth: 1024,
  maxArenaBytes: undefined
}

export interface ParsedDocument {
  readonly value: JsonValue
  readonly arena: Arena
}

export interface ParseContext {
  readonly cursor: ByteCursor
  readonly arena: Arena
  readonly settings: ParseSettings
}

type ParseResult<A> = Either.Either<A, ParseError>

// Accounting sizes, in bytes, of the nodes the arena hands out.
const VALUE_SIZE = 16
const ENTRY_SIZE = 24
const POINTER_SIZE = 8
const INITIAL_CAPACITY = 16

const QUOTE = 0x22
const BACKSLASH = 0x5c
const COMMA = 0x2c
const COLON = 0x3a
const LEFT_BRACE = 0x7b
const RIGHT_BRACE = 0x7d
const LEFT_BRACKET = 0x5b
const RIGHT_BRACKET = 0x5d
const MINUS = 0x2d
const PLUS = 0x2b
const DOT = 0x2e
const LOWER_E = 0x65
const UPPER_E = 0x45

const isWhitespace = (byte: number): boolean => byte === 0x20 || (byte >= 0x09 && byte <= 0x0d)

const isDigit = (byte: number): boolean => byte >= 0x30 && byte <= 0x39

const isSign = (byte: number): boolean => byte === MINUS || byte === PLUS

const decodeBytes = (bytes: Uint8Array): string => {
  let result = ""
  for (let start = 0; start < bytes.length; start += 4096) {
    result += String.fromCharCode(...bytes.subarray(start, start + 4096))
  }
  return result
}

const describeArenaFailure = (failure: ArenaFailure): string =>
  failure._tag === "ArenaReleased"
    ? "arena already released"
    : `arena limit of ${failure.limit} bytes exceeded (requested ${failure.requested})`

const allocateIn = (context: ParseContext, size: number): ParseResult<Allocation> =>
  Either.mapLeft(
    allocate(context.arena, size),
    (failure) => allocationFailure(tell(context.cursor), describeArenaFailure(failure))
  )

const growIn = (context: ParseContext, allocation: Allocation, size: number): ParseResult<Allocation> =>
  Either.mapLeft(
    grow(context.arena, allocation, size),
    (failure) => allocationFailure(tell(context.cursor), describeArenaFailure(failure))
  )

/**
 * Consume every whitespace byte at the cursor.
 *
 * End of input is left for the caller's next read to report.
 */
export const discardWhitespace = (cursor: ByteCursor): void => {
  while (isWhitespace(peekByte(cursor))) {
    readByte(cursor)
  }
}

const missingDigits = (cursor: ByteCursor, production: Production): ParseError => {
  const offset = tell(cursor)
  const byte = peekByte(cursor)
  return byte === END_OF_INPUT
    ? unexpectedEndOfInput(offset, production)
    : unexpectedCharacter(offset, production, "number", byte)
}

/**
 * Read the body of a string; the opening quote is already consumed.
 *
 * Escape sequences are kept verbatim: a backslash and the byte after it are
 * both copied.
 */
export const parseString = (context: ParseContext): ParseResult<string> => {
  const cursor = context.cursor
  const initial = allocateIn(context, INITIAL_CAPACITY)
  if (Either.isLeft(initial)) {
    return Either.left(initial.left)
  }
  let allocation = initial.right
  let buffer = new Uint8Array(INITIAL_CAPACITY)
  let length = 0
  let escaped = false
  while (true) {
    if (length + 1 >= buffer.length) {
      const grown = growIn(context, allocation, buffer.length * 2)
      if (Either.isLeft(grown)) {
        return Either.left(grown.left)
      }
      allocation = grown.right
      const next = new Uint8Array(buffer.length * 2)
      next.set(buffer)
      buffer = next
    }
    const offset = tell(cursor)
    const byte = readByte(cursor)
    if (byte === END_OF_INPUT) {
      return Either.left(unexpectedEndOfInput(offset, "string"))
    }
    if (!escaped && byte === QUOTE) {
      const shrunk = growIn(context, allocation, length + 1)
      if (Either.isLeft(shrunk)) {
        return Either.left(shrunk.left)
      }
      return Either.right(decodeBytes(buffer.subarray(0, length)))
    }
    escaped = !escaped && byte === BACKSLASH
    buffer[length] = byte
    length += 1
  }
}

const consumeDigits = (cursor: ByteCursor): number => {
  let count = 0
  while (isDigit(peekByte(cursor))) {
    readByte(cursor)
    count += 1
  }
  return count
}

/**
 * Read a floating-point literal: sign, integer part, fraction, exponent.
 *
 * An exponent without digits is rolled back so the literal ends before it.
 */
export const parseNumber = (context: ParseContext): ParseResult<number> => {
  const cursor = context.cursor
  const start = tell(cursor)
  if (isSign(peekByte(cursor))) {
    readByte(cursor)
  }
  const integerDigits = consumeDigits(cursor)
  let fractionDigits = 0
  if (peekByte(cursor) === DOT) {
    readByte(cursor)
    fractionDigits = consumeDigits(cursor)
  }
  if (integerDigits + fractionDigits === 0) {
    return Either.left(missingDigits(cursor, "number"))
  }
  const marker = peekByte(cursor)
  if (marker === LOWER_E || marker === UPPER_E) {
    const mark = tell(cursor)
    readByte(cursor)
    if (isSign(peekByte(cursor))) {
      readByte(cursor)
    }
    if (peekByte(cursor) === END_OF_INPUT) {
      return Either.left(unexpectedEndOfInput(tell(cursor), "number"))
    }
    if (consumeDigits(cursor) === 0) {
      seekTo(cursor, mark)
    }
  }
  return Either.right(Number(decodeBytes(cursor.bytes.subarray(start, tell(cursor)))))
}

/**
 * Match `literal` byte by byte at the cursor.
 *
 * A remainder that is a proper prefix of the literal is end of input; any
 * differing byte is an unexpected character at that byte.
 */
export const matchLiteral = (context: ParseContext, literal: "true" | "false" | "null"): ParseResult<void> => {
  const cursor = context.cursor
  for (let index = 0; index < literal.length; index++) {
    const offset = tell(cursor)
    const byte = readByte(cursor)
    if (byte === END_OF_INPUT) {
      return Either.left(unexpectedEndOfInput(offset, "literal"))
    }
    if (byte !== literal.charCodeAt(index)) {
      return Either.left(unexpectedCharacter(offset, "literal", "literal", byte))
    }
  }
  return Either.right(undefined)
}

export const parseBoolean = (context: ParseContext): ParseResult<boolean> => {
  const literal = peekByte(context.cursor) === 0x74 ? "true" : "false"
  return Either.map(matchLiteral(context, literal), () => literal === "true")
}

export const parseNull = (context: ParseContext): ParseResult<null> =>
  Either.map(matchLiteral(context, "null"), () => null)

interface ArrayFrame {
  readonly _tag: "ArrayFrame"
  readonly items: Array<JsonValue>
  allocation: Allocation
  capacity: number
}

interface ObjectFrame {
  readonly _tag: "ObjectFrame"
  readonly members: ObjectMap
  keyOffset: number
  key: string
}

type Frame = ArrayFrame | ObjectFrame

// What the driver does next: step an open container, or hand a finished value to its parent.
type Next =
  | { readonly _tag: "Step"; readonly frame: Frame }
  | { readonly _tag: "Done"; readonly value: JsonValue }

const step = (frame: Frame): Next => ({ _tag: "Step", frame })

const done = (value: JsonValue): Next => ({ _tag: "Done", value })

const openArray = (context: ParseContext): ParseResult<ArrayFrame> =>
  Either.map(allocateIn(context, INITIAL_CAPACITY * POINTER_SIZE), (allocation): ArrayFrame => ({
    _tag: "ArrayFrame",
    items: [],
    allocation,
    capacity: INITIAL_CAPACITY
  }))

const openObject = (context: ParseContext): ParseResult<ObjectFrame> => {
  const bucketCount = context.settings.bucketCount
  if (!isBucketCount(bucketCount)) {
    return Either.left(
      allocationFailure(tell(context.cursor), `bucket count ${bucketCount} is outside 1..${MAX_BUCKET_COUNT}`)
    )
  }
  return Either.map(allocateIn(context, bucketCount * POINTER_SIZE), (): ObjectFrame => {
    const members = makeObjectMap(bucketCount)
    adopt(context.arena, members)
    return { _tag: "ObjectFrame", members, keyOffset: -1, key: "" }
  })
}

/**
 * Advance an array until it needs its next item or closes.
 *
 * Commas are skipped as separators and `]` ends the array.
 */
const stepArray = (context: ParseContext, frame: ArrayFrame): ParseResult<Option.Option<JsonValue>> => {
  const cursor = context.cursor
  while (true) {
    if (frame.items.length + 1 >= frame.capacity) {
      frame.capacity *= 2
      const grown = growIn(context, frame.allocation, frame.capacity * POINTER_SIZE)
      if (Either.isLeft(grown)) {
        return Either.left(grown.left)
      }
      frame.allocation = grown.right
    }
    discardWhitespace(cursor)
    const offset = tell(cursor)
    const byte = readByte(cursor)
    if (byte === END_OF_INPUT) {
      return Either.left(unexpectedEndOfInput(offset, "array"))
    }
    if (byte === RIGHT_BRACKET) {
      return Either.map(
        growIn(context, frame.allocation, frame.items.length * POINTER_SIZE),
        () => Option.some(arrayValue(frame.items))
      )
    }
    if (byte !== COMMA) {
      unreadByte(cursor, byte)
      return Either.right(Option.none())
    }
  }
}

const readSeparator = (
  cursor: ByteCursor,
  expected: number,
  label: "colon" | "comma-or-brace"
): ParseResult<number> => {
  discardWhitespace(cursor)
  const offset = tell(cursor)
  const byte = readByte(cursor)
  if (byte === END_OF_INPUT) {
    return Either.left(unexpectedEndOfInput(offset, "object"))
  }
  if (byte === expected || (label === "comma-or-brace" && byte === RIGHT_BRACE)) {
    return Either.right(byte)
  }
  return Either.left(unexpectedCharacter(offset, "object", label, byte))
}

/**
 * Read the next key and its colon, or the closing brace.
 */
const stepObject = (context: ParseContext, frame: ObjectFrame): ParseResult<Option.Option<JsonValue>> => {
  const cursor = context.cursor
  discardWhitespace(cursor)
  const keyOffset = tell(cursor)
  const opener = readByte(cursor)
  if (opener === END_OF_INPUT) {
    return Either.left(unexpectedEndOfInput(keyOffset, "object"))
  }
  if (opener === RIGHT_BRACE) {
    return Either.right(Option.some(objectValue(frame.members)))
  }
  if (opener !== QUOTE) {
    return Either.left(unexpectedCharacter(keyOffset, "object", "quote", opener))
  }
  const key = parseString(context)
  if (Either.isLeft(key)) {
    return Either.left(key.left)
  }
  const colon = readSeparator(cursor, COLON, "colon")
  if (Either.isLeft(colon)) {
    return Either.left(colon.left)
  }
  frame.keyOffset = keyOffset
  frame.key = key.right
  return Either.right(Option.none())
}

/**
 * Bind a finished member value under the pending key, then read `,` or `}`.
 *
 * A key that is already present fails the parse with DuplicateKey at the
 * offset of the key's opening quote.
 */
const bindMember = (
  context: ParseContext,
  frame: ObjectFrame,
  value: JsonValue
): ParseResult<Option.Option<JsonValue>> => {
  const entry = allocateIn(context, ENTRY_SIZE + frame.key.length + 1)
  if (Either.isLeft(entry)) {
    return Either.left(entry.left)
  }
  if (!insertMember(frame.members, frame.key, value)) {
    return Either.left(duplicateKey(frame.keyOffset, frame.key))
  }
  return Either.map(
    readSeparator(context.cursor, COMMA, "comma-or-brace"),
    (separator): Option.Option<JsonValue> =>
      separator === RIGHT_BRACE ? Option.some(objectValue(frame.members)) : Option.none()
  )
}

const stepFrame = (context: ParseContext, frame: Frame): ParseResult<Option.Option<JsonValue>> =>
  frame._tag === "ArrayFrame" ? stepArray(context, frame) : stepObject(context, frame)

const deliver = (context: ParseContext, frame: Frame, value: JsonValue): ParseResult<Option.Option<JsonValue>> => {
  if (frame._tag === "ArrayFrame") {
    frame.items.push(value)
    return Either.right(Option.none())
  }
  return bindMember(context, frame, value)
}

const scalar = (context: ParseContext, byte: number, offset: number): ParseResult<JsonValue> => {
  const cursor = context.cursor
  switch (byte) {
    case QUOTE:
      return Either.map(parseString(context), stringValue)
    case 0x74:
    case 0x66:
      unreadByte(cursor, byte)
      return Either.map(parseBoolean(context), booleanValue)
    case 0x6e:
      unreadByte(cursor, byte)
      return Either.map(parseNull(context), () => nullValue)
    default:
      if (isDigit(byte) || byte === MINUS) {
        unreadByte(cursor, byte)
        return Either.map(parseNumber(context), numberValue)
      }
      return Either.left(unexpectedCharacter(offset, "value", "value", byte))
  }
}

// Read the first byte of a value: a scalar completes at once, a bracket opens a frame on `stack`.
const openValue = (context: ParseContext, stack: Array<Frame>): ParseResult<Next> => {
  const cursor = context.cursor
  discardWhitespace(cursor)
  const offset = tell(cursor)
  const byte = readByte(cursor)
  if (byte === END_OF_INPUT) {
    return Either.left(unexpectedEndOfInput(offset, "value"))
  }
  if (byte !== LEFT_BRACE && byte !== LEFT_BRACKET) {
    return Either.map(scalar(context, byte, offset), done)
  }
  if (stack.length >= context.settings.maxDepth) {
    return Either.left(depthLimitExceeded(offset, context.settings.maxDepth))
  }
  const opened: ParseResult<Frame> = byte === LEFT_BRACE ? openObject(context) : openArray(context)
  return Either.map(opened, (frame) => {
    stack.push(frame)
    return step(frame)
  })
}

/**
 * Run containers to completion with an explicit frame stack.
 *
 * Returns the value that closes the bottom frame; every value handed to a
 * parent container has its slot allocated first.
 */
const drive = (context: ParseContext, stack: Array<Frame>, first: Next): ParseResult<JsonValue> => {
  let next = first
  while (true) {
    if (next._tag === "Step") {
      const stepped = stepFrame(context, next.frame)
      if (Either.isLeft(stepped)) {
        return Either.left(stepped.left)
      }
      if (Option.isSome(stepped.right)) {
        stack.pop()
        next = done(stepped.right.value)
        continue
      }
      const opened = openValue(context, stack)
      if (Either.isLeft(opened)) {
        return Either.left(opened.left)
      }
      next = opened.right
      continue
    }
    const parent = stack[stack.length - 1]
    if (parent === undefined) {
      return Either.right(next.value)
    }
    const slot = allocateIn(context, VALUE_SIZE)
    if (Either.isLeft(slot)) {
      return Either.left(slot.left)
    }
    const delivered = deliver(context, parent, next.value)
    if (Either.isLeft(delivered)) {
      return Either.left(delivered.left)
    }
    if (Option.isSome(delivered.right)) {
      stack.pop()
      next = done(delivered.right.value)
    } else {
      next = step(parent)
    }
  }
}

/**
 * Read array items; the opening bracket is already consumed.
 */
export const parseArray = (context: ParseContext): ParseResult<JsonValue> =>
  Either.flatMap(openArray(context), (frame) => drive(context, [frame], step(frame)))

/**
 * Read object members; the opening brace is already consumed.
 */
export const parseObject = (context: ParseContext): ParseResult<JsonValue> =>
  Either.flatMap(openObject(context), (frame) => drive(context, [frame], step(frame)))

/**
 * Parse one value at the cursor, skipping leading whitespace.
 *
 * Nested containers are tracked on an explicit stack, so only `maxDepth`
 * bounds the nesting a document may have.
 *
 * @param context - Cursor, arena and settings shared by the whole parse.
 * @returns The value, or the first ParseError encountered.
 *
 * @pure false
 * @invariant the call stack does not grow with nesting depth
 * @complexity O(n) where n = bytes consumed
 */
export const parseValue = (context: ParseContext): ParseResult<JsonValue> => {
  const stack: Array<Frame> = []
  return Either.flatMap(
    Either.flatMap(openValue(context, stack), (first) => drive(context, stack, first)),
    (value) => Either.map(allocateIn(context, VALUE_SIZE), () => value)
  )
}

export const makeParseContext = (bytes: Uint8Array, settings: ParseSettings): ParseContext => ({
  cursor: makeCursor(bytes),
  arena: makeArena({ maxBytes: settings.maxArenaBytes }),
  settings
})

/**
 * Parse a complete document: one value followed only by whitespace.
 *
 * @param bytes - Document bytes; every byte is one character.
 * @param settings - Bucket count, depth limit and arena limit.
 * @returns The value tree and the arena that owns it, or a ParseError.
 *
 * @pure false
 * @invariant on failure the arena is released before returning
 * @complexity O(n)
 */
export const parseDocument = (
  bytes: Uint8Array,
  settings: ParseSettings = defaultParseSettings
): ParseResult<ParsedDocument> => {
  const context = makeParseContext(bytes, settings)
  const value = parseValue(context)
  if (Either.isLeft(value)) {
    release(context.arena)
    return Either.left(value.left)
  }
  discardWhitespace(context.cursor)
  const offset = tell(context.cursor)
  const trailing = readByte(context.cursor)
  if (trailing !== END_OF_INPUT) {
    release(context.arena)
    return Either.left(unexpectedCharacter(offset, "value", "end-of-input", trailing))
  }
  return Either.right({ value: value.right, arena: context.arena })
}

// One byte per character; code units above 0xff have no byte.
const encodeSingleByte = (text: string): ParseResult<Uint8Array> => {
  const bytes = new Uint8Array(text.length)
  for (let index = 0; index < text.length; index++) {
    const code = text.charCodeAt(index)
    if (code > 0xff) {
      return Either.left(unexpectedCharacter(index, "value", "single-byte", code))
    }
    bytes[index] = code
  }
  return Either.right(bytes)
}

/**
 * Parse a document given as text whose characters are all in U+0000..U+00FF.
 *
 * String values come back with the same characters they had in `text`.
 */
export const parseText = (
  text: string,
  settings: ParseSettings = defaultParseSettings
): ParseResult<ParsedDocument> => Either.flatMap(encodeSingleByte(text), (bytes) => parseDocument(bytes, settings))
