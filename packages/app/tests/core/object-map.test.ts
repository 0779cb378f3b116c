import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Option from "effect/Option"

import type { JsonValue } from "../../src/core/json-value.js"
import { arrayValue, numberValue, objectValue, releaseValue, stringValue } from "../../src/core/json-value.js"
import {
  deleteObjectMap,
  hashKey,
  insertMember,
  lookupMember,
  makeObjectMap,
  MAX_BUCKET_COUNT,
  memberCount,
  memberKeys
} from "../../src/core/object-map.js"

describe("hashKey", () => {
  it.effect("reduces djb2 modulo the bucket count", () =>
    Effect.sync(() => {
      expect(hashKey("", 32)).toBe(5)
      expect(hashKey("a", 32)).toBe(6)
      expect(hashKey("b", 32)).toBe(7)
      expect(hashKey("name", 32)).toBe(6)
      expect(hashKey("ab", 32)).toBe(hashKey("ba", 32))
      expect(hashKey("a", 1024)).toBe(177670 % 1024)
    }))
})

describe("insertMember / lookupMember", () => {
  it.effect("stores and finds members", () =>
    Effect.sync(() => {
      const map = makeObjectMap()
      expect(insertMember(map, "a", numberValue(1))).toBe(true)
      expect(insertMember(map, "b", stringValue("two"))).toBe(true)
      expect(memberCount(map)).toBe(2)
      expect(lookupMember(map, "b")).toEqual(Option.some(stringValue("two")))
      expect(Option.isNone(lookupMember(map, "c"))).toBe(true)
    }))

  it.effect("keeps the first binding of a duplicate key", () =>
    Effect.sync(() => {
      const map = makeObjectMap()
      expect(insertMember(map, "a", numberValue(1))).toBe(true)
      expect(insertMember(map, "a", numberValue(2))).toBe(false)
      expect(memberCount(map)).toBe(1)
      expect(lookupMember(map, "a")).toEqual(Option.some(numberValue(1)))
    }))

  it.effect("compares keys exactly, not by prefix", () =>
    Effect.sync(() => {
      const map = makeObjectMap()
      expect(insertMember(map, "ab", numberValue(1))).toBe(true)
      expect(insertMember(map, "ba", numberValue(2))).toBe(true)
      expect(Option.isNone(lookupMember(map, "a"))).toBe(true)
      expect(lookupMember(map, "ba")).toEqual(Option.some(numberValue(2)))
    }))

  it.effect("lists members in bucket order, newest first within a chain", () =>
    Effect.sync(() => {
      const map = makeObjectMap()
      insertMember(map, "b", numberValue(1))
      insertMember(map, "a", numberValue(2))
      insertMember(map, "name", numberValue(3))
      expect(memberKeys(map)).toEqual(["name", "a", "b"])
    }))

  it.effect("rejects a non-positive bucket count", () =>
    Effect.sync(() => {
      expect(() => makeObjectMap(0)).toThrow(RangeError)
      expect(() => makeObjectMap(MAX_BUCKET_COUNT + 1)).toThrow(RangeError)
      expect(makeObjectMap(MAX_BUCKET_COUNT).buckets.length).toBe(65_536)
    }))
})

describe("deleteObjectMap", () => {
  it.effect("empties nested maps when recursive", () =>
    Effect.sync(() => {
      const inner = makeObjectMap()
      insertMember(inner, "x", numberValue(1))
      const outer = makeObjectMap()
      insertMember(outer, "list", arrayValue([objectValue(inner)]))
      deleteObjectMap(outer, { recursive: true })
      expect(memberCount(outer)).toBe(0)
      expect(memberCount(inner)).toBe(0)
      expect(outer.buckets.every((bucket) => bucket === undefined)).toBe(true)
    }))

  it.effect("releases a deeply nested tree", () =>
    Effect.sync(() => {
      const innermost = makeObjectMap()
      insertMember(innermost, "leaf", numberValue(0))
      let tree: JsonValue = objectValue(innermost)
      for (let level = 0; level < 20_000; level++) {
        const map = makeObjectMap()
        insertMember(map, "child", arrayValue([tree]))
        tree = objectValue(map)
      }
      releaseValue(tree)
      expect(memberCount(innermost)).toBe(0)
    }))

  it.effect("leaves member values alone when not recursive", () =>
    Effect.sync(() => {
      const inner = makeObjectMap()
      insertMember(inner, "x", numberValue(1))
      const outer = makeObjectMap()
      insertMember(outer, "o", objectValue(inner))
      deleteObjectMap(outer, { recursive: false })
      expect(memberCount(outer)).toBe(0)
      expect(memberCount(inner)).toBe(1)
    }))
})
