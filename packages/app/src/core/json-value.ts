import { Match } from "effect"
import * as Option from "effect/Option"

import type { Json } from "./json.js"
import type { ObjectMap } from "./object-map.js"
import { lookupMember, memberCount, memberEntries, releaseValue } from "./object-map.js"

// CHANGE: define the tagged value tree produced by the parser
// WHY: exactly one payload is meaningful per value, selected by its tag
// QUOTE(TZ): "tagged union, one of {Object, Array, String, Number, Boolean, Null}"
// REF: req-value-model-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v: v._tag determines the shape of v
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: arrays carry their length; no sentinel terminates them
// COMPLEXITY: O(1) construction, O(n) comparison

export type JsonValue =
  | { readonly _tag: "Object"; readonly members: ObjectMap }
  | { readonly _tag: "Array"; readonly items: ReadonlyArray<JsonValue> }
  | { readonly _tag: "String"; readonly value: string }
  | { readonly _tag: "Number"; readonly value: number }
  | { readonly _tag: "Boolean"; readonly value: boolean }
  | { readonly _tag: "Null" }

export type JsonTag = JsonValue["_tag"]

export const objectValue = (members: ObjectMap): JsonValue => ({ _tag: "Object", members })

export const arrayValue = (items: ReadonlyArray<JsonValue>): JsonValue => ({ _tag: "Array", items })

export const stringValue = (value: string): JsonValue => ({ _tag: "String", value })

export const numberValue = (value: number): JsonValue => ({ _tag: "Number", value })

export const booleanValue = (value: boolean): JsonValue => ({ _tag: "Boolean", value })

export const nullValue: JsonValue = { _tag: "Null" }

export { releaseValue }

type Comparison = readonly [JsonValue, JsonValue]

// Compares one pair without descending; children go onto `pending`.
const shallowEquals = (left: JsonValue, right: JsonValue, pending: Array<Comparison>): boolean => {
  switch (left._tag) {
    case "Object": {
      if (right._tag !== "Object" || memberCount(left.members) !== memberCount(right.members)) {
        return false
      }
      for (const entry of memberEntries(left.members)) {
        const other = lookupMember(right.members, entry.key)
        if (Option.isNone(other)) {
          return false
        }
        pending.push([entry.value, other.value])
      }
      return true
    }
    case "Array": {
      if (right._tag !== "Array" || left.items.length !== right.items.length) {
        return false
      }
      left.items.forEach((item, index) => {
        const other = right.items[index]
        if (other !== undefined) {
          pending.push([item, other])
        }
      })
      return true
    }
    case "String":
      return right._tag === "String" && left.value === right.value
    case "Number":
      return right._tag === "Number" && left.value === right.value
    case "Boolean":
      return right._tag === "Boolean" && left.value === right.value
    case "Null":
      return right._tag === "Null"
  }
}

/**
 * Structural equality of two value trees.
 *
 * @returns true when tags match and payloads are equal; object members are
 * compared by key set, ignoring member order.
 *
 * @pure true
 * @invariant nesting depth does not grow the call stack
 * @complexity O(n)
 */
export const valueEquals = (left: JsonValue, right: JsonValue): boolean => {
  const pending: Array<Comparison> = [[left, right]]
  let pair = pending.pop()
  while (pair !== undefined) {
    if (!shallowEquals(pair[0], pair[1], pending)) {
      return false
    }
    pair = pending.pop()
  }
  return true
}

type JsonRecord = { [key: string]: Json }

// defineProperty keeps a "__proto__" key as an own member.
const setMember = (record: JsonRecord, key: string, json: Json): void => {
  Object.defineProperty(record, key, { value: json, enumerable: true, writable: true, configurable: true })
}

type Conversion = { readonly source: JsonValue; readonly place: (json: Json) => void }

const convertShallow = (value: JsonValue, pending: Array<Conversion>): Json =>
  Match.value(value).pipe(
    Match.tag("Object", (object): Json => {
      const record: JsonRecord = {}
      for (const entry of memberEntries(object.members)) {
        setMember(record, entry.key, null)
        pending.push({ source: entry.value, place: (json) => setMember(record, entry.key, json) })
      }
      return record
    }),
    Match.tag("Array", (array): Json => {
      const items: Array<Json> = array.items.map(() => null)
      array.items.forEach((item, index) => {
        pending.push({ source: item, place: (json) => { items[index] = json } })
      })
      return items
    }),
    Match.tag("String", (string): Json => string.value),
    Match.tag("Number", (number): Json => number.value),
    Match.tag("Boolean", (boolean): Json => boolean.value),
    Match.tag("Null", (): Json => null),
    Match.exhaustive
  )

/**
 * Convert a value tree into plain JSON data.
 *
 * Containers are created first and filled from a work list, so deep trees
 * convert without recursion.
 *
 * @pure true
 * @invariant object keys of the result equal memberKeys of the source map
 */
export const toJson = (value: JsonValue): Json => {
  const pending: Array<Conversion> = []
  const root = convertShallow(value, pending)
  let next = pending.pop()
  while (next !== undefined) {
    next.place(convertShallow(next.source, pending))
    next = pending.pop()
  }
  return root
}
