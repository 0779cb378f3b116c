import * as Option from "effect/Option"

import type { JsonValue } from "./json-value.js"

// CHANGE: implement the fixed-bucket object member table
// WHY: object members are stored in a djb2-hashed table with chained buckets
// QUOTE(TZ): "first insertion for a key wins and duplicate keys are rejected rather than overwritten"
// REF: req-object-map-1
// SOURCE: n/a
// FORMAT THEOREM: ∀m,k,v: insert(m,k,v) = false → m unchanged
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: every key appears in at most one entry of its bucket chain
// COMPLEXITY: O(1) average insert/lookup, O(n) per bucket worst case

export const DEFAULT_BUCKET_COUNT = 32
export const MAX_BUCKET_COUNT = 65_536

export interface MapEntry {
  readonly key: string
  readonly value: JsonValue
  readonly next: MapEntry | undefined
}

export interface ObjectMap {
  readonly bucketCount: number
  readonly buckets: Array<MapEntry | undefined>
  size: number
}

export interface DeleteOptions {
  readonly recursive: boolean
}

/**
 * djb2 string hash reduced to a bucket index.
 *
 * @param key - Key whose UTF-16 code units are treated as bytes.
 * @param bucketCount - Number of buckets.
 * @returns Bucket index in [0, bucketCount).
 *
 * @pure true
 * @invariant hash arithmetic is unsigned 32-bit
 * @complexity O(|key|)
 */
export const hashKey = (key: string, bucketCount: number): number => {
  let hash = 5381
  for (let index = 0; index < key.length; index++) {
    hash = (Math.imul(hash, 33) + key.charCodeAt(index)) >>> 0
  }
  return hash % bucketCount
}

export const isBucketCount = (bucketCount: number): boolean =>
  Number.isInteger(bucketCount) && bucketCount >= 1 && bucketCount <= MAX_BUCKET_COUNT

export const makeObjectMap = (bucketCount: number = DEFAULT_BUCKET_COUNT): ObjectMap => {
  if (!isBucketCount(bucketCount)) {
    throw new RangeError(`bucketCount must be an integer in 1..${MAX_BUCKET_COUNT}, got ${bucketCount}`)
  }
  return {
    bucketCount,
    buckets: Array.from<MapEntry | undefined>({ length: bucketCount }),
    size: 0
  }
}

const findEntry = (head: MapEntry | undefined, key: string): MapEntry | undefined => {
  let current = head
  while (current !== undefined && current.key !== key) {
    current = current.next
  }
  return current
}

/**
 * Insert a member unless its key is already present.
 *
 * @returns true when inserted, false when the key already exists.
 *
 * @pure false
 * @invariant new entry becomes the head of its chain
 */
export const insertMember = (map: ObjectMap, key: string, value: JsonValue): boolean => {
  const index = hashKey(key, map.bucketCount)
  const head = map.buckets[index]
  if (findEntry(head, key) !== undefined) {
    return false
  }
  map.buckets[index] = { key, value, next: head }
  map.size += 1
  return true
}

export const lookupMember = (map: ObjectMap, key: string): Option.Option<JsonValue> => {
  const entry = findEntry(map.buckets[hashKey(key, map.bucketCount)], key)
  return entry === undefined ? Option.none() : Option.some(entry.value)
}

export const memberCount = (map: ObjectMap): number => map.size

// Bucket order, then chain order (most recent insertion first).
export const memberEntries = (map: ObjectMap): ReadonlyArray<MapEntry> => {
  const result: Array<MapEntry> = []
  for (const head of map.buckets) {
    let current = head
    while (current !== undefined) {
      result.push(current)
      current = current.next
    }
  }
  return result
}

export const memberKeys = (map: ObjectMap): ReadonlyArray<string> => memberEntries(map).map((entry) => entry.key)

const emptyBuckets = (map: ObjectMap): ReadonlyArray<JsonValue> => {
  const values: Array<JsonValue> = []
  for (let index = 0; index < map.bucketCount; index++) {
    let current = map.buckets[index]
    while (current !== undefined) {
      values.push(current.value)
      current = current.next
    }
    map.buckets[index] = undefined
  }
  map.size = 0
  return values
}

/**
 * Tear down a value tree that is not owned by an arena.
 *
 * @pure false
 * @invariant walks an explicit stack; tree depth does not grow the call stack
 * @complexity O(n) where n = number of nodes
 */
export const releaseValue = (value: JsonValue): void => {
  const pending: Array<JsonValue> = [value]
  let current = pending.pop()
  while (current !== undefined) {
    const children = current._tag === "Object"
      ? emptyBuckets(current.members)
      : current._tag === "Array"
      ? current.items
      : []
    for (const child of children) {
      pending.push(child)
    }
    current = pending.pop()
  }
}

/**
 * Empty every bucket chain. With `recursive`, member values are released too.
 *
 * @pure false
 * @invariant memberCount(map) = 0 afterwards
 * @complexity O(bucketCount + n)
 */
export const deleteObjectMap = (map: ObjectMap, options: DeleteOptions): void => {
  const values = emptyBuckets(map)
  if (options.recursive) {
    for (const value of values) {
      releaseValue(value)
    }
  }
}
