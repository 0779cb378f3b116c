import * as Either from "effect/Either"

import type { ObjectMap } from "./object-map.js"
import { deleteObjectMap } from "./object-map.js"

// CHANGE: model the parse arena as an accounting region with bulk teardown
// WHY: every value of one parse shares a single lifetime that ends on release
// QUOTE(TZ): "bump allocation, tail growth, bulk teardown"
// REF: req-arena-1
// SOURCE: n/a
// FORMAT THEOREM: ∀a: released(a) → ∀op ∈ {allocate, grow}: op(a) = Left
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: bytesInUse ≤ maxBytes when maxBytes is defined
// COMPLEXITY: O(1) per allocation, O(n) release

export interface ArenaOptions {
  readonly maxBytes: number | undefined
}

export interface Allocation {
  readonly id: number
  readonly size: number
}

export type ArenaFailure =
  | { readonly _tag: "ArenaExhausted"; readonly requested: number; readonly limit: number }
  | { readonly _tag: "ArenaReleased" }

export interface ArenaStats {
  readonly allocations: number
  readonly relocations: number
  readonly bytesInUse: number
  readonly ownedMaps: number
}

export interface Arena {
  readonly maxBytes: number | undefined
  readonly maps: Array<ObjectMap>
  nextId: number
  tailId: number
  relocations: number
  bytesInUse: number
  released: boolean
}

export const makeArena = (options: ArenaOptions): Arena => ({
  maxBytes: options.maxBytes,
  maps: [],
  nextId: 0,
  tailId: -1,
  relocations: 0,
  bytesInUse: 0,
  released: false
})

const reserve = (arena: Arena, bytes: number): Either.Either<void, ArenaFailure> => {
  if (arena.released) {
    return Either.left({ _tag: "ArenaReleased" })
  }
  if (arena.maxBytes !== undefined && arena.bytesInUse + bytes > arena.maxBytes) {
    return Either.left({ _tag: "ArenaExhausted", requested: bytes, limit: arena.maxBytes })
  }
  arena.bytesInUse += bytes
  return Either.right(undefined)
}

/**
 * Bump-allocate `size` bytes; the allocation becomes the arena tail.
 *
 * @pure false
 * @invariant result.id is strictly increasing per arena
 */
export const allocate = (arena: Arena, size: number): Either.Either<Allocation, ArenaFailure> =>
  Either.map(reserve(arena, size), () => {
    const id = arena.nextId
    arena.nextId += 1
    arena.tailId = id
    return { id, size }
  })

/**
 * Resize an allocation. The tail grows or shrinks in place; any other
 * allocation that grows is relocated to a fresh tail and its old bytes stay
 * accounted.
 *
 * @pure false
 * @complexity O(1)
 */
export const grow = (
  arena: Arena,
  allocation: Allocation,
  size: number
): Either.Either<Allocation, ArenaFailure> => {
  if (arena.released) {
    return Either.left({ _tag: "ArenaReleased" })
  }
  if (allocation.id === arena.tailId) {
    const delta = size - allocation.size
    if (delta <= 0) {
      arena.bytesInUse += delta
      return Either.right({ id: allocation.id, size })
    }
    return Either.map(reserve(arena, delta), () => ({ id: allocation.id, size }))
  }
  // A buried allocation shrinks without returning its bytes.
  if (size <= allocation.size) {
    return Either.right({ id: allocation.id, size })
  }
  return Either.map(allocate(arena, size), (moved) => {
    arena.relocations += 1
    return moved
  })
}

export const adopt = (arena: Arena, map: ObjectMap): void => {
  arena.maps.push(map)
}

/**
 * Release every value allocated through the arena at once.
 *
 * @pure false
 * @invariant after release all adopted maps are empty
 * @complexity O(n) where n = number of owned map entries
 */
export const release = (arena: Arena): void => {
  if (arena.released) {
    return
  }
  for (const map of arena.maps) {
    deleteObjectMap(map, { recursive: false })
  }
  arena.maps.length = 0
  arena.bytesInUse = 0
  arena.tailId = -1
  arena.released = true
}

export const arenaStats = (arena: Arena): ArenaStats => ({
  allocations: arena.nextId,
  relocations: arena.relocations,
  bytesInUse: arena.bytesInUse,
  ownedMaps: arena.maps.length
})
