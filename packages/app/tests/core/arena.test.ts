import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { adopt, allocate, arenaStats, grow, makeArena, release } from "../../src/core/arena.js"
import { numberValue } from "../../src/core/json-value.js"
import { insertMember, makeObjectMap, memberCount } from "../../src/core/object-map.js"

describe("arena", () => {
  it.effect("grows the tail in place", () =>
    Effect.sync(() => {
      const arena = makeArena({ maxBytes: undefined })
      const first = allocate(arena, 16)
      expect(Either.isRight(first)).toBe(true)
      if (Either.isRight(first)) {
        expect(grow(arena, first.right, 64)).toEqual(Either.right({ id: 0, size: 64 }))
        expect(grow(arena, { id: 0, size: 64 }, 8)).toEqual(Either.right({ id: 0, size: 8 }))
      }
      expect(arenaStats(arena)).toEqual({ allocations: 1, relocations: 0, bytesInUse: 8, ownedMaps: 0 })
    }))

  it.effect("relocates a buried allocation that grows", () =>
    Effect.sync(() => {
      const arena = makeArena({ maxBytes: undefined })
      allocate(arena, 16)
      allocate(arena, 8)
      expect(grow(arena, { id: 0, size: 16 }, 32)).toEqual(Either.right({ id: 2, size: 32 }))
      expect(grow(arena, { id: 1, size: 8 }, 4)).toEqual(Either.right({ id: 1, size: 4 }))
      expect(arenaStats(arena)).toEqual({ allocations: 3, relocations: 1, bytesInUse: 56, ownedMaps: 0 })
    }))

  it.effect("enforces the byte limit", () =>
    Effect.sync(() => {
      const arena = makeArena({ maxBytes: 32 })
      expect(Either.isRight(allocate(arena, 32))).toBe(true)
      expect(allocate(arena, 1)).toEqual(Either.left({ _tag: "ArenaExhausted", requested: 1, limit: 32 }))
    }))

  it.effect("releases adopted maps and refuses later allocations", () =>
    Effect.sync(() => {
      const arena = makeArena({ maxBytes: undefined })
      const map = makeObjectMap()
      insertMember(map, "a", numberValue(1))
      adopt(arena, map)
      allocate(arena, 10)
      release(arena)
      release(arena)
      expect(memberCount(map)).toBe(0)
      expect(arena.released).toBe(true)
      expect(arenaStats(arena)).toEqual({ allocations: 1, relocations: 0, bytesInUse: 0, ownedMaps: 0 })
      expect(allocate(arena, 1)).toEqual(Either.left({ _tag: "ArenaReleased" }))
      expect(grow(arena, { id: 0, size: 10 }, 20)).toEqual(Either.left({ _tag: "ArenaReleased" }))
    }))
})
