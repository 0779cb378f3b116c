import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { parseCliArgs } from "../../src/core/cli.js"
import type { CliArgs } from "../../src/core/cli.js"
import { resolveConfig } from "../../src/core/config.js"

const cliFor = (...args: ReadonlyArray<string>): CliArgs => {
  const parsed = parseCliArgs(["node", "json-arena", ...args])
  if (Either.isLeft(parsed)) {
    throw new Error(parsed.left.message)
  }
  return parsed.right
}

describe("resolveConfig", () => {
  it.effect("falls back to defaults", () =>
    Effect.sync(() => {
      expect(resolveConfig(cliFor("doc.json"), undefined)).toEqual({
        indent: 2,
        contextWindow: 60,
        parse: { bucketCount: 32, maxDepth: 1024, maxArenaBytes: undefined }
      })
    }))

  it.effect("prefers CLI flags over the config file", () =>
    Effect.sync(() => {
      const resolved = resolveConfig(cliFor("doc.json", "--indent", "8", "--max-arena-bytes", "4096"), {
        indent: 4,
        contextWindow: 20,
        bucketCount: 1024
      })
      expect(resolved).toEqual({
        indent: 8,
        contextWindow: 20,
        parse: { bucketCount: 1024, maxDepth: 1024, maxArenaBytes: 4096 }
      })
    }))
})
