import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { decodeConfig, loadConfigFile } from "../../src/shell/config-file.js"
import { provideNodeContext, withTempDir, writeDocument } from "../app/test-helpers.js"

describe("decodeConfig", () => {
  it.effect("keeps only the fields that are present", () =>
    Effect.gen(function*(_) {
      const config = yield* _(decodeConfig(`{"indent": 4}`))
      expect(config).toEqual({ indent: 4 })
    }))

  it.effect("rejects a bucket count below the default", () =>
    Effect.gen(function*(_) {
      const error = yield* _(Effect.flip(decodeConfig(`{"bucketCount": 8}`)))
      expect(error._tag).toBe("ConfigError")
    }))

  it.effect("rejects a bucket count above the table ceiling", () =>
    Effect.gen(function*(_) {
      const error = yield* _(Effect.flip(decodeConfig(`{"bucketCount": 65537}`)))
      expect(error._tag).toBe("ConfigError")
    }))

  it.effect("rejects text that is not JSON", () =>
    Effect.gen(function*(_) {
      const error = yield* _(Effect.flip(decodeConfig("indent = 4")))
      expect(error._tag).toBe("ConfigError")
    }))
})

describe("loadConfigFile", () => {
  it.effect("ignores a missing implicit config", () =>
    withTempDir(({ path, tempDir }) =>
      Effect.gen(function*(_) {
        const config = yield* _(loadConfigFile(path.join(tempDir, "absent.json"), false))
        expect(config).toBeUndefined()
      })
    ).pipe(provideNodeContext))

  it.effect("fails on a missing explicit config", () =>
    withTempDir(({ path, tempDir }) =>
      Effect.gen(function*(_) {
        const missing = path.join(tempDir, "absent.json")
        const error = yield* _(Effect.flip(loadConfigFile(missing, true)))
        expect(error).toEqual({ _tag: "FileError", message: `Config file not found: ${missing}` })
      })
    ).pipe(provideNodeContext))

  it.effect("decodes an existing config", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        const file = yield* _(writeDocument(context, "config.json", `{"maxDepth": 16, "contextWindow": 20}`))
        const config = yield* _(loadConfigFile(file, true))
        expect(config).toEqual({ contextWindow: 20, maxDepth: 16 })
      })
    ).pipe(provideNodeContext))
})
