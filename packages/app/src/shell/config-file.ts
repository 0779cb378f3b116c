import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"
import { pipe } from "effect/Function"
import * as ParseResult from "effect/ParseResult"
import * as S from "effect/Schema"

import type { FileConfig } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { configError, fileError } from "../core/errors.js"
import { MAX_BUCKET_COUNT } from "../core/object-map.js"

// CHANGE: decode .json-arena.json with schema validation
// WHY: keep boundary data typed and reject invalid settings before parsing
// QUOTE(TZ): n/a
// REF: req-config-file-1
// SOURCE: n/a
// FORMAT THEOREM: ∀c: decode(c) = Right(cfg) → cfg fields are integers within their bounds
// PURITY: SHELL
// EFFECT: Effect<FileConfig | undefined, AppError, FileSystem>
// INVARIANT: missing default config yields undefined
// COMPLEXITY: O(n)

const Count = (minimum: number) => S.Int.pipe(S.greaterThanOrEqualTo(minimum))

const RawConfigSchema = S.partial(
  S.Struct({
    indent: Count(0),
    contextWindow: Count(0),
    bucketCount: Count(32).pipe(S.lessThanOrEqualTo(MAX_BUCKET_COUNT)),
    maxDepth: Count(1),
    maxArenaBytes: Count(1)
  })
)

const ConfigSchema = S.parseJson(RawConfigSchema)

export const decodeConfig = (raw: string): Effect.Effect<FileConfig, AppError> =>
  pipe(
    S.decodeUnknown(ConfigSchema)(raw),
    Effect.map((config) => ({
      ...(config.indent === undefined ? {} : { indent: config.indent }),
      ...(config.contextWindow === undefined ? {} : { contextWindow: config.contextWindow }),
      ...(config.bucketCount === undefined ? {} : { bucketCount: config.bucketCount }),
      ...(config.maxDepth === undefined ? {} : { maxDepth: config.maxDepth }),
      ...(config.maxArenaBytes === undefined ? {} : { maxArenaBytes: config.maxArenaBytes })
    })),
    Effect.mapError((error) => configError(ParseResult.TreeFormatter.formatErrorSync(error)))
  )

export const loadConfigFile = (
  path: string | undefined,
  explicit: boolean
): Effect.Effect<FileConfig | undefined, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    if (path === undefined) {
      return
    }
    const fs = yield* _(FileSystem)
    const exists = yield* _(
      fs.exists(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    if (!exists) {
      if (explicit) {
        return yield* _(Effect.fail(fileError(`Config file not found: ${path}`)))
      }
      return
    }
    const contents = yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    return yield* _(decodeConfig(contents))
  })
