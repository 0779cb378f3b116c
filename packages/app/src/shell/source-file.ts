import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"

import type { AppError } from "../core/errors.js"
import { fileError } from "../core/errors.js"

// CHANGE: read the input document as raw bytes
// WHY: the parser works on single-byte characters, so no text decoding happens here
// QUOTE(TZ): "a JSON document as a byte stream"
// REF: req-source-io-1
// SOURCE: n/a
// FORMAT THEOREM: ∀p: read(p) = Right(b) → b = contents(p)
// PURITY: SHELL
// EFFECT: Effect<Uint8Array, AppError, FileSystem>
// INVARIANT: bytes are returned unmodified
// COMPLEXITY: O(n)

export const readSourceFile = (
  path: string
): Effect.Effect<Uint8Array, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const exists = yield* _(
      fs.exists(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    if (!exists) {
      return yield* _(Effect.fail(fileError(`Input file not found: ${path}`)))
    }
    return yield* _(
      fs.readFile(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
  })
