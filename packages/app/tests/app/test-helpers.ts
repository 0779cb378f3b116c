import { NodeContext } from "@effect/platform-node"
import type { PlatformError } from "@effect/platform/Error"
import { FileSystem, type FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Path, type Path as PathService } from "@effect/platform/Path"
import { Effect } from "effect"
import { vi } from "vitest"

export interface TempContext {
  readonly fs: FileSystemService
  readonly path: PathService
  readonly tempDir: string
}

export const withTempDir = <A, E, R>(
  use: (context: TempContext) => Effect.Effect<A, E, R>
): Effect.Effect<A, E | PlatformError, R | FileSystemService | PathService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const path = yield* _(Path)
    const tempDir = yield* _(fs.makeTempDirectory())
    return yield* _(use({ fs, path, tempDir }))
  })

export const writeDocument = (
  context: TempContext,
  name: string,
  contents: string
): Effect.Effect<string, PlatformError> =>
  Effect.gen(function*(_) {
    const file = context.path.join(context.tempDir, name)
    yield* _(context.fs.writeFileString(file, contents))
    return file
  })

export const provideNodeContext = <A, E, R>(effect: Effect.Effect<A, E, R>) =>
  effect.pipe(Effect.provide(NodeContext.layer))

// Runs `effect` with process.stderr.write stubbed; yields the lines written meanwhile.
export const captureStderr = <A, E, R>(
  effect: Effect.Effect<A, E, R>
): Effect.Effect<ReadonlyArray<string>, E, R> =>
  Effect.acquireUseRelease(
    Effect.sync(() => {
      const chunks: Array<string> = []
      const spy = vi.spyOn(process.stderr, "write").mockImplementation((chunk: string | Uint8Array): boolean => {
        chunks.push(typeof chunk === "string" ? chunk : Buffer.from(chunk).toString("latin1"))
        return true
      })
      return { chunks, spy }
    }),
    ({ chunks }) => Effect.map(effect, () => chunks.join("").split("\n").filter((line) => line !== "")),
    ({ spy }) => Effect.sync(() => spy.mockRestore())
  )
