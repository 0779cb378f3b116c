import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Effect } from "effect"
import * as Either from "effect/Either"

import type { ArenaStats } from "../core/arena.js"
import { arenaStats, release } from "../core/arena.js"
import type { CliArgs } from "../core/cli.js"
import { parseCliArgs } from "../core/cli.js"
import { DEFAULT_CONFIG_PATH, resolveConfig } from "../core/config.js"
import type { ResolvedConfig } from "../core/config.js"
import { renderDiagnostic } from "../core/diagnostics.js"
import { type AppError, parseFailure } from "../core/errors.js"
import { parseDocument } from "../core/parse.js"
import { renderJson } from "../core/printer.js"
import { loadConfigFile } from "../shell/config-file.js"
import { loggerLayer } from "../shell/logger.js"
import { readSourceFile } from "../shell/source-file.js"

// CHANGE: orchestrate the print and check commands
// WHY: one entrypoint that reads, parses, prints and releases with typed errors
// QUOTE(TZ): "released exactly once after the caller has finished consuming the resulting value tree"
// REF: req-program-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: run(argv) = Right(r) → r.exitCode = 0 ∧ released(r.arena)
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem>
// INVARIANT: the arena is released before the result is returned
// COMPLEXITY: O(n)

export interface ProgramResult {
  readonly exitCode: number
  readonly output: string | undefined
  readonly stats: ArenaStats
}

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const writeStdout = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    const text = payload.endsWith("\n") ? payload : `${payload}\n`
    process.stdout.write(Buffer.from(text, "latin1"))
  })

const loadConfig = (cli: CliArgs): Effect.Effect<ResolvedConfig, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const configPath = cli.configPath ?? DEFAULT_CONFIG_PATH
    const fileConfig = yield* _(loadConfigFile(configPath, cli.configPathExplicit))
    return resolveConfig(cli, fileConfig)
  })

const execute = (cli: CliArgs): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const config = yield* _(loadConfig(cli))
    yield* _(Effect.logDebug("settings", JSON.stringify(config)))
    const bytes = yield* _(readSourceFile(cli.file))
    yield* _(Effect.logDebug(`read ${bytes.length} bytes from ${cli.file}`))
    const parsed = parseDocument(bytes, config.parse)
    if (Either.isLeft(parsed)) {
      const diagnostic = renderDiagnostic(parsed.left, bytes, config.contextWindow)
      return yield* _(Effect.fail(parseFailure(cli.file, parsed.left, diagnostic)))
    }
    const { arena, value } = parsed.right
    const stats = arenaStats(arena)
    yield* _(
      Effect.logDebug(
        `arena: ${stats.allocations} allocations, ${stats.relocations} relocations, ${stats.bytesInUse} bytes`
      )
    )
    const output = cli.command === "print" ? renderJson(value, config.indent) : undefined
    release(arena)
    if (output !== undefined && !cli.silent) {
      yield* _(writeStdout(output))
    }
    return { exitCode: 0, output, stats }
  })

/**
 * Run CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @returns ProgramResult with the rendered output and arena statistics.
 *
 * @pure false
 * @effect FileSystem, stdout, stderr logging
 * @invariant parse failures surface as ParseFailure carrying the diagnostic
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    return yield* _(execute(cli).pipe(Effect.provide(loggerLayer(cli.verbose))))
  })
