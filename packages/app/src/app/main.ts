#!/usr/bin/env node
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect } from "effect"

import { exitCodeFor, renderAppError } from "../core/errors.js"
import { runCli } from "./program.js"

// CHANGE: wire the CLI program into the Node runtime
// WHY: execute effects with platform services and map failures to exit codes
// QUOTE(TZ): n/a
// REF: req-main-1
// SOURCE: n/a
// FORMAT THEOREM: runMain(program) terminates with exitCodeFor(error) or 0
// PURITY: SHELL
// EFFECT: Effect<void, never, NodeContext>
// INVARIANT: diagnostics go to stderr
// COMPLEXITY: O(1)

const main = runCli(process.argv).pipe(
  Effect.asVoid,
  Effect.catchAll((error) =>
    Effect.sync(() => {
      process.stderr.write(`${renderAppError(error)}\n`)
      process.exitCode = exitCodeFor(error)
    })
  )
)

NodeRuntime.runMain(Effect.provide(main, NodeContext.layer))
