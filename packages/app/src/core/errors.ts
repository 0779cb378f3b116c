import { Match } from "effect"

import type { CliError } from "./cli.js"
import type { ParseError } from "./parse-error.js"
import { parseErrorExitCode } from "./parse-error.js"

// CHANGE: unify the program's error algebra
// WHY: map every failure to a message and a deterministic exit code
// QUOTE(TZ): "a distinct nonzero exit status per error kind"
// REF: req-errors-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ AppError: exitCodeFor(e) ≠ 0
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique
// COMPLEXITY: O(1)/O(1)

export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type FileError = { readonly _tag: "FileError"; readonly message: string }
export type ParseFailure = {
  readonly _tag: "ParseFailure"
  readonly file: string
  readonly error: ParseError
  readonly diagnostic: string
}

export type AppError = CliError | ConfigError | FileError | ParseFailure

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})

export const parseFailure = (file: string, error: ParseError, diagnostic: string): ParseFailure => ({
  _tag: "ParseFailure",
  file,
  error,
  diagnostic
})

export const exitCodeFor = (error: AppError): number =>
  Match.value(error).pipe(
    Match.tag("ParseFailure", (failure) => parseErrorExitCode(failure.error)),
    Match.orElse(() => 1)
  )

export const renderAppError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.tag("CliError", (value) => `error: ${value.message}`),
    Match.tag("ConfigError", (value) => `config error: ${value.message}`),
    Match.tag("FileError", (value) => `file error: ${value.message}`),
    Match.tag("ParseFailure", (value) => `${value.file}: ${value.diagnostic}`),
    Match.exhaustive
  )
