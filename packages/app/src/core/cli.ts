import { Match } from "effect"
import * as Either from "effect/Either"

import { MAX_BUCKET_COUNT } from "./object-map.js"

// CHANGE: deterministic argument parsing for the json-arena command line
// WHY: keep CLI decoding pure and testable at the boundary
// QUOTE(TZ): "reads a filename, invokes the parser, prints or discards the result"
// REF: req-cli-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → args.command ∈ Commands ∧ args.file ≠ ""
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags and extra positionals are rejected
// COMPLEXITY: O(n) where n = argv length

export type CliCommand = "print" | "check"

export interface CliArgs {
  readonly command: CliCommand
  readonly file: string
  readonly configPath: string | undefined
  readonly configPathExplicit: boolean
  readonly indent: number | undefined
  readonly contextWindow: number | undefined
  readonly bucketCount: number | undefined
  readonly maxDepth: number | undefined
  readonly maxArenaBytes: number | undefined
  readonly silent: boolean
  readonly verbose: boolean
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

const cliError = (message: string): CliError => ({ _tag: "CliError", message })

const isFlag = (value: string): boolean => value.startsWith("-") && value !== "-"

const parseCommand = (value: string): CliCommand | undefined =>
  Match.value(value).pipe(
    Match.when("print", (): CliCommand => "print"),
    Match.when("check", (): CliCommand => "check"),
    Match.orElse(() => undefined)
  )

const defaultArgs = (command: CliCommand): CliArgs => ({
  command,
  file: "",
  configPath: undefined,
  configPathExplicit: false,
  indent: undefined,
  contextWindow: undefined,
  bucketCount: undefined,
  maxDepth: undefined,
  maxArenaBytes: undefined,
  silent: false,
  verbose: false
})

const readFlagValue = (
  flagName: string,
  inlineValue: string | undefined,
  nextValue: string | undefined
): Either.Either<string, CliError> => {
  if (inlineValue !== undefined) {
    return Either.right(inlineValue)
  }
  if (nextValue === undefined || isFlag(nextValue)) {
    return Either.left(cliError(`Missing value for --${flagName}`))
  }
  return Either.right(nextValue)
}

interface CountRange {
  readonly minimum: number
  readonly maximum?: number
}

const describeRange = (range: CountRange): string =>
  range.maximum === undefined
    ? `an integer ≥ ${range.minimum}`
    : `an integer between ${range.minimum} and ${range.maximum}`

const parseCount = (
  flagName: string,
  value: string,
  range: CountRange
): Either.Either<number, CliError> => {
  const parsed = /^\d+$/.test(value) ? Number(value) : Number.NaN
  if (
    !Number.isSafeInteger(parsed) || parsed < range.minimum ||
    (range.maximum !== undefined && parsed > range.maximum)
  ) {
    return Either.left(cliError(`--${flagName} expects ${describeRange(range)}, got: ${value}`))
  }
  return Either.right(parsed)
}

type Parsed = { readonly next: CliArgs; readonly consumed: number }

const setParsedFlag = (next: CliArgs, consumed: number): Either.Either<Parsed, CliError> =>
  Either.right({ next, consumed })

const parseValueFlag = (
  flagName: string,
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: CliArgs, value: string) => CliArgs
): Either.Either<Parsed, CliError> =>
  Either.map(readFlagValue(flagName, inlineValue, nextValue), (value) => ({
    next: update(current, value),
    consumed: inlineValue === undefined ? 2 : 1
  }))

const parseCountFlag = (
  flagName: string,
  range: CountRange,
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: CliArgs, value: number) => CliArgs
): Either.Either<Parsed, CliError> =>
  Either.flatMap(readFlagValue(flagName, inlineValue, nextValue), (raw) =>
    Either.map(parseCount(flagName, raw, range), (value) => ({
      next: update(current, value),
      consumed: inlineValue === undefined ? 2 : 1
    })))

type FlagParser = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => Either.Either<Parsed, CliError>

const flagParsers: Record<string, FlagParser> = {
  silent: (current) => setParsedFlag({ ...current, silent: true }, 1),
  verbose: (current) => setParsedFlag({ ...current, verbose: true }, 1),
  config: (current, inlineValue, nextValue) =>
    parseValueFlag("config", current, inlineValue, nextValue, (args, value) => ({
      ...args,
      configPath: value,
      configPathExplicit: true
    })),
  indent: (current, inlineValue, nextValue) =>
    parseCountFlag("indent", { minimum: 0 }, current, inlineValue, nextValue, (args, value) => ({
      ...args,
      indent: value
    })),
  context: (current, inlineValue, nextValue) =>
    parseCountFlag("context", { minimum: 0 }, current, inlineValue, nextValue, (args, value) => ({
      ...args,
      contextWindow: value
    })),
  buckets: (current, inlineValue, nextValue) =>
    parseCountFlag(
      "buckets",
      { minimum: 32, maximum: MAX_BUCKET_COUNT },
      current,
      inlineValue,
      nextValue,
      (args, value) => ({ ...args, bucketCount: value })
    ),
  "max-depth": (current, inlineValue, nextValue) =>
    parseCountFlag("max-depth", { minimum: 1 }, current, inlineValue, nextValue, (args, value) => ({
      ...args,
      maxDepth: value
    })),
  "max-arena-bytes": (current, inlineValue, nextValue) =>
    parseCountFlag("max-arena-bytes", { minimum: 1 }, current, inlineValue, nextValue, (args, value) => ({
      ...args,
      maxArenaBytes: value
    }))
}

const parseFlag = (
  raw: string,
  nextValue: string | undefined,
  current: CliArgs
): Either.Either<Parsed, CliError> => {
  if (!raw.startsWith("--")) {
    return Either.left(cliError(`Unknown flag: ${raw}`))
  }
  const body = raw.slice(2)
  const separator = body.indexOf("=")
  const name = separator === -1 ? body : body.slice(0, separator)
  const inlineValue = separator === -1 ? undefined : body.slice(separator + 1)
  const parser = flagParsers[name]
  if (parser === undefined) {
    return Either.left(cliError(`Unknown flag: --${name}`))
  }
  return parser(current, inlineValue, nextValue)
}

const parsePositional = (value: string, current: CliArgs): Either.Either<Parsed, CliError> => {
  if (current.file !== "") {
    return Either.left(cliError(`Unexpected positional argument: ${value}`))
  }
  return setParsedFlag({ ...current, file: value }, 1)
}

const parseArgs = (
  rawArgs: ReadonlyArray<string>,
  startIndex: number,
  initial: CliArgs
): Either.Either<CliArgs, CliError> => {
  let args = initial
  let index = startIndex
  while (index < rawArgs.length) {
    const current = rawArgs[index]
    if (current === undefined) {
      return Either.left(cliError("Unexpected end of arguments"))
    }
    const parsed = isFlag(current)
      ? parseFlag(current, rawArgs[index + 1], args)
      : parsePositional(current, args)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    args = parsed.right.next
    index += parsed.right.consumed
  }
  if (args.file === "") {
    return Either.left(cliError("Missing input file"))
  }
  return Either.right(args)
}

/**
 * Parse CLI arguments into a typed configuration.
 *
 * @param argv - Raw process.argv array.
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant command defaults to print when omitted
 * @complexity O(n)
 */
export const parseCliArgs = (
  argv: ReadonlyArray<string>
): Either.Either<CliArgs, CliError> => {
  const rawArgs = argv.slice(2)
  const first = rawArgs[0]
  const command = first === undefined ? undefined : parseCommand(first)
  return command === undefined
    ? parseArgs(rawArgs, 0, defaultArgs("print"))
    : parseArgs(rawArgs, 1, defaultArgs(command))
}
