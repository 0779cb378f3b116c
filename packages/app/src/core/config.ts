import type { CliArgs } from "./cli.js"
import { DEFAULT_CONTEXT_WINDOW } from "./diagnostics.js"
import type { ParseSettings } from "./parse.js"
import { defaultParseSettings } from "./parse.js"
import { DEFAULT_INDENT } from "./printer.js"

// CHANGE: define config merging rules and defaults
// WHY: ensure CLI flags override the config file and defaults deterministically
// QUOTE(TZ): "a few compile-time constants (bucket count, initial buffer sizes, diagnostic context window size)"
// REF: req-config-merge-1
// SOURCE: n/a
// FORMAT THEOREM: ∀k: resolve(cli, cfg).k = cli.k ?? cfg.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: 32 ≤ bucketCount ≤ MAX_BUCKET_COUNT and maxDepth ≥ 1 after resolution
// COMPLEXITY: O(1)/O(1)

export const DEFAULT_CONFIG_PATH = "./.json-arena.json"

export interface FileConfig {
  readonly indent?: number
  readonly contextWindow?: number
  readonly bucketCount?: number
  readonly maxDepth?: number
  readonly maxArenaBytes?: number
}

export interface ResolvedConfig {
  readonly indent: number
  readonly contextWindow: number
  readonly parse: ParseSettings
}

/**
 * Resolve the effective config from CLI flags, file config, and defaults.
 *
 * @param cli - Parsed CLI arguments.
 * @param fileConfig - Optional config loaded from .json-arena.json.
 * @returns Resolved configuration.
 *
 * @pure true
 * @complexity O(1)
 */
export const resolveConfig = (
  cli: CliArgs,
  fileConfig: FileConfig | undefined
): ResolvedConfig => ({
  indent: cli.indent ?? fileConfig?.indent ?? DEFAULT_INDENT,
  contextWindow: cli.contextWindow ?? fileConfig?.contextWindow ?? DEFAULT_CONTEXT_WINDOW,
  parse: {
    bucketCount: cli.bucketCount ?? fileConfig?.bucketCount ?? defaultParseSettings.bucketCount,
    maxDepth: cli.maxDepth ?? fileConfig?.maxDepth ?? defaultParseSettings.maxDepth,
    maxArenaBytes: cli.maxArenaBytes ?? fileConfig?.maxArenaBytes ?? defaultParseSettings.maxArenaBytes
  }
})
