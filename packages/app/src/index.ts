export type { Allocation, Arena, ArenaFailure, ArenaOptions, ArenaStats } from "./core/arena.js"
export { allocate, arenaStats, grow, makeArena, release } from "./core/arena.js"
export type { ByteCursor } from "./core/byte-cursor.js"
export { END_OF_INPUT, makeCursor } from "./core/byte-cursor.js"
export type { ContextWindow } from "./core/diagnostics.js"
export { DEFAULT_CONTEXT_WINDOW, renderContext, renderDiagnostic } from "./core/diagnostics.js"
export type { Json, JsonObject } from "./core/json.js"
export type { JsonTag, JsonValue } from "./core/json-value.js"
export {
  arrayValue,
  booleanValue,
  nullValue,
  numberValue,
  objectValue,
  releaseValue,
  stringValue,
  toJson,
  valueEquals
} from "./core/json-value.js"
export type { MapEntry, ObjectMap } from "./core/object-map.js"
export {
  DEFAULT_BUCKET_COUNT,
  deleteObjectMap,
  hashKey,
  insertMember,
  isBucketCount,
  lookupMember,
  makeObjectMap,
  MAX_BUCKET_COUNT,
  memberCount,
  memberEntries,
  memberKeys
} from "./core/object-map.js"
export type { ParseContext, ParsedDocument, ParseSettings } from "./core/parse.js"
export { defaultParseSettings, makeParseContext, parseDocument, parseText, parseValue } from "./core/parse.js"
export type { Expectation, ParseError, Production } from "./core/parse-error.js"
export { describeParseError, parseErrorExitCode } from "./core/parse-error.js"
export { DEFAULT_INDENT, renderJson } from "./core/printer.js"
