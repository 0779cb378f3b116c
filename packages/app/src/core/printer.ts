import { Match } from "effect"

import type { JsonValue } from "./json-value.js"
import { memberEntries } from "./object-map.js"

// CHANGE: pretty-print a value tree as indented JSON text
// WHY: the print command shows the parsed tree; its output parses back to an equal tree
// QUOTE(TZ): "indentation increasing by a caller-supplied fixed amount per nesting level"
// REF: req-printer-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v: parse(render(v)) ≅ v for numbers exact to six decimals
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: members are printed in bucket order
// COMPLEXITY: O(n)

export const DEFAULT_INDENT = 2

const pad = (level: number, indent: number): string => " ".repeat(level * indent)

// Fixed six-decimal notation, like printf("%lf").
export const formatNumber = (value: number): string => value.toFixed(6)

type Task =
  | { readonly _tag: "Text"; readonly text: string }
  | { readonly _tag: "Value"; readonly value: JsonValue; readonly level: number }

const text = (value: string): Task => ({ _tag: "Text", text: value })

const renderScalar = (value: JsonValue): string =>
  Match.value(value).pipe(
    Match.tag("String", (string) => `"${string.value}"`),
    Match.tag("Number", (number) => formatNumber(number.value)),
    Match.tag("Boolean", (boolean) => (boolean.value ? "true" : "false")),
    Match.tag("Null", () => "null"),
    Match.tag("Object", () => "{}"),
    Match.tag("Array", () => "[]"),
    Match.exhaustive
  )

// Each child is a prefix text followed by the child value one level deeper.
const childTasks = (value: JsonValue, level: number, indent: number): ReadonlyArray<readonly [string, JsonValue]> => {
  const prefix = pad(level + 1, indent)
  if (value._tag === "Object") {
    return memberEntries(value.members).map((entry) => [`${prefix}"${entry.key}": `, entry.value] as const)
  }
  if (value._tag === "Array") {
    return value.items.map((item) => [prefix, item] as const)
  }
  return []
}

const expand = (value: JsonValue, level: number, indent: number, out: Array<string>, tasks: Array<Task>): void => {
  const children = childTasks(value, level, indent)
  if (children.length === 0) {
    out.push(renderScalar(value))
    return
  }
  const [open, close] = value._tag === "Object" ? (["{", "}"] as const) : (["[", "]"] as const)
  out.push(`${open}\n`)
  const ordered: Array<Task> = []
  children.forEach(([prefix, child], index) => {
    if (index > 0) {
      ordered.push(text(",\n"))
    }
    ordered.push(text(prefix), { _tag: "Value", value: child, level: level + 1 })
  })
  ordered.push(text(`\n${pad(level, indent)}${close}`))
  for (let index = ordered.length - 1; index >= 0; index--) {
    const task = ordered[index]
    if (task !== undefined) {
      tasks.push(task)
    }
  }
}

/**
 * Render a value tree.
 *
 * @param value - Root value.
 * @param indent - Spaces added per nesting level.
 * @returns Text without a trailing newline.
 *
 * @pure true
 * @invariant output is produced from an explicit task stack; depth does not grow the call stack
 * @complexity O(n)
 */
export const renderJson = (value: JsonValue, indent: number = DEFAULT_INDENT): string => {
  const out: Array<string> = []
  const tasks: Array<Task> = [{ _tag: "Value", value, level: 0 }]
  let task = tasks.pop()
  while (task !== undefined) {
    if (task._tag === "Text") {
      out.push(task.text)
    } else {
      expand(task.value, task.level, indent, out, tasks)
    }
    task = tasks.pop()
  }
  return out.join("")
}
