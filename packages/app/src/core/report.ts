import { Match } from "effect"

import type { ParserContext } from "./diagnostics.js"
import { formatParserContext } from "./diagnostics.js"
import type { AppError, ValueErrorKind } from "./errors.js"
import type { Value } from "./value.js"

// CHANGE: render diagnostics and summaries as single lines
// WHY: keep the wording of CLI output in the pure core where it is testable
// SOURCE: n/a
// FORMAT THEOREM: ∀x: render(x) contains no newline
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: every line starts with the subject (file or program name)
// COMPLEXITY: O(radius)

const ANSI_RED = "\u001b[1;31m"
const ANSI_RESET = "\u001b[0m"

export const paint = (line: string, color: boolean): string => color ? `${ANSI_RED}${line}${ANSI_RESET}` : line

export const renderParseFailure = (file: string, context: ParserContext, radius: number): string =>
  `${file}: ${formatParserContext(context, radius)}`

export const renderLookupFailure = (file: string, path: string, kind: ValueErrorKind): string =>
  `${file}: lookup of "${path}" failed with ${kind}`

/**
 * Short description of a node for trace output.
 *
 * @pure true
 * @invariant containers report their member count
 */
export const describeValue = (value: Value): string => {
  const kind = value.type()
  if (kind === "Object") {
    return `Object with ${value.size()} attribute(s)`
  }
  if (kind === "Array") {
    return `Array with ${value.size()} item(s)`
  }
  return kind
}

export const renderAppError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.tag("CliError", ({ message }) => `laxjson: ${message}`),
    Match.tag("ConfigError", ({ message }) => `laxjson: invalid config: ${message}`),
    Match.tag("FileError", ({ message }) => `laxjson: ${message}`),
    Match.exhaustive
  )
