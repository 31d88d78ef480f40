import { Match } from "effect"

// CHANGE: describe parser failures with a kind, a position and a text window
// WHY: the error callback receives everything needed to print a diagnostic
// SOURCE: n/a
// FORMAT THEOREM: ∀c, r ≥ 0: |surroundings(c, r)| ≤ 2r
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: the window is clamped to [0, input.length]
// COMPLEXITY: O(r)

export type ParserErrorKind =
  | "Ok"
  | "ExpectedCommaBeforeAttribute"
  | "ExpectedCommaBeforeItem"
  | "ExpectedAttributeButGotComma"
  | "ExpectedStringKey"
  | "UnterminatedString"
  | "UnexpectedToken"
  | "ExpectedColon"
  | "InvalidNumber"

export interface ParserContext {
  readonly error: ParserErrorKind
  /** Cursor (UTF-16 code unit offset) at which the error was recorded. */
  readonly position: number
  readonly input: string
  readonly message: string
  readonly surroundings: (radius: number) => string
}

export const DEFAULT_RADIUS = 20

export const describeParserError = (kind: ParserErrorKind): string =>
  Match.value(kind).pipe(
    Match.when("Ok", () => "No error."),
    Match.when("ExpectedCommaBeforeAttribute", () => "Expected ',' before the next object attribute."),
    Match.when("ExpectedCommaBeforeItem", () => "Expected ',' between array items."),
    Match.when("ExpectedAttributeButGotComma", () => "Expected an object attribute but found ','."),
    Match.when("ExpectedStringKey", () => "Expected a non-empty string as object attribute key."),
    Match.when("UnterminatedString", () => "Expected closing quote but reached end of input."),
    Match.when(
      "UnexpectedToken",
      () => "Expected an object, array, string, number, boolean or null."
    ),
    Match.when("ExpectedColon", () => "Expected ':' after object attribute key."),
    Match.when("InvalidNumber", () => "Expected an integer or a decimal number."),
    Match.exhaustive
  )

/**
 * Slice of `input` around `position`, at most `radius` characters on each side.
 *
 * @pure true
 * @invariant 0 ≤ start ≤ end ≤ input.length
 * @complexity O(radius)
 */
export const surroundingText = (input: string, position: number, radius: number): string => {
  const reach = Math.max(0, Math.trunc(radius))
  const start = Math.max(0, position - reach)
  const end = Math.min(input.length, position + reach)
  return start < end ? input.slice(start, end) : ""
}

export const makeParserContext = (
  input: string,
  position: number,
  error: ParserErrorKind
): ParserContext => ({
  error,
  position,
  input,
  message: describeParserError(error),
  surroundings: (radius) => surroundingText(input, position, radius)
})

/**
 * One-line rendering: message, position and the quoted window.
 *
 * @pure true
 * @complexity O(radius)
 */
export const formatParserContext = (context: ParserContext, radius: number = DEFAULT_RADIUS): string =>
  `${context.message} (${context.error} at position ${context.position}): ${
    JSON.stringify(context.surroundings(radius))
  }`
