import * as Either from "effect/Either"

import type { ParserContext, ParserErrorKind } from "./diagnostics.js"
import { makeParserContext } from "./diagnostics.js"
import { saturateInt64 } from "./kind.js"
import { Value } from "./value.js"

// CHANGE: recursive-descent reader from relaxed JSON text into a value tree
// WHY: one pass over the input with an explicit cursor and a sticky error kind
// SOURCE: n/a
// FORMAT THEOREM: ∀s: parse(s) is a live root; failed(s) → error(root) = ParseError
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: parsing stops at the first error and returns the partial tree
// COMPLEXITY: O(n) time, O(depth) stack where depth = nesting depth of the input

export type ParseErrorHandler = (context: ParserContext) => void

const INTEGER_PREFIX = /^-?\d+/
const FLOAT_PREFIX = /^-?(?:\d+\.?\d*|\.\d+)/

const isBlank = (char: string | undefined): boolean =>
  char === " " || char === "\t" || char === "\n" || char === "\r"

const isDigit = (char: string | undefined): boolean => char !== undefined && char >= "0" && char <= "9"

const isNumberChar = (char: string | undefined): boolean => isDigit(char) || char === "-" || char === "."

/**
 * Cursor over an immutable input. Each `parse*` method consumes one production and leaves
 * the cursor after it. Nesting is handled by recursion; there is no depth limit.
 */
export class Parser {
  private cursor: number
  private pending: ParserErrorKind = "Ok"
  private errorPosition = 0

  constructor(private readonly input: string, start = 0) {
    this.cursor = start
  }

  get position(): number {
    return this.cursor
  }

  get failed(): boolean {
    return this.pending !== "Ok"
  }

  context(): ParserContext {
    return makeParserContext(this.input, this.failed ? this.errorPosition : this.cursor, this.pending)
  }

  parseValue(): Value {
    this.skipBlank()
    const char = this.peek()
    switch (char) {
      case "{":
        return this.parseObject()
      case "[":
        return this.parseArray()
      case "\"":
        return this.parseString()
      case "t":
      case "f":
        return this.parseBoolean()
      case "n":
        return this.parseNull()
      default:
        if (char === "-" || isDigit(char)) {
          return this.parseNumber()
        }
        this.fail("UnexpectedToken")
        return Value.object()
    }
  }

  private parseObject(): Value {
    this.cursor++
    const object = Value.object()
    let key: string | undefined
    let expectComma = false
    while (this.cursor < this.input.length && !this.failed) {
      const char = this.peek()
      if (isBlank(char)) {
        this.cursor++
        continue
      }
      if (char === "}") {
        this.cursor++
        break
      }
      if (char === ",") {
        if (!expectComma) {
          this.fail("ExpectedAttributeButGotComma")
          break
        }
        expectComma = false
        this.cursor++
        continue
      }
      if (key === undefined) {
        if (expectComma) {
          this.fail("ExpectedCommaBeforeAttribute")
          break
        }
        key = this.parseKey()
        continue
      }
      if (char !== ":") {
        this.fail("ExpectedColon")
        break
      }
      this.cursor++
      object.insert(key, this.parseValue())
      key = undefined
      expectComma = true
    }
    return object
  }

  private parseKey(): string | undefined {
    const candidate = this.parseValue()
    const key = Either.getOrElse(candidate.extractString(), () => "")
    if (key.length === 0) {
      this.fail("ExpectedStringKey")
      return undefined
    }
    return key
  }

  private parseArray(): Value {
    this.cursor++
    const array = Value.array()
    let expectComma = false
    while (this.cursor < this.input.length && !this.failed) {
      const char = this.peek()
      if (isBlank(char)) {
        this.cursor++
        continue
      }
      if (char === "]") {
        this.cursor++
        break
      }
      if (char === ",") {
        if (!expectComma) {
          this.fail("ExpectedCommaBeforeItem")
          break
        }
        expectComma = false
        this.cursor++
        continue
      }
      if (expectComma) {
        this.fail("ExpectedCommaBeforeItem")
        break
      }
      array.push(this.parseValue())
      expectComma = true
    }
    return array
  }

  /**
   * A quote ends the string unless the single character before it is a backslash.
   * Escapes are kept verbatim, so `"a\\"` (backslash, backslash, quote) does not terminate.
   */
  private parseString(): Value {
    this.cursor++
    const start = this.cursor
    while (this.cursor < this.input.length) {
      if (this.peek() === "\"" && this.input[this.cursor - 1] !== "\\") {
        const content = this.input.slice(start, this.cursor)
        this.cursor++
        return Value.string(content)
      }
      this.cursor++
    }
    this.fail("UnterminatedString")
    return Value.string(this.input.slice(start))
  }

  private parseNumber(): Value {
    const start = this.cursor
    while (this.cursor < this.input.length && isNumberChar(this.peek())) {
      this.cursor++
    }
    const run = this.input.slice(start, this.cursor)
    if (run.includes(".")) {
      const prefix = FLOAT_PREFIX.exec(run)
      if (prefix === null) {
        this.fail("InvalidNumber")
        return Value.float(0)
      }
      return Value.float(Number(prefix[0]))
    }
    const prefix = INTEGER_PREFIX.exec(run)
    if (prefix === null) {
      this.fail("InvalidNumber")
      return Value.integer(0)
    }
    return Value.integer(saturateInt64(BigInt(prefix[0])))
  }

  /** Anything starting with `t` or `f` that is not `true` reads as `false`. */
  private parseBoolean(): Value {
    if (this.input.startsWith("true", this.cursor)) {
      this.advance(4)
      return Value.boolean(true)
    }
    this.advance(5)
    return Value.boolean(false)
  }

  private parseNull(): Value {
    if (!this.input.startsWith("null", this.cursor)) {
      this.fail("UnexpectedToken")
    }
    this.advance(4)
    return Value.null()
  }

  private peek(): string | undefined {
    return this.input[this.cursor]
  }

  private advance(count: number): void {
    this.cursor = Math.min(this.input.length, this.cursor + count)
  }

  private skipBlank(): void {
    while (this.cursor < this.input.length && isBlank(this.peek())) {
      this.cursor++
    }
  }

  private fail(kind: ParserErrorKind): void {
    this.pending = kind
    this.errorPosition = this.cursor
  }
}

const decoder = new TextDecoder("utf-8")

const decodeInput = (text: string | Uint8Array): string => typeof text === "string" ? text : decoder.decode(text)

/**
 * Parse relaxed JSON text into a value tree.
 *
 * @param text - Source text, or UTF-8 bytes.
 * @param onError - Called once with the parser context when any error occurred.
 * @returns Always a live root; after a failure it is the partial tree and carries `ParseError`.
 *
 * @pure true (apart from invoking onError)
 * @invariant text after the first complete value is ignored
 * @complexity O(n)
 */
export const parse = (text: string | Uint8Array, onError?: ParseErrorHandler): Value => {
  const parser = new Parser(decodeInput(text))
  const root = parser.parseValue()
  if (parser.failed) {
    onError?.(parser.context())
    root.setError("ParseError")
  }
  return root
}

/**
 * Parse and return either the root or the failure context.
 *
 * @pure true
 * @complexity O(n)
 */
export const parseEither = (text: string | Uint8Array): Either.Either<Value, ParserContext> => {
  const parser = new Parser(decodeInput(text))
  const root = parser.parseValue()
  return parser.failed ? Either.left(parser.context()) : Either.right(root)
}
