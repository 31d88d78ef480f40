import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import {
  describeParserError,
  formatParserContext,
  makeParserContext,
  surroundingText
} from "../../src/core/diagnostics.js"
import { describeValue, paint, renderAppError, renderLookupFailure } from "../../src/core/report.js"
import { parse } from "../../src/core/parser.js"
import type { ParserContext } from "../../src/core/diagnostics.js"

describe("surroundingText", () => {
  it.effect("takes radius characters on each side", () =>
    Effect.sync(() => {
      expect(surroundingText("abcdefghij", 5, 2)).toBe("defg")
    }))

  it.effect("clamps the window to the input", () =>
    Effect.sync(() => {
      expect(surroundingText("abcdefghij", 1, 5)).toBe("abcdef")
      expect(surroundingText("abc", 3, 10)).toBe("abc")
      expect(surroundingText("abc", 1, 0)).toBe("")
    }))
})

describe("parser context", () => {
  it.effect("carries a message for the error kind", () =>
    Effect.sync(() => {
      const context = makeParserContext("[,]", 1, "ExpectedCommaBeforeItem")
      expect(context.message).toBe("Expected ',' between array items.")
      expect(describeParserError("Ok")).toBe("No error.")
    }))

  it.effect("renders the failure on one line", () =>
    Effect.sync(() => {
      const contexts: Array<ParserContext> = []
      parse("{\"key\":100,,}", (context) => {
        contexts.push(context)
      })
      const [context] = contexts
      expect(context).toBeDefined()
      if (context !== undefined) {
        expect(formatParserContext(context, 3)).toBe(
          "Expected an object attribute but found ','. (ExpectedAttributeButGotComma at position 11): \"00,,}\""
        )
      }
    }))
})

describe("report", () => {
  it.effect("paints lines only when color is on", () =>
    Effect.sync(() => {
      expect(paint("x", false)).toBe("x")
      expect(paint("x", true)).toBe("\u001b[1;31mx\u001b[0m")
    }))

  it.effect("describes values for trace output", () =>
    Effect.sync(() => {
      expect(describeValue(parse("{\"a\":1}"))).toBe("Object with 1 attribute(s)")
      expect(describeValue(parse("[1,2]"))).toBe("Array with 2 item(s)")
      expect(describeValue(parse("2.5"))).toBe("Float")
    }))

  it.effect("renders lookup failures and program errors", () =>
    Effect.sync(() => {
      expect(renderLookupFailure("doc.json", "a.b", "NotFound")).toBe(
        "doc.json: lookup of \"a.b\" failed with NotFound"
      )
      expect(renderAppError({ _tag: "ConfigError", message: "bad" })).toBe("laxjson: invalid config: bad")
      expect(renderAppError({ _tag: "CliError", message: "Missing input file" })).toBe(
        "laxjson: Missing input file"
      )
    }))
})
