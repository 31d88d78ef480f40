import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Option from "effect/Option"

import { fromJson, toJson } from "../../src/core/json.js"
import { parse } from "../../src/core/parser.js"

describe("fromJson / toJson", () => {
  it.effect("builds a tree from plain data", () =>
    Effect.sync(() => {
      const value = fromJson({ a: [1, 2.5, "x", true, null] })
      expect(value.hasError()).toBe(false)
      expect(value.dump()).toBe("{\"a\":[1,2.500000,\"x\",true,null]}")
    }))

  it.effect("converts a parsed tree to plain data", () =>
    Effect.sync(() => {
      const json = toJson(parse("{\"a\":[1,2.5,\"x\",true,null],\"b\":{}}"))
      expect(json).toEqual({ a: [1, 2.5, "x", true, null], b: {} })
    }))

  it.effect("marks objects built with an empty key", () =>
    Effect.sync(() => {
      const value = fromJson({ "": 1 })
      expect(value.error()).toEqual(Option.some("EmptyKey"))
      expect(value.size()).toBe(0)
    }))
})
