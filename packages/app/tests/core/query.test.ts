import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"
import * as Option from "effect/Option"

import { parse } from "../../src/core/parser.js"
import { splitPath, walkPath } from "../../src/core/query.js"

const document = "{\"items\":[{\"name\":\"x\"}]}"

describe("splitPath", () => {
  it.effect("drops empty segments", () =>
    Effect.sync(() => {
      expect(splitPath("a..b.")).toEqual(["a", "b"])
      expect(splitPath("")).toEqual([])
    }))
})

describe("walkPath", () => {
  it.effect("follows keys and indices", () =>
    Effect.sync(() => {
      const reached = walkPath(parse(document), splitPath("items.0.name"))
      expect(reached.extractString()).toEqual(Either.right("x"))
    }))

  it.effect("returns the root for an empty path", () =>
    Effect.sync(() => {
      const root = parse(document)
      expect(walkPath(root, [])).toBe(root)
    }))

  it.effect("stops at the array when the index is out of range", () =>
    Effect.sync(() => {
      const reached = walkPath(parse(document), splitPath("items.5"))
      expect(reached.type()).toBe("Array")
      expect(reached.error()).toEqual(Option.some("NotFound"))
    }))

  it.effect("reports a key used on an array", () =>
    Effect.sync(() => {
      const reached = walkPath(parse(document), splitPath("items.name"))
      expect(reached.type()).toBe("Array")
      expect(reached.error()).toEqual(Option.some("NotSupported"))
    }))

  it.effect("stays on the node that failed", () =>
    Effect.sync(() => {
      const root = parse(document)
      const reached = walkPath(root, splitPath("missing.0"))
      expect(reached).toBe(root)
      expect(reached.error()).toEqual(Option.some("NotFound"))
    }))
})
