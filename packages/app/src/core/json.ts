import { Match } from "effect"

import { Value } from "./value.js"

// CHANGE: bridge between value trees and plain JavaScript data
// WHY: hosts build documents from literals and hand parsed trees to code expecting plain data
// SOURCE: n/a
// FORMAT THEOREM: ∀j without empty keys: toJson(fromJson(j)) = j (integers within the safe range)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Json is closed under array/object nesting with primitive leaves
// COMPLEXITY: O(n)/O(n)

export type Json =
  | null
  | boolean
  | number
  | string
  | ReadonlyArray<Json>
  | { readonly [key: string]: Json }

export type JsonObject = { readonly [key: string]: Json }

const isJsonArray = (json: Json): json is ReadonlyArray<Json> => Array.isArray(json)

/**
 * Build a fresh root from plain data.
 *
 * Integral numbers become Integer, other numbers Float. An empty object key is rejected by
 * the object it belongs to, which then carries `EmptyKey`.
 *
 * @pure true
 * @complexity O(n)
 */
export const fromJson = (json: Json): Value => {
  if (json === null || typeof json === "boolean" || typeof json === "number" || typeof json === "string") {
    return Value.of(json)
  }
  if (isJsonArray(json)) {
    const array = Value.array()
    for (const item of json) {
      array.push(fromJson(item))
    }
    return array
  }
  const object = Value.object()
  for (const [key, member] of Object.entries(json)) {
    object.insert(key, fromJson(member))
  }
  return object
}

/**
 * Convert a tree to plain data. Integers are converted with `Number`, so values beyond
 * ±2^53 lose precision.
 *
 * @pure true
 * @complexity O(n)
 */
export const toJson = (value: Value): Json =>
  Match.value(value.view()).pipe(
    Match.tag("Object", ({ entries }): Json =>
      Object.fromEntries([...entries].map(([key, child]) => [key, toJson(child)] as const))),
    Match.tag("Array", ({ items }): Json => items.map((item) => toJson(item))),
    Match.tag("String", ({ value: text }): Json => text),
    Match.tag("Integer", ({ value: integer }): Json => Number(integer)),
    Match.tag("Float", ({ value: float }): Json => float),
    Match.tag("Boolean", ({ value: flag }): Json => flag),
    Match.tag("Null", (): Json => null),
    Match.exhaustive
  )
