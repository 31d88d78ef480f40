import { Match } from "effect"

import type { Value } from "./value.js"

// CHANGE: serialize a value tree into compact text
// WHY: dump is the inverse of parse for every tree the parser produces
// SOURCE: n/a
// FORMAT THEOREM: ∀v: parse(dump(v)) ≅ v up to object member order
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: no whitespace is emitted and string contents are written verbatim
// COMPLEXITY: O(n) where n = number of nodes

const FIXED_DIGITS = 6

// x·10^6 ends in exactly .5 iff x·2^7 is an odd integer
const HALF_UNIT_SCALE = 128
// 2·10^6 / 2^7
const HALF_UNITS_PER_STEP = 15625n

const isHalfwayTie = (magnitude: number): boolean => {
  const scaled = magnitude * HALF_UNIT_SCALE
  return Number.isInteger(scaled) && scaled % 2 === 1
}

const roundHalfToEven = (magnitude: number): string => {
  const halfUnits = BigInt(magnitude * HALF_UNIT_SCALE) * HALF_UNITS_PER_STEP
  const lower = halfUnits / 2n
  const units = lower % 2n === 0n ? lower : lower + 1n
  const digits = units.toString().padStart(FIXED_DIGITS + 1, "0")
  return `${digits.slice(0, -FIXED_DIGITS)}.${digits.slice(-FIXED_DIGITS)}`
}

/**
 * Fixed-point rendering with six fraction digits, the `%f` convention: exact ties round
 * to even.
 *
 * @pure true
 * @invariant formatFixed(2.5) = "2.500000"
 * @complexity O(1)
 */
export const formatFixed = (value: number): string => {
  if (Number.isNaN(value)) {
    return "nan"
  }
  if (!Number.isFinite(value)) {
    return value > 0 ? "inf" : "-inf"
  }
  if (Object.is(value, -0)) {
    return `-${(0).toFixed(FIXED_DIGITS)}`
  }
  if (Math.abs(value) >= 1e21) {
    // toFixed switches to exponent notation here; such doubles are integral
    return `${BigInt(value).toString()}.${"0".repeat(FIXED_DIGITS)}`
  }
  if (isHalfwayTie(Math.abs(value))) {
    // toFixed rounds exact ties away from zero
    return `${value < 0 ? "-" : ""}${roundHalfToEven(Math.abs(value))}`
  }
  return value.toFixed(FIXED_DIGITS)
}

const join = (open: string, parts: ReadonlyArray<string>, close: string): string =>
  `${open}${parts.join(",")}${close}`

/**
 * Serialize a value. Member order of objects follows storage order and is unspecified.
 *
 * @param value - Live root or subtree.
 * @returns Compact text.
 *
 * @pure true
 * @invariant empty containers render as {} and []
 * @complexity O(n)
 */
export const dumpValue = (value: Value): string =>
  Match.value(value.view()).pipe(
    Match.tag("Object", ({ entries }) =>
      join("{", [...entries].map(([key, child]) => `"${key}":${dumpValue(child)}`), "}")),
    Match.tag("Array", ({ items }) => join("[", items.map((item) => dumpValue(item)), "]")),
    Match.tag("String", ({ value: text }) => `"${text}"`),
    Match.tag("Integer", ({ value: integer }) => integer.toString()),
    Match.tag("Float", ({ value: float }) => formatFixed(float)),
    Match.tag("Boolean", ({ value: flag }) => (flag ? "true" : "false")),
    Match.tag("Null", () => "null"),
    Match.exhaustive
  )
