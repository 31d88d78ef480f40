// CHANGE: enumerate the value kinds and the 64-bit integer domain
// WHY: every operation dispatches on one closed set of kinds
// SOURCE: n/a
// FORMAT THEOREM: ∀v ∈ Value: kind(v) ∈ ValueKind
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: INT64_MIN ≤ saturateInt64(x) ≤ INT64_MAX
// COMPLEXITY: O(1)/O(1)

export type ValueKind = "Object" | "Array" | "String" | "Integer" | "Float" | "Boolean" | "Null"

export type Scalar = string | number | bigint | boolean | null

export const INT64_MAX = 9223372036854775807n
export const INT64_MIN = -9223372036854775808n

export const saturateInt64 = (value: bigint): bigint => {
  if (value > INT64_MAX) {
    return INT64_MAX
  }
  if (value < INT64_MIN) {
    return INT64_MIN
  }
  return value
}

/**
 * Convert a bigint or number into the signed 64-bit integer domain.
 *
 * Fractions are truncated toward zero, out-of-range values saturate and NaN maps to 0.
 *
 * @pure true
 * @invariant result ∈ [INT64_MIN, INT64_MAX]
 * @complexity O(1)
 */
export const toInt64 = (value: bigint | number): bigint => {
  if (typeof value === "bigint") {
    return saturateInt64(value)
  }
  if (Number.isNaN(value)) {
    return 0n
  }
  if (!Number.isFinite(value)) {
    return value > 0 ? INT64_MAX : INT64_MIN
  }
  return saturateInt64(BigInt(Math.trunc(value)))
}
