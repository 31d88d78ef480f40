import type { CliError } from "./cli.js"

// CHANGE: unify the error algebras of the value tree and the CLI
// WHY: value failures are recorded on nodes, program failures are typed records
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ AppError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique; "Ok" means no pending value error
// COMPLEXITY: O(1)/O(1)

/**
 * Sticky error register of a {@link Value}.
 *
 * - `NotSupported`: operation is invalid for the receiver's kind
 * - `NotFound`: object key is missing
 * - `EmptyKey`: object insert with `""`
 * - `ParseError`: root of a tree produced by a failed parse
 * - `TypeMismatch`: extraction of the wrong kind
 */
export type ValueErrorKind =
  | "Ok"
  | "NotSupported"
  | "NotFound"
  | "EmptyKey"
  | "ParseError"
  | "TypeMismatch"

/**
 * Raised when a moved-from value is used, or when a value owned by a container is moved.
 * These are programming defects and never travel through the sticky register.
 */
export class OwnershipError extends Error {
  override readonly name = "OwnershipError"

  constructor(message: string) {
    super(message)
    Object.setPrototypeOf(this, OwnershipError.prototype)
  }
}

export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type FileError = { readonly _tag: "FileError"; readonly message: string }

export type AppError =
  | CliError
  | ConfigError
  | FileError

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})
