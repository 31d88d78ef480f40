import * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { ValueErrorKind } from "./errors.js"
import { OwnershipError } from "./errors.js"
import type { Scalar, ValueKind } from "./kind.js"
import { toInt64 } from "./kind.js"
import { dumpValue } from "./serialize.js"

// CHANGE: model the document node as one tagged payload with exclusive ownership
// WHY: a node holds exactly one kind of payload and belongs to at most one container
// SOURCE: n/a
// FORMAT THEOREM: ∀v: live(v) → kind(v) = payload(v)._tag ∧ |owners(v)| ≤ 1
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: object keys are non-empty; moved-from nodes reject every operation
// COMPLEXITY: O(1) per accessor, O(n) for clone/dump

type Payload =
  | { readonly _tag: "Object"; readonly entries: Map<string, Value> }
  | { readonly _tag: "Array"; readonly items: Array<Value> }
  | { readonly _tag: "String"; readonly value: string }
  | { readonly _tag: "Integer"; readonly value: bigint }
  | { readonly _tag: "Float"; readonly value: number }
  | { readonly _tag: "Boolean"; readonly value: boolean }
  | { readonly _tag: "Null" }

type Slot = Payload | { readonly _tag: "Moved" }

/** Read-only projection of a node's payload, used by the serializer and the plain-data bridge. */
export type ValueView =
  | { readonly _tag: "Object"; readonly entries: ReadonlyMap<string, Value> }
  | { readonly _tag: "Array"; readonly items: ReadonlyArray<Value> }
  | { readonly _tag: "String"; readonly value: string }
  | { readonly _tag: "Integer"; readonly value: bigint }
  | { readonly _tag: "Float"; readonly value: number }
  | { readonly _tag: "Boolean"; readonly value: boolean }
  | { readonly _tag: "Null" }

const MOVED: Slot = { _tag: "Moved" }

export class Value {
  private slot: Slot
  private owner: Value | undefined = undefined
  private lastError: ValueErrorKind = "Ok"

  private constructor(payload: Payload) {
    this.slot = payload
  }

  /** An empty object, the default node. */
  static object(): Value {
    return new Value({ _tag: "Object", entries: new Map() })
  }

  static array(): Value {
    return new Value({ _tag: "Array", items: [] })
  }

  static string(value: string): Value {
    return new Value({ _tag: "String", value })
  }

  static integer(value: bigint | number): Value {
    return new Value({ _tag: "Integer", value: toInt64(value) })
  }

  static float(value: number): Value {
    return new Value({ _tag: "Float", value })
  }

  static boolean(value: boolean): Value {
    return new Value({ _tag: "Boolean", value })
  }

  static null(): Value {
    return new Value({ _tag: "Null" })
  }

  /**
   * Wrap a plain scalar. Integral numbers and bigints become Integer, other numbers Float.
   *
   * @pure true
   * @complexity O(1)
   */
  static of(scalar: Scalar): Value {
    if (scalar === null) {
      return Value.null()
    }
    if (typeof scalar === "string") {
      return Value.string(scalar)
    }
    if (typeof scalar === "boolean") {
      return Value.boolean(scalar)
    }
    if (typeof scalar === "bigint" || Number.isInteger(scalar)) {
      return Value.integer(scalar)
    }
    return Value.float(scalar)
  }

  private get payload(): Payload {
    const slot = this.slot
    if (slot._tag === "Moved") {
      throw new OwnershipError("value used after it was moved")
    }
    return slot
  }

  type(): ValueKind {
    return this.payload._tag
  }

  /** 1 for scalars, the number of members for Object and Array. */
  size(): number {
    const payload = this.payload
    if (payload._tag === "Object") {
      return payload.entries.size
    }
    if (payload._tag === "Array") {
      return payload.items.length
    }
    return 1
  }

  view(): ValueView {
    return this.payload
  }

  isMoved(): boolean {
    return this.slot._tag === "Moved"
  }

  isRoot(): boolean {
    this.assertLive()
    return this.owner === undefined
  }

  /**
   * Transfer the payload of a root into a fresh node; the receiver becomes moved-from.
   *
   * @throws OwnershipError when the receiver is owned by a container
   * @invariant afterwards isMoved() = true and the pending error travels with the payload
   */
  take(): Value {
    if (this.owner !== undefined) {
      throw new OwnershipError("cannot move a value owned by a container")
    }
    return this.moveInto(undefined)
  }

  /**
   * Insert `child` under `key`.
   *
   * Object: `key` must be non-empty, an existing member is replaced and discarded.
   * Array: `key` must be `""`, `child` is appended.
   * The child is moved into the container, so the caller's handle becomes moved-from.
   * A child that already has an owner, or that is the receiver's own root, is rejected.
   *
   * @returns the receiver
   */
  insert(key: string, child: Value): Value {
    const payload = this.payload
    child.assertLive()
    if (payload._tag === "Object") {
      if (key.length === 0) {
        return this.setError("EmptyKey")
      }
      if (!this.canAdopt(child)) {
        return this.setError("NotSupported")
      }
      const previous = payload.entries.get(key)
      payload.entries.set(key, child.moveInto(this))
      previous?.discard()
      return this
    }
    if (payload._tag === "Array" && key.length === 0 && this.canAdopt(child)) {
      payload.items.push(child.moveInto(this))
      return this
    }
    return this.setError("NotSupported")
  }

  set(key: string, child: Value | Scalar): Value {
    return this.insert(key, child instanceof Value ? child : Value.of(child))
  }

  push(child: Value | Scalar): Value {
    return this.insert("", child instanceof Value ? child : Value.of(child))
  }

  /**
   * Member lookup by key (Object) or by index (Array).
   *
   * Returns the child on success. On failure, or when an error is already pending on the
   * receiver, the receiver itself is returned so a chain keeps running.
   *
   * Index access is unchecked by the error channel: the caller guarantees
   * `0 <= index < size()`; a violation raises a RangeError.
   */
  get(key: string): Value
  get(index: number): Value
  get(selector: string | number): Value {
    const found = typeof selector === "number" ? this.lookupIndex(selector) : this.lookupKey(selector)
    return found === undefined || this.hasError() ? this : found
  }

  dump(): string {
    return dumpValue(this)
  }

  extractString(): Either.Either<string, ValueErrorKind> {
    const payload = this.payload
    return payload._tag === "String" ? Either.right(payload.value) : this.mismatch<string>()
  }

  extractInt(): Either.Either<bigint, ValueErrorKind> {
    const payload = this.payload
    return payload._tag === "Integer" ? Either.right(payload.value) : this.mismatch<bigint>()
  }

  extractBool(): Either.Either<boolean, ValueErrorKind> {
    const payload = this.payload
    return payload._tag === "Boolean" ? Either.right(payload.value) : this.mismatch<boolean>()
  }

  extractFloat(): Either.Either<number, ValueErrorKind> {
    const payload = this.payload
    return payload._tag === "Float" ? Either.right(payload.value) : this.mismatch<number>()
  }

  mapString(f: (value: string) => void): Value {
    return this.runIfClear(this.extractString(), f)
  }

  mapInt(f: (value: bigint) => void): Value {
    return this.runIfClear(this.extractInt(), f)
  }

  mapBool(f: (value: boolean) => void): Value {
    return this.runIfClear(this.extractBool(), f)
  }

  mapFloat(f: (value: number) => void): Value {
    return this.runIfClear(this.extractFloat(), f)
  }

  /** Visit elements in index order; stops as soon as an error is pending on the receiver. */
  mapArray(f: (item: Value, index: number) => void): Value {
    const payload = this.payload
    if (payload._tag !== "Array") {
      return this.setError("TypeMismatch")
    }
    const items = [...payload.items]
    for (let index = 0; index < items.length; index++) {
      const item = items[index]
      if (item === undefined || this.hasError()) {
        break
      }
      f(item, index)
    }
    return this
  }

  /**
   * Visit members. The visiting order is unspecified.
   * Keys are fixed when the visit starts; each member is read when its turn comes, so a
   * callback that replaces a later member hands the replacement to that later call.
   */
  mapObject(f: (key: string, child: Value) => void): Value {
    const payload = this.payload
    if (payload._tag !== "Object") {
      return this.setError("TypeMismatch")
    }
    if (this.hasError()) {
      return this
    }
    for (const key of [...payload.entries.keys()]) {
      const child = payload.entries.get(key)
      if (child !== undefined) {
        f(key, child)
      }
    }
    return this
  }

  map(f: () => void): Value {
    if (!this.hasError()) {
      f()
    }
    return this
  }

  /**
   * Without arguments: the pending error, if any.
   * With a handler: call it with the pending error and clear the register; no-op when clear.
   */
  error(): Option.Option<ValueErrorKind>
  error(handler: (kind: ValueErrorKind) => void): Value
  error(handler?: (kind: ValueErrorKind) => void): Option.Option<ValueErrorKind> | Value {
    this.assertLive()
    const pending: Option.Option<ValueErrorKind> = this.lastError === "Ok" ? Option.none() : Option.some(this.lastError)
    if (handler === undefined) {
      return pending
    }
    if (Option.isSome(pending)) {
      this.lastError = "Ok"
      handler(pending.value)
    }
    return this
  }

  hasError(): boolean {
    this.assertLive()
    return this.lastError !== "Ok"
  }

  clearError(): Value {
    return this.setError("Ok")
  }

  setError(kind: ValueErrorKind): Value {
    this.assertLive()
    this.lastError = kind
    return this
  }

  /** Deep copy into a new root with a clear error register. */
  clone(): Value {
    const payload = this.payload
    if (payload._tag === "Object") {
      const copy = Value.object()
      for (const [key, child] of payload.entries) {
        copy.insert(key, child.clone())
      }
      return copy
    }
    if (payload._tag === "Array") {
      const copy = Value.array()
      for (const item of payload.items) {
        copy.insert("", item.clone())
      }
      return copy
    }
    return new Value(payload)
  }

  private assertLive(): void {
    if (this.slot._tag === "Moved") {
      throw new OwnershipError("value used after it was moved")
    }
  }

  private mismatch<A>(): Either.Either<A, ValueErrorKind> {
    this.lastError = "TypeMismatch"
    return Either.left("TypeMismatch")
  }

  private runIfClear<A>(extracted: Either.Either<A, ValueErrorKind>, f: (value: A) => void): Value {
    if (Either.isRight(extracted) && !this.hasError()) {
      f(extracted.right)
    }
    return this
  }

  private lookupKey(key: string): Value | undefined {
    const payload = this.payload
    if (payload._tag !== "Object") {
      this.lastError = "NotSupported"
      return undefined
    }
    const child = payload.entries.get(key)
    if (child === undefined) {
      this.lastError = "NotFound"
    }
    return child
  }

  private lookupIndex(index: number): Value | undefined {
    const payload = this.payload
    if (payload._tag !== "Array") {
      this.lastError = "NotSupported"
      return undefined
    }
    const item = Number.isInteger(index) ? payload.items[index] : undefined
    if (item === undefined) {
      throw new RangeError(`index ${index} is outside [0, ${payload.items.length})`)
    }
    return item
  }

  private root(): Value {
    let current: Value = this
    while (current.owner !== undefined) {
      current = current.owner
    }
    return current
  }

  private canAdopt(child: Value): boolean {
    return child.owner === undefined && child !== this.root()
  }

  private moveInto(owner: Value | undefined): Value {
    const moved = new Value(this.payload)
    moved.owner = owner
    moved.lastError = this.lastError
    moved.claimChildren()
    this.slot = MOVED
    this.lastError = "Ok"
    return moved
  }

  private claimChildren(): void {
    const payload = this.payload
    if (payload._tag === "Object") {
      for (const child of payload.entries.values()) {
        child.owner = this
      }
    } else if (payload._tag === "Array") {
      for (const item of payload.items) {
        item.owner = this
      }
    }
  }

  private discard(): void {
    const payload = this.payload
    if (payload._tag === "Object") {
      for (const child of payload.entries.values()) {
        child.discard()
      }
    } else if (payload._tag === "Array") {
      for (const item of payload.items) {
        item.discard()
      }
    }
    this.owner = undefined
    this.slot = MOVED
  }
}
