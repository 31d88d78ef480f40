export type { ParserContext, ParserErrorKind } from "./core/diagnostics.js"
export { DEFAULT_RADIUS, describeParserError, formatParserContext, surroundingText } from "./core/diagnostics.js"
export type { ValueErrorKind } from "./core/errors.js"
export { OwnershipError } from "./core/errors.js"
export type { Json, JsonObject } from "./core/json.js"
export { fromJson, toJson } from "./core/json.js"
export type { Scalar, ValueKind } from "./core/kind.js"
export { INT64_MAX, INT64_MIN } from "./core/kind.js"
export type { ParseErrorHandler } from "./core/parser.js"
export { parse, parseEither, Parser } from "./core/parser.js"
export { splitPath, walkPath } from "./core/query.js"
export { dumpValue, formatFixed } from "./core/serialize.js"
export type { ValueView } from "./core/value.js"
export { Value } from "./core/value.js"
