import { Match } from "effect"
import * as Effect from "effect/Effect"
import type * as Layer from "effect/Layer"
import * as Logger from "effect/Logger"
import * as LogLevel from "effect/LogLevel"

import type { LogLevelName } from "../core/cli.js"
import type { ResolvedConfig } from "../core/config.js"
import type { ParserContext } from "../core/diagnostics.js"
import { describeValue, paint, renderParseFailure } from "../core/report.js"
import type { Value } from "../core/value.js"

// CHANGE: route parser diagnostics through the Effect logger
// WHY: the parse callback only hands over a context, printing it is the shell's job
// SOURCE: n/a
// FORMAT THEOREM: ∀ctx: level ≥ error → reportParseFailure(ctx) writes exactly one line
// PURITY: SHELL
// EFFECT: Effect<void, never, never>
// INVARIANT: "none" suppresses every line, "trace" lets every line through
// COMPLEXITY: O(radius)

export type LineWriter = (line: string) => void

export const writeStderr: LineWriter = (line) => {
  process.stderr.write(`${line}\n`)
}

export const toLogLevel = (name: LogLevelName): LogLevel.LogLevel =>
  Match.value(name).pipe(
    Match.when("none", () => LogLevel.None),
    Match.when("error", () => LogLevel.Error),
    Match.when("trace", () => LogLevel.Trace),
    Match.exhaustive
  )

const renderMessage = (message: unknown): string =>
  Array.isArray(message) ? message.map((part) => String(part)).join(" ") : String(message)

/**
 * Logger printing `LEVEL message` lines; error lines are painted red when `color` is set.
 *
 * @pure false
 * @effect writes through `write`
 */
export const makeSinkLogger = (write: LineWriter, color: boolean): Logger.Logger<unknown, void> =>
  Logger.make(({ logLevel, message }) => {
    const line = `${logLevel.label} ${renderMessage(message)}`
    write(LogLevel.greaterThanEqual(logLevel, LogLevel.Error) ? paint(line, color) : line)
  })

export const sinkLayer = (write: LineWriter, color: boolean): Layer.Layer<never> =>
  Logger.replace(Logger.defaultLogger, makeSinkLogger(write, color))

/**
 * Run `effect` with the sink logger installed and the configured minimum level.
 *
 * @pure false
 */
export const withSink = <A, E, R>(
  effect: Effect.Effect<A, E, R>,
  config: ResolvedConfig,
  write: LineWriter
): Effect.Effect<A, E, R> =>
  effect.pipe(
    Logger.withMinimumLogLevel(toLogLevel(config.logLevel)),
    Effect.provide(sinkLayer(write, config.color))
  )

export const reportParseFailure = (
  file: string,
  context: ParserContext,
  radius: number
): Effect.Effect<void> => Effect.logError(renderParseFailure(file, context, radius))

export const traceParsed = (file: string, value: Value): Effect.Effect<void> =>
  Effect.logTrace(`${file}: parsed ${describeValue(value)}`)
