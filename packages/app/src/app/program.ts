import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Effect, Match } from "effect"
import type * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { CliArgs } from "../core/cli.js"
import { parseCliArgs } from "../core/cli.js"
import type { ResolvedConfig } from "../core/config.js"
import { resolveConfig } from "../core/config.js"
import type { ParserContext } from "../core/diagnostics.js"
import type { AppError } from "../core/errors.js"
import { parse } from "../core/parser.js"
import { splitPath, walkPath } from "../core/query.js"
import { renderLookupFailure } from "../core/report.js"
import type { Value } from "../core/value.js"
import { loadConfigFile } from "../shell/config-file.js"
import type { LineWriter } from "../shell/log-sink.js"
import { reportParseFailure, traceParsed, withSink, writeStderr } from "../shell/log-sink.js"
import { readSourceFile } from "../shell/source-file.js"

// CHANGE: orchestrate CLI modes with functional core + imperative shell
// WHY: enforce single entrypoint with typed errors and deterministic outputs
// SOURCE: n/a
// FORMAT THEOREM: ∀mode: run(mode) returns exitCode ∈ {0,1}
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem>
// INVARIANT: a parse failure is logged at most once per run
// COMPLEXITY: O(n)

export interface ProgramResult {
  readonly exitCode: number
  readonly output: string | undefined
}

export interface ProgramIo {
  readonly stdout: LineWriter
  readonly stderr: LineWriter
}

const defaultIo: ProgramIo = {
  stdout: (line) => {
    process.stdout.write(`${line}\n`)
  },
  stderr: writeStderr
}

interface Loaded {
  readonly root: Value
  readonly failure: ParserContext | undefined
}

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const loadDocument = (
  cli: CliArgs,
  config: ResolvedConfig
): Effect.Effect<Loaded, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const bytes = yield* _(readSourceFile(cli.file))
    const failures: Array<ParserContext> = []
    const root = parse(bytes, (context) => {
      failures.push(context)
    })
    const failure = failures[0]
    if (failure === undefined) {
      yield* _(traceParsed(cli.file, root))
    } else {
      yield* _(reportParseFailure(cli.file, failure, config.radius))
    }
    return { root, failure }
  })

const handleCheck = (loaded: Loaded): ProgramResult => ({
  exitCode: loaded.failure === undefined ? 0 : 1,
  output: undefined
})

const handleDump = (loaded: Loaded): ProgramResult => ({
  exitCode: loaded.failure === undefined ? 0 : 1,
  output: loaded.root.dump()
})

const handleGet = (cli: CliArgs, loaded: Loaded): Effect.Effect<ProgramResult> => {
  if (loaded.failure !== undefined) {
    return Effect.succeed({ exitCode: 1, output: undefined })
  }
  const path = cli.path ?? ""
  const reached = walkPath(loaded.root, splitPath(path))
  return Option.match(reached.error(), {
    onNone: () => Effect.succeed({ exitCode: 0, output: reached.dump() }),
    onSome: (kind) =>
      Effect.logError(renderLookupFailure(cli.file, path, kind)).pipe(
        Effect.as({ exitCode: 1, output: undefined })
      )
  })
}

const executeCommand = (
  cli: CliArgs,
  loaded: Loaded
): Effect.Effect<ProgramResult> =>
  Match.value(cli.command).pipe(
    Match.when("check", () => Effect.succeed(handleCheck(loaded))),
    Match.when("dump", () => Effect.succeed(handleDump(loaded))),
    Match.when("get", () => handleGet(cli, loaded)),
    Match.exhaustive
  )

/**
 * Run CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @param io - Line writers for results (stdout) and diagnostics (stderr).
 * @returns ProgramResult with exit code and the text written to stdout, if any.
 *
 * @pure false
 * @effect FileSystem, Logger
 * @invariant exitCode is deterministic for fixed inputs
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>,
  io: ProgramIo = defaultIo
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    const fileConfig = yield* _(loadConfigFile(cli.configPath, cli.configExplicit))
    const config = resolveConfig(cli, fileConfig)
    const result = yield* _(
      withSink(
        Effect.flatMap(loadDocument(cli, config), (loaded) => executeCommand(cli, loaded)),
        config,
        io.stderr
      )
    )
    if (result.output !== undefined) {
      const output = result.output
      yield* _(Effect.sync(() => io.stdout(output)))
    }
    return result
  })
