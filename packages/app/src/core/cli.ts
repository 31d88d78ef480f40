import { Match } from "effect"
import * as Either from "effect/Either"

// CHANGE: implement deterministic CLI parsing for laxjson
// WHY: keep CLI decoding pure and testable at the boundary
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → args.command ∈ Commands ∧ args.file ≠ ""
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags and extra positionals are rejected
// COMPLEXITY: O(n) where n = argv length

export type CliCommand = "check" | "dump" | "get"

export type LogLevelName = "none" | "error" | "trace"

export interface CliArgs {
  readonly command: CliCommand
  readonly file: string
  readonly path: string | undefined
  readonly logLevel: LogLevelName | undefined
  readonly radius: number | undefined
  readonly color: boolean | undefined
  readonly configPath: string | undefined
  readonly configExplicit: boolean
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

const cliError = (message: string): CliError => ({ _tag: "CliError", message })

const isFlag = (value: string): boolean => value.startsWith("-")

const parseBoolean = (value: string): Either.Either<boolean, CliError> => {
  if (value === "true" || value === "1") {
    return Either.right(true)
  }
  if (value === "false" || value === "0") {
    return Either.right(false)
  }
  return Either.left(cliError(`Invalid boolean value: ${value}`))
}

export const parseLogLevel = (value: string): Either.Either<LogLevelName, CliError> =>
  Match.value(value).pipe(
    Match.when("none", () => Either.right<LogLevelName>("none")),
    Match.when("error", () => Either.right<LogLevelName>("error")),
    Match.when("trace", () => Either.right<LogLevelName>("trace")),
    Match.orElse(() => Either.left(cliError(`Invalid log level: ${value}`)))
  )

const parseRadius = (value: string): Either.Either<number, CliError> =>
  /^\d+$/.test(value) ? Either.right(Number(value)) : Either.left(cliError(`Invalid radius: ${value}`))

const parseCommand = (value: string): Either.Either<CliCommand, CliError> =>
  Match.value(value).pipe(
    Match.when("check", () => Either.right<CliCommand>("check")),
    Match.when("dump", () => Either.right<CliCommand>("dump")),
    Match.when("get", () => Either.right<CliCommand>("get")),
    Match.orElse(() => Either.left(cliError(`Unknown command: ${value}`)))
  )

const defaultArgs = (command: CliCommand): CliArgs => ({
  command,
  file: "",
  path: undefined,
  logLevel: undefined,
  radius: undefined,
  color: undefined,
  configPath: "./.laxjson.json",
  configExplicit: false
})

const readFlagValue = (
  flagName: string,
  inlineValue: string | undefined,
  nextValue: string | undefined
): Either.Either<string, CliError> => {
  if (inlineValue !== undefined) {
    return Either.right(inlineValue)
  }
  if (nextValue === undefined || isFlag(nextValue)) {
    return Either.left(cliError(`Missing value for --${flagName}`))
  }
  return Either.right(nextValue)
}

type ParsedFlag = { readonly next: CliArgs; readonly consumed: number }

const parseValueFlag = <A>(
  flagName: string,
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  decode: (raw: string) => Either.Either<A, CliError>,
  update: (args: CliArgs, value: A) => CliArgs
): Either.Either<ParsedFlag, CliError> =>
  Either.flatMap(readFlagValue(flagName, inlineValue, nextValue), (raw) =>
    Either.map(decode(raw), (value) => ({
      next: update(current, value),
      consumed: inlineValue === undefined ? 2 : 1
    })))

const parseOptionalBooleanFlag = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: CliArgs, value: boolean) => CliArgs
): Either.Either<ParsedFlag, CliError> => {
  const useNext = inlineValue === undefined && nextValue !== undefined && (nextValue === "true" ||
    nextValue === "false")
  const nextValueResolved = inlineValue ?? (useNext ? nextValue : "true")
  return Either.map(parseBoolean(nextValueResolved), (value) => ({
    next: update(current, value),
    consumed: useNext ? 2 : 1
  }))
}

type FlagParser = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => Either.Either<ParsedFlag, CliError>

const asIs = (raw: string): Either.Either<string, CliError> => Either.right(raw)

const flagParsers: Record<string, FlagParser> = {
  color: (current, inlineValue, nextValue) =>
    parseOptionalBooleanFlag(current, inlineValue, nextValue, (args, value) => ({
      ...args,
      color: value
    })),
  "log-level": (current, inlineValue, nextValue) =>
    parseValueFlag("log-level", current, inlineValue, nextValue, parseLogLevel, (args, value) => ({
      ...args,
      logLevel: value
    })),
  radius: (current, inlineValue, nextValue) =>
    parseValueFlag("radius", current, inlineValue, nextValue, parseRadius, (args, value) => ({
      ...args,
      radius: value
    })),
  path: (current, inlineValue, nextValue) =>
    parseValueFlag("path", current, inlineValue, nextValue, asIs, (args, value) => ({
      ...args,
      path: value
    })),
  config: (current, inlineValue, nextValue) =>
    parseValueFlag("config", current, inlineValue, nextValue, asIs, (args, value) => ({
      ...args,
      configPath: value,
      configExplicit: true
    }))
}

const parseFlag = (
  raw: string,
  nextValue: string | undefined,
  current: CliArgs
): Either.Either<ParsedFlag, CliError> => {
  if (!raw.startsWith("--")) {
    return Either.left(cliError(`Unknown flag: ${raw}`))
  }
  const [name = "", inlineValue] = raw.slice(2).split("=", 2)
  const parser = flagParsers[name]
  if (parser === undefined) {
    return Either.left(cliError(`Unknown flag: --${name}`))
  }
  return parser(current, inlineValue, nextValue)
}

const parseArguments = (
  rawArgs: ReadonlyArray<string>,
  initial: CliArgs
): Either.Either<CliArgs, CliError> => {
  let args = initial
  let index = 1
  while (index < rawArgs.length) {
    const current = rawArgs[index]
    if (current === undefined) {
      return Either.left(cliError("Unexpected end of arguments"))
    }
    if (!isFlag(current)) {
      if (args.file.length > 0) {
        return Either.left(cliError(`Unexpected positional argument: ${current}`))
      }
      args = { ...args, file: current }
      index += 1
      continue
    }
    const parsed = parseFlag(current, rawArgs[index + 1], args)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    args = parsed.right.next
    index += parsed.right.consumed
  }
  return Either.right(args)
}

const requireInputs = (args: CliArgs): Either.Either<CliArgs, CliError> => {
  if (args.file.length === 0) {
    return Either.left(cliError("Missing input file"))
  }
  if (args.command === "get" && args.path === undefined) {
    return Either.left(cliError("Missing value for --path"))
  }
  return Either.right(args)
}

/**
 * Parse CLI arguments into a typed configuration.
 *
 * @param argv - Raw process.argv array.
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant the first argument is the command, exactly one positional names the input file
 * @complexity O(n)
 */
export const parseCliArgs = (
  argv: ReadonlyArray<string>
): Either.Either<CliArgs, CliError> => {
  const rawArgs = argv.slice(2)
  const first = rawArgs[0]
  if (first === undefined || isFlag(first)) {
    return Either.left(cliError("Missing command (check, dump or get)"))
  }
  return parseCommand(first).pipe(
    Either.flatMap((command) => parseArguments(rawArgs, defaultArgs(command))),
    Either.flatMap(requireInputs)
  )
}
