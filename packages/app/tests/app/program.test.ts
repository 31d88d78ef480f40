import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { runCli } from "../../src/app/program.js"
import { captureIo, provideNodeContext, type TempContext, withTempDir } from "./test-helpers.js"

const argv = (...args: ReadonlyArray<string>): ReadonlyArray<string> => ["node", "laxjson", ...args]

const setup = (context: TempContext, document: string, config = "{\"radius\":10}") =>
  Effect.gen(function*(_) {
    const file = yield* _(context.write("doc.json", document))
    const configFile = yield* _(context.write("laxjson.json", config))
    return { file, configFile }
  })

describe("runCli", () => {
  it.effect("dumps a document compactly", () =>
    provideNodeContext(
      withTempDir((context) =>
        Effect.gen(function*(_) {
          const { configFile, file } = yield* _(setup(context, "{ \"a\" : [1, 2] }"))
          const io = captureIo()
          const result = yield* _(runCli(argv("dump", file, "--config", configFile), io))
          expect(result).toEqual({ exitCode: 0, output: "{\"a\":[1,2]}" })
          expect(io.out).toEqual(["{\"a\":[1,2]}"])
          expect(io.err).toEqual([])
        })
      )
    ))

  it.effect("reports a parse failure and exits with 1", () =>
    provideNodeContext(
      withTempDir((context) =>
        Effect.gen(function*(_) {
          const { configFile, file } = yield* _(setup(context, "[1,,2]"))
          const io = captureIo()
          const result = yield* _(runCli(argv("check", file, "--config", configFile), io))
          expect(result.exitCode).toBe(1)
          expect(io.out).toEqual([])
          expect(io.err).toEqual([
            `ERROR ${file}: Expected ',' between array items. (ExpectedCommaBeforeItem at position 3): "[1,,2]"`
          ])
        })
      )
    ))

  it.effect("paints the failure when the config enables color", () =>
    provideNodeContext(
      withTempDir((context) =>
        Effect.gen(function*(_) {
          const { configFile, file } = yield* _(setup(context, "[,]", "{\"color\":true,\"radius\":1}"))
          const io = captureIo()
          yield* _(runCli(argv("check", file, "--config", configFile), io))
          expect(io.err).toEqual([
            `\u001b[1;31mERROR ${file}: Expected ',' between array items. (ExpectedCommaBeforeItem at position 1): "[,"\u001b[0m`
          ])
        })
      )
    ))

  it.effect("stays silent at log level none", () =>
    provideNodeContext(
      withTempDir((context) =>
        Effect.gen(function*(_) {
          const { configFile, file } = yield* _(setup(context, "[1,,2]"))
          const io = captureIo()
          const result = yield* _(runCli(argv("check", file, "--config", configFile, "--log-level", "none"), io))
          expect(result.exitCode).toBe(1)
          expect(io.err).toEqual([])
        })
      )
    ))

  it.effect("traces a successful parse", () =>
    provideNodeContext(
      withTempDir((context) =>
        Effect.gen(function*(_) {
          const { configFile, file } = yield* _(setup(context, "{\"a\":1}"))
          const io = captureIo()
          const result = yield* _(runCli(argv("check", file, "--config", configFile, "--log-level=trace"), io))
          expect(result).toEqual({ exitCode: 0, output: undefined })
          expect(io.err).toEqual([`TRACE ${file}: parsed Object with 1 attribute(s)`])
        })
      )
    ))

  it.effect("prints the value at a path", () =>
    provideNodeContext(
      withTempDir((context) =>
        Effect.gen(function*(_) {
          const { configFile, file } = yield* _(setup(context, "{\"items\":[{\"name\":\"x\"}]}"))
          const io = captureIo()
          const result = yield* _(
            runCli(argv("get", file, "--path", "items.0.name", "--config", configFile), io)
          )
          expect(result.exitCode).toBe(0)
          expect(io.out).toEqual(["\"x\""])
        })
      )
    ))

  it.effect("reports a failed lookup", () =>
    provideNodeContext(
      withTempDir((context) =>
        Effect.gen(function*(_) {
          const { configFile, file } = yield* _(setup(context, "{\"items\":[{\"name\":\"x\"}]}"))
          const io = captureIo()
          const result = yield* _(runCli(argv("get", file, "--path", "items.3", "--config", configFile), io))
          expect(result.exitCode).toBe(1)
          expect(io.out).toEqual([])
          expect(io.err).toEqual([`ERROR ${file}: lookup of "items.3" failed with NotFound`])
        })
      )
    ))

  it.effect("fails with typed errors", () =>
    provideNodeContext(
      withTempDir((context) =>
        Effect.gen(function*(_) {
          const { configFile, file } = yield* _(setup(context, "[]", "{\"radius\":\"wide\"}"))
          const configFailure = yield* _(Effect.flip(runCli(argv("check", file, "--config", configFile), captureIo())))
          const cliFailure = yield* _(Effect.flip(runCli(argv("check"), captureIo())))
          const emptyConfig = yield* _(context.write("empty.json", "{}"))
          const fileFailure = yield* _(
            Effect.flip(runCli(argv("check", `${context.tempDir}/absent.json`, "--config", emptyConfig), captureIo()))
          )
          expect(configFailure._tag).toBe("ConfigError")
          expect(cliFailure).toEqual({ _tag: "CliError", message: "Missing input file" })
          expect(fileFailure._tag).toBe("FileError")
        })
      )
    ))
})
