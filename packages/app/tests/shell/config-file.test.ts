import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { decodeConfig, loadConfigFile } from "../../src/shell/config-file.js"
import { provideNodeContext, withTempDir } from "../app/test-helpers.js"

describe("decodeConfig", () => {
  it.effect("keeps only the fields that are present", () =>
    Effect.gen(function*(_) {
      const config = yield* _(decodeConfig("{\"radius\":3,\"color\":true}"))
      expect(config).toEqual({ radius: 3, color: true })
    }))

  it.effect("rejects invalid values", () =>
    Effect.gen(function*(_) {
      const badLevel = yield* _(Effect.flip(decodeConfig("{\"logLevel\":\"loud\"}")))
      const badRadius = yield* _(Effect.flip(decodeConfig("{\"radius\":-1}")))
      const badJson = yield* _(Effect.flip(decodeConfig("{radius")))
      expect(badLevel._tag).toBe("ConfigError")
      expect(badRadius._tag).toBe("ConfigError")
      expect(badJson._tag).toBe("ConfigError")
    }))
})

describe("loadConfigFile", () => {
  it.effect("reads a config file", () =>
    provideNodeContext(
      withTempDir(({ write }) =>
        Effect.gen(function*(_) {
          const file = yield* _(write("laxjson.json", "{\"logLevel\":\"trace\"}"))
          const config = yield* _(loadConfigFile(file, true))
          expect(config).toEqual({ logLevel: "trace" })
        })
      )
    ))

  it.effect("ignores a missing implicit config", () =>
    provideNodeContext(
      withTempDir(({ tempDir }) =>
        Effect.gen(function*(_) {
          const config = yield* _(loadConfigFile(`${tempDir}/absent.json`, false))
          expect(config).toBeUndefined()
        })
      )
    ))

  it.effect("fails on a missing explicit config", () =>
    provideNodeContext(
      withTempDir(({ tempDir }) =>
        Effect.gen(function*(_) {
          const missing = `${tempDir}/absent.json`
          const error = yield* _(Effect.flip(loadConfigFile(missing, true)))
          expect(error).toEqual({ _tag: "FileError", message: `Config file not found: ${missing}` })
        })
      )
    ))
})
