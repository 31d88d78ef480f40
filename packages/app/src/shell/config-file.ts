import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as S from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import * as Effect from "effect/Effect"

import type { FileConfig } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { configError, fileError } from "../core/errors.js"

// CHANGE: load diagnostics settings from .laxjson.json
// WHY: log level, snippet radius and color are project settings, flags only override them
// SOURCE: n/a
// FORMAT THEOREM: ∀t: decode(t) = Right(cfg) → cfg ⊆ {logLevel, radius, color} with valid values
// PURITY: SHELL
// EFFECT: Effect<FileConfig | undefined, AppError, FileSystem>
// INVARIANT: an absent file is only an error when its path was given with --config
// COMPLEXITY: O(n)

const ConfigFileSchema = S.Struct({
  logLevel: S.optionalWith(S.Literal("none", "error", "trace"), { exact: true }),
  radius: S.optionalWith(S.Number.pipe(S.int(), S.nonNegative()), { exact: true }),
  color: S.optionalWith(S.Boolean, { exact: true })
})

const decodeConfigText = S.decodeUnknown(S.parseJson(ConfigFileSchema))

/**
 * Decode the text of a config file. Absent fields stay absent.
 *
 * @effect fails with ConfigError carrying the schema's tree-formatted message
 */
export const decodeConfig = (raw: string): Effect.Effect<FileConfig, AppError> =>
  decodeConfigText(raw).pipe(
    Effect.mapError((error) => configError(TreeFormatter.formatErrorSync(error)))
  )

const readConfigText = (
  fs: FileSystemService,
  path: string
): Effect.Effect<string, AppError> =>
  fs.readFileString(path).pipe(
    Effect.mapError((error) => fileError(`Cannot read config ${path}: ${error.message}`))
  )

export const loadConfigFile = (
  path: string | undefined,
  explicit: boolean
): Effect.Effect<FileConfig | undefined, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    if (path === undefined) {
      return undefined
    }
    const fs = yield* _(FileSystem)
    const present = yield* _(
      fs.exists(path).pipe(Effect.mapError((error) => fileError(`Cannot stat config ${path}: ${error.message}`)))
    )
    if (present) {
      return yield* _(Effect.flatMap(readConfigText(fs, path), decodeConfig))
    }
    return explicit ? yield* _(Effect.fail(fileError(`Config file not found: ${path}`))) : undefined
  })
