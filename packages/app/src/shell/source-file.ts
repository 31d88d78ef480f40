import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"

import type { AppError } from "../core/errors.js"
import { fileError } from "../core/errors.js"

// CHANGE: read an input document as raw bytes
// WHY: the parser decodes UTF-8 itself, the shell only moves bytes
// SOURCE: n/a
// FORMAT THEOREM: ∀p: read(p) = Right(b) → b = bytes(p)
// PURITY: SHELL
// EFFECT: Effect<Uint8Array, AppError, FileSystem>
// INVARIANT: platform errors are mapped to FileError
// COMPLEXITY: O(n)

export const readSourceFile = (
  path: string
): Effect.Effect<Uint8Array, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    return yield* _(
      fs.readFile(path).pipe(Effect.mapError((error) => fileError(`Cannot read ${path}: ${error.message}`)))
    )
  })
