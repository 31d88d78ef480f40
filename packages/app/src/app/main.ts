#!/usr/bin/env node
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect } from "effect"

import { renderAppError } from "../core/report.js"
import { writeStderr } from "../shell/log-sink.js"
import { runCli } from "./program.js"

// CHANGE: laxjson executable entry point
// WHY: map program outcomes onto process exit codes
// SOURCE: n/a
// FORMAT THEOREM: exit = 0 on success, 1 on parse/lookup failure, 2 on AppError
// PURITY: SHELL
// EFFECT: Effect<void, never, NodeContext>
// INVARIANT: every AppError is printed once as "laxjson: ..."
// COMPLEXITY: O(n)

const USAGE_EXIT_CODE = 2

const setExitCode = (exitCode: number): Effect.Effect<void> =>
  exitCode === 0 ? Effect.void : Effect.sync(() => {
    process.exitCode = exitCode
  })

const main = runCli(process.argv).pipe(
  Effect.map((result) => result.exitCode),
  Effect.catchAll((error) => Effect.sync(() => writeStderr(renderAppError(error))).pipe(Effect.as(USAGE_EXIT_CODE))),
  Effect.flatMap(setExitCode)
)

NodeRuntime.runMain(main.pipe(Effect.provide(NodeContext.layer)))
