#!/usr/bin/env node
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect, Logger } from "effect"

import { runProgram } from "./program.js"

// CHANGE: wire CLI program into Node runtime with proper teardown
// WHY: execute effects with platform services and typed error handling
// REF: req-main-1
// SOURCE: n/a
// FORMAT THEOREM: runMain(program) terminates with exitCode from ProgramResult, or 1 on AppError
// PURITY: SHELL
// EFFECT: Effect<void, never, NodeContext>
// INVARIANT: diagnostics and logs go to stderr, reports to stdout
// COMPLEXITY: O(1)

const StderrLogger = Logger.replace(Logger.defaultLogger, Logger.withConsoleError(Logger.logfmtLogger))

const main = runProgram(process.argv).pipe(
  Effect.flatMap((exitCode) =>
    Effect.sync(() => {
      if (exitCode !== 0) {
        process.exitCode = exitCode
      }
    })
  )
)

NodeRuntime.runMain(main.pipe(Effect.provide(NodeContext.layer), Effect.provide(StderrLogger)))
