import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as S from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import * as Effect from "effect/Effect"
import { pipe } from "effect/Function"

import type { FileConfig } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { configError, fileError } from "../core/errors.js"
import { MAX_DEPTH_CEILING } from "../core/validator.js"

// CHANGE: decode .json-validator.json with schema validation
// WHY: keep boundary data typed and reject invalid config early
// REF: req-config-file-1
// SOURCE: n/a
// FORMAT THEOREM: ∀c: decode(c) = Right(cfg) → cfg fields have correct types and ranges
// PURITY: SHELL
// EFFECT: Effect<FileConfig | undefined, AppError, FileSystem>
// INVARIANT: missing implicit config yields undefined
// COMPLEXITY: O(n)

const RawConfigSchema = S.partial(
  S.Struct({
    maxDepth: S.Number.pipe(S.int(), S.between(1, MAX_DEPTH_CEILING)),
    concurrency: S.Number.pipe(S.int(), S.positive())
  })
)

const ConfigSchema = S.parseJson(RawConfigSchema)

const decodeConfig = (raw: string): Effect.Effect<FileConfig, AppError> =>
  pipe(
    S.decodeUnknown(ConfigSchema)(raw),
    Effect.map((config) => ({
      ...(config.maxDepth === undefined ? {} : { maxDepth: config.maxDepth }),
      ...(config.concurrency === undefined ? {} : { concurrency: config.concurrency })
    })),
    Effect.mapError((error) => configError(TreeFormatter.formatErrorSync(error)))
  )

export const loadConfigFile = (
  path: string,
  explicit: boolean
): Effect.Effect<FileConfig | undefined, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const exists = yield* _(
      fs.exists(path).pipe(Effect.mapError((error) => fileError(path, String(error))))
    )
    if (!exists) {
      if (explicit) {
        return yield* _(Effect.fail(fileError(path, "config file not found")))
      }
      yield* _(Effect.logDebug(`no config file at ${path}`))
      return
    }
    const contents = yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => fileError(path, String(error))))
    )
    const decoded = yield* _(decodeConfig(contents))
    yield* _(Effect.logDebug(`loaded config from ${path}`))
    return decoded
  })
