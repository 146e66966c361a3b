import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"

import type { AppError } from "../core/errors.js"
import { fileError } from "../core/errors.js"

// CHANGE: read a candidate JSON document as raw bytes
// WHY: UTF-8 decoding belongs to the core so invalid encodings become a verdict
// REF: req-source-io-1
// SOURCE: n/a
// FORMAT THEOREM: ∀p: read(p) = Right(b) → b = bytes(p)
// PURITY: SHELL
// EFFECT: Effect<Uint8Array, AppError, FileSystem>
// INVARIANT: unreadable files fail with FileError, never with a verdict
// COMPLEXITY: O(n)

export const readSourceFile = (
  path: string
): Effect.Effect<Uint8Array, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    return yield* _(
      fs.readFile(path).pipe(Effect.mapError((error) => fileError(path, error.message)))
    )
  })
