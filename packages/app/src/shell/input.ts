import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"

import type { CliInput } from "../core/cli.js"
import type { AppError } from "../core/errors.js"
import { fileError } from "../core/errors.js"
import { textToBytes } from "../core/sql-value.js"

// CHANGE: load the JSON document to render as raw bytes
// WHY: the renderer consumes column-shaped bytes, whatever the source
// QUOTE(TZ): n/a
// REF: req-input-1
// SOURCE: n/a
// FORMAT THEOREM: ∀i: read(Inline(t)) = utf8(t) ∧ read(File(p)) = bytes(p)
// PURITY: SHELL
// EFFECT: Effect<Uint8Array, AppError, FileSystem>
// INVARIANT: file contents are passed through without decoding
// COMPLEXITY: O(n)

export const readInput = (
  input: CliInput
): Effect.Effect<Uint8Array, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    if (input._tag === "Inline") {
      return textToBytes(input.text)
    }
    const fs = yield* _(FileSystem)
    const bytes = yield* _(
      fs.readFile(input.path).pipe(
        Effect.mapError((error) => fileError(`Cannot read ${input.path}: ${error.message}`))
      )
    )
    yield* _(Effect.logDebug(`read ${bytes.length} bytes from ${input.path}`))
    return bytes
  })
