import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"
import { pipe } from "effect/Function"
import * as ParseResult from "effect/ParseResult"
import * as Schema from "effect/Schema"

import type { FileConfig } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { configError, fileError } from "../core/errors.js"

// CHANGE: decode .json-sql.json with schema validation
// WHY: keep boundary data typed and reject invalid config early
// QUOTE(TZ): n/a
// REF: req-config-file-1
// SOURCE: n/a
// FORMAT THEOREM: ∀c: decode(c) = Right(cfg) → cfg fields have correct types
// PURITY: SHELL
// EFFECT: Effect<FileConfig | undefined, AppError, FileSystem>
// INVARIANT: missing config yields undefined unless the path was explicit
// COMPLEXITY: O(n)

const RawConfigSchema = Schema.Struct({
  now: Schema.optional(Schema.Date),
  nested: Schema.optional(Schema.Boolean)
})

const ConfigSchema = Schema.parseJson(RawConfigSchema)

export const decodeConfig = (raw: string): Effect.Effect<FileConfig, AppError> =>
  pipe(
    Schema.decodeUnknown(ConfigSchema)(raw),
    Effect.map((config) => ({
      ...(config.now === undefined ? {} : { now: config.now }),
      ...(config.nested === undefined ? {} : { nested: config.nested })
    })),
    Effect.mapError((error) => configError(ParseResult.TreeFormatter.formatErrorSync(error)))
  )

export const loadConfigFile = (
  path: string,
  explicit: boolean
): Effect.Effect<FileConfig | undefined, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const exists = yield* _(
      fs.exists(path).pipe(
        Effect.mapError((error) => fileError(`Cannot access config file ${path}: ${error.message}`))
      )
    )
    if (!exists) {
      if (explicit) {
        return yield* _(Effect.fail(fileError(`Config file not found: ${path}`)))
      }
      yield* _(Effect.logDebug(`no config file at ${path}`))
      return
    }
    const contents = yield* _(
      fs.readFileString(path).pipe(
        Effect.mapError((error) => fileError(`Cannot read config file ${path}: ${error.message}`))
      )
    )
    const decoded = yield* _(decodeConfig(contents))
    yield* _(Effect.logDebug(`loaded config from ${path}`))
    return decoded
  })
