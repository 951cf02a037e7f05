import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Effect, Logger, LogLevel } from "effect"
import * as Either from "effect/Either"

import { parseCliArgs } from "../core/cli.js"
import type { Clock } from "../core/clock.js"
import { resolveConfig } from "../core/config.js"
import { type AppError, formatAppError, type JsonParseError } from "../core/errors.js"
import { marshalSqlTo } from "../core/marshal-sql.js"
import { marshalSqlValue } from "../core/marshal-sql-value.js"
import { parseJsonBytes } from "../core/parse-json.js"
import { orNullBytes, sqlValueToString } from "../core/sql-value.js"
import { loadConfigFile } from "../shell/config-file.js"
import { readInput } from "../shell/input.js"

// CHANGE: orchestrate the json-sql CLI with functional core + imperative shell
// WHY: enforce single entrypoint with typed errors and deterministic output
// QUOTE(TZ): n/a
// REF: req-program-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: run(argv) returns exitCode ∈ {0,1}
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, never, FileSystem>
// INVARIANT: exactly one of sql / error line is written
// COMPLEXITY: O(n)

export interface ProgramResult {
  readonly sql: string | undefined
  readonly exitCode: number
}

const writeLine = (stream: NodeJS.WriteStream, payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    stream.write(payload.endsWith("\n") ? payload : `${payload}\n`)
  })

const stderrLogger = Logger.map(Logger.logfmtLogger, (line) => {
  process.stderr.write(`${line}\n`)
})

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

/**
 * Render JSON bytes as SQL, top-level (cast to JSON) or nested.
 *
 * @pure false
 * @effect Clock
 * @complexity O(n)
 */
export const renderBytes = (
  bytes: Uint8Array,
  top: boolean,
  clock: Clock
): Either.Either<string, JsonParseError> =>
  top
    ? Either.map(marshalSqlValue(bytes, clock), sqlValueToString)
    : Either.map(parseJsonBytes(orNullBytes(bytes)), (value) => marshalSqlTo(value, false, [], clock).join(""))

const render = (
  argv: ReadonlyArray<string>
): Effect.Effect<string, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    const program = Effect.gen(function*(_) {
      const fileConfig = yield* _(loadConfigFile(cli.configPath, cli.configPathExplicit))
      const config = resolveConfig(cli, fileConfig)
      const bytes = yield* _(readInput(cli.input))
      yield* _(Effect.logDebug(`rendering ${bytes.length} bytes (top=${config.top})`))
      return yield* _(fromEither(renderBytes(bytes, config.top, config.clock)))
    })
    return yield* _(
      program.pipe(Logger.withMinimumLogLevel(cli.verbose ? LogLevel.Debug : LogLevel.Info))
    )
  })

/**
 * Run CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @returns ProgramResult with the rendered SQL and exit code.
 *
 * @pure false
 * @effect FileSystem, Console
 * @invariant failures are reported on stderr with exit code 1
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>
): Effect.Effect<ProgramResult, never, FileSystemService> =>
  render(argv).pipe(
    Effect.flatMap((sql) => Effect.as(writeLine(process.stdout, sql), { sql, exitCode: 0 })),
    Effect.catchAll((error) =>
      Effect.as(writeLine(process.stderr, `error: ${formatAppError(error)}`), { sql: undefined, exitCode: 1 })
    ),
    Effect.provide(Logger.replace(Logger.defaultLogger, stderrLogger))
  )
