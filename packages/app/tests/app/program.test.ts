import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { renderBytes, runCli } from "../../src/app/program.js"
import { fixedClock } from "../../src/core/clock.js"
import { textToBytes } from "../../src/core/sql-value.js"
import { loadConfigFile } from "../../src/shell/config-file.js"
import { readInput } from "../../src/shell/input.js"
import { provideNodeContext, withTempDir } from "./test-helpers.js"

const clock = fixedClock(new Date("2024-02-03T04:05:06Z"))

describe("renderBytes", () => {
  it.effect("renders nested fragments without a cast", () =>
    Effect.sync(() => {
      expect(Either.getOrThrow(renderBytes(textToBytes("\"hi\""), false, clock))).toEqual("_utf8mb4'hi'")
      expect(Either.getOrThrow(renderBytes(new Uint8Array(0), false, clock))).toEqual("null")
      expect(Either.getOrThrow(renderBytes(textToBytes("true"), true, clock))).toEqual("CAST(true as JSON)")
    }))
})

describe("runCli", () => {
  it.effect("renders a JSON file as SQL", () =>
    withTempDir(({ writeFixture }) =>
      Effect.gen(function*(_) {
        const file = yield* _(writeFixture("doc.json", "{\"when\": \"x\", \"n\": [true, null]}\n"))
        const result = yield* _(runCli(["node", "json-sql", "--file", file]))
        expect(result).toEqual({
          sql: "JSON_OBJECT(_utf8mb4'when', _utf8mb4'x', _utf8mb4'n', JSON_ARRAY(true, null))",
          exitCode: 0
        })
      })
    ).pipe(provideNodeContext))

  it.effect("renders an empty file as SQL NULL", () =>
    withTempDir(({ writeFixture }) =>
      Effect.gen(function*(_) {
        const file = yield* _(writeFixture("empty.json", ""))
        const result = yield* _(runCli(["node", "json-sql", "--file", file]))
        expect(result.sql).toBe("CAST(null as JSON)")
      })
    ).pipe(provideNodeContext))

  it.effect("reads render settings from the config file", () =>
    withTempDir(({ writeFixture }) =>
      Effect.gen(function*(_) {
        const config = yield* _(writeFixture("json-sql.json", "{\"nested\": true}"))
        const result = yield* _(runCli(["node", "json-sql", "--value", "\"hi\"", "--config", config]))
        expect(result).toEqual({ sql: "_utf8mb4'hi'", exitCode: 0 })
      })
    ).pipe(provideNodeContext))

  it.effect("fails on malformed JSON", () =>
    Effect.gen(function*(_) {
      const result = yield* _(runCli(["node", "json-sql", "--value", "{"]))
      expect(result).toEqual({ sql: undefined, exitCode: 1 })
    }).pipe(provideNodeContext))

  it.effect("fails when an explicit config file is missing", () =>
    withTempDir(({ path, tempDir }) =>
      Effect.gen(function*(_) {
        const missing = path.join(tempDir, "missing.json")
        const result = yield* _(runCli(["node", "json-sql", "--value", "1", "--config", missing]))
        expect(result.exitCode).toBe(1)
      })
    ).pipe(provideNodeContext))

  it.effect("fails when the input file does not exist", () =>
    withTempDir(({ path, tempDir }) =>
      Effect.gen(function*(_) {
        const file = path.join(tempDir, "nope.json")
        const result = yield* _(runCli(["node", "json-sql", "--file", file]))
        expect(result.exitCode).toBe(1)
        const error = yield* _(Effect.flip(readInput({ _tag: "File", path: file })))
        expect(error._tag).toBe("FileError")
        expect(error.message.startsWith(`Cannot read ${file}: NotFound: FileSystem.readFile (${file})`)).toBe(true)
      })
    ).pipe(provideNodeContext))

  it.effect("names the config file it cannot read", () =>
    withTempDir(({ tempDir }) =>
      Effect.gen(function*(_) {
        const error = yield* _(Effect.flip(loadConfigFile(tempDir, true)))
        expect(error._tag).toBe("FileError")
        expect(error.message.startsWith(`Cannot read config file ${tempDir}: `)).toBe(true)
      })
    ).pipe(provideNodeContext))
})
