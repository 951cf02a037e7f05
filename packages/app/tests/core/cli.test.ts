import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { parseCliArgs } from "../../src/core/cli.js"

const parse = (...args: ReadonlyArray<string>) => parseCliArgs(["node", "json-sql", ...args])

const expectCliError = (message: string, ...args: ReadonlyArray<string>): void => {
  expect(Either.getOrThrow(Either.flip(parse(...args)))).toEqual({ _tag: "CliError", message })
}

describe("parseCliArgs", () => {
  it.effect("applies defaults around an inline value", () =>
    Effect.sync(() => {
      expect(Either.getOrThrow(parse("--value", "[1]"))).toEqual(
        {
          input: { _tag: "Inline", text: "[1]" },
          now: undefined,
          nested: undefined,
          configPath: "./.json-sql.json",
          configPathExplicit: false,
          verbose: false
        }
      )
    }))

  it.effect("keeps '=' inside inline flag values", () =>
    Effect.sync(() => {
      const parsed = parse("--value={\"a\":\"x=y\"}", "--config=cfg.json")
      expect(Either.isRight(parsed)).toBe(true)
      if (Either.isRight(parsed)) {
        expect(parsed.right.input).toEqual({ _tag: "Inline", text: "{\"a\":\"x=y\"}" })
        expect(parsed.right.configPath).toBe("cfg.json")
        expect(parsed.right.configPathExplicit).toBe(true)
      }
    }))

  it.effect("accepts negative numbers as flag values", () =>
    Effect.sync(() => {
      const parsed = parse("--value", "-1")
      expect(Either.getOrThrow(Either.map(parsed, (args) => args.input))).toEqual({ _tag: "Inline", text: "-1" })
    }))

  it.effect("parses file input, clock and render flags", () =>
    Effect.sync(() => {
      const parsed = parse("--file", "doc.json", "--now", "2024-01-02T03:04:05Z", "--nested", "--verbose")
      expect(Either.isRight(parsed)).toBe(true)
      if (Either.isRight(parsed)) {
        expect(parsed.right.input).toEqual({ _tag: "File", path: "doc.json" })
        expect(parsed.right.now?.toISOString()).toBe("2024-01-02T03:04:05.000Z")
        expect(parsed.right.nested).toBe(true)
        expect(parsed.right.verbose).toBe(true)
      }
    }))

  it.effect("reads explicit boolean values for --nested", () =>
    Effect.sync(() => {
      expect(Either.getOrThrow(Either.map(parse("--value", "1", "--nested=false"), (args) => args.nested))).toEqual(
        false
      )
      expectCliError("Invalid boolean value: maybe", "--value", "1", "--nested=maybe")
    }))

  it.effect("rejects invalid argument lists", () =>
    Effect.sync(() => {
      expectCliError("Missing input: pass --file <path> or --value <json>")
      expectCliError("Use either --file or --value, not both", "--file", "a.json", "--value", "1")
      expectCliError("Unknown flag: --bogus", "--bogus")
      expectCliError("Unexpected positional argument: x", "x")
      expectCliError("Missing value for --file", "--file")
      expectCliError("Invalid --now instant: soon", "--value", "1", "--now", "soon")
    }))
})
