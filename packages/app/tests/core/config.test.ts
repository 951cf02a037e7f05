import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import type { CliArgs } from "../../src/core/cli.js"
import { systemClock } from "../../src/core/clock.js"
import { resolveConfig } from "../../src/core/config.js"
import { decodeConfig } from "../../src/shell/config-file.js"

const baseCli: CliArgs = {
  input: { _tag: "Inline", text: "null" },
  now: undefined,
  nested: undefined,
  configPath: "./.json-sql.json",
  configPathExplicit: false,
  verbose: false
}

describe("resolveConfig", () => {
  it.effect("defaults to a top-level render on the system clock", () =>
    Effect.sync(() => {
      const resolved = resolveConfig(baseCli, undefined)
      expect(resolved.top).toBe(true)
      expect(resolved.clock).toBe(systemClock)
    }))

  it.effect("prefers CLI flags over the config file", () =>
    Effect.sync(() => {
      const fromFile = resolveConfig(baseCli, { nested: true, now: new Date("2020-01-01T00:00:00Z") })
      expect(fromFile.top).toBe(false)
      expect(fromFile.clock.now().toISOString()).toBe("2020-01-01T00:00:00.000Z")

      const cli: CliArgs = { ...baseCli, nested: false, now: new Date("2021-06-01T10:00:00Z") }
      const overridden = resolveConfig(cli, { nested: true, now: new Date("2020-01-01T00:00:00Z") })
      expect(overridden.top).toBe(true)
      expect(overridden.clock.now().toISOString()).toBe("2021-06-01T10:00:00.000Z")
    }))
})

describe("decodeConfig", () => {
  it.effect("decodes optional fields", () =>
    Effect.gen(function*(_) {
      const config = yield* _(decodeConfig("{\"now\":\"2024-01-02T03:04:05Z\",\"nested\":true}"))
      expect(config.nested).toBe(true)
      expect(config.now?.toISOString()).toBe("2024-01-02T03:04:05.000Z")
      const empty = yield* _(decodeConfig("{}"))
      expect(empty).toEqual({})
    }))

  it.effect("fails with a ConfigError on invalid fields", () =>
    Effect.gen(function*(_) {
      const error = yield* _(Effect.flip(decodeConfig("{\"nested\":\"yes\"}")))
      expect(error._tag).toBe("ConfigError")
    }))
})
