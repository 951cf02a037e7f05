import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { jsonNull, jsonNumber, jsonObject, jsonRawString, jsonString, jsonTrue } from "../../src/core/json-value.js"
import { MAX_DEPTH, parseJsonBytes, parseJsonText } from "../../src/core/parse-json.js"

const expectError = (text: string, offset: number, message: string): void => {
  const parsed = parseJsonText(text)
  expect(Either.isLeft(parsed)).toBe(true)
  if (Either.isLeft(parsed)) {
    expect(parsed.left).toEqual({ _tag: "JsonParseError", offset, message })
  }
}

describe("parseJsonText", () => {
  it.effect("keeps object key order and duplicate keys", () =>
    Effect.sync(() => {
      const parsed = parseJsonText("{\"b\": 1, \"a\": 2, \"b\": 3}")
      expect(Either.getOrThrow(parsed)).toEqual(
        jsonObject([
          ["b", jsonNumber("1")],
          ["a", jsonNumber("2")],
          ["b", jsonNumber("3")]
        ])
      )
    }))

  it.effect("keeps number text verbatim", () =>
    Effect.sync(() => {
      expect(Either.getOrThrow(parseJsonText("1.0e+5"))).toEqual(jsonNumber("1.0e+5"))
      expect(Either.getOrThrow(parseJsonText("-0"))).toEqual(jsonNumber("-0"))
      expect(Either.getOrThrow(parseJsonText("12345678901234567890"))).toEqual(jsonNumber("12345678901234567890"))
    }))

  it.effect("marks strings without escapes as raw", () =>
    Effect.sync(() => {
      expect(Either.getOrThrow(parseJsonText("\"plain\""))).toEqual(jsonRawString("plain"))
      expect(Either.getOrThrow(parseJsonText("\"esc\\n\\/\""))).toEqual(jsonString("esc\n/"))
    }))

  it.effect("decodes unicode escapes and surrogate pairs", () =>
    Effect.sync(() => {
      expect(Either.getOrThrow(parseJsonText("\"\\u00e9\\ud83d\\ude00\""))).toEqual(jsonString("é😀"))
    }))

  it.effect("accepts surrounding whitespace", () =>
    Effect.sync(() => {
      expect(Either.getOrThrow(parseJsonText("  null \n"))).toEqual(jsonNull)
      expect(Either.getOrThrow(parseJsonText("\ttrue\r\n"))).toEqual(jsonTrue)
    }))

  it.effect("reports the offset of malformed input", () =>
    Effect.sync(() => {
      expectError("[1,]", 3, "unexpected character \"]\"")
      expectError("01", 1, "unexpected trailing content \"1\"")
      expectError("\"abc", 4, "unterminated string")
      expectError("\"a\u0001\"", 2, "unescaped control character in string")
      expectError("\"\\x\"", 2, "invalid escape sequence \"\\x\"")
      expectError("-", 0, "invalid number: unexpected character \"-\"")
      expectError("{", 1, "unexpected end of input; expected object key")
      expectError("{\"a\" 1}", 5, "unexpected character \"1\"; expected \":\" after object key")
      expectError("", 0, "unexpected end of input")
    }))

  it.effect("limits nesting depth", () =>
    Effect.sync(() => {
      const deepest = "[".repeat(MAX_DEPTH) + "]".repeat(MAX_DEPTH)
      expect(Either.isRight(parseJsonText(deepest))).toBe(true)
      const tooDeep = "[".repeat(MAX_DEPTH + 1) + "]".repeat(MAX_DEPTH + 1)
      expectError(tooDeep, MAX_DEPTH, `too deep nesting; it exceeds ${MAX_DEPTH}`)
    }))
})

describe("parseJsonBytes", () => {
  it.effect("decodes UTF-8 input", () =>
    Effect.sync(() => {
      const bytes = new TextEncoder().encode("\"ключ\"")
      expect(Either.getOrThrow(parseJsonBytes(bytes))).toEqual(jsonRawString("ключ"))
    }))

  it.effect("rejects invalid UTF-8", () =>
    Effect.sync(() => {
      expect(Either.getOrThrow(Either.flip(parseJsonBytes(Uint8Array.of(0x22, 0xff, 0x22))))).toEqual(
        { _tag: "JsonParseError", offset: 0, message: "input is not valid UTF-8" }
      )
    }))

  it.effect("rejects a leading byte order mark", () =>
    Effect.sync(() => {
      expect(Either.getOrThrow(Either.flip(parseJsonBytes(Uint8Array.of(0xef, 0xbb, 0xbf, 0x31))))).toEqual(
        { _tag: "JsonParseError", offset: 0, message: "unexpected character \"\uFEFF\"" }
      )
    }))
})
