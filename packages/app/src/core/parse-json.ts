import * as Either from "effect/Either"

import { type JsonParseError, jsonParseError } from "./errors.js"
import {
  type JsonEntry,
  jsonArray,
  jsonFalse,
  jsonNull,
  jsonNumber,
  jsonObject,
  jsonRawString,
  jsonString,
  jsonTrue,
  type JsonValue
} from "./json-value.js"

// CHANGE: parse JSON text into the tagged value tree
// WHY: column bytes must become a JsonValue before they can be rendered as SQL
// QUOTE(TZ): n/a
// REF: req-parse-json-1
// SOURCE: https://www.rfc-editor.org/rfc/rfc8259
// FORMAT THEOREM: ∀s: parse(s) = Right(v) → s ∈ JSON ∧ keys(v) preserve source order
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: number text is kept verbatim; depth ≤ MAX_DEPTH
// COMPLEXITY: O(n) where n = input length

export const MAX_DEPTH = 300

interface Cursor {
  readonly text: string
  index: number
}

type Step<A> = Either.Either<A, JsonParseError>

const fail = <A>(cursor: Cursor, message: string): Step<A> =>
  Either.left(jsonParseError(message, cursor.index))

const isWhitespace = (char: string): boolean => char === " " || char === "\t" || char === "\n" || char === "\r"

const skipWhitespace = (cursor: Cursor): void => {
  while (cursor.index < cursor.text.length && isWhitespace(cursor.text.charAt(cursor.index))) {
    cursor.index += 1
  }
}

const describeNext = (cursor: Cursor): string =>
  cursor.index >= cursor.text.length
    ? "unexpected end of input"
    : `unexpected character ${JSON.stringify(cursor.text.charAt(cursor.index))}`

const NUMBER_PATTERN = /-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?/uy

const parseNumber = (cursor: Cursor): Step<JsonValue> => {
  NUMBER_PATTERN.lastIndex = cursor.index
  const matched = NUMBER_PATTERN.exec(cursor.text)?.[0]
  if (matched === undefined) {
    return fail(cursor, `invalid number: ${describeNext(cursor)}`)
  }
  cursor.index += matched.length
  return Either.right(jsonNumber(matched))
}

const parseKeyword = (cursor: Cursor, keyword: string, value: JsonValue): Step<JsonValue> => {
  if (!cursor.text.startsWith(keyword, cursor.index)) {
    return fail(cursor, describeNext(cursor))
  }
  cursor.index += keyword.length
  return Either.right(value)
}

const SIMPLE_ESCAPES: Readonly<Record<string, string>> = {
  "\"": "\"",
  "\\": "\\",
  "/": "/",
  b: "\b",
  f: "\f",
  n: "\n",
  r: "\r",
  t: "\t"
}

const HEX4_PATTERN = /^[0-9a-fA-F]{4}$/u

const readHex4 = (cursor: Cursor): Step<number> => {
  const digits = cursor.text.slice(cursor.index, cursor.index + 4)
  if (!HEX4_PATTERN.test(digits)) {
    return fail(cursor, `invalid unicode escape "\\u${digits}"`)
  }
  cursor.index += 4
  return Either.right(Number.parseInt(digits, 16))
}

const isHighSurrogate = (code: number): boolean => code >= 0xd800 && code <= 0xdbff
const isLowSurrogate = (code: number): boolean => code >= 0xdc00 && code <= 0xdfff

const readUnicodeEscape = (cursor: Cursor): Step<string> => {
  const high = readHex4(cursor)
  if (Either.isLeft(high)) {
    return Either.left(high.left)
  }
  if (!isHighSurrogate(high.right) || !cursor.text.startsWith("\\u", cursor.index)) {
    return Either.right(String.fromCharCode(high.right))
  }
  const mark = cursor.index
  cursor.index += 2
  const low = readHex4(cursor)
  if (Either.isLeft(low)) {
    return Either.left(low.left)
  }
  if (!isLowSurrogate(low.right)) {
    cursor.index = mark
    return Either.right(String.fromCharCode(high.right))
  }
  return Either.right(String.fromCharCode(high.right, low.right))
}

const readEscape = (cursor: Cursor): Step<string> => {
  const char = cursor.text.charAt(cursor.index)
  cursor.index += 1
  if (char === "u") {
    return readUnicodeEscape(cursor)
  }
  const simple = SIMPLE_ESCAPES[char]
  if (simple === undefined) {
    cursor.index -= 1
    return fail(cursor, `invalid escape sequence "\\${char}"`)
  }
  return Either.right(simple)
}

interface ParsedString {
  readonly value: string
  readonly escaped: boolean
}

const parseStringBody = (cursor: Cursor): Step<ParsedString> => {
  cursor.index += 1
  let value = ""
  let escaped = false
  let chunkStart = cursor.index
  while (cursor.index < cursor.text.length) {
    const char = cursor.text.charAt(cursor.index)
    if (char === "\"") {
      value += cursor.text.slice(chunkStart, cursor.index)
      cursor.index += 1
      return Either.right({ value, escaped })
    }
    if (char === "\\") {
      value += cursor.text.slice(chunkStart, cursor.index)
      cursor.index += 1
      const decoded = readEscape(cursor)
      if (Either.isLeft(decoded)) {
        return Either.left(decoded.left)
      }
      value += decoded.right
      escaped = true
      chunkStart = cursor.index
      continue
    }
    if (char.charCodeAt(0) < 0x20) {
      return fail(cursor, "unescaped control character in string")
    }
    cursor.index += 1
  }
  return fail(cursor, "unterminated string")
}

const parseString = (cursor: Cursor): Step<JsonValue> =>
  Either.map(parseStringBody(cursor), (parsed) =>
    parsed.escaped ? jsonString(parsed.value) : jsonRawString(parsed.value))

const expectChar = (cursor: Cursor, expected: string, context: string): Step<void> => {
  skipWhitespace(cursor)
  if (cursor.text.charAt(cursor.index) !== expected) {
    return fail(cursor, `${describeNext(cursor)}; expected ${JSON.stringify(expected)} ${context}`)
  }
  cursor.index += 1
  return Either.right(undefined)
}

const parseArray = (cursor: Cursor, depth: number): Step<JsonValue> => {
  cursor.index += 1
  const items: Array<JsonValue> = []
  skipWhitespace(cursor)
  if (cursor.text.charAt(cursor.index) === "]") {
    cursor.index += 1
    return Either.right(jsonArray(items))
  }
  for (;;) {
    const item = parseValue(cursor, depth + 1)
    if (Either.isLeft(item)) {
      return Either.left(item.left)
    }
    items.push(item.right)
    skipWhitespace(cursor)
    const next = cursor.text.charAt(cursor.index)
    if (next === "]") {
      cursor.index += 1
      return Either.right(jsonArray(items))
    }
    if (next !== ",") {
      return fail(cursor, `${describeNext(cursor)}; expected "," or "]" in array`)
    }
    cursor.index += 1
  }
}

const parseEntry = (cursor: Cursor, depth: number): Step<JsonEntry> => {
  skipWhitespace(cursor)
  if (cursor.text.charAt(cursor.index) !== "\"") {
    return fail(cursor, `${describeNext(cursor)}; expected object key`)
  }
  const key = parseStringBody(cursor)
  if (Either.isLeft(key)) {
    return Either.left(key.left)
  }
  const colon = expectChar(cursor, ":", "after object key")
  if (Either.isLeft(colon)) {
    return Either.left(colon.left)
  }
  return Either.map(parseValue(cursor, depth + 1), (value): JsonEntry => [key.right.value, value])
}

const parseObject = (cursor: Cursor, depth: number): Step<JsonValue> => {
  cursor.index += 1
  const entries: Array<JsonEntry> = []
  skipWhitespace(cursor)
  if (cursor.text.charAt(cursor.index) === "}") {
    cursor.index += 1
    return Either.right(jsonObject(entries))
  }
  for (;;) {
    const entry = parseEntry(cursor, depth)
    if (Either.isLeft(entry)) {
      return Either.left(entry.left)
    }
    entries.push(entry.right)
    skipWhitespace(cursor)
    const next = cursor.text.charAt(cursor.index)
    if (next === "}") {
      cursor.index += 1
      return Either.right(jsonObject(entries))
    }
    if (next !== ",") {
      return fail(cursor, `${describeNext(cursor)}; expected "," or "}" in object`)
    }
    cursor.index += 1
  }
}

const parseValue = (cursor: Cursor, depth: number): Step<JsonValue> => {
  if (depth > MAX_DEPTH) {
    return fail(cursor, `too deep nesting; it exceeds ${MAX_DEPTH}`)
  }
  skipWhitespace(cursor)
  const char = cursor.text.charAt(cursor.index)
  switch (char) {
    case "{":
      return parseObject(cursor, depth)
    case "[":
      return parseArray(cursor, depth)
    case "\"":
      return parseString(cursor)
    case "t":
      return parseKeyword(cursor, "true", jsonTrue)
    case "f":
      return parseKeyword(cursor, "false", jsonFalse)
    case "n":
      return parseKeyword(cursor, "null", jsonNull)
    default:
      return char === "-" || (char >= "0" && char <= "9")
        ? parseNumber(cursor)
        : fail(cursor, describeNext(cursor))
  }
}

/**
 * Parse JSON text into a JsonValue tree.
 *
 * @param text - Complete JSON document.
 * @returns Either with the value tree or a JsonParseError carrying the offset.
 *
 * @pure true
 * @invariant trailing non-whitespace content is rejected
 * @complexity O(n)
 */
export const parseJsonText = (text: string): Either.Either<JsonValue, JsonParseError> => {
  const cursor: Cursor = { text, index: 0 }
  const value = parseValue(cursor, 1)
  if (Either.isLeft(value)) {
    return value
  }
  skipWhitespace(cursor)
  if (cursor.index < text.length) {
    return fail(cursor, `unexpected trailing content ${JSON.stringify(text.slice(cursor.index, cursor.index + 10))}`)
  }
  return value
}

const utf8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true })

/**
 * Parse UTF-8 encoded JSON bytes into a JsonValue tree.
 *
 * @pure true
 * @invariant invalid UTF-8 is a parse error, never replaced with U+FFFD
 * @invariant a leading byte order mark is kept and rejected by the parser
 * @complexity O(n)
 */
export const parseJsonBytes = (bytes: Uint8Array): Either.Either<JsonValue, JsonParseError> => {
  let text: string
  try {
    text = utf8.decode(bytes)
  } catch (error) {
    if (error instanceof TypeError) {
      return Either.left(jsonParseError("input is not valid UTF-8", 0))
    }
    throw error
  }
  return parseJsonText(text)
}
