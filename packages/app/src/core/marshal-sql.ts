import { Match } from "effect"

import type { Clock } from "./clock.js"
import type { JsonDate, JsonDateTime, JsonTime, JsonValue } from "./json-value.js"
import { encodeStringLiteralSql } from "./sql-string.js"

// CHANGE: render a JsonValue tree as a MySQL expression that rebuilds the same JSON
// WHY: echoing JSON columns into generated SQL must keep DATE/TIME/BLOB/BIT types intact
// QUOTE(TZ): n/a
// REF: req-marshal-sql-1
// SOURCE: https://dev.mysql.com/doc/refman/8.0/en/json-creation-functions.html
// FORMAT THEOREM: ∀v: eval(marshalSql(v)) ≅ v under MySQL JSON literal semantics
// PURITY: CORE
// EFFECT: Clock (TIME values only)
// INVARIANT: only top-level scalars get CAST(... as JSON); objects and arrays never do
// COMPLEXITY: O(n) where n = nodes + bytes in the tree

/** Chunks of SQL text; joined once rendering is complete. */
export type SqlBuffer = Array<string>

const pad = (value: number | bigint, width: number): string => value.toString().padStart(width, "0")

const formatDate = (value: JsonDate | JsonDateTime): string =>
  `${pad(value.year, 4)}-${pad(value.month, 2)}-${pad(value.day, 2)}`

const formatDateTime = (value: JsonDateTime): string =>
  `${formatDate(value)} ${pad(value.hour, 2)}:${pad(value.minute, 2)}:${pad(value.second, 2)}.${
    pad(value.microsecond, 6)
  }`

const MICROS_PER_SECOND = 1_000_000n
const MICROS_PER_MINUTE = 60n * MICROS_PER_SECOND
const MICROS_PER_HOUR = 60n * MICROS_PER_MINUTE

// MySQL wraps the hour field of a TIME cast to JSON after 32 hours and drops the rest.
const TIME_HOUR_WRAP = 32n

const timeToMicros = (value: JsonTime): bigint => {
  const magnitude = BigInt(value.hours) * MICROS_PER_HOUR +
    BigInt(value.minutes) * MICROS_PER_MINUTE +
    BigInt(value.seconds) * MICROS_PER_SECOND +
    BigInt(value.microseconds)
  return value.negative ? -magnitude : magnitude
}

const midnightMicros = (instant: Date): bigint =>
  BigInt(Date.UTC(instant.getUTCFullYear(), instant.getUTCMonth(), instant.getUTCDate())) * 1000n

/**
 * Format a TIME value as `[-]HH:MM:SS.ffffff`.
 *
 * The value is anchored on UTC midnight of the clock's current date and
 * measured back from that midnight. UTC days have no offset changes, so the
 * anchor cancels out and the result depends on `value` alone; the clock is
 * still read to pick the anchor day.
 *
 * @pure false
 * @effect Clock
 * @invariant 0 ≤ HH < 32
 * @complexity O(1)
 */
export const formatTime = (value: JsonTime, clock: Clock): string => {
  const midnight = midnightMicros(clock.now())
  const instant = midnight + timeToMicros(value)
  let diff = instant - midnight
  const negative = diff < 0n
  if (negative) {
    diff = -diff
  }
  const hours = diff / MICROS_PER_HOUR
  diff -= hours * MICROS_PER_HOUR
  const minutes = diff / MICROS_PER_MINUTE
  diff -= minutes * MICROS_PER_MINUTE
  const seconds = diff / MICROS_PER_SECOND
  diff -= seconds * MICROS_PER_SECOND
  const sign = negative ? "-" : ""
  return `${sign}${pad(hours % TIME_HOUR_WRAP, 2)}:${pad(minutes, 2)}:${pad(seconds, 2)}.${pad(diff, 6)}`
}

export const bytesToHex = (bytes: Uint8Array): string =>
  Array.from(bytes, (byte) => byte.toString(16).padStart(2, "0")).join("")

export const bytesToBinary = (bytes: Uint8Array): string =>
  bytes.length === 0 ? "0" : BigInt(`0x${bytesToHex(bytes)}`).toString(2)

const appendScalar = (dst: SqlBuffer, top: boolean, literal: string): SqlBuffer => {
  if (top) {
    dst.push("CAST(", literal, " as JSON)")
  } else {
    dst.push(literal)
  }
  return dst
}

const appendString = (dst: SqlBuffer, top: boolean, value: string): SqlBuffer => {
  const literal = `_utf8mb4${encodeStringLiteralSql(value)}`
  if (top) {
    dst.push("CAST(JSON_QUOTE(", literal, ") as JSON)")
  } else {
    dst.push(literal)
  }
  return dst
}

const describeTag = (node: unknown): string =>
  typeof node === "object" && node !== null && "_tag" in node ? String(node._tag) : String(node)

const unexpectedValue = (value: never): never => {
  throw new Error(`BUG: unexpected JSON value type: ${describeTag(value)}`)
}

/**
 * Append the SQL rendering of `value` to `dst`.
 *
 * @param value - Value tree to render; never mutated.
 * @param top - Whether the fragment stands alone and needs an explicit JSON cast.
 * @param dst - Caller-owned buffer, extended in place.
 * @param clock - Clock used to anchor TIME values.
 * @returns The extended buffer.
 * @throws Error when a node carries a tag outside JsonValue; this is a producer bug.
 *
 * @pure false
 * @effect Clock
 * @invariant objects and arrays are never wrapped in CAST
 * @complexity O(n)
 */
export const marshalSqlTo = (value: JsonValue, top: boolean, dst: SqlBuffer, clock: Clock): SqlBuffer =>
  Match.value(value).pipe(
    Match.tag("Object", (node) => {
      dst.push("JSON_OBJECT(")
      node.entries.forEach(([key, entry], index) => {
        if (index !== 0) {
          dst.push(", ")
        }
        dst.push("_utf8mb4'", key, "', ")
        marshalSqlTo(entry, false, dst, clock)
      })
      dst.push(")")
      return dst
    }),
    Match.tag("Array", (node) => {
      dst.push("JSON_ARRAY(")
      node.items.forEach((item, index) => {
        if (index !== 0) {
          dst.push(", ")
        }
        marshalSqlTo(item, false, dst, clock)
      })
      dst.push(")")
      return dst
    }),
    Match.tag("String", (node) => appendString(dst, top, node.value)),
    Match.tag("Date", (node) => appendScalar(dst, top, `date '${formatDate(node)}'`)),
    Match.tag("DateTime", (node) => appendScalar(dst, top, `timestamp '${formatDateTime(node)}'`)),
    Match.tag("Time", (node) => appendScalar(dst, top, `time '${formatTime(node, clock)}'`)),
    Match.tag("Blob", (node) => appendScalar(dst, top, `x'${bytesToHex(node.bytes)}'`)),
    Match.tag("Bit", (node) => appendScalar(dst, top, `b'${bytesToBinary(node.bytes)}'`)),
    Match.tag("Number", (node) => appendScalar(dst, top, node.text)),
    Match.tag("Boolean", (node) => appendScalar(dst, top, node.value ? "true" : "false")),
    Match.tag("Null", () => appendScalar(dst, top, "null")),
    Match.orElse((node) => unexpectedValue(node))
  )

/**
 * Render `value` as a standalone SQL expression evaluating to JSON.
 *
 * @pure false
 * @effect Clock
 * @complexity O(n)
 */
export const marshalSql = (value: JsonValue, clock: Clock): string => marshalSqlTo(value, true, [], clock).join("")
