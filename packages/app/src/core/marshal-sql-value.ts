import * as Either from "effect/Either"

import type { Clock } from "./clock.js"
import type { JsonParseError } from "./errors.js"
import { marshalSql } from "./marshal-sql.js"
import { parseJsonBytes } from "./parse-json.js"
import { makeTrusted, orNullBytes, type SqlValue, textToBytes } from "./sql-value.js"

// CHANGE: turn raw JSON column bytes into a JSON-typed SQL expression value
// WHY: the proxy hands JSON columns to the query builder as trusted wire values
// QUOTE(TZ): n/a
// REF: req-marshal-sql-value-1
// SOURCE: n/a
// FORMAT THEOREM: ∀b: marshal(b) = Right(v) → v.type = JSON ∧ v.raw = render(parse(b ‖ null))
// PURITY: CORE
// EFFECT: Clock (TIME values only)
// INVARIANT: marshalSqlValue(empty) = marshalSqlValue("null")
// COMPLEXITY: O(n)

/**
 * Parse JSON bytes and render them as a top-level SQL expression tagged JSON.
 *
 * @param bytes - Raw JSON column value; empty means SQL NULL.
 * @param clock - Clock used to anchor TIME values.
 * @returns Either with the trusted JSON value or the parser's error unchanged.
 *
 * @pure false
 * @effect Clock
 * @complexity O(n)
 */
export const marshalSqlValue = (
  bytes: Uint8Array,
  clock: Clock
): Either.Either<SqlValue, JsonParseError> =>
  Either.map(
    parseJsonBytes(orNullBytes(bytes)),
    (value) => makeTrusted("JSON", textToBytes(marshalSql(value, clock)))
  )
