// CHANGE: model wire-typed database values handed to the query builder
// WHY: the rendered expression must be tagged as JSON without being re-validated
// QUOTE(TZ): n/a
// REF: req-sql-value-1
// SOURCE: n/a
// FORMAT THEOREM: ∀t,b: makeTrusted(t, b).raw = b ∧ makeTrusted(t, b).type = t
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: raw bytes are UTF-8 text
// COMPLEXITY: O(1)/O(1)

export type SqlType = "JSON"

export interface SqlValue {
  readonly type: SqlType
  readonly raw: Uint8Array
}

const encoder = new TextEncoder()
const decoder = new TextDecoder()

export const NULL_BYTES: Uint8Array = encoder.encode("null")

export const makeTrusted = (type: SqlType, raw: Uint8Array): SqlValue => ({ type, raw })

export const textToBytes = (text: string): Uint8Array => encoder.encode(text)

export const sqlValueToString = (value: SqlValue): string => decoder.decode(value.raw)

/** Empty column bytes stand for SQL NULL. */
export const orNullBytes = (bytes: Uint8Array): Uint8Array => bytes.length === 0 ? NULL_BYTES : bytes
