import * as Either from "effect/Either"

import { type JsonParseError, jsonParseError } from "./errors.js"

// CHANGE: introduce the tagged JSON value tree carrying MySQL extended types
// WHY: keep DATE/DATETIME/TIME/BLOB/BIT distinct from plain strings and numbers
// QUOTE(TZ): n/a
// REF: req-json-value-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v ∈ JsonValue: v._tag ∈ Tags ∧ children(v) ⊆ JsonValue
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: values are immutable once constructed; Number.text is never re-formatted
// COMPLEXITY: O(1)/O(1)

export type JsonEntry = readonly [key: string, value: JsonValue]

export interface JsonObject {
  readonly _tag: "Object"
  readonly entries: ReadonlyArray<JsonEntry>
}

export interface JsonArray {
  readonly _tag: "Array"
  readonly items: ReadonlyArray<JsonValue>
}

export interface JsonString {
  readonly _tag: "String"
  readonly value: string
  readonly raw: boolean
}

export interface JsonDate {
  readonly _tag: "Date"
  readonly year: number
  readonly month: number
  readonly day: number
}

export interface JsonDateTime {
  readonly _tag: "DateTime"
  readonly year: number
  readonly month: number
  readonly day: number
  readonly hour: number
  readonly minute: number
  readonly second: number
  readonly microsecond: number
}

export interface JsonTime {
  readonly _tag: "Time"
  readonly negative: boolean
  readonly hours: number
  readonly minutes: number
  readonly seconds: number
  readonly microseconds: number
}

export interface JsonBlob {
  readonly _tag: "Blob"
  readonly bytes: Uint8Array
}

export interface JsonBit {
  readonly _tag: "Bit"
  readonly bytes: Uint8Array
}

export interface JsonNumber {
  readonly _tag: "Number"
  readonly text: string
}

export interface JsonBoolean {
  readonly _tag: "Boolean"
  readonly value: boolean
}

export interface JsonNull {
  readonly _tag: "Null"
}

export type JsonValue =
  | JsonObject
  | JsonArray
  | JsonString
  | JsonDate
  | JsonDateTime
  | JsonTime
  | JsonBlob
  | JsonBit
  | JsonNumber
  | JsonBoolean
  | JsonNull

export type JsonValueTag = JsonValue["_tag"]

export const jsonTrue: JsonBoolean = { _tag: "Boolean", value: true }
export const jsonFalse: JsonBoolean = { _tag: "Boolean", value: false }
export const jsonNull: JsonNull = { _tag: "Null" }

export const jsonBoolean = (value: boolean): JsonBoolean => value ? jsonTrue : jsonFalse

export const jsonObject = (entries: ReadonlyArray<JsonEntry>): JsonObject => ({
  _tag: "Object",
  entries
})

export const jsonArray = (items: ReadonlyArray<JsonValue>): JsonArray => ({
  _tag: "Array",
  items
})

export const jsonString = (value: string): JsonString => ({ _tag: "String", value, raw: false })

export const jsonRawString = (value: string): JsonString => ({ _tag: "String", value, raw: true })

export const jsonNumber = (text: string): JsonNumber => ({ _tag: "Number", text })

export const jsonBlob = (bytes: Uint8Array): JsonBlob => ({ _tag: "Blob", bytes })

export const jsonBit = (bytes: Uint8Array): JsonBit => ({ _tag: "Bit", bytes })

const checkRange = (field: string, value: number, min: number, max: number): void => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new RangeError(`${field} must be an integer in [${min}, ${max}], got ${value}`)
  }
}

const isLeapYear = (year: number): boolean => (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0

const daysInMonth = (year: number, month: number): number => {
  if (month === 2) {
    return isLeapYear(year) ? 29 : 28
  }
  return month === 4 || month === 6 || month === 9 || month === 11 ? 30 : 31
}

const checkCalendarDate = (year: number, month: number, day: number): void => {
  checkRange("year", year, 0, 9999)
  checkRange("month", month, 1, 12)
  checkRange("day", day, 1, daysInMonth(year, month))
}

/**
 * Build a calendar date value.
 *
 * @throws RangeError when a component is outside the calendar.
 *
 * @pure true
 * @invariant 1 ≤ month ≤ 12 ∧ 1 ≤ day ≤ daysInMonth(year, month)
 * @complexity O(1)
 */
export const jsonDate = (year: number, month: number, day: number): JsonDate => {
  checkCalendarDate(year, month, day)
  return { _tag: "Date", year, month, day }
}

export interface DateTimeFields {
  readonly year: number
  readonly month: number
  readonly day: number
  readonly hour: number
  readonly minute: number
  readonly second: number
  readonly microsecond?: number
}

export const jsonDateTime = (fields: DateTimeFields): JsonDateTime => {
  const microsecond = fields.microsecond ?? 0
  checkCalendarDate(fields.year, fields.month, fields.day)
  checkRange("hour", fields.hour, 0, 23)
  checkRange("minute", fields.minute, 0, 59)
  checkRange("second", fields.second, 0, 59)
  checkRange("microsecond", microsecond, 0, 999_999)
  return {
    _tag: "DateTime",
    year: fields.year,
    month: fields.month,
    day: fields.day,
    hour: fields.hour,
    minute: fields.minute,
    second: fields.second,
    microsecond
  }
}

export interface TimeFields {
  readonly negative?: boolean
  readonly hours: number
  readonly minutes: number
  readonly seconds: number
  readonly microseconds?: number
}

// MySQL TIME spans -838:59:59.000000 .. 838:59:59.000000
export const MAX_TIME_HOURS = 838

export const jsonTime = (fields: TimeFields): JsonTime => {
  const microseconds = fields.microseconds ?? 0
  checkRange("hours", fields.hours, 0, MAX_TIME_HOURS)
  checkRange("minutes", fields.minutes, 0, 59)
  checkRange("seconds", fields.seconds, 0, 59)
  const atMaximum = fields.hours === MAX_TIME_HOURS && fields.minutes === 59 && fields.seconds === 59
  checkRange("microseconds", microseconds, 0, atMaximum ? 0 : 999_999)
  return {
    _tag: "Time",
    negative: fields.negative ?? false,
    hours: fields.hours,
    minutes: fields.minutes,
    seconds: fields.seconds,
    microseconds
  }
}

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/u
const DATE_TIME_PATTERN = /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,6}))?$/u
const TIME_PATTERN = /^(-)?(\d{1,3}):(\d{2}):(\d{2})(?:\.(\d{1,6}))?$/u

const toInt = (digits: string | undefined): number => digits === undefined ? 0 : Number.parseInt(digits, 10)

const fractionToMicros = (digits: string | undefined): number =>
  digits === undefined ? 0 : Number.parseInt(digits.padEnd(6, "0"), 10)

const buildLiteral = <A extends JsonValue>(
  kind: string,
  text: string,
  build: () => A
): Either.Either<A, JsonParseError> => {
  try {
    return Either.right(build())
  } catch (error) {
    if (error instanceof RangeError) {
      return Either.left(jsonParseError(`invalid ${kind} literal ${JSON.stringify(text)}: ${error.message}`, 0))
    }
    throw error
  }
}

/**
 * Parse a `YYYY-MM-DD` literal into a Date value.
 *
 * @pure true
 * @complexity O(n)
 */
export const parseDateLiteral = (text: string): Either.Either<JsonDate, JsonParseError> => {
  const match = DATE_PATTERN.exec(text)
  if (match === null) {
    return Either.left(jsonParseError(`invalid date literal ${JSON.stringify(text)}`, 0))
  }
  return buildLiteral("date", text, () => jsonDate(toInt(match[1]), toInt(match[2]), toInt(match[3])))
}

export const parseDateTimeLiteral = (text: string): Either.Either<JsonDateTime, JsonParseError> => {
  const match = DATE_TIME_PATTERN.exec(text)
  if (match === null) {
    return Either.left(jsonParseError(`invalid datetime literal ${JSON.stringify(text)}`, 0))
  }
  return buildLiteral("datetime", text, () =>
    jsonDateTime({
      year: toInt(match[1]),
      month: toInt(match[2]),
      day: toInt(match[3]),
      hour: toInt(match[4]),
      minute: toInt(match[5]),
      second: toInt(match[6]),
      microsecond: fractionToMicros(match[7])
    }))
}

export const parseTimeLiteral = (text: string): Either.Either<JsonTime, JsonParseError> => {
  const match = TIME_PATTERN.exec(text)
  if (match === null) {
    return Either.left(jsonParseError(`invalid time literal ${JSON.stringify(text)}`, 0))
  }
  return buildLiteral("time", text, () =>
    jsonTime({
      negative: match[1] === "-",
      hours: toInt(match[2]),
      minutes: toInt(match[3]),
      seconds: toInt(match[4]),
      microseconds: fractionToMicros(match[5])
    }))
}
