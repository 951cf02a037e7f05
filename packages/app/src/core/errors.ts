import type { CliError } from "./cli.js"

// CHANGE: unify error algebra for the JSON → SQL renderer and its CLI
// WHY: provide typed recoverable failures; invariant violations stay defects
// QUOTE(TZ): n/a
// REF: req-errors-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ AppError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique
// COMPLEXITY: O(1)/O(1)

export type JsonParseError = {
  readonly _tag: "JsonParseError"
  readonly message: string
  readonly offset: number
}
export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type FileError = { readonly _tag: "FileError"; readonly message: string }

export type AppError =
  | CliError
  | JsonParseError
  | ConfigError
  | FileError

export const jsonParseError = (message: string, offset: number): JsonParseError => ({
  _tag: "JsonParseError",
  message,
  offset
})

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})

export const formatAppError = (error: AppError): string =>
  error._tag === "JsonParseError"
    ? `invalid JSON at offset ${error.offset}: ${error.message}`
    : error.message
