import * as Either from "effect/Either"

// CHANGE: implement deterministic CLI parsing for json-sql
// WHY: keep CLI decoding pure and testable at the boundary
// QUOTE(TZ): n/a
// REF: req-cli-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → exactly one input source is set
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags and positional arguments are rejected
// COMPLEXITY: O(n) where n = argv length

export type CliInput =
  | { readonly _tag: "File"; readonly path: string }
  | { readonly _tag: "Inline"; readonly text: string }

export interface CliArgs {
  readonly input: CliInput
  readonly now: Date | undefined
  readonly nested: boolean | undefined
  readonly configPath: string
  readonly configPathExplicit: boolean
  readonly verbose: boolean
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

export const DEFAULT_CONFIG_PATH = "./.json-sql.json"

export const cliError = (message: string): CliError => ({ _tag: "CliError", message })

interface RawArgs {
  readonly file: string | undefined
  readonly value: string | undefined
  readonly now: Date | undefined
  readonly nested: boolean | undefined
  readonly configPath: string | undefined
  readonly verbose: boolean
}

const initialArgs: RawArgs = {
  file: undefined,
  value: undefined,
  now: undefined,
  nested: undefined,
  configPath: undefined,
  verbose: false
}

type ParsedFlag = { readonly next: RawArgs; readonly consumed: number }

const isFlag = (value: string): boolean => value.startsWith("--")

const parseBoolean = (value: string): Either.Either<boolean, CliError> => {
  if (value === "true" || value === "1") {
    return Either.right(true)
  }
  if (value === "false" || value === "0") {
    return Either.right(false)
  }
  return Either.left(cliError(`Invalid boolean value: ${value}`))
}

/**
 * Parse an ISO-8601 instant used to freeze the clock.
 *
 * @pure true
 * @complexity O(n)
 */
export const parseInstant = (value: string): Either.Either<Date, CliError> => {
  const instant = new Date(value)
  return Number.isNaN(instant.getTime())
    ? Either.left(cliError(`Invalid --now instant: ${value}`))
    : Either.right(instant)
}

const readFlagValue = (
  flagName: string,
  inlineValue: string | undefined,
  nextValue: string | undefined
): Either.Either<string, CliError> => {
  if (inlineValue !== undefined) {
    return Either.right(inlineValue)
  }
  if (nextValue === undefined || isFlag(nextValue)) {
    return Either.left(cliError(`Missing value for --${flagName}`))
  }
  return Either.right(nextValue)
}

const parseValueFlag = <A>(
  flagName: string,
  current: RawArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  decode: (value: string) => Either.Either<A, CliError>,
  update: (args: RawArgs, value: A) => RawArgs
): Either.Either<ParsedFlag, CliError> =>
  Either.flatMap(readFlagValue(flagName, inlineValue, nextValue), (raw) =>
    Either.map(decode(raw), (value) => ({
      next: update(current, value),
      consumed: inlineValue === undefined ? 2 : 1
    })))

const parseOptionalBooleanFlag = (
  current: RawArgs,
  inlineValue: string | undefined,
  update: (args: RawArgs, value: boolean) => RawArgs
): Either.Either<ParsedFlag, CliError> =>
  Either.map(parseBoolean(inlineValue ?? "true"), (value) => ({
    next: update(current, value),
    consumed: 1
  }))

type FlagParser = (
  current: RawArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => Either.Either<ParsedFlag, CliError>

const asString = (value: string): Either.Either<string, CliError> => Either.right(value)

const flagParsers: Readonly<Record<string, FlagParser>> = {
  file: (current, inlineValue, nextValue) =>
    parseValueFlag("file", current, inlineValue, nextValue, asString, (args, value) => ({
      ...args,
      file: value
    })),
  value: (current, inlineValue, nextValue) =>
    parseValueFlag("value", current, inlineValue, nextValue, asString, (args, value) => ({
      ...args,
      value
    })),
  now: (current, inlineValue, nextValue) =>
    parseValueFlag("now", current, inlineValue, nextValue, parseInstant, (args, value) => ({
      ...args,
      now: value
    })),
  config: (current, inlineValue, nextValue) =>
    parseValueFlag("config", current, inlineValue, nextValue, asString, (args, value) => ({
      ...args,
      configPath: value
    })),
  nested: (current, inlineValue) =>
    parseOptionalBooleanFlag(current, inlineValue, (args, value) => ({
      ...args,
      nested: value
    })),
  verbose: (current) => Either.right({ next: { ...current, verbose: true }, consumed: 1 })
}

const parseFlag = (
  raw: string,
  nextValue: string | undefined,
  current: RawArgs
): Either.Either<ParsedFlag, CliError> => {
  const body = raw.slice(2)
  const separator = body.indexOf("=")
  const name = separator === -1 ? body : body.slice(0, separator)
  const inlineValue = separator === -1 ? undefined : body.slice(separator + 1)
  const parser = flagParsers[name]
  if (parser === undefined) {
    return Either.left(cliError(`Unknown flag: --${name}`))
  }
  return parser(current, inlineValue, nextValue)
}

const parseFlags = (rawArgs: ReadonlyArray<string>): Either.Either<RawArgs, CliError> => {
  let args = initialArgs
  let index = 0
  while (index < rawArgs.length) {
    const current = rawArgs[index]
    if (current === undefined) {
      return Either.left(cliError("Unexpected end of arguments"))
    }
    if (!isFlag(current)) {
      return Either.left(cliError(`Unexpected positional argument: ${current}`))
    }
    const parsed = parseFlag(current, rawArgs[index + 1], args)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    args = parsed.right.next
    index += parsed.right.consumed
  }
  return Either.right(args)
}

const resolveInput = (args: RawArgs): Either.Either<CliInput, CliError> => {
  if (args.file !== undefined && args.value !== undefined) {
    return Either.left(cliError("Use either --file or --value, not both"))
  }
  if (args.file !== undefined) {
    return Either.right({ _tag: "File", path: args.file })
  }
  if (args.value !== undefined) {
    return Either.right({ _tag: "Inline", text: args.value })
  }
  return Either.left(cliError("Missing input: pass --file <path> or --value <json>"))
}

/**
 * Parse CLI arguments into a typed configuration.
 *
 * @param argv - Raw process.argv array.
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant configPath defaults to ./.json-sql.json when omitted
 * @complexity O(n)
 */
export const parseCliArgs = (
  argv: ReadonlyArray<string>
): Either.Either<CliArgs, CliError> =>
  Either.flatMap(parseFlags(argv.slice(2)), (args) =>
    Either.map(resolveInput(args), (input) => ({
      input,
      now: args.now,
      nested: args.nested,
      configPath: args.configPath ?? DEFAULT_CONFIG_PATH,
      configPathExplicit: args.configPath !== undefined,
      verbose: args.verbose
    })))
