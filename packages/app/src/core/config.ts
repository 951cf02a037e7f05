import type { CliArgs } from "./cli.js"
import { type Clock, fixedClock, systemClock } from "./clock.js"

// CHANGE: define config merging rules and defaults
// WHY: ensure CLI flags override config file and defaults deterministically
// QUOTE(TZ): n/a
// REF: req-config-merge-1
// SOURCE: n/a
// FORMAT THEOREM: ∀k: resolve(cli, cfg).k = cli.k ?? cfg.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: clock is fixed iff an instant was given by CLI or config
// COMPLEXITY: O(1)/O(1)

export interface FileConfig {
  readonly now?: Date
  readonly nested?: boolean
}

export interface ResolvedConfig {
  readonly clock: Clock
  readonly top: boolean
}

const resolveClock = (cli: CliArgs, fileConfig: FileConfig | undefined): Clock => {
  const instant = cli.now ?? fileConfig?.now
  return instant === undefined ? systemClock : fixedClock(instant)
}

/**
 * Resolve the effective render settings from CLI flags, file config, and defaults.
 *
 * @param cli - Parsed CLI arguments.
 * @param fileConfig - Optional config loaded from .json-sql.json.
 * @returns Resolved configuration.
 *
 * @pure true
 * @invariant top = ¬nested
 * @complexity O(1)
 */
export const resolveConfig = (
  cli: CliArgs,
  fileConfig: FileConfig | undefined
): ResolvedConfig => ({
  clock: resolveClock(cli, fileConfig),
  top: !(cli.nested ?? fileConfig?.nested ?? false)
})
