import { Match } from "effect"

import type { CliArgs, Collector } from "./cli.js"
import type { ReclassificationPolicy } from "./reclassify.js"

// CHANGE: define config merging rules and defaults
// FORMAT THEOREM: ∀k: resolve(cli, cfg).k = cli.k ?? cfg.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: barWidth ≥ 3 and cutOff ≥ 1 whenever the inputs respect their schemas
// COMPLEXITY: O(1)/O(1)

export const configFileName = ".dependency-footprint.json"

export interface FileConfig {
  readonly policy?: ReclassificationPolicy
  readonly barWidth?: number
  readonly cutOff?: number
}

export interface ResolvedConfig {
  readonly policy: ReclassificationPolicy
  readonly barWidth: number
  readonly cutOff: number
}

export const defaultBarWidth = 15

export const defaultCutOff = 2

/**
 * Reclassification each collector needs without further instruction.
 *
 * @pure true
 * @complexity O(1)
 */
export const defaultPolicy = (collector: Collector): ReclassificationPolicy =>
  Match.value(collector).pipe(
    Match.when("apt", (): ReclassificationPolicy => "prune"),
    Match.when("dnf", (): ReclassificationPolicy => "promote"),
    Match.when("flatpak", (): ReclassificationPolicy => "none"),
    Match.when("snapshot", (): ReclassificationPolicy => "promote"),
    Match.exhaustive
  )

/**
 * Resolve the effective config from CLI flags, file config, and defaults.
 *
 * @param cli - Parsed CLI arguments.
 * @param fileConfig - Optional config loaded from .dependency-footprint.json.
 * @returns Resolved configuration.
 *
 * @pure true
 * @invariant CLI values win over file values, file values over defaults
 * @complexity O(1)
 */
export const resolveConfig = (cli: CliArgs, fileConfig: FileConfig | undefined): ResolvedConfig => ({
  policy: cli.policy ?? fileConfig?.policy ?? defaultPolicy(cli.collector),
  barWidth: cli.barWidth ?? fileConfig?.barWidth ?? defaultBarWidth,
  cutOff: cli.cutOff ?? fileConfig?.cutOff ?? defaultCutOff
})
