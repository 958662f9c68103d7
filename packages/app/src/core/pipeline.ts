import * as Either from "effect/Either"

import type { ConservationSummary } from "./attribution.js"
import { computeAttribution, summarizeConservation } from "./attribution.js"
import { computeClosures } from "./closure.js"
import type { RegistryError } from "./errors.js"
import type { Reclassification, ReclassificationPolicy } from "./reclassify.js"
import { applyPolicy } from "./reclassify.js"
import type { PackageRegistry } from "./registry.js"

// CHANGE: run closure, reclassification and attribution as one ordered pass
// FORMAT THEOREM: analyze(r, p) = attribute(reclassify(closures(r), p))
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: reclassification is the last tier mutation before attribution
// COMPLEXITY: O(V · (V + E))

export interface Analysis {
  readonly registry: PackageRegistry
  readonly reclassification: Reclassification
  readonly conservation: ConservationSummary
}

/**
 * Compute every derived field of a freshly collected registry.
 *
 * @param registry - Collector output; updated in place.
 * @param policy - Reclassification policy chosen by the caller.
 * @returns Analysis or the first registry failure; no partial result is exposed.
 *
 * @pure false
 * @invariant closures are computed before the policy, attribution after it
 * @complexity O(V · (V + E))
 */
export const analyzeRegistry = (
  registry: PackageRegistry,
  policy: ReclassificationPolicy
): Either.Either<Analysis, RegistryError> =>
  Either.gen(function*() {
    yield* computeClosures(registry)
    const reclassification = yield* applyPolicy(registry, policy)
    yield* computeAttribution(registry)
    return { registry, reclassification, conservation: summarizeConservation(registry) }
  })
