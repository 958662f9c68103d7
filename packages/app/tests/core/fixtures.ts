import * as Either from "effect/Either"

import type { PackageEdges, PackageInput, Tier } from "../../src/core/package.js"
import type { PackageRegistry } from "../../src/core/registry.js"
import { registryFromInputs } from "../../src/core/registry.js"

export const pkg = (
  identifier: string,
  tier: Tier,
  installedBytes: number,
  edges: Partial<PackageEdges> & { readonly name?: string } = {}
): PackageInput => ({ identifier, tier, installedBytes, ...edges })

export const buildRegistry = (inputs: ReadonlyArray<PackageInput>): PackageRegistry =>
  Either.getOrThrow(registryFromInputs(inputs))

export const right = <R, L>(either: Either.Either<R, L>): R => Either.getOrThrow(either)

export const left = <R, L>(either: Either.Either<R, L>): L => Either.getOrThrow(Either.flip(either))

export const members = (values: Iterable<string>): ReadonlyArray<string> => [...values]
