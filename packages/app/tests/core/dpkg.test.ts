import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { replayHistory } from "../../src/core/apt-history.js"
import { aptInputs, classifyApt, parseDpkgQuery, parseManualList, parseRelations } from "../../src/core/dpkg.js"
import { left, members, right } from "./fixtures.js"

interface RowSpec {
  readonly name: string
  readonly architecture?: string
  readonly status?: string
  readonly kib?: number
  readonly section?: string
  readonly priority?: string
  readonly provides?: string
  readonly depends?: string
  readonly preDepends?: string
  readonly recommends?: string
  readonly suggests?: string
  readonly enhances?: string
  readonly summary?: string
}

const row = (spec: RowSpec): string =>
  [
    spec.name,
    spec.architecture ?? "amd64",
    spec.status ?? "ii ",
    String(spec.kib ?? 1),
    spec.section ?? "misc",
    spec.priority ?? "optional",
    spec.provides ?? "",
    spec.depends ?? "",
    spec.preDepends ?? "",
    spec.recommends ?? "",
    spec.suggests ?? "",
    spec.enhances ?? "",
    spec.summary ?? ""
  ].join("\t")

const query = [
  row({ name: "base-files", section: "admin", priority: "required" }),
  row({ name: "libc6", section: "libs", priority: "required", kib: 1000 }),
  row({ name: "bash", section: "shells", priority: "required", depends: "base-files, libc6" }),
  row({
    name: "editor",
    kib: 300,
    section: "editors",
    depends: "libc6 (>= 2.30), libedit | libedit-alt",
    recommends: "editor-doc",
    suggests: "spell",
    summary: "A text editor"
  }),
  row({ name: "libedit", section: "libs", kib: 80 }),
  row({ name: "libedit-alt", section: "libs", kib: 70 }),
  row({ name: "editor-doc", architecture: "all", section: "doc", kib: 50 }),
  row({ name: "spell", status: "rc ", section: "text" }),
  row({ name: "libfoo", section: "libs", kib: 40 }),
  row({ name: "mta-impl", section: "mail", provides: "mail-transport-agent", kib: 200 }),
  row({ name: "mailer", section: "mail", depends: "mail-transport-agent", kib: 150 })
].join("\n")

const manual = parseManualList("editor\nlibfoo\nmailer\n")

describe("parseRelations", () => {
  it.effect("splits groups and alternatives and drops version constraints", () =>
    Effect.sync(() => {
      expect(parseRelations("libc6 (>= 2.34), mail-transport-agent | postfix, libx:i386")).toEqual([
        [{ name: "libc6", architecture: undefined }],
        [{ name: "mail-transport-agent", architecture: undefined }, { name: "postfix", architecture: undefined }],
        [{ name: "libx", architecture: "i386" }]
      ])
      expect(parseRelations("")).toEqual([])
    }))
})

describe("parseDpkgQuery", () => {
  it.effect("reads installation state and sizes", () =>
    Effect.sync(() => {
      const rows = right(parseDpkgQuery(`${query}\n`))
      expect(rows).toHaveLength(11)
      const spell = rows.find((candidate) => candidate.name === "spell")
      expect(spell?.installed).toBe(false)
      const mta = rows.find((candidate) => candidate.name === "mta-impl")
      expect(mta?.provides).toEqual(["mail-transport-agent"])
      expect(mta?.installedKib).toBe(200)
    }))

  it.effect("names the first malformed line", () =>
    Effect.sync(() => {
      expect(left(parseDpkgQuery("a\tb\tc"))).toBe("line 1: expected 13 fields, got 3")
    }))
})

describe("classifyApt", () => {
  it.effect("excludes the base system and library sections from the upper tier", () =>
    Effect.sync(() => {
      const tiers = classifyApt(right(parseDpkgQuery(query)), manual)
      expect(members(tiers.base).toSorted()).toEqual(["base-files:amd64", "bash:amd64", "libc6:amd64"])
      expect(members(tiers.upper).toSorted()).toEqual(["editor:amd64", "mailer:amd64"])
      expect(tiers.user.has("spell:amd64")).toBe(false)
      expect(members(tiers.ahistoricalLibs)).toEqual([
        "libedit:amd64",
        "libedit-alt:amd64",
        "libfoo:amd64"
      ])
    }))

  it.effect("lets history promote requested libraries and demote automatic or installer packages", () =>
    Effect.sync(() => {
      const history = replayHistory([
        [
          "Start-Date: 2024-01-01  10:00:00",
          "Install: mailer:amd64 (1.0)",
          "End-Date: 2024-01-01  10:00:05",
          "",
          "Start-Date: 2024-02-01  10:00:00",
          "Commandline: apt install libfoo editor",
          "Requested-By: user (1000)",
          "Install: libfoo:amd64 (2.0), editor:amd64 (3.1, automatic)",
          "End-Date: 2024-02-01  10:00:09"
        ].join("\n")
      ])
      const tiers = classifyApt(right(parseDpkgQuery(query)), manual, history)
      expect(members(tiers.upper)).toEqual(["libfoo:amd64"])
      expect(tiers.user.has("mailer:amd64")).toBe(false)
      expect(tiers.user.has("mta-impl:amd64")).toBe(true)
      expect(tiers.ahistoricalLibs.has("libfoo:amd64")).toBe(false)
    }))
})

describe("aptInputs", () => {
  it.effect("emits user packages sorted with resolved relations", () =>
    Effect.sync(() => {
      const inputs = aptInputs(right(parseDpkgQuery(query)), manual)
      expect(inputs.map((input) => input.identifier)).toEqual([
        "editor-doc:all",
        "editor:amd64",
        "libedit-alt:amd64",
        "libedit:amd64",
        "libfoo:amd64",
        "mailer:amd64",
        "mta-impl:amd64"
      ])
      expect(inputs.find((input) => input.identifier === "editor:amd64")).toEqual({
        identifier: "editor:amd64",
        tier: "upper",
        installedBytes: 307200,
        name: "editor",
        description: "A text editor",
        category: "editors",
        requires: ["libedit:amd64"],
        advises: ["editor-doc:all"],
        suggests: [],
        enhances: []
      })
      expect(inputs.find((input) => input.identifier === "mailer:amd64")?.requires).toEqual(["mta-impl:amd64"])
      expect(inputs.find((input) => input.identifier === "libfoo:amd64")?.tier).toBe("lower")
    }))

  it.effect("prefers the dependent's architecture unless one is named", () =>
    Effect.sync(() => {
      const rows = right(
        parseDpkgQuery(
          [
            row({ name: "libx", architecture: "i386" }),
            row({ name: "libx" }),
            row({ name: "tool", depends: "libx" }),
            row({ name: "tool32", depends: "libx:i386" })
          ].join("\n")
        )
      )
      const inputs = aptInputs(rows, parseManualList("tool\ntool32"))
      expect(inputs.find((input) => input.identifier === "tool:amd64")?.requires).toEqual(["libx:amd64"])
      expect(inputs.find((input) => input.identifier === "tool32:amd64")?.requires).toEqual(["libx:i386"])
    }))
})
