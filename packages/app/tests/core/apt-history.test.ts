import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import {
  isHistoryLog,
  parseAptConfigShell,
  parseHistoryEntries,
  parseHistorySections,
  replayHistory
} from "../../src/core/apt-history.js"
import { members } from "./fixtures.js"

const installerLog = [
  "Start-Date: 2023-05-01  09:00:00",
  "Commandline: apt-get install base-tools",
  "Install: coreutils:amd64 (9.1-1), tzdata:all (2023c-5)",
  "End-Date: 2023-05-01  09:01:00",
  ""
].join("\n")

const userLog = [
  "",
  "Start-Date: 2024-03-10  18:20:11",
  "Commandline: apt install gimp",
  "Requested-By: alice (1000)",
  "Install: gimp:amd64 (2.10.34-1), libbabl-0.1-0:amd64 (1:0.1.98-1, automatic),",
  " gimp-data:all (2.10.34-1, automatic)",
  "End-Date: 2024-03-10  18:21:40",
  "",
  "Start-Date: 2024-04-02  08:00:00",
  "Commandline: apt purge gimp",
  "Requested-By: alice (1000)",
  "Purge: gimp:amd64 (2.10.34-1)",
  "Remove: gimp-data:all (2.10.34-1, automatic)",
  "End-Date: 2024-04-02  08:00:30",
  "",
  "Start-Date: 2024-04-03  08:00:00",
  "Commandline: apt install inkscape",
  "Requested-By: alice (1000)",
  "Install: inkscape:amd64 (1.2.2-2)",
  "Upgrade: tzdata:all (2023c-5, 2024a-1)",
  "End-Date: 2024-04-03  08:00:30"
].join("\n")

describe("parseHistorySections", () => {
  it.effect("splits on blank lines and joins continuation lines", () =>
    Effect.sync(() => {
      const sections = parseHistorySections(userLog)
      expect(sections).toHaveLength(3)
      expect(sections[0]?.get("Requested-By")).toBe("alice (1000)")
      expect(sections[0]?.get("Install")).toBe(
        "gimp:amd64 (2.10.34-1), libbabl-0.1-0:amd64 (1:0.1.98-1, automatic), gimp-data:all (2.10.34-1, automatic)"
      )
      expect(sections[0]?.get("Start-Date")).toBe("2024-03-10  18:20:11")
    }))
})

describe("parseHistoryEntries", () => {
  it.effect("reads identifiers and the automatic flag with epochs in versions", () =>
    Effect.sync(() => {
      expect(parseHistoryEntries("vim:amd64 (2:9.0-1), libx:i386 (1.2, automatic)")).toEqual([
        { identifier: "vim:amd64", automatic: false },
        { identifier: "libx:i386", automatic: true }
      ])
      expect(parseHistoryEntries("")).toEqual([])
    }))
})

describe("replayHistory", () => {
  it.effect("replays requested installs and removals in log order", () =>
    Effect.sync(() => {
      const marks = replayHistory([installerLog, userLog])
      expect(members(marks.manual)).toEqual(["inkscape:amd64"])
      expect(members(marks.automatic)).toEqual(["libbabl-0.1-0:amd64"])
      expect(members(marks.system)).toEqual(["coreutils:amd64", "tzdata:all"])
    }))

  it.effect("is empty without logs", () =>
    Effect.sync(() => {
      const marks = replayHistory([])
      expect([marks.manual.size, marks.automatic.size, marks.system.size]).toEqual([0, 0, 0])
    }))
})

describe("apt-config helpers", () => {
  it.effect("reads a shell variable and unescapes quotes", () =>
    Effect.sync(() => {
      expect(parseAptConfigShell("HISTORY='/var/log/apt/history.log'\n", "HISTORY")).toBe("/var/log/apt/history.log")
      expect(parseAptConfigShell("HISTORY='/tmp/it'\\''s.log'", "HISTORY")).toBe("/tmp/it's.log")
      expect(parseAptConfigShell("", "HISTORY")).toBeUndefined()
    }))

  it.effect("matches rotated logs by the active log's stem", () =>
    Effect.sync(() => {
      expect(isHistoryLog("history.log.2.gz", "history.log")).toBe(true)
      expect(isHistoryLog("history.log", "history.log")).toBe(true)
      expect(isHistoryLog("term.log", "history.log")).toBe(false)
    }))
})
