import { describe, expect, it } from "vitest"
import { createRecord } from "../core/registry"
import type { WorktreeRecordStatus } from "../core/worktree-state"
import {
  createCatppuccinTheme,
  formatMergedState,
  formatSyncState,
  formatWorktreeState,
  renderCleanupTable,
  renderRemoteOnlyBranches,
  renderStatusLines,
  renderWorktreeTable,
} from "./render"

const theme = createCatppuccinTheme({ enabled: false })
const now = new Date("2026-03-10T12:00:00.000Z")

const alphaRecord = createRecord({
  featureName: "alpha",
  branch: "feature/alpha",
  path: "/repo/.wt/worktrees/alpha",
  base: "main",
  now: new Date("2026-03-01T09:00:00.000Z"),
})

const buildStatus = (overrides: Partial<WorktreeRecordStatus> = {}): WorktreeRecordStatus => {
  return {
    record: alphaRecord,
    exists: true,
    dirty: false,
    ahead: null,
    behind: null,
    lastCommitAt: null,
    merged: false,
    ...overrides,
  }
}

const toCells = (line: string): string[] => line.split("│").map((cell) => cell.trim())

describe("state formatters", () => {
  it("formats the worktree state", () => {
    expect(formatWorktreeState(buildStatus({ exists: false }))).toBe("missing")
    expect(formatWorktreeState(buildStatus({ dirty: null }))).toBe("unknown")
    expect(formatWorktreeState(buildStatus({ dirty: true }))).toBe("dirty")
    expect(formatWorktreeState(buildStatus())).toBe("clean")
  })

  it("formats ahead and behind counts", () => {
    expect(formatSyncState(buildStatus())).toBe("-")
    expect(formatSyncState(buildStatus({ ahead: 0, behind: 0 }))).toBe("in sync")
    expect(formatSyncState(buildStatus({ ahead: 2, behind: 0 }))).toBe("↑2")
    expect(formatSyncState(buildStatus({ ahead: 1, behind: 3 }))).toBe("↑1 ↓3")
  })

  it("formats the merged flag", () => {
    expect(formatMergedState(true)).toBe("merged")
    expect(formatMergedState(false)).toBe("unmerged")
    expect(formatMergedState(null)).toBe("unknown")
  })
})

describe("renderWorktreeTable", () => {
  it("marks the current worktree and shows relative activity", () => {
    const lines = renderWorktreeTable({
      statuses: [buildStatus({ dirty: true, ahead: 1, behind: 0, lastCommitAt: new Date("2026-03-10T09:00:00.000Z") })],
      currentPath: alphaRecord.path,
      now,
      theme,
    })

    expect(lines.map(toCells)).toEqual([
      [lines[0]?.trim() ?? ""],
      ["", "name", "branch", "status", "sync", "merged", "activity", ""],
      [lines[2]?.trim() ?? ""],
      ["", "* alpha", "feature/alpha", "dirty", "↑1", "unmerged", "3h ago", ""],
      [lines[4]?.trim() ?? ""],
    ])
  })

  it("colors cells without changing the layout when enabled", () => {
    const statuses = [buildStatus()]
    const plain = renderWorktreeTable({ statuses, currentPath: null, now, theme })
    const colored = renderWorktreeTable({ statuses, currentPath: null, now, theme: createCatppuccinTheme({ enabled: true }) })

    expect(colored).toHaveLength(plain.length)
    expect(colored[3]).not.toBe(plain[3])
    expect(colored[3]?.replace(/\u001b\[[0-9;]*m/g, "")).toBe(plain[3])
  })
})

describe("renderRemoteOnlyBranches", () => {
  it("prints nothing without branches", () => {
    expect(renderRemoteOnlyBranches({ branches: [], theme })).toEqual([])
  })

  it("lists remote branches under a heading", () => {
    expect(renderRemoteOnlyBranches({ branches: [{ remote: "origin", branch: "feature/beta" }], theme })).toEqual([
      "Remote branches without a worktree:",
      "  origin/feature/beta",
    ])
  })
})

describe("renderStatusLines", () => {
  it("aligns labels to the longest one", () => {
    expect(renderStatusLines({ status: buildStatus({ merged: true }), now, theme })).toEqual([
      "feature:     alpha",
      "branch:      feature/alpha",
      "base:        main",
      "path:        /repo/.wt/worktrees/alpha",
      "created:     2026-03-01T09:00:00.000Z",
      "status:      clean",
      "sync:        -",
      "merged:      merged",
      "last commit: -",
    ])
  })

  it("appends the worktree settings after the status", () => {
    const lines = renderStatusLines({
      status: buildStatus(),
      settings: { editor: "vim", ports: [3000, 3001], debug: false },
      now,
      theme,
    })

    expect(lines.slice(-5)).toEqual(["", "worktree config:", "  editor: vim", "  ports: [3000,3001]", "  debug: false"])
  })
})

describe("renderCleanupTable", () => {
  it("renders one row per candidate with its reason", () => {
    const lines = renderCleanupTable({ candidates: [{ record: alphaRecord, reason: "path missing" }], theme })

    expect(toCells(lines[1] ?? "")).toEqual(["", "name", "branch", "reason", ""])
    expect(toCells(lines[3] ?? "")).toEqual(["", "alpha", "feature/alpha", "path missing", ""])
  })
})
