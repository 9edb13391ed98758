import { Chalk } from "chalk"
import stringWidth from "string-width"
import { getBorderCharacters, table } from "table"
import type { CleanupCandidate } from "../core/clean"
import type { RemoteOnlyBranch, WorktreeRecordStatus } from "../core/worktree-state"
import { formatRelativeTime, formatTimestamp } from "../utils/time"

export type CatppuccinTheme = {
  readonly header: (value: string) => string
  readonly name: (value: string) => string
  readonly nameCurrent: (value: string) => string
  readonly branch: (value: string) => string
  readonly dirty: (value: string) => string
  readonly clean: (value: string) => string
  readonly missing: (value: string) => string
  readonly merged: (value: string) => string
  readonly unmerged: (value: string) => string
  readonly unknown: (value: string) => string
  readonly sync: (value: string) => string
  readonly path: (value: string) => string
  readonly label: (value: string) => string
  readonly muted: (value: string) => string
}

const CATPPUCCIN_MOCHA = {
  rosewater: "#f5e0dc",
  mauve: "#cba6f7",
  red: "#f38ba8",
  peach: "#fab387",
  yellow: "#f9e2af",
  green: "#a6e3a1",
  blue: "#89b4fa",
  lavender: "#b4befe",
  sapphire: "#74c7ec",
  text: "#cdd6f4",
  overlay0: "#6c7086",
} as const

const LIST_HEADERS = ["name", "branch", "status", "sync", "merged", "activity"] as const

const identityColor = (value: string): string => value

export const createCatppuccinTheme = ({ enabled }: { readonly enabled: boolean }): CatppuccinTheme => {
  if (enabled !== true) {
    return {
      header: identityColor,
      name: identityColor,
      nameCurrent: identityColor,
      branch: identityColor,
      dirty: identityColor,
      clean: identityColor,
      missing: identityColor,
      merged: identityColor,
      unmerged: identityColor,
      unknown: identityColor,
      sync: identityColor,
      path: identityColor,
      label: identityColor,
      muted: identityColor,
    }
  }

  const chalk = new Chalk({ level: 3 })
  const color =
    (hex: string) =>
    (value: string): string =>
      chalk.hex(hex)(value)

  return {
    header: color(CATPPUCCIN_MOCHA.rosewater),
    name: color(CATPPUCCIN_MOCHA.text),
    nameCurrent: color(CATPPUCCIN_MOCHA.mauve),
    branch: color(CATPPUCCIN_MOCHA.lavender),
    dirty: color(CATPPUCCIN_MOCHA.peach),
    clean: color(CATPPUCCIN_MOCHA.green),
    missing: color(CATPPUCCIN_MOCHA.red),
    merged: color(CATPPUCCIN_MOCHA.green),
    unmerged: color(CATPPUCCIN_MOCHA.blue),
    unknown: color(CATPPUCCIN_MOCHA.yellow),
    sync: color(CATPPUCCIN_MOCHA.sapphire),
    path: color(CATPPUCCIN_MOCHA.sapphire),
    label: color(CATPPUCCIN_MOCHA.mauve),
    muted: color(CATPPUCCIN_MOCHA.overlay0),
  }
}

export const formatWorktreeState = (status: WorktreeRecordStatus): string => {
  if (status.exists !== true) {
    return "missing"
  }
  if (status.dirty === null) {
    return "unknown"
  }
  return status.dirty ? "dirty" : "clean"
}

/** `↑ahead ↓behind` against the upstream; `-` when there is none. */
export const formatSyncState = (status: WorktreeRecordStatus): string => {
  if (status.ahead === null || status.behind === null) {
    return "-"
  }
  if (status.ahead === 0 && status.behind === 0) {
    return "in sync"
  }
  const parts: string[] = []
  if (status.ahead > 0) {
    parts.push(`↑${String(status.ahead)}`)
  }
  if (status.behind > 0) {
    parts.push(`↓${String(status.behind)}`)
  }
  return parts.join(" ")
}

export const formatMergedState = (merged: boolean | null): string => {
  if (merged === null) {
    return "unknown"
  }
  return merged ? "merged" : "unmerged"
}

const formatActivity = (lastCommitAt: Date | null, now: Date): string => {
  return lastCommitAt === null ? "-" : formatRelativeTime(lastCommitAt, now)
}

const colorizeCellContent = ({
  cell,
  color,
}: {
  readonly cell: string
  readonly color: (value: string) => string
}): string => {
  const matched = /^(\s*)(.*?)(\s*)$/.exec(cell)
  if (matched === null) {
    return cell
  }
  const leftPadding = matched[1] ?? ""
  const content = matched[2] ?? ""
  const rightPadding = matched[3] ?? ""
  if (content.length === 0) {
    return cell
  }
  return `${leftPadding}${color(content)}${rightPadding}`
}

const stateColor = (value: string, theme: CatppuccinTheme): ((value: string) => string) => {
  switch (value) {
    case "dirty":
      return theme.dirty
    case "clean":
    case "merged":
      return theme.clean
    case "missing":
      return theme.missing
    case "unmerged":
      return theme.unmerged
    case "-":
      return theme.muted
    default:
      return theme.unknown
  }
}

const colorizeListTableLine = ({ line, theme }: { readonly line: string; readonly theme: CatppuccinTheme }): string => {
  if (line.startsWith("┌") || line.startsWith("├") || line.startsWith("└")) {
    return theme.muted(line)
  }
  if (line.startsWith("│") !== true) {
    return line
  }

  const segments = line.split("│")
  const cells = segments.slice(1, -1)
  const [nameCell, branchCell, stateCell, syncCell, mergedCell, activityCell] = cells
  if (
    cells.length !== LIST_HEADERS.length ||
    nameCell === undefined ||
    branchCell === undefined ||
    stateCell === undefined ||
    syncCell === undefined ||
    mergedCell === undefined ||
    activityCell === undefined
  ) {
    return line
  }

  const isHeaderRow = cells.every((cell, index) => cell.trim() === LIST_HEADERS[index])
  if (isHeaderRow) {
    const nextCells = cells.map((cell) => colorizeCellContent({ cell, color: theme.header }))
    return [segments[0], ...nextCells, segments.at(-1) ?? ""].join("│")
  }

  const nextCells = [
    colorizeCellContent({ cell: nameCell, color: nameCell.trimStart().startsWith("*") ? theme.nameCurrent : theme.name }),
    colorizeCellContent({ cell: branchCell, color: theme.branch }),
    colorizeCellContent({ cell: stateCell, color: stateColor(stateCell.trim(), theme) }),
    colorizeCellContent({ cell: syncCell, color: syncCell.trim() === "-" ? theme.muted : theme.sync }),
    colorizeCellContent({ cell: mergedCell, color: stateColor(mergedCell.trim(), theme) }),
    colorizeCellContent({ cell: activityCell, color: theme.muted }),
  ]
  return [segments[0], ...nextCells, segments.at(-1) ?? ""].join("│")
}

const renderTable = (rows: string[][]): string => {
  return table(rows, {
    border: getBorderCharacters("norc"),
    drawHorizontalLine: (lineIndex, rowCount) => {
      return lineIndex === 0 || lineIndex === 1 || lineIndex === rowCount
    },
  })
}

/** Table of managed worktrees; the row of `currentPath` is marked with `*`. */
export const renderWorktreeTable = ({
  statuses,
  currentPath,
  now,
  theme,
}: {
  readonly statuses: ReadonlyArray<WorktreeRecordStatus>
  readonly currentPath: string | null
  readonly now: Date
  readonly theme: CatppuccinTheme
}): string[] => {
  const rows: string[][] = [
    [...LIST_HEADERS],
    ...statuses.map((status) => [
      `${status.record.path === currentPath ? "*" : " "} ${status.record.featureName}`,
      status.record.branch,
      formatWorktreeState(status),
      formatSyncState(status),
      formatMergedState(status.merged),
      formatActivity(status.lastCommitAt, now),
    ]),
  ]
  return renderTable(rows)
    .trimEnd()
    .split("\n")
    .map((line) => colorizeListTableLine({ line, theme }))
}

export const renderRemoteOnlyBranches = ({
  branches,
  theme,
}: {
  readonly branches: ReadonlyArray<RemoteOnlyBranch>
  readonly theme: CatppuccinTheme
}): string[] => {
  if (branches.length === 0) {
    return []
  }
  return [
    theme.header("Remote branches without a worktree:"),
    ...branches.map(({ remote, branch }) => `  ${theme.branch(`${remote}/${branch}`)}`),
  ]
}

const padToDisplayWidth = ({ value, width }: { readonly value: string; readonly width: number }): string => {
  const visibleLength = stringWidth(value)
  if (visibleLength >= width) {
    return value
  }
  return `${value}${" ".repeat(width - visibleLength)}`
}

const formatSettingValue = (value: unknown): string => {
  return typeof value === "string" ? value : JSON.stringify(value)
}

export const renderStatusLines = ({
  status,
  settings = null,
  now,
  theme,
}: {
  readonly status: WorktreeRecordStatus
  readonly settings?: Readonly<Record<string, unknown>> | null
  readonly now: Date
  readonly theme: CatppuccinTheme
}): string[] => {
  const { record } = status
  const state = formatWorktreeState(status)
  const entries: ReadonlyArray<readonly [string, string]> = [
    ["feature", record.featureName],
    ["branch", theme.branch(record.branch)],
    ["base", record.base.length > 0 ? record.base : "-"],
    ["path", theme.path(record.path)],
    ["created", record.createdAt],
    ["status", stateColor(state, theme)(state)],
    ["sync", formatSyncState(status)],
    ["merged", formatMergedState(status.merged)],
    [
      "last commit",
      status.lastCommitAt === null
        ? "-"
        : `${formatTimestamp(status.lastCommitAt)} (${formatRelativeTime(status.lastCommitAt, now)})`,
    ],
  ]
  const labelWidth = Math.max(...entries.map(([label]) => stringWidth(label))) + 2
  const lines = entries.map(
    ([label, value]) => `${theme.label(padToDisplayWidth({ value: `${label}:`, width: labelWidth }))}${value}`,
  )
  if (settings === null) {
    return lines
  }
  return [
    ...lines,
    "",
    theme.label("worktree config:"),
    ...Object.entries(settings).map(([key, value]) => `  ${key}: ${formatSettingValue(value)}`),
  ]
}

export const renderCleanupTable = ({
  candidates,
  theme,
}: {
  readonly candidates: ReadonlyArray<CleanupCandidate>
  readonly theme: CatppuccinTheme
}): string[] => {
  const rows: string[][] = [
    ["name", "branch", "reason"],
    ...candidates.map(({ record, reason }) => [record.featureName, record.branch, reason]),
  ]
  return renderTable(rows)
    .trimEnd()
    .split("\n")
    .map((line, index) => {
      if (line.startsWith("│") !== true) {
        return theme.muted(line)
      }
      return index === 1 ? theme.header(line) : line
    })
}
