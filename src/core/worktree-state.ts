import { join } from "node:path"
import type { GitRepository } from "../git/repository"
import { WORKTREE_SETTINGS_FILE_NAME } from "./constants"
import { isJsonObject, readJsonDocument } from "./json-storage"
import { pathExists } from "./paths"
import type { Registry, WorktreeRecord } from "./registry"

export type WorktreeRecordStatus = {
  readonly record: WorktreeRecord
  readonly exists: boolean
  readonly dirty: boolean | null
  readonly ahead: number | null
  readonly behind: number | null
  readonly lastCommitAt: Date | null
  readonly merged: boolean | null
}

export type WorktreeSettings =
  | {
      readonly path: string
      readonly valid: true
      readonly values: Readonly<Record<string, unknown>>
    }
  | {
      readonly path: string
      readonly valid: false
      readonly reason: string
    }

export type RemoteOnlyBranch = {
  readonly remote: string
  readonly branch: string
}

const missingStatus = (record: WorktreeRecord): WorktreeRecordStatus => {
  return {
    record,
    exists: false,
    dirty: null,
    ahead: null,
    behind: null,
    lastCommitAt: null,
    merged: null,
  }
}

/** Read-only projection of one record; probes run in parallel. */
export const collectRecordStatus = async ({
  git,
  record,
  fallbackBase,
}: {
  readonly git: GitRepository
  readonly record: WorktreeRecord
  readonly fallbackBase: string
}): Promise<WorktreeRecordStatus> => {
  if ((await pathExists(record.path)) !== true) {
    return missingStatus(record)
  }

  const base = record.base.length > 0 ? record.base : fallbackBase
  const [dirty, aheadBehind, lastCommitAt, merged] = await Promise.all([
    git.hasUncommittedChanges(record.path),
    git.aheadBehind(record.path),
    git.lastCommitTime(record.path),
    git.isBranchMerged({ branch: record.branch, into: base }),
  ])

  return {
    record,
    exists: true,
    dirty,
    ahead: aheadBehind?.ahead ?? null,
    behind: aheadBehind?.behind ?? null,
    lastCommitAt,
    merged,
  }
}

export const collectRegistryStatus = async ({
  git,
  registry,
  fallbackBase,
}: {
  readonly git: GitRepository
  readonly registry: Registry
  readonly fallbackBase: string
}): Promise<WorktreeRecordStatus[]> => {
  return Promise.all(registry.worktrees.map(async (record) => collectRecordStatus({ git, record, fallbackBase })))
}

/** Settings a worktree keeps in its own `.wt.json`, or null when it has none. */
export const readWorktreeSettings = async (worktreePath: string): Promise<WorktreeSettings | null> => {
  const document = await readJsonDocument(join(worktreePath, WORKTREE_SETTINGS_FILE_NAME))
  if (document.exists !== true) {
    return null
  }
  if (document.valid !== true) {
    return { path: document.path, valid: false, reason: document.reason }
  }
  const { value } = document
  if (isJsonObject(value) !== true) {
    return { path: document.path, valid: false, reason: "expected a JSON object" }
  }
  return { path: document.path, valid: true, values: value }
}

/** Remote branches with no managed worktree, for `list --all`. */
export const collectRemoteOnlyBranches = async ({
  git,
  registry,
  remote,
}: {
  readonly git: GitRepository
  readonly registry: Registry
  readonly remote: string
}): Promise<RemoteOnlyBranch[]> => {
  const managed = new Set(registry.worktrees.map((record) => record.branch))
  const branches = await git.listRemoteBranches(remote)
  return branches.filter((branch) => managed.has(branch) !== true).map((branch) => ({ remote, branch }))
}
