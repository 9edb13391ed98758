import { describeError } from "./errors"
import { pathExists } from "./paths"
import { loadRegistry, type Registry, removeRecordByPath, saveRegistry, type WorktreeRecord } from "./registry"
import type { RepoSession } from "./session"

export type CleanupReason = "path missing" | "merged"

export type CleanupCandidate = {
  readonly record: WorktreeRecord
  readonly reason: CleanupReason
}

export type CleanupPlan = {
  readonly registry: Registry
  readonly candidates: ReadonlyArray<CleanupCandidate>
  /** Merged worktrees left alone because they have uncommitted changes. */
  readonly skipped: ReadonlyArray<WorktreeRecord>
}

export type CleanupResult = {
  readonly removed: ReadonlyArray<CleanupCandidate>
  readonly failed: ReadonlyArray<CleanupCandidate>
}

export const planCleanup = async (
  session: RepoSession,
  { merged }: { readonly merged: boolean },
): Promise<CleanupPlan> => {
  const registry = await loadRegistry(session.registryPath)
  const candidates: CleanupCandidate[] = []
  const skipped: WorktreeRecord[] = []

  for (const record of registry.worktrees) {
    if ((await pathExists(record.path)) !== true) {
      candidates.push({ record, reason: "path missing" })
      continue
    }
    if (merged !== true) {
      continue
    }
    const base = record.base.length > 0 ? record.base : session.config.baseBranch
    if ((await session.git.isBranchMerged({ branch: record.branch, into: base })) !== true) {
      continue
    }
    if (await session.git.hasUncommittedChanges(record.path)) {
      skipped.push(record)
      continue
    }
    candidates.push({ record, reason: "merged" })
  }

  return { registry, candidates, skipped }
}

const removeCandidate = async (session: RepoSession, candidate: CleanupCandidate): Promise<void> => {
  const { record } = candidate
  session.logger.info(`Removing ${record.featureName}`)
  if (await pathExists(record.path)) {
    await session.git.removeWorktree({ path: record.path, force: true })
  } else {
    await session.git.pruneWorktrees()
  }
  try {
    await session.git.deleteBranch({ branch: record.branch, force: true })
  } catch (error) {
    session.logger.warn(`Could not delete branch '${record.branch}': ${describeError(error)}`)
  }
}

/**
 * Removes every candidate it can. A failing candidate keeps its record and is
 * reported; the registry is written once at the end.
 */
export const applyCleanup = async (session: RepoSession, plan: CleanupPlan): Promise<CleanupResult> => {
  let registry = plan.registry
  const removed: CleanupCandidate[] = []
  const failed: CleanupCandidate[] = []

  for (const candidate of plan.candidates) {
    try {
      await removeCandidate(session, candidate)
      registry = removeRecordByPath(registry, candidate.record.path)
      removed.push(candidate)
    } catch (error) {
      session.logger.warn(`Failed to clean ${candidate.record.featureName}: ${describeError(error)}`)
      failed.push(candidate)
    }
  }

  if (removed.length > 0) {
    await saveRegistry(registry, session.registryPath)
  }
  return { removed, failed }
}
