import type { GitWorktree } from "../git/worktree"
import { canonicalizePath } from "./paths"
import type { Registry, WorktreeRecord } from "./registry"

export type ReconcileResult = {
  readonly registry: Registry
  readonly removed: ReadonlyArray<WorktreeRecord>
}

const collectLivePaths = async (worktrees: ReadonlyArray<GitWorktree>): Promise<Set<string>> => {
  const live = worktrees.filter((worktree) => worktree.prunable !== true)
  const canonical = await Promise.all(live.map(async (worktree) => canonicalizePath(worktree.path)))
  return new Set(canonical)
}

/**
 * Drops records whose path is not a live worktree of the repository.
 * Paths are compared in canonical form, so a record written through a
 * symlinked directory still matches the path git reports.
 */
export const reconcileRegistry = async ({
  registry,
  worktrees,
}: {
  readonly registry: Registry
  readonly worktrees: ReadonlyArray<GitWorktree>
}): Promise<ReconcileResult> => {
  const livePaths = await collectLivePaths(worktrees)
  const verdicts = await Promise.all(
    registry.worktrees.map(async (record) => ({
      record,
      live: livePaths.has(await canonicalizePath(record.path)),
    })),
  )

  const kept = verdicts.filter((verdict) => verdict.live).map((verdict) => verdict.record)
  const removed = verdicts.filter((verdict) => verdict.live !== true).map((verdict) => verdict.record)
  if (removed.length === 0) {
    return { registry, removed }
  }
  return {
    registry: { worktrees: kept },
    removed,
  }
}
