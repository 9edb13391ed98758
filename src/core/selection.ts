import { createCliError } from "./errors"
import { isSamePath } from "./paths"
import { findByBranch, findByFeatureName, type Registry, type WorktreeRecord } from "./registry"

/** Where the command was invoked from. */
export type InvocationLocation =
  | { readonly kind: "root" }
  | { readonly kind: "worktree"; readonly path: string; readonly branch: string | null }

/**
 * Presents the numbered records and returns the 1-based answer, or `null`
 * when the answer is not a number.
 */
export type WorktreeChooser = (input: {
  readonly records: ReadonlyArray<WorktreeRecord>
  readonly message: string
}) => Promise<number | null>

export const findByIdentifier = (registry: Registry, identifier: string): WorktreeRecord | undefined => {
  return findByFeatureName(registry, identifier) ?? findByBranch(registry, identifier)
}

export const findByLocation = async ({
  registry,
  path,
  branch,
}: {
  readonly registry: Registry
  readonly path: string
  readonly branch: string | null
}): Promise<WorktreeRecord | undefined> => {
  for (const record of registry.worktrees) {
    if (await isSamePath(record.path, path)) {
      return record
    }
  }
  return branch === null ? undefined : findByBranch(registry, branch)
}

export const resolveTargetRecord = async ({
  registry,
  identifier,
  location,
  interactive,
  chooser,
  message = "Select worktree",
}: {
  readonly registry: Registry
  readonly identifier: string | undefined
  readonly location: InvocationLocation
  readonly interactive: boolean
  readonly chooser: WorktreeChooser
  readonly message?: string
}): Promise<WorktreeRecord> => {
  if (identifier !== undefined) {
    const record = findByIdentifier(registry, identifier)
    if (record === undefined) {
      throw createCliError("WORKTREE_NOT_FOUND", {
        message: `Worktree not found: ${identifier}`,
        details: { identifier },
      })
    }
    return record
  }

  if (location.kind === "worktree") {
    const record = await findByLocation({ registry, path: location.path, branch: location.branch })
    if (record === undefined) {
      throw createCliError("NOT_IN_WORKTREE", {
        message: "Current directory is not a managed worktree",
        details: { path: location.path, branch: location.branch },
      })
    }
    return record
  }

  if (registry.worktrees.length === 0) {
    throw createCliError("NO_WORKTREES_MANAGED", {
      message: "No worktrees are managed in this repository",
    })
  }

  if (interactive !== true) {
    throw createCliError("USAGE_ERROR", {
      message: "Worktree name required when not running interactively",
      suggestion: "Pass the worktree name, or run from a terminal.",
    })
  }

  const choice = await chooser({ records: registry.worktrees, message })
  const record = choice === null || Number.isInteger(choice) !== true ? undefined : registry.worktrees[choice - 1]
  if (record === undefined) {
    throw createCliError("USAGE_ERROR", {
      message: "Invalid selection",
      details: { choice, count: registry.worktrees.length },
    })
  }
  return record
}
