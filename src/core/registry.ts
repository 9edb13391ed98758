import { createCliError } from "./errors"
import { isJsonObject, readJsonDocument, writeJsonAtomically } from "./json-storage"

export type WorktreeRecord = {
  readonly featureName: string
  readonly branch: string
  readonly path: string
  readonly base: string
  readonly createdAt: string
}

export type Registry = {
  readonly worktrees: ReadonlyArray<WorktreeRecord>
}

export const EMPTY_REGISTRY: Registry = { worktrees: [] }

const throwInvalidRegistry = ({
  file,
  reason,
}: {
  readonly file: string
  readonly reason: string
}): never => {
  throw createCliError("INVALID_REGISTRY", {
    message: `Invalid worktree registry: ${file} (${reason})`,
    details: { file, reason },
  })
}

const readOptionalString = (record: Record<string, unknown>, key: string): string => {
  const value = record[key]
  return typeof value === "string" ? value : ""
}

const parseRecord = ({
  value,
  index,
  file,
}: {
  readonly value: unknown
  readonly index: number
  readonly file: string
}): WorktreeRecord => {
  if (isJsonObject(value) !== true) {
    return throwInvalidRegistry({ file, reason: `worktrees.${String(index)} must be an object` })
  }
  for (const key of ["featureName", "branch", "path"] as const) {
    const field = value[key]
    if (typeof field !== "string" || field.length === 0) {
      throwInvalidRegistry({ file, reason: `worktrees.${String(index)}.${key} must be a non-empty string` })
    }
  }
  return {
    featureName: readOptionalString(value, "featureName"),
    branch: readOptionalString(value, "branch"),
    path: readOptionalString(value, "path"),
    base: readOptionalString(value, "base"),
    createdAt: readOptionalString(value, "createdAt"),
  }
}

export const parseRegistry = ({ value, file }: { readonly value: unknown; readonly file: string }): Registry => {
  if (isJsonObject(value) !== true) {
    return throwInvalidRegistry({ file, reason: "root must be an object" })
  }
  const rawWorktrees = value.worktrees
  if (rawWorktrees === undefined) {
    return EMPTY_REGISTRY
  }
  if (Array.isArray(rawWorktrees) !== true) {
    return throwInvalidRegistry({ file, reason: "worktrees must be an array" })
  }
  const items: unknown[] = rawWorktrees
  return {
    worktrees: items.map((item, index) => parseRecord({ value: item, index, file })),
  }
}

export const loadRegistry = async (path: string): Promise<Registry> => {
  const document = await readJsonDocument(path)
  if (document.exists !== true) {
    return EMPTY_REGISTRY
  }
  if (document.valid !== true) {
    return throwInvalidRegistry({ file: path, reason: document.reason })
  }
  return parseRegistry({ value: document.value, file: path })
}

export const saveRegistry = async (registry: Registry, path: string): Promise<void> => {
  await writeJsonAtomically({
    filePath: path,
    payload: {
      worktrees: registry.worktrees.map((record) => ({
        featureName: record.featureName,
        branch: record.branch,
        path: record.path,
        base: record.base,
        createdAt: record.createdAt,
      })),
    },
    ensureDir: true,
  })
}

export const createRecord = ({
  featureName,
  branch,
  path,
  base,
  now = new Date(),
}: {
  readonly featureName: string
  readonly branch: string
  readonly path: string
  readonly base: string
  readonly now?: Date
}): WorktreeRecord => {
  return {
    featureName,
    branch,
    path,
    base,
    createdAt: now.toISOString(),
  }
}

export const findByFeatureName = (registry: Registry, featureName: string): WorktreeRecord | undefined => {
  return registry.worktrees.find((record) => record.featureName === featureName)
}

export const findByBranch = (registry: Registry, branch: string): WorktreeRecord | undefined => {
  return registry.worktrees.find((record) => record.branch === branch)
}

export const findByPath = (registry: Registry, path: string): WorktreeRecord | undefined => {
  return registry.worktrees.find((record) => record.path === path)
}

/** Rejects a second record for the same feature name or path. */
export const ensureRecordSlotAvailable = ({
  registry,
  featureName,
  path,
}: {
  readonly registry: Registry
  readonly featureName: string
  readonly path: string
}): void => {
  const conflict = findByFeatureName(registry, featureName) ?? findByPath(registry, path)
  if (conflict !== undefined) {
    throw createCliError("WORKTREE_EXISTS", {
      message: `Worktree '${conflict.featureName}' is already managed at ${conflict.path}`,
      details: { featureName: conflict.featureName, branch: conflict.branch, path: conflict.path },
    })
  }
}

export const addRecord = (registry: Registry, record: WorktreeRecord): Registry => {
  ensureRecordSlotAvailable({ registry, featureName: record.featureName, path: record.path })
  return {
    worktrees: [...registry.worktrees, record],
  }
}

export const removeRecordByPath = (registry: Registry, path: string): Registry => {
  return {
    worktrees: registry.worktrees.filter((record) => record.path !== path),
  }
}
