import { lstat } from "node:fs/promises"
import { resolve } from "node:path"
import { createCliError, hasErrorCode } from "../core/errors"
import { isJsonObject, readJsonDocument, writeJsonAtomically } from "../core/json-storage"
import { getConfigFilePath, getWorktreeRootPath, isPathInsideOrEqual } from "../core/paths"
import { DEFAULT_CONFIG, type PartialConfig, type ResolvedConfig } from "./types"

type ValidationContext = {
  readonly file: string
}

type LoadResolvedConfigInput = {
  readonly repoRoot: string
}

export type LoadResolvedConfigResult = {
  readonly config: ResolvedConfig
  readonly loadedFile: string | null
}

const throwInvalidConfig = ({
  file,
  keyPath,
  reason,
}: {
  readonly file: string
  readonly keyPath: string
  readonly reason: string
}): never => {
  throw createCliError("INVALID_CONFIG", {
    message: `Invalid config: ${file} (${keyPath}: ${reason})`,
    details: {
      file,
      keyPath,
      reason,
    },
  })
}

const parseBoolean = ({
  value,
  ctx,
  keyPath,
}: {
  readonly value: unknown
  readonly ctx: ValidationContext
  readonly keyPath: string
}): boolean => {
  if (typeof value === "boolean") {
    return value
  }
  return throwInvalidConfig({
    file: ctx.file,
    keyPath,
    reason: "must be boolean",
  })
}

const parseString = ({
  value,
  ctx,
  keyPath,
  allowEmpty = false,
}: {
  readonly value: unknown
  readonly ctx: ValidationContext
  readonly keyPath: string
  readonly allowEmpty?: boolean
}): string => {
  if (typeof value === "string" && (allowEmpty || value.trim().length > 0)) {
    return value
  }
  return throwInvalidConfig({
    file: ctx.file,
    keyPath,
    reason: allowEmpty ? "must be a string" : "must be a non-empty string",
  })
}

const parseNullableCommand = ({
  value,
  ctx,
  keyPath,
}: {
  readonly value: unknown
  readonly ctx: ValidationContext
  readonly keyPath: string
}): string | null => {
  if (value === null) {
    return null
  }
  return parseString({ value, ctx, keyPath })
}

/** Recognized keys are type-checked; anything else in the file is ignored. */
export const validatePartialConfig = ({
  rawConfig,
  ctx,
}: {
  readonly rawConfig: unknown
  readonly ctx: ValidationContext
}): PartialConfig => {
  if (isJsonObject(rawConfig) !== true) {
    return throwInvalidConfig({
      file: ctx.file,
      keyPath: "<root>",
      reason: "must be an object",
    })
  }

  const root = rawConfig
  const partial: PartialConfig = {}

  if (root.branchPrefix !== undefined) {
    partial.branchPrefix = parseString({ value: root.branchPrefix, ctx, keyPath: "branchPrefix", allowEmpty: true })
  }
  if (root.baseBranch !== undefined) {
    partial.baseBranch = parseString({ value: root.baseBranch, ctx, keyPath: "baseBranch" })
  }
  if (root.remote !== undefined) {
    partial.remote = parseString({ value: root.remote, ctx, keyPath: "remote" })
  }
  if (root.worktreesDir !== undefined) {
    partial.worktreesDir = parseString({ value: root.worktreesDir, ctx, keyPath: "worktreesDir" })
  }
  if (root.defaultCompanionTool !== undefined) {
    partial.defaultCompanionTool = parseNullableCommand({
      value: root.defaultCompanionTool,
      ctx,
      keyPath: "defaultCompanionTool",
    })
  }
  if (root.initCommand !== undefined) {
    partial.initCommand = parseNullableCommand({ value: root.initCommand, ctx, keyPath: "initCommand" })
  }
  if (root.autoCommit !== undefined) {
    partial.autoCommit = parseBoolean({ value: root.autoCommit, ctx, keyPath: "autoCommit" })
  }
  if (root.pushOnCreate !== undefined) {
    partial.pushOnCreate = parseBoolean({ value: root.pushOnCreate, ctx, keyPath: "pushOnCreate" })
  }
  if (root.pushOnMerge !== undefined) {
    partial.pushOnMerge = parseBoolean({ value: root.pushOnMerge, ctx, keyPath: "pushOnMerge" })
  }

  return partial
}

export const mergeConfig = (base: ResolvedConfig, partial: PartialConfig): ResolvedConfig => {
  return {
    branchPrefix: partial.branchPrefix ?? base.branchPrefix,
    baseBranch: partial.baseBranch ?? base.baseBranch,
    remote: partial.remote ?? base.remote,
    worktreesDir: partial.worktreesDir ?? base.worktreesDir,
    defaultCompanionTool:
      partial.defaultCompanionTool === undefined ? base.defaultCompanionTool : partial.defaultCompanionTool,
    initCommand: partial.initCommand === undefined ? base.initCommand : partial.initCommand,
    autoCommit: partial.autoCommit ?? base.autoCommit,
    pushOnCreate: partial.pushOnCreate ?? base.pushOnCreate,
    pushOnMerge: partial.pushOnMerge ?? base.pushOnMerge,
  }
}

export const validateWorktreesDir = async ({
  repoRoot,
  config,
}: {
  readonly repoRoot: string
  readonly config: ResolvedConfig
}): Promise<void> => {
  const resolvedWorktreeRoot = getWorktreeRootPath(repoRoot, config.worktreesDir)

  const gitDirPath = resolve(repoRoot, ".git")
  if (
    isPathInsideOrEqual({
      rootPath: gitDirPath,
      candidatePath: resolvedWorktreeRoot,
    })
  ) {
    throwInvalidConfig({
      file: "<resolved>",
      keyPath: "worktreesDir",
      reason: "must not point inside .git",
    })
  }

  try {
    const stat = await lstat(resolvedWorktreeRoot)
    if (stat.isDirectory() !== true) {
      throwInvalidConfig({
        file: "<resolved>",
        keyPath: "worktreesDir",
        reason: "must not point to an existing file",
      })
    }
  } catch (error) {
    if (hasErrorCode(error, "ENOENT")) {
      return
    }
    throw error
  }
}

export const loadResolvedConfig = async ({ repoRoot }: LoadResolvedConfigInput): Promise<LoadResolvedConfigResult> => {
  const file = getConfigFilePath(repoRoot)
  const document = await readJsonDocument(file)
  let config = mergeConfig(DEFAULT_CONFIG, {})
  let loadedFile: string | null = null

  if (document.exists) {
    if (document.valid !== true) {
      throwInvalidConfig({ file, keyPath: "<root>", reason: document.reason })
    } else {
      config = mergeConfig(config, validatePartialConfig({ rawConfig: document.value, ctx: { file } }))
      loadedFile = file
    }
  }

  await validateWorktreesDir({
    repoRoot,
    config,
  })

  return {
    config,
    loadedFile,
  }
}

/** Writes every recognized key, defaults included. */
export const saveConfig = async (config: ResolvedConfig, path: string): Promise<void> => {
  await writeJsonAtomically({
    filePath: path,
    payload: {
      branchPrefix: config.branchPrefix,
      baseBranch: config.baseBranch,
      remote: config.remote,
      worktreesDir: config.worktreesDir,
      defaultCompanionTool: config.defaultCompanionTool,
      initCommand: config.initCommand,
      autoCommit: config.autoCommit,
      pushOnCreate: config.pushOnCreate,
      pushOnMerge: config.pushOnMerge,
    },
    ensureDir: true,
  })
}
