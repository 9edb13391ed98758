import { constants as fsConstants } from "node:fs"
import { access, realpath } from "node:fs/promises"
import { basename, dirname, isAbsolute, join, relative, resolve, sep } from "node:path"
import { runGitCommand } from "../git/exec"
import { CONFIG_FILE_NAME, INIT_HOOK_FILE_NAME, META_DIRECTORY_NAME, REGISTRY_FILE_NAME } from "./constants"
import { createCliError } from "./errors"

export type RepoContext = {
  readonly repoRoot: string
  readonly currentWorktreeRoot: string
  readonly gitCommonDir: string
}

const GIT_DIR_NAME = ".git"

const resolveRepoRootFromCommonDir = ({
  currentWorktreeRoot,
  gitCommonDir,
}: {
  readonly currentWorktreeRoot: string
  readonly gitCommonDir: string
}): string => {
  if (gitCommonDir.endsWith(`/${GIT_DIR_NAME}`)) {
    return dirname(gitCommonDir)
  }

  if (gitCommonDir.endsWith(`\\${GIT_DIR_NAME}`)) {
    return dirname(gitCommonDir)
  }

  return currentWorktreeRoot
}

export const resolveRepoContext = async (cwd: string): Promise<RepoContext> => {
  const toplevelResult = await runGitCommand({
    cwd,
    args: ["rev-parse", "--show-toplevel"],
    reject: false,
  })

  if (toplevelResult.exitCode !== 0) {
    const bareResult = await runGitCommand({
      cwd,
      args: ["rev-parse", "--is-bare-repository"],
      reject: false,
    })
    if (bareResult.exitCode === 0 && bareResult.stdout.trim() === "true") {
      throw createCliError("NOT_GIT_REPOSITORY", {
        message: "Bare repositories are not supported; run inside a repository with a working tree",
        details: { cwd },
      })
    }
    throw createCliError("NOT_GIT_REPOSITORY", {
      message: "Current directory is not inside a Git repository",
      details: { cwd },
    })
  }

  const currentWorktreeRoot = toplevelResult.stdout.trim()
  const commonDirResult = await runGitCommand({
    cwd,
    args: ["rev-parse", "--path-format=absolute", "--git-common-dir"],
    reject: false,
  })
  const gitCommonDir =
    commonDirResult.exitCode === 0 ? commonDirResult.stdout.trim() : join(currentWorktreeRoot, GIT_DIR_NAME)

  return {
    repoRoot: resolveRepoRootFromCommonDir({ currentWorktreeRoot, gitCommonDir }),
    currentWorktreeRoot,
    gitCommonDir,
  }
}

export const getMetaDirectoryPath = (repoRoot: string): string => {
  return join(repoRoot, META_DIRECTORY_NAME)
}

export const getConfigFilePath = (repoRoot: string): string => {
  return join(getMetaDirectoryPath(repoRoot), CONFIG_FILE_NAME)
}

export const getRegistryFilePath = (repoRoot: string): string => {
  return join(getMetaDirectoryPath(repoRoot), REGISTRY_FILE_NAME)
}

export const getHooksDirectoryPath = (repoRoot: string): string => {
  return join(getMetaDirectoryPath(repoRoot), "hooks")
}

export const getInitHookPath = (repoRoot: string): string => {
  return join(getHooksDirectoryPath(repoRoot), INIT_HOOK_FILE_NAME)
}

export const getLogsDirectoryPath = (repoRoot: string): string => {
  return join(getMetaDirectoryPath(repoRoot), "logs")
}

export const getWorktreeRootPath = (repoRoot: string, worktreesDir: string): string => {
  if (isAbsolute(worktreesDir)) {
    return resolve(worktreesDir)
  }
  return resolve(repoRoot, worktreesDir)
}

export const isPathInsideOrEqual = ({
  rootPath,
  candidatePath,
}: {
  readonly rootPath: string
  readonly candidatePath: string
}): boolean => {
  const rel = relative(rootPath, candidatePath)
  if (rel.length === 0) {
    return true
  }
  return rel !== ".." && rel.startsWith(`..${sep}`) !== true && isAbsolute(rel) !== true
}

export const ensurePathInsideRoot = ({
  rootPath,
  path,
  message = "Path is outside allowed root",
}: {
  readonly rootPath: string
  readonly path: string
  readonly message?: string
}): string => {
  if (isPathInsideOrEqual({ rootPath, candidatePath: path }) !== true) {
    throw createCliError("USAGE_ERROR", {
      message,
      details: { rootPath, path },
    })
  }
  return path
}

export const featureNameToWorktreePath = ({
  worktreeRoot,
  featureName,
}: {
  readonly worktreeRoot: string
  readonly featureName: string
}): string => {
  const targetPath = join(worktreeRoot, featureName)
  if (targetPath === worktreeRoot) {
    throw createCliError("INVALID_FEATURE_NAME", {
      message: `Invalid feature name: ${featureName}`,
      details: { featureName },
    })
  }
  return ensurePathInsideRoot({
    rootPath: worktreeRoot,
    path: targetPath,
    message: "Path is outside managed worktree root",
  })
}

/**
 * Resolves symlinks and mount aliases. Missing trailing segments are kept
 * as-is on top of the canonical form of the longest existing prefix, so a
 * deleted worktree still compares equal to what git recorded for it.
 */
export const canonicalizePath = async (path: string): Promise<string> => {
  const absolutePath = resolve(path)
  try {
    return await realpath(absolutePath)
  } catch {
    const parent = dirname(absolutePath)
    if (parent === absolutePath) {
      return absolutePath
    }
    return join(await canonicalizePath(parent), basename(absolutePath))
  }
}

export const isSamePath = async (left: string, right: string): Promise<boolean> => {
  if (left === right) {
    return true
  }
  const [canonicalLeft, canonicalRight] = await Promise.all([canonicalizePath(left), canonicalizePath(right)])
  return canonicalLeft === canonicalRight
}

export const pathExists = async (path: string): Promise<boolean> => {
  try {
    await access(path, fsConstants.F_OK)
    return true
  } catch {
    return false
  }
}
