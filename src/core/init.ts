import { chmod, mkdir, readFile, writeFile } from "node:fs/promises"
import { join, relative, sep } from "node:path"
import { loadResolvedConfig, mergeConfig, saveConfig, validatePartialConfig, validateWorktreesDir } from "../config/loader"
import { DEFAULT_CONFIG, type PartialConfig, type ResolvedConfig } from "../config/types"
import { REGISTRY_FILE_NAME } from "./constants"
import { hasErrorCode } from "./errors"
import {
  getConfigFilePath,
  getRegistryFilePath,
  getHooksDirectoryPath,
  getInitHookPath,
  getMetaDirectoryPath,
  getWorktreeRootPath,
  isPathInsideOrEqual,
  pathExists,
} from "./paths"
import { EMPTY_REGISTRY, saveRegistry } from "./registry"

const INIT_HOOK_TEMPLATE = [
  "#!/bin/sh",
  "# wt init hook",
  "set -e",
  "",
  'echo "wt: setting up $WT_FEAT_NAME in $WT_WORKTREE_PATH (base=$WT_BASE_BRANCH)"',
  "",
  "# example:",
  "#   npm install",
  "",
]

export type InitOverrides = Pick<
  PartialConfig,
  "branchPrefix" | "baseBranch" | "remote" | "worktreesDir" | "defaultCompanionTool" | "initCommand"
>

export type InitializeRepositoryInput = {
  readonly repoRoot: string
  readonly currentBranch: string | null
  readonly overrides: InitOverrides
  readonly hook: boolean
  readonly force: boolean
}

export type InitResult = {
  readonly alreadyInitialized: boolean
  readonly config: ResolvedConfig
  readonly configPath: string
  readonly hookPath: string | null
}

const hasOverrides = (overrides: InitOverrides): boolean => {
  return Object.values(overrides).some((value) => value !== undefined)
}

const readTextOrEmpty = async (path: string): Promise<string> => {
  try {
    return await readFile(path, "utf8")
  } catch (error) {
    if (hasErrorCode(error, "ENOENT")) {
      return ""
    }
    throw error
  }
}

/** Entries `.wt/.gitignore` must hold: the registry, logs and an in-tree worktrees dir. */
export const buildIgnoreEntries = ({
  repoRoot,
  worktreesDir,
}: {
  readonly repoRoot: string
  readonly worktreesDir: string
}): string[] => {
  const metaDir = getMetaDirectoryPath(repoRoot)
  const entries = [REGISTRY_FILE_NAME, "logs/"]
  const worktreeRoot = getWorktreeRootPath(repoRoot, worktreesDir)
  if (worktreeRoot !== metaDir && isPathInsideOrEqual({ rootPath: metaDir, candidatePath: worktreeRoot })) {
    entries.push(`${relative(metaDir, worktreeRoot).split(sep).join("/")}/`)
  }
  return entries
}

export const ensureMetaGitignore = async ({
  repoRoot,
  worktreesDir,
}: {
  readonly repoRoot: string
  readonly worktreesDir: string
}): Promise<void> => {
  const ignorePath = join(getMetaDirectoryPath(repoRoot), ".gitignore")
  const current = await readTextOrEmpty(ignorePath)
  const present = new Set(current.split("\n").map((line) => line.trim()))
  const missing = buildIgnoreEntries({ repoRoot, worktreesDir }).filter((entry) => present.has(entry) !== true)
  if (missing.length === 0) {
    return
  }
  const prefix = current.length === 0 || current.endsWith("\n") ? current : `${current}\n`
  await mkdir(getMetaDirectoryPath(repoRoot), { recursive: true })
  await writeFile(ignorePath, `${prefix}${missing.join("\n")}\n`, "utf8")
}

const ensureRegistryFile = async (repoRoot: string): Promise<void> => {
  const registryPath = getRegistryFilePath(repoRoot)
  if ((await pathExists(registryPath)) !== true) {
    await saveRegistry(EMPTY_REGISTRY, registryPath)
  }
}

const writeInitHookTemplate = async ({
  repoRoot,
  force,
}: {
  readonly repoRoot: string
  readonly force: boolean
}): Promise<string> => {
  const hookPath = getInitHookPath(repoRoot)
  if (force || (await pathExists(hookPath)) !== true) {
    await mkdir(getHooksDirectoryPath(repoRoot), { recursive: true })
    await writeFile(hookPath, INIT_HOOK_TEMPLATE.join("\n"), "utf8")
    await chmod(hookPath, 0o755)
  }
  return hookPath
}

/**
 * Writes `.wt/wt.json` and the files around it. Re-running without
 * overrides, `hook` or `force` leaves an existing config untouched.
 */
export const initializeRepository = async ({
  repoRoot,
  currentBranch,
  overrides,
  hook,
  force,
}: InitializeRepositoryInput): Promise<InitResult> => {
  const configPath = getConfigFilePath(repoRoot)
  const configExists = await pathExists(configPath)

  if (configExists && force !== true && hasOverrides(overrides) !== true && hook !== true) {
    const { config } = await loadResolvedConfig({ repoRoot })
    await ensureMetaGitignore({ repoRoot, worktreesDir: config.worktreesDir })
    await ensureRegistryFile(repoRoot)
    return { alreadyInitialized: true, config, configPath, hookPath: null }
  }

  const base =
    configExists && force !== true
      ? (await loadResolvedConfig({ repoRoot })).config
      : { ...DEFAULT_CONFIG, baseBranch: currentBranch ?? DEFAULT_CONFIG.baseBranch }
  const config = mergeConfig(base, validatePartialConfig({ rawConfig: overrides, ctx: { file: "command-line options" } }))
  await validateWorktreesDir({ repoRoot, config })

  await saveConfig(config, configPath)
  await ensureMetaGitignore({ repoRoot, worktreesDir: config.worktreesDir })
  await ensureRegistryFile(repoRoot)
  await mkdir(getWorktreeRootPath(repoRoot, config.worktreesDir), { recursive: true })

  const hookPath = hook ? await writeInitHookTemplate({ repoRoot, force }) : null
  return { alreadyInitialized: false, config, configPath, hookPath }
}
