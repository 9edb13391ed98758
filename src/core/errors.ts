import { EXIT_CODE } from "./constants"

export type ErrorCode =
  | "BRANCH_EXISTS"
  | "BRANCH_NOT_FOUND"
  | "BASE_BRANCH_NOT_FOUND"
  | "NOT_IN_WORKTREE"
  | "NO_WORKTREES_MANAGED"
  | "UNCOMMITTED_CHANGES"
  | "UNPUSHED_COMMITS"
  | "WORKTREE_NOT_FOUND"
  | "WORKTREE_EXISTS"
  | "TARGET_PATH_NOT_EMPTY"
  | "INVALID_FEATURE_NAME"
  | "USAGE_ERROR"
  | "UNKNOWN_COMMAND"
  | "NOT_GIT_REPOSITORY"
  | "COMMAND_FAILED"
  | "INIT_HOOK_FAILED"
  | "INVALID_CONFIG"
  | "INVALID_REGISTRY"
  | "DEPENDENCY_MISSING"
  | "INTERNAL_ERROR"

const EXIT_CODE_BY_ERROR: Readonly<Record<ErrorCode, number>> = {
  BRANCH_EXISTS: EXIT_CODE.USAGE_ERROR,
  BRANCH_NOT_FOUND: EXIT_CODE.USAGE_ERROR,
  BASE_BRANCH_NOT_FOUND: EXIT_CODE.USAGE_ERROR,
  NOT_IN_WORKTREE: EXIT_CODE.USAGE_ERROR,
  NO_WORKTREES_MANAGED: EXIT_CODE.USAGE_ERROR,
  UNCOMMITTED_CHANGES: EXIT_CODE.USAGE_ERROR,
  UNPUSHED_COMMITS: EXIT_CODE.USAGE_ERROR,
  WORKTREE_NOT_FOUND: EXIT_CODE.USAGE_ERROR,
  WORKTREE_EXISTS: EXIT_CODE.USAGE_ERROR,
  TARGET_PATH_NOT_EMPTY: EXIT_CODE.USAGE_ERROR,
  INVALID_FEATURE_NAME: EXIT_CODE.USAGE_ERROR,
  USAGE_ERROR: EXIT_CODE.USAGE_ERROR,
  UNKNOWN_COMMAND: EXIT_CODE.USAGE_ERROR,
  NOT_GIT_REPOSITORY: EXIT_CODE.USAGE_ERROR,
  COMMAND_FAILED: EXIT_CODE.FAILURE,
  INIT_HOOK_FAILED: EXIT_CODE.FAILURE,
  INVALID_CONFIG: EXIT_CODE.FAILURE,
  INVALID_REGISTRY: EXIT_CODE.FAILURE,
  DEPENDENCY_MISSING: EXIT_CODE.DEPENDENCY_MISSING,
  INTERNAL_ERROR: EXIT_CODE.FAILURE,
}

const SUGGESTION_BY_ERROR: Readonly<Record<ErrorCode, string | null>> = {
  BRANCH_EXISTS: "Use `wt checkout <branch>` to open the existing branch in a worktree.",
  BRANCH_NOT_FOUND: "Check the branch name, or make sure it exists on the configured remote.",
  BASE_BRANCH_NOT_FOUND: "Pass --base <branch> or set baseBranch in .wt/wt.json.",
  NOT_IN_WORKTREE: "Run this command from inside a managed worktree.",
  NO_WORKTREES_MANAGED: "Create one with `wt new <feature>`.",
  UNCOMMITTED_CHANGES: "Commit or stash your changes, or use --force to override.",
  UNPUSHED_COMMITS: "Push your commits, or use --force to override.",
  WORKTREE_NOT_FOUND: "Run `wt list` to see managed worktrees.",
  WORKTREE_EXISTS: "Run `wt path <name>` to locate the existing worktree.",
  TARGET_PATH_NOT_EMPTY: "Remove the directory or pick another feature name.",
  INVALID_FEATURE_NAME: "Use lowercase letters, digits, '.', '_' or '-'.",
  USAGE_ERROR: "Run `wt help` for usage.",
  UNKNOWN_COMMAND: "Run `wt help` to list the available commands.",
  NOT_GIT_REPOSITORY: "Run this command inside a non-bare git repository.",
  COMMAND_FAILED: "Check the command output and try again.",
  INIT_HOOK_FAILED: "Check the init hook log under .wt/logs and try again.",
  INVALID_CONFIG: "Fix .wt/wt.json, or reset it with `wt init --force`.",
  INVALID_REGISTRY: "Fix the JSON in .wt/state.json.",
  DEPENDENCY_MISSING: "Install the missing command and make sure it is on PATH.",
  INTERNAL_ERROR: null,
}

type CliErrorOptions = {
  readonly message: string
  readonly details?: Record<string, unknown>
  readonly suggestion?: string | null
  readonly cause?: unknown
}

export class CliError extends Error {
  readonly code: ErrorCode
  readonly exitCode: number
  readonly details: Record<string, unknown>
  readonly suggestion: string | null

  constructor(code: ErrorCode, { message, details = {}, suggestion, cause }: CliErrorOptions) {
    super(message, cause === undefined ? undefined : { cause })
    this.name = "CliError"
    this.code = code
    this.exitCode = EXIT_CODE_BY_ERROR[code]
    this.details = details
    this.suggestion = suggestion === undefined ? SUGGESTION_BY_ERROR[code] : suggestion
  }
}

export const createCliError = (code: ErrorCode, options: CliErrorOptions): CliError => {
  return new CliError(code, options)
}

export const ensureCliError = (error: unknown): CliError => {
  if (error instanceof CliError) {
    return error
  }
  if (error instanceof Error) {
    return createCliError("INTERNAL_ERROR", {
      message: error.message,
      cause: error,
    })
  }
  return createCliError("INTERNAL_ERROR", {
    message: "An unexpected error occurred",
    details: { value: String(error) },
    cause: error,
  })
}

/** Reads a property off an unknown thrown value, e.g. `code` or `stderr` on a child-process failure. */
export const readErrorField = (error: unknown, key: string): unknown => {
  if (typeof error !== "object" || error === null) {
    return undefined
  }
  return Reflect.get(error, key)
}

export const hasErrorCode = (error: unknown, code: string): boolean => {
  return readErrorField(error, "code") === code
}

export const describeError = (error: unknown): string => {
  if (error instanceof CliError) {
    const stderr = error.details.stderr
    return typeof stderr === "string" && stderr.trim().length > 0 ? stderr.trim() : error.message
  }
  return error instanceof Error ? error.message : String(error)
}
