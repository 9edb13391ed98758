export const SCHEMA_VERSION = 1

export const EXIT_CODE = {
  OK: 0,
  FAILURE: 1,
  USAGE_ERROR: 2,
  DEPENDENCY_MISSING: 3,
} as const

export const META_DIRECTORY_NAME = ".wt"
export const CONFIG_FILE_NAME = "wt.json"
export const REGISTRY_FILE_NAME = "state.json"
export const INIT_HOOK_FILE_NAME = "init.sh"
export const WORKTREE_SETTINGS_FILE_NAME = ".wt.json"

export const DEFAULT_AUTO_COMMIT_MESSAGE_PREFIX = "implement: "

export const COMMAND_NAMES = {
  INIT: "init",
  NEW: "new",
  CHECKOUT: "checkout",
  PR: "pr",
  DELETE: "delete",
  MERGE: "merge",
  PATH: "path",
  LIST: "list",
  STATUS: "status",
  CLEAN: "clean",
} as const

export type CommandName = (typeof COMMAND_NAMES)[keyof typeof COMMAND_NAMES]

// delete and clean handle stale records themselves, so their branches still get cleaned up
export const RECONCILE_SKIPPED_COMMANDS = new Set<string>([
  COMMAND_NAMES.INIT,
  COMMAND_NAMES.DELETE,
  COMMAND_NAMES.CLEAN,
])
