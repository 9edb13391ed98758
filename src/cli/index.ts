import { createRequire } from "node:module"
import { parseArgs } from "citty"
import type { ArgsDef } from "citty"
import { applyCleanup, planCleanup } from "../core/clean"
import { COMMAND_NAMES, type CommandName, EXIT_CODE, RECONCILE_SKIPPED_COMMANDS, SCHEMA_VERSION } from "../core/constants"
import { type CliError, createCliError, describeError, ensureCliError } from "../core/errors"
import { initializeRepository, type InitOverrides } from "../core/init"
import { createInitHookRunner, type InitHookRunner } from "../core/init-hook"
import {
  checkoutBranchWorktree,
  createFeatureWorktree,
  deleteManagedWorktree,
  type HookPolicy,
  mergeManagedWorktree,
} from "../core/lifecycle"
import { canonicalizePath, resolveRepoContext } from "../core/paths"
import { createPullRequestForWorktree } from "../core/pull-request"
import { loadRegistry } from "../core/registry"
import { resolveTargetRecord } from "../core/selection"
import { createRepoSession, type RepoSession, syncRegistry } from "../core/session"
import {
  collectRecordStatus,
  collectRegistryStatus,
  collectRemoteOnlyBranches,
  readWorktreeSettings,
  type WorktreeRecordStatus,
} from "../core/worktree-state"
import { createGitRepository } from "../git/repository"
import { type CompanionLauncher, createCompanionLauncher } from "../integrations/companion"
import type { GhCommandRunner } from "../integrations/gh"
import { createTerminalPrompts, type TerminalPrompts } from "../integrations/prompt"
import { createLogger, LogLevel, type Logger } from "../utils/logger"
import {
  createLifecycleCommandHandlers,
  createReadCommandHandlers,
  createSetupCommandHandlers,
  dispatchCommandHandler,
} from "./commands/handler-groups"
import { commandHelpEntries, findCommandHelp, renderCommandHelpText, renderGeneralHelpText } from "./help"
import {
  buildOptionSpecs,
  collectOptionValues,
  ensureArgumentCount,
  findCommandToken,
  getPositionals,
  readBooleanFlag,
  readRequiredArgument,
  readStringOption,
  validateRawOptions,
} from "./options"
import { loadPackageVersion } from "./package-version"
import {
  createCatppuccinTheme,
  renderCleanupTable,
  renderRemoteOnlyBranches,
  renderStatusLines,
  renderWorktreeTable,
} from "./render"
import type { CommandContext } from "./runtime/command-context"

export type CLI = {
  run(args?: string[]): Promise<number>
}

export type CLIOptions = {
  readonly version?: string
  readonly cwd?: string
  readonly stdout?: (line: string) => void
  readonly stderr?: (line: string) => void
  /** Whether prompts may be shown; defaults to stdin and stderr being terminals. */
  readonly isInteractive?: () => boolean
  readonly useColors?: () => boolean
  readonly prompts?: TerminalPrompts
  readonly runInitHook?: InitHookRunner
  readonly launchCompanion?: CompanionLauncher
  readonly runGh?: GhCommandRunner
  readonly now?: () => Date
}

type JsonSuccessStatus = "ok" | "created" | "existing" | "deleted" | "merged" | "cancelled"

type JsonSuccess = {
  readonly schemaVersion: number
  readonly command: string
  readonly status: JsonSuccessStatus
  readonly repoRoot: string | null
  readonly [key: string]: unknown
}

const globalArgsDef = {
  command: {
    type: "positional",
    description: "Command name",
    required: false,
  },
  json: {
    type: "boolean",
    description: "Output JSON on stdout",
  },
  verbose: {
    type: "boolean",
    description: "Show detailed logs",
  },
  help: {
    type: "boolean",
    alias: "h",
    description: "Show help",
  },
  version: {
    type: "boolean",
    alias: "v",
    description: "Show version",
  },
} satisfies ArgsDef

const baseArg = {
  type: "string",
  alias: "b",
  valueHint: "branch",
  description: "Base branch",
} satisfies ArgsDef[string]

const pushArg = {
  type: "boolean",
  description: "Push to the remote (disable with --no-push)",
} satisfies ArgsDef[string]

const hookArgsDef = {
  init: {
    type: "boolean",
    description: "Run the init hook (disable with --no-init)",
  },
  strictInit: {
    type: "boolean",
    description: "Roll back the worktree when the init hook fails",
  },
  companion: {
    type: "boolean",
    description: "Launch the companion tool in the worktree",
  },
} satisfies ArgsDef

const commandArgsDefs: Readonly<Record<CommandName, ArgsDef>> = {
  init: {
    base: { type: "string", valueHint: "branch", description: "Base branch stored in wt.json" },
    branchPrefix: { type: "string", valueHint: "prefix", description: "Prefix for feature branches" },
    remote: { type: "string", valueHint: "name", description: "Remote used for fetch and push" },
    worktreesDir: { type: "string", valueHint: "dir", description: "Directory holding the worktrees" },
    companionTool: { type: "string", valueHint: "command", description: "Command launched in new worktrees" },
    initCommand: { type: "string", valueHint: "command", description: "Command run in new worktrees" },
    hook: { type: "boolean", description: "Write the .wt/hooks/init.sh template" },
    force: { type: "boolean", alias: "f", description: "Reset wt.json to defaults plus the given options" },
  },
  new: {
    base: baseArg,
    push: pushArg,
    ...hookArgsDef,
  },
  checkout: {
    printPath: { type: "boolean", alias: "p", description: "Print only the worktree path" },
    ...hookArgsDef,
  },
  pr: {
    base: baseArg,
    title: { type: "string", alias: "t", valueHint: "text", description: "Pull request title" },
    body: { type: "string", valueHint: "text", description: "Pull request body" },
    draft: { type: "boolean", alias: "d", description: "Open as a draft" },
    push: pushArg,
  },
  delete: {
    force: { type: "boolean", alias: "f", description: "Skip the uncommitted and unpushed checks" },
    remote: { type: "boolean", alias: "r", description: "Also delete the remote branch" },
  },
  merge: {
    base: baseArg,
    push: pushArg,
    force: { type: "boolean", alias: "f", description: "Merge without committing pending changes" },
    noFf: { type: "boolean", description: "Always create a merge commit" },
    ffOnly: { type: "boolean", description: "Refuse to merge unless fast-forward is possible" },
    message: { type: "string", alias: "m", valueHint: "text", description: "Auto-commit message" },
  },
  path: {},
  list: {
    all: { type: "boolean", alias: "a", description: "Include remote branches without a worktree" },
  },
  status: {},
  clean: {
    dryRun: { type: "boolean", alias: "n", description: "Only list what would be removed" },
    force: { type: "boolean", alias: "f", description: "Do not ask for confirmation" },
    merged: { type: "boolean", description: "Also remove worktrees merged into their base" },
  },
}

const toCommandName = (value: string): CommandName | undefined => {
  return Object.values(COMMAND_NAMES).find((name) => name === value)
}

const resolveArgsDef = (commandToken: string | undefined): ArgsDef => {
  const commandName = commandToken === undefined ? undefined : toCommandName(commandToken)
  return commandName === undefined ? globalArgsDef : { ...globalArgsDef, ...commandArgsDefs[commandName] }
}

const shouldUseAnsiColors = ({ enabled }: { readonly enabled: boolean }): boolean => {
  return enabled === true && process.env.NO_COLOR === undefined
}

const buildJsonSuccess = ({
  command,
  status,
  repoRoot,
  details,
}: {
  readonly command: string
  readonly status: JsonSuccessStatus
  readonly repoRoot: string | null
  readonly details?: Record<string, unknown>
}): JsonSuccess => {
  return {
    schemaVersion: SCHEMA_VERSION,
    command,
    status,
    repoRoot,
    ...(details ?? {}),
  }
}

const buildJsonError = ({
  command,
  repoRoot,
  error,
}: {
  readonly command: string
  readonly repoRoot: string | null
  readonly error: CliError
}): Record<string, unknown> => {
  return {
    schemaVersion: SCHEMA_VERSION,
    command,
    status: "error",
    repoRoot,
    code: error.code,
    message: error.message,
    suggestion: error.suggestion,
    details: error.details,
  }
}

const toStatusJson = (status: WorktreeRecordStatus): Record<string, unknown> => {
  return {
    featureName: status.record.featureName,
    branch: status.record.branch,
    path: status.record.path,
    base: status.record.base,
    createdAt: status.record.createdAt,
    exists: status.exists,
    dirty: status.dirty,
    ahead: status.ahead,
    behind: status.behind,
    lastCommitAt: status.lastCommitAt?.toISOString() ?? null,
    merged: status.merged,
  }
}

export const createCli = (options: CLIOptions = {}): CLI => {
  const require = createRequire(import.meta.url)
  const version =
    options.version ??
    ((): string => {
      try {
        return loadPackageVersion(require)
      } catch {
        return "0.0.0"
      }
    })()

  const runtimeCwd = options.cwd ?? process.cwd()
  const stdout = options.stdout ?? ((line: string): void => console.log(line))
  const stderr = options.stderr ?? ((line: string): void => console.error(line))
  const isInteractiveFn =
    options.isInteractive ?? ((): boolean => process.stdin.isTTY === true && process.stderr.isTTY === true)
  const useColorsFn = options.useColors ?? ((): boolean => process.stdout.isTTY === true)
  const prompts = options.prompts ?? createTerminalPrompts()
  const now = options.now ?? ((): Date => new Date())

  let logger: Logger = createLogger({ stdout, stderr })

  const run = async (rawArgs: string[] = process.argv.slice(2)): Promise<number> => {
    logger = createLogger({ stdout, stderr })
    let command = "unknown"
    let jsonEnabled = readBooleanFlag(rawArgs, "json") === true
    let repoRootForJson: string | null = null

    try {
      const argsDef = resolveArgsDef(findCommandToken(rawArgs))
      validateRawOptions(rawArgs, buildOptionSpecs(argsDef))
      const parsedArgs = parseArgs(rawArgs, argsDef)
      const parsedArgsRecord = parsedArgs as Record<string, unknown>
      const positionals = getPositionals(parsedArgs)
      command = positionals[0] ?? "unknown"
      jsonEnabled = parsedArgs.json === true

      if (parsedArgs.help === true) {
        const entry = command === "unknown" || command === "help" ? undefined : findCommandHelp(command)
        stdout(`${entry === undefined ? renderGeneralHelpText({ version }) : renderCommandHelpText({ entry })}\n`)
        return EXIT_CODE.OK
      }

      if (parsedArgs.version === true) {
        stdout(version)
        return EXIT_CODE.OK
      }

      logger =
        parsedArgs.verbose === true
          ? createLogger({ level: LogLevel.INFO, stdout, stderr })
          : createLogger({ stdout, stderr })

      if (positionals.length === 0) {
        stdout(`${renderGeneralHelpText({ version })}\n`)
        return EXIT_CODE.OK
      }

      if (command === "help") {
        const helpTarget = positionals[1]
        if (typeof helpTarget !== "string" || helpTarget.length === 0) {
          stdout(`${renderGeneralHelpText({ version })}\n`)
          return EXIT_CODE.OK
        }
        const entry = findCommandHelp(helpTarget)
        if (entry === undefined) {
          throw createCliError("USAGE_ERROR", {
            message: `Unknown command for help: ${helpTarget}`,
            details: {
              requested: helpTarget,
              availableCommands: commandHelpEntries.map((item) => item.name),
            },
          })
        }
        stdout(`${renderCommandHelpText({ entry })}\n`)
        return EXIT_CODE.OK
      }

      const context: CommandContext = {
        command,
        commandArgs: positionals.slice(1),
        rawArgs,
        parsedArgs: parsedArgsRecord,
        jsonEnabled,
        interactive: isInteractiveFn(),
      }
      const { commandArgs } = context
      const theme = createCatppuccinTheme({
        enabled: context.jsonEnabled !== true && shouldUseAnsiColors({ enabled: useColorsFn() }),
      })

      const writeJson = (status: JsonSuccessStatus, details: Record<string, unknown>): void => {
        stdout(JSON.stringify(buildJsonSuccess({ command, status, repoRoot: repoRootForJson, details })))
      }

      const openSession = async (): Promise<RepoSession> => {
        const session = await createRepoSession({
          cwd: runtimeCwd,
          logger,
          // hook output would corrupt the JSON document on stdout
          runInitHook:
            options.runInitHook ??
            (context.jsonEnabled
              ? createInitHookRunner({ logger: logger.createChild("[init]"), stdio: "pipe" })
              : undefined),
          launchCompanion:
            options.launchCompanion ??
            (context.jsonEnabled
              ? createCompanionLauncher({ logger: logger.createChild("[companion]"), stdio: "ignore" })
              : undefined),
        })
        repoRootForJson = session.repoRoot
        if (RECONCILE_SKIPPED_COMMANDS.has(command) !== true) {
          try {
            await syncRegistry(session)
          } catch (error) {
            logger.warn(`Registry reconciliation skipped: ${describeError(error)}`)
          }
        }
        return session
      }

      const readHookPolicy = (): HookPolicy => {
        return {
          enabled: readBooleanFlag(context.rawArgs, "init") !== false,
          strict: context.parsedArgs.strictInit === true,
        }
      }

      const initHandler = async (): Promise<number> => {
        ensureArgumentCount({ command, args: commandArgs, min: 0, max: 0 })
        const repoContext = await resolveRepoContext(runtimeCwd)
        const repoRoot = await canonicalizePath(repoContext.repoRoot)
        repoRootForJson = repoRoot

        const overrides: InitOverrides = {
          branchPrefix: collectOptionValues({ args: rawArgs, optionNames: ["branchPrefix", "branch-prefix"] }).at(-1),
          baseBranch: readStringOption(parsedArgsRecord, "base"),
          remote: readStringOption(parsedArgsRecord, "remote"),
          worktreesDir: readStringOption(parsedArgsRecord, "worktreesDir"),
          defaultCompanionTool: readStringOption(parsedArgsRecord, "companionTool"),
          initCommand: readStringOption(parsedArgsRecord, "initCommand"),
        }
        const result = await initializeRepository({
          repoRoot,
          currentBranch: await createGitRepository(repoRoot).currentBranch(),
          overrides,
          hook: parsedArgsRecord.hook === true,
          force: parsedArgsRecord.force === true,
        })

        if (context.jsonEnabled) {
          writeJson(result.alreadyInitialized ? "ok" : "created", {
            alreadyInitialized: result.alreadyInitialized,
            configPath: result.configPath,
            hookPath: result.hookPath,
            config: result.config,
          })
          return EXIT_CODE.OK
        }
        stdout(
          result.alreadyInitialized ? `Already initialized: ${result.configPath}` : `Initialized: ${result.configPath}`,
        )
        if (result.hookPath !== null) {
          stdout(`Init hook: ${result.hookPath}`)
        }
        return EXIT_CODE.OK
      }

      const newHandler = async (): Promise<number> => {
        const featureName = readRequiredArgument({ command, args: commandArgs, name: "feature" })
        const session = await openSession()
        const result = await createFeatureWorktree(session, {
          featureName,
          base: readStringOption(parsedArgsRecord, "base"),
          push: readBooleanFlag(rawArgs, "push"),
          hook: readHookPolicy(),
          companion: readBooleanFlag(rawArgs, "companion") !== false,
        })
        const { record } = result

        if (context.jsonEnabled) {
          writeJson("created", {
            featureName: record.featureName,
            branch: record.branch,
            path: record.path,
            base: record.base,
            pushed: result.pushed,
            hook: result.hook,
          })
          return EXIT_CODE.OK
        }
        stdout(`Created worktree: ${record.path}`)
        stdout(`Branch: ${record.branch} (from ${record.base})`)
        return EXIT_CODE.OK
      }

      const checkoutHandler = async (): Promise<number> => {
        const branch = readRequiredArgument({ command, args: commandArgs, name: "branch" })
        const session = await openSession()
        const result = await checkoutBranchWorktree(session, {
          branch,
          hook: readHookPolicy(),
          companion: readBooleanFlag(rawArgs, "companion") === true,
        })

        if (context.jsonEnabled) {
          writeJson(result.kind, {
            branch: result.branch,
            path: result.path,
            featureName: result.kind === "created" ? result.record.featureName : null,
            hook: result.kind === "created" ? result.hook : "skipped",
          })
          return EXIT_CODE.OK
        }
        if (parsedArgsRecord.printPath === true) {
          stdout(result.path)
          return EXIT_CODE.OK
        }
        stdout(
          result.kind === "created"
            ? `Created worktree: ${result.path}`
            : `Branch '${result.branch}' is already checked out at ${result.path}`,
        )
        return EXIT_CODE.OK
      }

      const prHandler = async (): Promise<number> => {
        ensureArgumentCount({ command, args: commandArgs, min: 0, max: 0 })
        const session = await openSession()
        const result = await createPullRequestForWorktree(session, {
          base: readStringOption(parsedArgsRecord, "base"),
          title: readStringOption(parsedArgsRecord, "title"),
          body: readStringOption(parsedArgsRecord, "body"),
          draft: parsedArgsRecord.draft === true,
          push: readBooleanFlag(rawArgs, "push") !== false,
          runGh: options.runGh,
        })

        if (context.jsonEnabled) {
          writeJson("created", {
            featureName: result.record.featureName,
            branch: result.record.branch,
            base: result.base,
            url: result.url,
            autoCommitted: result.autoCommitted,
            pushed: result.pushed,
          })
          return EXIT_CODE.OK
        }
        stdout(result.url)
        return EXIT_CODE.OK
      }

      const deleteHandler = async (): Promise<number> => {
        ensureArgumentCount({ command, args: commandArgs, min: 0, max: 1 })
        const session = await openSession()
        const result = await deleteManagedWorktree(session, {
          identifier: commandArgs[0],
          force: parsedArgsRecord.force === true,
          remote: parsedArgsRecord.remote === true,
          interactive: context.interactive,
          chooser: prompts.chooseWorktree,
        })

        if (context.jsonEnabled) {
          writeJson("deleted", {
            featureName: result.record.featureName,
            branch: result.record.branch,
            path: result.record.path,
            stale: result.stale,
            remoteDeleted: result.remoteDeleted,
          })
          return EXIT_CODE.OK
        }
        stdout(`Deleted worktree: ${result.record.featureName} (${result.record.branch})`)
        return EXIT_CODE.OK
      }

      const mergeHandler = async (): Promise<number> => {
        ensureArgumentCount({ command, args: commandArgs, min: 0, max: 0 })
        const session = await openSession()
        const result = await mergeManagedWorktree(session, {
          base: readStringOption(parsedArgsRecord, "base"),
          push: readBooleanFlag(rawArgs, "push"),
          force: parsedArgsRecord.force === true,
          // citty would read --no-ff as the negation of "ff"
          noFf: readBooleanFlag(rawArgs, "no-ff") === true,
          ffOnly: parsedArgsRecord.ffOnly === true,
          message: readStringOption(parsedArgsRecord, "message"),
        })

        if (context.jsonEnabled) {
          writeJson("merged", {
            featureName: result.record.featureName,
            branch: result.record.branch,
            base: result.base,
            autoCommitted: result.autoCommitted,
            pushed: result.pushed,
          })
          return EXIT_CODE.OK
        }
        stdout(`Merged '${result.record.branch}' into '${result.base}' and removed worktree '${result.record.featureName}'`)
        return EXIT_CODE.OK
      }

      const cleanHandler = async (): Promise<number> => {
        ensureArgumentCount({ command, args: commandArgs, min: 0, max: 0 })
        const session = await openSession()
        const dryRun = parsedArgsRecord.dryRun === true
        const plan = await planCleanup(session, { merged: parsedArgsRecord.merged === true })
        for (const record of plan.skipped) {
          logger.warn(`Skipping '${record.featureName}': merged but has uncommitted changes`)
        }
        const candidatesJson = plan.candidates.map(({ record, reason }) => ({
          featureName: record.featureName,
          branch: record.branch,
          path: record.path,
          reason,
        }))
        const skippedJson = plan.skipped.map((record) => record.featureName)

        if (plan.candidates.length === 0) {
          if (context.jsonEnabled) {
            writeJson("ok", { dryRun, candidates: [], removed: [], failed: [], skipped: skippedJson })
          } else {
            stdout("Nothing to clean.")
          }
          return EXIT_CODE.OK
        }

        if (dryRun) {
          if (context.jsonEnabled) {
            writeJson("ok", { dryRun, candidates: candidatesJson, removed: [], failed: [], skipped: skippedJson })
            return EXIT_CODE.OK
          }
          stdout("Would remove:")
          for (const line of renderCleanupTable({ candidates: plan.candidates, theme })) {
            stdout(line)
          }
          return EXIT_CODE.OK
        }

        if (parsedArgsRecord.force !== true) {
          if (context.interactive !== true) {
            throw createCliError("USAGE_ERROR", {
              message: "Confirmation required when not running interactively",
              suggestion: "Pass --force to clean without confirmation.",
            })
          }
          if (context.jsonEnabled !== true) {
            for (const line of renderCleanupTable({ candidates: plan.candidates, theme })) {
              stdout(line)
            }
          }
          const confirmed = await prompts.confirm(`Remove ${String(plan.candidates.length)} worktree(s)?`)
          if (confirmed !== true) {
            if (context.jsonEnabled) {
              writeJson("cancelled", { dryRun, candidates: candidatesJson, removed: [], failed: [], skipped: skippedJson })
            } else {
              stderr("Cancelled.")
            }
            return EXIT_CODE.OK
          }
        }

        const result = await applyCleanup(session, plan)
        if (context.jsonEnabled) {
          writeJson("deleted", {
            dryRun,
            candidates: candidatesJson,
            removed: result.removed.map(({ record }) => record.featureName),
            failed: result.failed.map(({ record }) => record.featureName),
            skipped: skippedJson,
          })
          return EXIT_CODE.OK
        }
        stdout(`Removed ${String(result.removed.length)} worktree(s).`)
        return EXIT_CODE.OK
      }

      const pathHandler = async (): Promise<number> => {
        ensureArgumentCount({ command, args: commandArgs, min: 0, max: 1 })
        const session = await openSession()
        const record = await resolveTargetRecord({
          registry: await loadRegistry(session.registryPath),
          identifier: commandArgs[0],
          location: session.location,
          interactive: context.interactive,
          chooser: prompts.chooseWorktree,
        })

        if (context.jsonEnabled) {
          writeJson("ok", { featureName: record.featureName, branch: record.branch, path: record.path })
          return EXIT_CODE.OK
        }
        stdout(record.path)
        return EXIT_CODE.OK
      }

      const listHandler = async (): Promise<number> => {
        ensureArgumentCount({ command, args: commandArgs, min: 0, max: 0 })
        const session = await openSession()
        const registry = await loadRegistry(session.registryPath)
        const showAll = parsedArgsRecord.all === true
        if (registry.worktrees.length === 0 && showAll !== true) {
          throw createCliError("NO_WORKTREES_MANAGED", {
            message: "No worktrees are managed in this repository",
          })
        }
        const statuses = await collectRegistryStatus({
          git: session.git,
          registry,
          fallbackBase: session.config.baseBranch,
        })
        const remoteBranches = showAll
          ? await collectRemoteOnlyBranches({ git: session.git, registry, remote: session.config.remote })
          : []

        if (context.jsonEnabled) {
          writeJson("ok", {
            worktrees: statuses.map(toStatusJson),
            ...(showAll ? { remoteBranches } : {}),
          })
          return EXIT_CODE.OK
        }

        if (statuses.length === 0) {
          stdout("No managed worktrees.")
        } else {
          const currentPath = session.location.kind === "worktree" ? session.location.path : null
          for (const line of renderWorktreeTable({ statuses, currentPath, now: now(), theme })) {
            stdout(line)
          }
        }
        for (const line of renderRemoteOnlyBranches({ branches: remoteBranches, theme })) {
          stdout(line)
        }
        return EXIT_CODE.OK
      }

      const statusHandler = async (): Promise<number> => {
        ensureArgumentCount({ command, args: commandArgs, min: 0, max: 1 })
        const session = await openSession()
        const record = await resolveTargetRecord({
          registry: await loadRegistry(session.registryPath),
          identifier: commandArgs[0],
          location: session.location,
          interactive: context.interactive,
          chooser: prompts.chooseWorktree,
        })
        const status = await collectRecordStatus({ git: session.git, record, fallbackBase: session.config.baseBranch })
        const storedSettings = status.exists ? await readWorktreeSettings(record.path) : null
        if (storedSettings !== null && storedSettings.valid !== true) {
          logger.warn(`Ignoring ${storedSettings.path}: ${storedSettings.reason}`)
        }
        const settings = storedSettings !== null && storedSettings.valid ? storedSettings.values : null

        if (context.jsonEnabled) {
          writeJson("ok", { worktree: { ...toStatusJson(status), settings } })
          return EXIT_CODE.OK
        }
        for (const line of renderStatusLines({ status, settings, now: now(), theme })) {
          stdout(line)
        }
        return EXIT_CODE.OK
      }

      const handlerGroups = [
        createSetupCommandHandlers({ initHandler }),
        createReadCommandHandlers({ pathHandler, listHandler, statusHandler }),
        createLifecycleCommandHandlers({
          newHandler,
          checkoutHandler,
          prHandler,
          deleteHandler,
          mergeHandler,
          cleanHandler,
        }),
      ]
      for (const handlers of handlerGroups) {
        const exitCode = await dispatchCommandHandler({ command, handlers })
        if (exitCode !== undefined) {
          return exitCode
        }
      }

      throw createCliError("UNKNOWN_COMMAND", {
        message: `Unknown command: ${command}`,
        details: { availableCommands: commandHelpEntries.map((item) => item.name) },
      })
    } catch (error) {
      const cliError = ensureCliError(error)
      if (jsonEnabled) {
        stdout(
          JSON.stringify(
            buildJsonError({
              command,
              repoRoot: repoRootForJson,
              error: cliError,
            }),
          ),
        )
      } else {
        stderr(`[${cliError.code}] ${cliError.message}`)
        if (cliError.suggestion !== null) {
          stderr(`hint: ${cliError.suggestion}`)
        }
        logger.debug(JSON.stringify(cliError.details))
      }
      return cliError.exitCode
    }
  }

  return { run }
}
