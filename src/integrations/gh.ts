import { execa } from "execa"
import { createCliError, readErrorField } from "../core/errors"

type GhCommandRunnerInput = {
  readonly cwd: string
  readonly args: readonly string[]
}

type GhCommandRunnerOutput = {
  readonly exitCode: number
  readonly stdout: string
  readonly stderr: string
}

export type GhCommandRunner = (input: GhCommandRunnerInput) => Promise<GhCommandRunnerOutput>

export type CreatePullRequestInput = {
  readonly cwd: string
  readonly base: string
  readonly head: string
  readonly title?: string | undefined
  readonly body?: string | undefined
  readonly draft: boolean
  readonly runGh?: GhCommandRunner
}

const throwGhMissing = (cause?: unknown): never => {
  throw createCliError("DEPENDENCY_MISSING", {
    message: "GitHub CLI (gh) is not installed",
    suggestion: "Install gh from https://cli.github.com and run `gh auth login`.",
    details: { command: "gh" },
    cause,
  })
}

export const defaultRunGh: GhCommandRunner = async ({ cwd, args }) => {
  try {
    const result = await execa("gh", [...args], {
      cwd,
      reject: false,
    })
    if (readErrorField(result, "code") === "ENOENT") {
      return throwGhMissing()
    }
    return {
      exitCode: result.exitCode ?? 1,
      stdout: result.stdout,
      stderr: result.stderr,
    }
  } catch (error) {
    if (readErrorField(error, "code") === "ENOENT") {
      return throwGhMissing(error)
    }
    throw error
  }
}

export const ensureGhAvailable = async ({
  cwd,
  runGh = defaultRunGh,
}: {
  readonly cwd: string
  readonly runGh?: GhCommandRunner
}): Promise<void> => {
  const result = await runGh({ cwd, args: ["--version"] })
  if (result.exitCode !== 0) {
    throwGhMissing()
  }
}

export const buildPullRequestArgs = ({
  base,
  head,
  title,
  body,
  draft,
}: Omit<CreatePullRequestInput, "cwd" | "runGh">): string[] => {
  const args = ["pr", "create", "--base", base, "--head", head]
  if (title === undefined) {
    args.push("--fill")
  } else {
    args.push("--title", title)
  }
  if (body !== undefined) {
    args.push("--body", body)
  }
  if (draft) {
    args.push("--draft")
  }
  return args
}

/** Opens a pull request and returns its URL as printed by `gh`. */
export const createPullRequest = async ({ cwd, runGh = defaultRunGh, ...input }: CreatePullRequestInput): Promise<string> => {
  const args = buildPullRequestArgs(input)
  const result = await runGh({ cwd, args })
  if (result.exitCode !== 0) {
    throw createCliError("COMMAND_FAILED", {
      message: "Command failed: gh pr create",
      details: {
        command: ["gh", ...args],
        cwd,
        exitCode: result.exitCode,
        stderr: result.stderr,
      },
    })
  }
  const lines = result.stdout
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
  return lines.at(-1) ?? ""
}
