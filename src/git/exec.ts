import { execa } from "execa"
import { createCliError, readErrorField } from "../core/errors"

export type RunGitCommandInput = {
  readonly cwd: string
  readonly args: readonly string[]
  readonly reject?: boolean
}

export type RunGitCommandOutput = {
  readonly stdout: string
  readonly stderr: string
  readonly exitCode: number
}

const toText = (value: unknown): string => {
  return typeof value === "string" ? value : ""
}

export const formatGitCommand = (args: readonly string[]): string => {
  return ["git", ...args].join(" ")
}

export const runGitCommand = async ({ cwd, args, reject = true }: RunGitCommandInput): Promise<RunGitCommandOutput> => {
  try {
    const result = await execa("git", [...args], {
      cwd,
      reject,
    })
    return {
      stdout: result.stdout,
      stderr: result.stderr,
      exitCode: result.exitCode ?? 0,
    }
  } catch (error) {
    const exitCode = readErrorField(error, "exitCode")
    const shortMessage = readErrorField(error, "shortMessage")
    throw createCliError("COMMAND_FAILED", {
      message: `Command failed: ${formatGitCommand(args)}`,
      details: {
        command: ["git", ...args],
        cwd,
        exitCode: typeof exitCode === "number" ? exitCode : null,
        stdout: toText(readErrorField(error, "stdout")),
        stderr: toText(readErrorField(error, "stderr")),
        shortMessage:
          typeof shortMessage === "string" ? shortMessage : error instanceof Error ? error.message : String(error),
      },
      cause: error,
    })
  }
}

export const doesGitRefExist = async (cwd: string, ref: string): Promise<boolean> => {
  const result = await runGitCommand({
    cwd,
    args: ["show-ref", "--verify", "--quiet", ref],
    reject: false,
  })
  return result.exitCode === 0
}
