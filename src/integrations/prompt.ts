import readline from "node:readline/promises"
import type { Readable, Writable } from "node:stream"
import type { WorktreeChooser } from "../core/selection"

export type ConfirmPrompt = (message: string) => Promise<boolean>

export type TerminalPrompts = {
  readonly chooseWorktree: WorktreeChooser
  readonly confirm: ConfirmPrompt
}

const ask = async ({
  input,
  output,
  question,
}: {
  readonly input: Readable
  readonly output: Writable
  readonly question: string
}): Promise<string> => {
  const rl = readline.createInterface({ input, output, terminal: false })
  try {
    return (await rl.question(question)).trim()
  } finally {
    rl.close()
  }
}

export const parseChoice = (answer: string): number | null => {
  if (/^\d+$/.test(answer) !== true) {
    return null
  }
  return Number.parseInt(answer, 10)
}

/** Prompts read from `input` and print on `output` (stderr by default). */
export const createTerminalPrompts = ({
  input = process.stdin,
  output = process.stderr,
}: {
  readonly input?: Readable
  readonly output?: Writable
} = {}): TerminalPrompts => {
  return {
    async chooseWorktree({ records, message }) {
      output.write("Available worktrees:\n")
      records.forEach((record, index) => {
        output.write(`  ${String(index + 1)}. ${record.featureName} (${record.path})\n`)
      })
      return parseChoice(await ask({ input, output, question: `${message} [1-${String(records.length)}]: ` }))
    },

    async confirm(message) {
      const answer = await ask({ input, output, question: `${message} [y/N]: ` })
      return /^y(es)?$/i.test(answer)
    },
  }
}
