export type CommandHelp = {
  readonly name: string
  readonly usage: string
  readonly summary: string
  readonly details: readonly string[]
  readonly options?: readonly string[]
  readonly examples?: readonly string[]
}

export const commandHelpEntries: readonly CommandHelp[] = [
  {
    name: "init",
    usage: "wt init [--base <branch>] [--branch-prefix <prefix>] [--remote <name>] [--worktrees-dir <dir>] [--hook] [--force]",
    summary: "Create .wt/ with wt.json and an empty registry.",
    details: [
      "baseBranch defaults to the current branch.",
      "Running again without options leaves an existing setup untouched.",
      "--force rewrites wt.json from defaults plus the given options.",
    ],
    options: [
      "--base <branch>",
      "--branch-prefix <prefix>",
      "--remote <name>",
      "--worktrees-dir <dir>",
      "--companion-tool <command>",
      "--init-command <command>",
      "--hook",
      "--force",
    ],
    examples: ["wt init --base main --hook"],
  },
  {
    name: "new",
    usage: "wt new <feature> [--base <branch>] [--push|--no-push] [--no-init] [--strict-init] [--no-companion]",
    summary: "Create a feature branch in a new worktree.",
    details: [
      "The feature name is normalized to lowercase with dashes.",
      "The branch is <branchPrefix><feature>, created from the base branch.",
      "The init hook runs inside the new worktree unless --no-init is given.",
      "With --strict-init a failing hook rolls the worktree back.",
    ],
    options: ["-b, --base <branch>", "--push", "--no-push", "--no-init", "--strict-init", "--no-companion"],
    examples: ['wt new "Login Form"', "wt new hotfix-12 --base main --push"],
  },
  {
    name: "checkout",
    usage: "wt checkout <branch> [--print-path] [--companion] [--no-init] [--strict-init]",
    summary: "Open an existing local or remote branch in a managed worktree.",
    details: [
      "Reuses the worktree when the branch is already checked out.",
      "Fetches the branch from the remote when it is not local.",
    ],
    options: ["-p, --print-path", "--companion", "--no-init", "--strict-init"],
    examples: ['cd "$(wt checkout feature/login --print-path)"'],
  },
  {
    name: "pr",
    usage: "wt pr [--base <branch>] [--title <text>] [--body <text>] [--draft] [--no-push]",
    summary: "Push the current worktree branch and open a pull request with gh.",
    details: [
      "Uncommitted changes are auto-committed when autoCommit is enabled.",
      "Without --title, gh fills title and body from the commits.",
      "--no-push requires the branch to have an upstream already.",
    ],
    options: ["-b, --base <branch>", "-t, --title <text>", "--body <text>", "-d, --draft", "--no-push"],
    examples: ['wt pr --title "Add login form" --draft'],
  },
  {
    name: "delete",
    usage: "wt delete [name] [--force] [--remote]",
    summary: "Remove a managed worktree and its branch.",
    details: [
      "Without a name, targets the current worktree or asks for one.",
      "Refuses when there are uncommitted or unpushed changes unless --force.",
      "--remote also deletes the branch on the remote.",
    ],
    options: ["-f, --force", "-r, --remote"],
    examples: ["wt delete login-form", "wt delete login-form --force --remote"],
  },
  {
    name: "merge",
    usage: "wt merge [--base <branch>] [--push|--no-push] [--force] [--no-ff|--ff-only] [--message <text>]",
    summary: "Merge the current worktree branch into its base and remove the worktree.",
    details: [
      "Runs from inside a managed worktree.",
      "Uncommitted changes are auto-committed unless --force.",
      "--no-ff and --ff-only are mutually exclusive.",
    ],
    options: ["-b, --base <branch>", "--push", "--no-push", "-f, --force", "--no-ff", "--ff-only", "-m, --message <text>"],
    examples: ["wt merge --no-ff"],
  },
  {
    name: "path",
    usage: "wt path [name]",
    summary: "Print the absolute path of a managed worktree.",
    details: ["Matches the feature name first, then the branch name."],
    examples: ['cd "$(wt path login-form)"'],
  },
  {
    name: "list",
    usage: "wt list [--all]",
    summary: "List managed worktrees with status and activity.",
    details: ["--all also lists remote branches that have no managed worktree."],
    options: ["-a, --all"],
  },
  {
    name: "status",
    usage: "wt status [name]",
    summary: "Show details for one managed worktree.",
    details: ["Without a name, shows the current worktree."],
  },
  {
    name: "clean",
    usage: "wt clean [--dry-run] [--force] [--merged]",
    summary: "Remove worktrees whose directory is gone, and merged ones with --merged.",
    details: [
      "Asks for confirmation unless --force.",
      "Merged worktrees with uncommitted changes are skipped.",
    ],
    options: ["-n, --dry-run", "-f, --force", "--merged"],
    examples: ["wt clean --merged --dry-run"],
  },
] as const

export const findCommandHelp = (commandName: string): CommandHelp | undefined => {
  return commandHelpEntries.find((entry) => entry.name === commandName)
}

export const renderGeneralHelpText = ({ version }: { readonly version: string }): string => {
  const commandList = commandHelpEntries.map((entry) => `  ${entry.name.padEnd(9)} ${entry.summary}`).join("\n")
  return [
    "wt",
    "",
    "Usage:",
    "  wt <command> [options]",
    "",
    `Version: ${version}`,
    "",
    "Commands:",
    commandList,
    "",
    "Global options:",
    "  --json         Output machine-readable JSON.",
    "  --verbose      Enable verbose logs.",
    "  -h, --help     Show help.",
    "  -v, --version  Show version.",
    "",
    "Help commands:",
    "  wt help",
    "  wt help <command>",
    "  wt <command> --help",
    "",
    "Examples:",
    "  wt new login-form",
    '  cd "$(wt path login-form)"',
    "  wt merge",
  ].join("\n")
}

export const renderCommandHelpText = ({ entry }: { readonly entry: CommandHelp }): string => {
  const lines = [`Command: ${entry.name}`, "", "Usage:", `  ${entry.usage}`, "", "Summary:", `  ${entry.summary}`]

  if (entry.details.length > 0) {
    lines.push("", "Details:")
    for (const detail of entry.details) {
      lines.push(`  - ${detail}`)
    }
  }

  if (entry.options !== undefined && entry.options.length > 0) {
    lines.push("", "Options:")
    for (const option of entry.options) {
      lines.push(`  - ${option}`)
    }
  }

  if (entry.examples !== undefined && entry.examples.length > 0) {
    lines.push("", "Examples:")
    for (const example of entry.examples) {
      lines.push(`  ${example}`)
    }
  }

  lines.push("", "Show all commands: wt help")
  return lines.join("\n")
}
