export type ResolvedConfig = {
  readonly branchPrefix: string
  readonly baseBranch: string
  readonly remote: string
  readonly worktreesDir: string
  readonly defaultCompanionTool: string | null
  readonly initCommand: string | null
  readonly autoCommit: boolean
  readonly pushOnCreate: boolean
  readonly pushOnMerge: boolean
}

export type PartialConfig = {
  -readonly [K in keyof ResolvedConfig]?: ResolvedConfig[K]
}

export const DEFAULT_CONFIG: ResolvedConfig = {
  branchPrefix: "feature/",
  baseBranch: "develop",
  remote: "origin",
  worktreesDir: ".wt/worktrees",
  defaultCompanionTool: null,
  initCommand: null,
  autoCommit: true,
  pushOnCreate: false,
  pushOnMerge: false,
}
