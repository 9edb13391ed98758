/** Parsed invocation handed to every command handler. */
export type CommandContext = {
  readonly command: string
  readonly commandArgs: readonly string[]
  /** Tokens as given, for flags citty cannot express (tri-state, empty values). */
  readonly rawArgs: readonly string[]
  readonly parsedArgs: Record<string, unknown>
  readonly jsonEnabled: boolean
  readonly interactive: boolean
}
