export type CommandHandler = () => Promise<number>

export type CommandHandlerMap = ReadonlyMap<string, CommandHandler>

const createHandlerMap = (entries: ReadonlyArray<readonly [string, CommandHandler]>): CommandHandlerMap => {
  return new Map(entries)
}

export const dispatchCommandHandler = async ({
  command,
  handlers,
}: {
  readonly command: string
  readonly handlers: CommandHandlerMap
}): Promise<number | undefined> => {
  const handler = handlers.get(command)
  if (handler === undefined) {
    return undefined
  }
  return await handler()
}

export const createSetupCommandHandlers = ({
  initHandler,
}: {
  readonly initHandler: CommandHandler
}): CommandHandlerMap => {
  return createHandlerMap([["init", initHandler]])
}

/** Commands that only read the registry and git state. */
export const createReadCommandHandlers = ({
  pathHandler,
  listHandler,
  statusHandler,
}: {
  readonly pathHandler: CommandHandler
  readonly listHandler: CommandHandler
  readonly statusHandler: CommandHandler
}): CommandHandlerMap => {
  return createHandlerMap([
    ["path", pathHandler],
    ["list", listHandler],
    ["status", statusHandler],
  ])
}

export const createLifecycleCommandHandlers = ({
  newHandler,
  checkoutHandler,
  prHandler,
  deleteHandler,
  mergeHandler,
  cleanHandler,
}: {
  readonly newHandler: CommandHandler
  readonly checkoutHandler: CommandHandler
  readonly prHandler: CommandHandler
  readonly deleteHandler: CommandHandler
  readonly mergeHandler: CommandHandler
  readonly cleanHandler: CommandHandler
}): CommandHandlerMap => {
  return createHandlerMap([
    ["new", newHandler],
    ["checkout", checkoutHandler],
    ["pr", prHandler],
    ["delete", deleteHandler],
    ["merge", mergeHandler],
    ["clean", cleanHandler],
  ])
}
