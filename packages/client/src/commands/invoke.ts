/**
 * Shared plumbing between commander actions and command handlers
 */

import { ColdstartError } from '../errors'
import { createContext, type CommandContext, type GlobalOptions } from '../context'
import { createLogger, type Logger } from '../logger'

export const EXIT_OK = 0
export const EXIT_FAILURE = 1
export const EXIT_INTERRUPTED = 130

export type Handler<A extends unknown[]> = (ctx: CommandContext, ...args: A) => Promise<number>

/**
 * Run a handler, turning thrown errors into a logged failure and exit code
 */
export async function invoke<A extends unknown[]>(
  ctx: CommandContext,
  handler: Handler<A>,
  ...args: A
): Promise<number> {
  try {
    return await handler(ctx, ...args)
  } catch (error) {
    reportError(ctx.logger, error)
    return EXIT_FAILURE
  }
}

export function reportError(logger: Logger, error: unknown): void {
  if (error instanceof ColdstartError) {
    logger.error(error.message)
    logger.debug(`[${error.code}]`)
    return
  }
  logger.error(error instanceof Error ? error.message : String(error))
  if (error instanceof Error && error.stack) {
    logger.debug(error.stack)
  }
}

/**
 * Resolve the context from the global options, run the handler and record
 * its exit code. Used as the body of every commander action.
 */
export async function execute<A extends unknown[]>(
  globals: () => GlobalOptions,
  handler: Handler<A>,
  ...args: A
): Promise<void> {
  const options = globals()
  let ctx: CommandContext
  try {
    ctx = createContext(options)
  } catch (error) {
    reportError(createLogger({ debug: options.debug }), error)
    process.exitCode = EXIT_FAILURE
    return
  }
  process.exitCode = await invoke(ctx, handler, ...args)
}

/**
 * Run work with an AbortSignal tied to Ctrl+C / SIGTERM
 */
export async function withInterrupt<T>(
  logger: Logger,
  work: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController()
  const shutdown = () => {
    logger.warn('Interrupted, finishing current tick...')
    controller.abort()
  }

  process.on('SIGINT', shutdown)
  process.on('SIGTERM', shutdown)
  try {
    return await work(controller.signal)
  } finally {
    process.off('SIGINT', shutdown)
    process.off('SIGTERM', shutdown)
  }
}
