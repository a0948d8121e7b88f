/**
 * Compute node commands
 */

import { Command } from 'commander'
import type {
  ClusterStatusReport,
  ComputeNode,
  PollTick,
  PowerReport,
  WaitReport,
} from '@coldstart/shared'
import type { CommandContext, GlobalOptions } from '../context'
import { NodesUnreachableError } from '../errors'
import { buildNodeList } from '../inventory'
import type { Logger } from '../logger'
import { execute, EXIT_FAILURE, EXIT_INTERRUPTED, EXIT_OK, withInterrupt } from './invoke'

export interface PollCommandOptions {
  signal?: AbortSignal
}

export interface WaitCommandOptions extends PollCommandOptions {
  timeout?: string
}

function names(nodes: ComputeNode[]): string {
  return nodes.map((node) => node.name).join(', ')
}

export function printStatus(logger: Logger, report: ClusterStatusReport): void {
  const total = report.reachable.length + report.unreachable.length
  if (report.ok) {
    logger.success(`All ${total} nodes reachable`)
    return
  }
  logger.error(`${report.unreachable.length}/${total} nodes unreachable`)
  for (const result of report.unreachable) {
    const reason = result.failure ? `${result.failure.kind}: ${result.failure.message}` : 'unreachable'
    logger.detail(`${result.node.name} (${result.node.ip}) - ${reason}`)
  }
}

export function printPowerReport(logger: Logger, report: PowerReport): void {
  const verb = report.action === 'shutdown' ? 'Shutdown' : 'Restart'
  for (const result of report.results) {
    const label = `${result.node.name} (${result.node.ip})`
    if (result.outcome === 'acknowledged') {
      logger.info(`  ${label}: ${report.action} acknowledged`)
    } else if (result.outcome === 'already-down') {
      logger.info(`  ${label}: already down`)
    } else {
      const reason = result.failure ? `${result.failure.kind}: ${result.failure.message}` : 'failed'
      logger.error(`${label}: ${reason}`)
    }
  }
  const failed = report.results.filter((r) => r.outcome === 'failed').length
  if (report.ok) {
    logger.success(`${verb} issued to ${report.results.length} nodes`)
  } else {
    logger.error(`${verb} failed on ${failed}/${report.results.length} nodes`)
  }
}

export function printTick(logger: Logger, tick: PollTick): void {
  const total = tick.reachable.length + tick.pending.length
  const waiting = tick.pending.length > 0 ? ` (waiting on ${names(tick.pending)})` : ''
  logger.info(`tick ${tick.tick}: ${tick.reachable.length}/${total} reachable${waiting}`)
}

function finishWait(logger: Logger, report: WaitReport): number {
  const total = report.reachable.length + report.unreachable.length
  if (report.ok) {
    logger.success(`All ${total} nodes reachable after ${report.ticks} ticks`)
    return EXIT_OK
  }

  if (report.cancelled) {
    logger.warn(`Cancelled after ${report.ticks} ticks`)
  } else {
    logger.error(`Gave up after ${report.ticks} ticks`)
  }
  logger.info(`  Reachable: [${names(report.reachable)}]`)
  logger.info(`  Unreachable: [${names(report.unreachable)}]`)
  return report.cancelled ? EXIT_INTERRUPTED : EXIT_FAILURE
}

export async function computeUp(ctx: CommandContext, options: PollCommandOptions = {}): Promise<number> {
  const profile = ctx.activeProfile()
  const nodes = buildNodeList(profile)
  ctx.logger.heading(`Waking ${nodes.length} compute nodes...`)

  const report = await ctx.power(profile).up(nodes, {
    signal: options.signal,
    onTick: (tick) => printTick(ctx.logger, tick),
  })
  return finishWait(ctx.logger, report)
}

export async function computeWait(ctx: CommandContext, options: WaitCommandOptions = {}): Promise<number> {
  const profile = ctx.activeProfile()
  const nodes = buildNodeList(profile)
  const power = ctx.power(profile)

  let maxTicks: number | undefined
  if (options.timeout !== undefined) {
    const seconds = Number(options.timeout)
    if (!Number.isFinite(seconds) || seconds <= 0) {
      ctx.logger.error(`Invalid --timeout "${options.timeout}"`)
      return EXIT_FAILURE
    }
    maxTicks = Math.max(1, Math.ceil((seconds * 1000) / ctx.config.power.poll_interval_ms))
  }

  ctx.logger.heading(`Waiting for ${nodes.length} compute nodes...`)
  const report = await power.wait(nodes, {
    signal: options.signal,
    maxTicks,
    onTick: (tick) => printTick(ctx.logger, tick),
  })
  return finishWait(ctx.logger, report)
}

export async function computeDown(ctx: CommandContext): Promise<number> {
  const profile = ctx.activeProfile()
  const report = await ctx.power(profile).down(buildNodeList(profile))
  printPowerReport(ctx.logger, report)
  return report.ok ? EXIT_OK : EXIT_FAILURE
}

export async function computeRestart(ctx: CommandContext): Promise<number> {
  const profile = ctx.activeProfile()
  const report = await ctx.power(profile).restart(buildNodeList(profile))
  printPowerReport(ctx.logger, report)
  return report.ok ? EXIT_OK : EXIT_FAILURE
}

export async function computeStatus(ctx: CommandContext): Promise<number> {
  const profile = ctx.activeProfile()
  const report = await ctx.power(profile).status(buildNodeList(profile))
  printStatus(ctx.logger, report)
  return report.ok ? EXIT_OK : EXIT_FAILURE
}

/**
 * Configure compute nodes, but only once every node is reachable
 */
export async function computeConfigure(ctx: CommandContext): Promise<number> {
  const profile = ctx.activeProfile()
  const report = await ctx.power(profile).status(buildNodeList(profile))
  if (!report.ok) {
    printStatus(ctx.logger, report)
    throw new NodesUnreachableError(report.unreachable)
  }

  ctx.logger.heading(`Configuring ${report.reachable.length} compute nodes...`)
  await ctx.playbooks.run('compute_configure', profile, { limit: 'compute' })
  ctx.logger.success('Compute node configuration complete')
  return EXIT_OK
}

export async function computeTest(ctx: CommandContext): Promise<number> {
  const profile = ctx.activeProfile()
  ctx.logger.heading(`Testing ${profile.computeNodes.length} compute nodes...`)
  await ctx.playbooks.run('compute_test', profile, { limit: 'compute' })
  ctx.logger.success('Compute node tests passed')
  return EXIT_OK
}

/**
 * Run a command on one node, picked by its position in the profile, and
 * mirror its exit code
 */
export async function computeCmd(ctx: CommandContext, index: string, command: string[]): Promise<number> {
  const profile = ctx.activeProfile()
  const nodes = buildNodeList(profile)
  const position = /^\d+$/.test(index) ? Number(index) : -1
  const node = nodes[position]
  if (!node) {
    ctx.logger.error(`Invalid node index "${index}" (expected 0-${nodes.length - 1})`)
    return EXIT_FAILURE
  }

  const result = await ctx.nodeShell(profile).exec(node, command.join(' '), { stream: true })
  if (result.failure && result.failure.kind !== 'exit') {
    ctx.logger.error(`${node.name} (${node.ip}): ${result.failure.message}`)
  }
  return result.exitCode
}

export function registerComputeCommands(program: Command, globals: () => GlobalOptions): void {
  const compute = program
    .command('compute')
    .description('Manage compute nodes')
    .enablePositionalOptions()

  compute
    .command('up')
    .description('Wake all compute nodes and wait until they are reachable (Ctrl+C to stop)')
    .action(() =>
      execute(globals, (ctx) => withInterrupt(ctx.logger, (signal) => computeUp(ctx, { signal })))
    )

  compute
    .command('wait')
    .description('Wait until all compute nodes are reachable (Ctrl+C to stop)')
    .option('--timeout <seconds>', 'Give up after this many seconds')
    .action((options: WaitCommandOptions) =>
      execute(globals, (ctx) =>
        withInterrupt(ctx.logger, (signal) => computeWait(ctx, { timeout: options.timeout, signal }))
      )
    )

  compute
    .command('down')
    .description('Shut down all compute nodes')
    .action(() => execute(globals, computeDown))

  compute
    .command('restart')
    .description('Restart all compute nodes')
    .action(() => execute(globals, computeRestart))

  compute
    .command('status')
    .description('Check that every compute node is reachable')
    .action(() => execute(globals, computeStatus))

  compute
    .command('test')
    .description('Run the compute node test playbook')
    .action(() => execute(globals, computeTest))

  compute
    .command('cmd')
    .description('Run a command on one compute node')
    .argument('<index>', 'Node position in the hardware profile, from 0')
    .argument('<command...>', 'Command to run')
    .passThroughOptions()
    .allowUnknownOption()
    .action((index: string, command: string[]) => execute(globals, computeCmd, index, command))

  compute
    .command('configure')
    .description('Run the compute configuration playbook once all nodes are reachable')
    .action(() => execute(globals, computeConfigure))
}
