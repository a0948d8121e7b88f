/**
 * Whole-cluster commands
 */

import { Command } from 'commander'
import type { ComputeNode } from '@coldstart/shared'
import type { CommandContext, GlobalOptions } from '../context'
import { RemoteExecError } from '../errors'
import { buildNodeList } from '../inventory'
import type { NodeShell } from '../node-shell'
import { controlConfigure } from './control'
import { computeConfigure, computeWait, printPowerReport, printStatus } from './compute'
import { execute, EXIT_FAILURE, EXIT_INTERRUPTED, EXIT_OK, withInterrupt } from './invoke'

export const CONTROL_TIMESTAMP_FILE = '.last_configured_control'
export const COMPUTE_TIMESTAMP_FILE = '/etc/last_configured_compute'

/**
 * Turn `stat -c %y` output into "YYYY-MM-DD HH:MM:SS"
 */
export function parseStatTime(stdout: string): string | null {
  const line = stdout.trim().split('\n').pop() ?? ''
  const match = line.match(/^(\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2})/)
  return match ? match[1] : null
}

function lastConfigured(exitCode: number, stdout: string, stderr: string): string {
  if (exitCode === 0) {
    return parseStatTime(stdout) ?? 'unknown'
  }
  return /no such file/i.test(stderr) ? 'never' : 'unknown'
}

async function computeLastConfigured(shell: NodeShell, node: ComputeNode): Promise<string> {
  const result = await shell.exec(node, `stat -c %y ${COMPUTE_TIMESTAMP_FILE}`)
  return lastConfigured(result.exitCode, result.stdout, result.stderr)
}

export async function clusterStatus(ctx: CommandContext): Promise<number> {
  const profile = ctx.activeProfile()
  const nodes = buildNodeList(profile)

  ctx.logger.heading(`Cluster status (hardware ${profile.version})`)
  ctx.logger.info('')

  let controlUp = true
  let controlConfigured = 'unknown'
  try {
    const result = await ctx.session.run(
      profile.controlHostAlias,
      `stat -c %y ${CONTROL_TIMESTAMP_FILE}`,
      { capture: true, sync: false }
    )
    controlConfigured = lastConfigured(result.exitCode, result.stdout, result.stderr)
  } catch (error) {
    if (!(error instanceof RemoteExecError)) throw error
    controlUp = false
    ctx.logger.debug(error.message)
  }

  ctx.logger.info(`Control host (${profile.controlHostAlias}):`)
  ctx.logger.info(`  Status: ${controlUp ? 'UP' : 'DOWN'}`)
  if (controlUp) {
    ctx.logger.info(`  Last configured: ${controlConfigured}`)
  }
  ctx.logger.info('')

  const report = await ctx.power(profile).status(nodes)
  const shell = ctx.nodeShell(profile)
  const reachable = new Set(report.reachable.map((node) => node.name))
  const configured = await Promise.all(
    report.reachable.map(async (node) => [node.name, await computeLastConfigured(shell, node)] as const)
  )
  const configuredByName = new Map(configured)

  ctx.logger.info('Compute nodes:')
  for (const node of nodes) {
    const up = reachable.has(node.name)
    ctx.logger.info(`  ${node.name} (${node.ip}): ${up ? 'UP' : 'DOWN'}`)
    if (up) {
      ctx.logger.info(`    Last configured: ${configuredByName.get(node.name) ?? 'unknown'}`)
    }
  }
  ctx.logger.info('')
  printStatus(ctx.logger, report)

  if (!controlUp) {
    ctx.logger.error(`Control host ${profile.controlHostAlias} unreachable`)
  }
  return controlUp && report.ok ? EXIT_OK : EXIT_FAILURE
}

/**
 * Restart every node, then wait for the acknowledged ones to drop off the
 * network. A reboot issued with --no-block returns while the node still answers.
 */
export async function restartAndSettle(ctx: CommandContext, options: { signal?: AbortSignal } = {}): Promise<number> {
  const profile = ctx.activeProfile()
  const power = ctx.power(profile)
  const report = await power.restart(buildNodeList(profile))
  printPowerReport(ctx.logger, report)
  if (!report.ok) {
    return EXIT_FAILURE
  }

  const restarted = report.results.filter((r) => r.outcome === 'acknowledged').map((r) => r.node)
  const { poll_interval_ms, settle_timeout_ms } = ctx.config.power
  const settled = await power.waitUntilDown(restarted, {
    signal: options.signal,
    maxTicks: Math.max(1, Math.ceil(settle_timeout_ms / poll_interval_ms)),
  })
  if (settled.cancelled) {
    ctx.logger.warn(`Cancelled after ${settled.ticks} ticks`)
    return EXIT_INTERRUPTED
  }
  if (!settled.ok) {
    ctx.logger.error(`Nodes still up after restart: [${settled.reachable.map((n) => n.name).join(', ')}]`)
    return EXIT_FAILURE
  }
  ctx.logger.success(`${restarted.length} nodes went down for restart`)
  return EXIT_OK
}

/**
 * Configure the whole cluster from scratch, stopping at the first failing step
 */
export async function clusterConfigure(ctx: CommandContext, options: { signal?: AbortSignal } = {}): Promise<number> {
  const steps: Array<[string, () => Promise<number>]> = [
    ['Configuring control host', () => controlConfigure(ctx)],
    ['Restarting compute nodes to apply network boot settings', () => restartAndSettle(ctx, options)],
    ['Waiting for compute nodes to come back', () => computeWait(ctx, { signal: options.signal })],
    ['Configuring compute nodes', () => computeConfigure(ctx)],
  ]

  for (const [index, [label, run]] of steps.entries()) {
    ctx.logger.heading(`Step ${index + 1}/${steps.length}: ${label}`)
    const code = await run()
    if (code !== EXIT_OK) {
      ctx.logger.error(`Cluster configuration stopped at step ${index + 1}`)
      return code
    }
  }

  ctx.logger.success('Cluster configuration complete')
  return EXIT_OK
}

export function registerClusterCommands(program: Command, globals: () => GlobalOptions): void {
  program
    .command('status')
    .description('Show control host and compute node status')
    .action(() => execute(globals, clusterStatus))

  program
    .command('configure')
    .description('Configure the entire cluster (control, restart, wait, compute)')
    .action(() =>
      execute(globals, (ctx) => withInterrupt(ctx.logger, (signal) => clusterConfigure(ctx, { signal })))
    )
}
