/**
 * Power lifecycle for compute nodes
 *
 * Node state is observed, never stored: every operation probes the nodes
 * it is given and reports what it saw.
 */

import { setTimeout as delay } from 'node:timers/promises'
import type {
  ClusterStatusReport,
  ComputeNode,
  PollTick,
  PowerAction,
  PowerActionResult,
  PowerReport,
  Reachability,
  ReachabilityResult,
  WaitReport,
  WakeReport,
} from '@coldstart/shared'
import type { Logger } from './logger'
import { isConnectFailure, type NodeExecOptions, type NodeExecResult } from './node-shell'
import { SSH_TRANSPORT_FAILURE } from './remote-session'
import type { ReachabilityChecker } from './reachability'
import type { WakeSender } from './wake-on-lan'

export interface NodeCommander {
  exec(node: ComputeNode, command: string, options?: NodeExecOptions): Promise<NodeExecResult>
}

export interface PowerControllerOptions {
  reachability: ReachabilityChecker
  commander: NodeCommander
  waker: WakeSender
  logger: Logger
  pollIntervalMs: number
  probeTimeoutMs: number
  commandTimeoutMs: number
  shutdownCommand: string
  restartCommand: string
}

export interface WaitOptions {
  signal?: AbortSignal
  /** Give up after this many ticks; unbounded when omitted */
  maxTicks?: number
  onTick?: (tick: PollTick) => void
}

interface PollOutcome {
  cancelled: boolean
  timedOut: boolean
  ticks: number
  elapsedMs: number
  /** Nodes seen in the target state */
  settled: ComputeNode[]
  pending: ComputeNode[]
}

export class PowerController {
  private readonly logger: Logger

  constructor(private readonly options: PowerControllerOptions) {
    this.logger = options.logger.child('POWER')
  }

  /**
   * Probe every node once, concurrently
   */
  async status(nodes: ComputeNode[], signal?: AbortSignal): Promise<ClusterStatusReport> {
    const results = await this.probe(nodes, signal)
    const unreachable = results.filter((r) => r.state === 'unreachable')
    return {
      ok: unreachable.length === 0,
      reachable: results.filter((r) => r.state === 'reachable').map((r) => r.node),
      unreachable,
    }
  }

  /**
   * Send one magic packet per node, then poll until all are reachable
   */
  async up(nodes: ComputeNode[], options: WaitOptions = {}): Promise<WakeReport> {
    if (nodes.length === 0) {
      return { ...this.emptyWait(), woken: [] }
    }

    await Promise.all(
      nodes.map(async (node) => {
        await this.options.waker.wake(node)
        this.logger.debug(`Magic packet sent to ${node.name} (${node.mac})`)
      })
    )

    const report = await this.wait(nodes, options)
    return { ...report, woken: nodes.slice() }
  }

  /**
   * Poll loop: one tick per interval, each tick probing the nodes not yet seen
   * reachable. Ends when all are reachable, on cancellation, or after maxTicks.
   */
  async wait(nodes: ComputeNode[], options: WaitOptions = {}): Promise<WaitReport> {
    if (nodes.length === 0) {
      return this.emptyWait()
    }

    const poll = await this.pollUntil(nodes, 'reachable', options)
    return {
      ok: poll.pending.length === 0,
      cancelled: poll.cancelled,
      timedOut: poll.timedOut,
      ticks: poll.ticks,
      elapsedMs: poll.elapsedMs,
      reachable: poll.settled,
      unreachable: poll.pending,
    }
  }

  /**
   * Poll until every node stops answering, e.g. after a reboot was
   * acknowledged but before the node has actually gone down
   */
  async waitUntilDown(nodes: ComputeNode[], options: WaitOptions = {}): Promise<WaitReport> {
    if (nodes.length === 0) {
      return this.emptyWait()
    }

    const poll = await this.pollUntil(nodes, 'unreachable', options)
    return {
      ok: poll.pending.length === 0,
      cancelled: poll.cancelled,
      timedOut: poll.timedOut,
      ticks: poll.ticks,
      elapsedMs: poll.elapsedMs,
      reachable: poll.pending,
      unreachable: poll.settled,
    }
  }

  async down(nodes: ComputeNode[]): Promise<PowerReport> {
    return this.powerAction(nodes, 'shutdown', this.options.shutdownCommand)
  }

  async restart(nodes: ComputeNode[]): Promise<PowerReport> {
    return this.powerAction(nodes, 'restart', this.options.restartCommand)
  }

  private async powerAction(
    nodes: ComputeNode[],
    action: PowerAction,
    command: string
  ): Promise<PowerReport> {
    const results = await Promise.all(
      nodes.map((node) => this.powerNode(node, command))
    )
    return {
      ok: results.every((r) => r.outcome !== 'failed'),
      action,
      results,
    }
  }

  private async powerNode(node: ComputeNode, command: string): Promise<PowerActionResult> {
    const result = await this.options.commander.exec(node, command, {
      timeoutMs: this.options.commandTimeoutMs,
    })
    const { failure } = result

    if (!failure) {
      return { node, outcome: 'acknowledged' }
    }
    if (result.exitCode === SSH_TRANSPORT_FAILURE && isConnectFailure(failure)) {
      this.logger.debug(`${node.name} already down: ${failure.message}`)
      return { node, outcome: 'already-down', failure }
    }
    // The node may drop the session as it goes down
    if (failure.kind === 'closed') {
      return { node, outcome: 'acknowledged', failure }
    }
    return { node, outcome: 'failed', failure }
  }

  private async pollUntil(nodes: ComputeNode[], target: Reachability, options: WaitOptions): Promise<PollOutcome> {
    const { signal, maxTicks, onTick } = options
    const started = Date.now()
    const seen = new Set<string>()
    let tick = 0

    const outcome = (cancelled: boolean, timedOut: boolean): PollOutcome => ({
      cancelled,
      timedOut,
      ticks: tick,
      elapsedMs: Date.now() - started,
      settled: nodes.filter((node) => seen.has(node.name)),
      pending: nodes.filter((node) => !seen.has(node.name)),
    })

    while (true) {
      if (signal?.aborted) {
        return outcome(true, false)
      }

      try {
        await delay(this.options.pollIntervalMs, undefined, { signal })
      } catch (error) {
        if (signal?.aborted) {
          return outcome(true, false)
        }
        throw error
      }

      tick++
      const pending = nodes.filter((node) => !seen.has(node.name))
      const results = await this.probe(pending, signal)
      for (const result of results) {
        if (result.state === target) {
          seen.add(result.node.name)
        }
      }

      const settled = nodes.filter((node) => seen.has(node.name))
      const waiting = nodes.filter((node) => !seen.has(node.name))
      onTick?.({
        tick,
        reachable: target === 'reachable' ? settled : waiting,
        pending: waiting,
      })
      this.logger.debug(`tick ${tick}: ${seen.size}/${nodes.length} ${target}`)

      if (seen.size === nodes.length) {
        return outcome(false, false)
      }
      if (signal?.aborted) {
        return outcome(true, false)
      }
      if (maxTicks !== undefined && tick >= maxTicks) {
        return outcome(false, true)
      }
    }
  }

  private probe(nodes: ComputeNode[], signal?: AbortSignal): Promise<ReachabilityResult[]> {
    return Promise.all(
      nodes.map((node) => this.options.reachability.check(node, this.options.probeTimeoutMs, signal))
    )
  }

  private emptyWait(): WaitReport {
    return {
      ok: true,
      cancelled: false,
      timedOut: false,
      ticks: 0,
      elapsedMs: 0,
      reachable: [],
      unreachable: [],
    }
  }
}
