/**
 * Direct ssh to compute nodes
 *
 * In remote mode nodes sit behind the control host, so connections jump
 * through its alias.
 */

import { isIPv4 } from 'node:net'
import type { ComputeNode, ProbeFailure } from '@coldstart/shared'
import { NodeAddressError } from './errors'
import { runProcess, type ProcessResult, type ProcessRunner } from './process'
import { SSH_TRANSPORT_FAILURE } from './remote-session'

export interface NodeShellOptions {
  user: string
  connectTimeoutSeconds: number
  /** Control host alias to jump through, or null to connect directly */
  jumpHost: string | null
  runner?: ProcessRunner
}

export interface NodeExecOptions {
  timeoutMs?: number
  signal?: AbortSignal
  /** Tee the node's output to the terminal */
  stream?: boolean
}

export interface NodeExecResult {
  exitCode: number
  stdout: string
  stderr: string
  failure?: ProbeFailure
}

const FAILURE_PATTERNS: Array<[RegExp, ProbeFailure['kind']]> = [
  [/connection timed out|operation timed out|timeout/i, 'timeout'],
  [/connection refused/i, 'refused'],
  [/no route to host|network is unreachable|host is down|could not resolve/i, 'no-route'],
  [/permission denied|authentication failed|too many authentication failures/i, 'auth'],
  [/host key verification failed|remote host identification has changed/i, 'host-key'],
  [/closed by remote host|connection reset|broken pipe|closed by/i, 'closed'],
]

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/**
 * ssh's own complaint about the jump host, as opposed to the node behind it
 */
function jumpHostFailure(stderr: string, jumpHost: string): boolean {
  const alias = escapeRegExp(jumpHost)
  return new RegExp(
    `connect to host ${alias} port|could not resolve hostname ${alias}\\b`,
    'i'
  ).test(stderr)
}

/**
 * Classify a failed ssh invocation
 *
 * When the connection jumps through a control host, a failure to reach the
 * control host is reported as `jump`. The jump host relays failures to reach
 * the node itself as `channel N: open failed: <reason>`.
 */
export function classifyFailure(result: ProcessResult, jumpHost: string | null = null): ProbeFailure {
  const message = result.stderr.trim().split('\n').filter(Boolean).pop() ?? ''

  if (result.aborted) {
    return { kind: 'cancelled', message: 'probe cancelled' }
  }
  if (result.timedOut) {
    return { kind: 'timeout', message: message || 'probe timed out' }
  }
  if (result.exitCode === SSH_TRANSPORT_FAILURE) {
    const channel = result.stderr.match(/channel \d+: open failed: (.*)/i)
    if (channel) {
      const reason = channel[1].trim()
      for (const [pattern, kind] of FAILURE_PATTERNS) {
        if (pattern.test(reason)) {
          return { kind, message: reason }
        }
      }
      return { kind: 'no-route', message: reason }
    }
    if (jumpHost && jumpHostFailure(result.stderr, jumpHost)) {
      return { kind: 'jump', message: `control host ${jumpHost} unreachable: ${message}` }
    }
    for (const [pattern, kind] of FAILURE_PATTERNS) {
      if (pattern.test(result.stderr)) {
        return { kind, message }
      }
    }
    return { kind: 'closed', message: message || 'ssh transport failure' }
  }
  return { kind: 'exit', message: message || `exit code ${result.exitCode}` }
}

/**
 * Failures that mean the node never accepted a session
 */
export function isConnectFailure(failure: ProbeFailure): boolean {
  return failure.kind === 'timeout' || failure.kind === 'refused' || failure.kind === 'no-route'
}

export class NodeShell {
  private readonly runner: ProcessRunner

  constructor(private readonly options: NodeShellOptions) {
    this.runner = options.runner ?? runProcess
  }

  get connectTimeoutSeconds(): number {
    return this.options.connectTimeoutSeconds
  }

  sshArgs(node: ComputeNode, command: string): string[] {
    if (!isIPv4(node.ip)) {
      throw new NodeAddressError(node.name, node.ip)
    }

    const { user, connectTimeoutSeconds, jumpHost } = this.options
    return [
      '-o', 'BatchMode=yes',
      '-o', `ConnectTimeout=${connectTimeoutSeconds}`,
      '-o', 'StrictHostKeyChecking=accept-new',
      ...(jumpHost ? ['-J', jumpHost] : []),
      `${user}@${node.ip}`,
      command,
    ]
  }

  async exec(node: ComputeNode, command: string, options: NodeExecOptions = {}): Promise<NodeExecResult> {
    const result = await this.runner('ssh', this.sshArgs(node, command), {
      timeoutMs: options.timeoutMs,
      signal: options.signal,
      stream: options.stream,
    })

    if (result.exitCode === 0 && !result.timedOut && !result.aborted) {
      return { exitCode: 0, stdout: result.stdout, stderr: result.stderr }
    }

    return {
      exitCode: result.exitCode,
      stdout: result.stdout,
      stderr: result.stderr,
      failure: classifyFailure(result, this.options.jumpHost),
    }
  }
}
