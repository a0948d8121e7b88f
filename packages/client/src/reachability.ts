/**
 * Node reachability checks
 */

import type { ComputeNode, ReachabilityResult } from '@coldstart/shared'
import type { NodeShell } from './node-shell'

export interface ReachabilityChecker {
  check(node: ComputeNode, timeoutMs: number, signal?: AbortSignal): Promise<ReachabilityResult>
}

/**
 * Liveness probe: an authenticated `true` over ssh.
 * Ordinary unreachability is a result; only a malformed address throws.
 */
export class SshReachability implements ReachabilityChecker {
  constructor(private readonly shell: NodeShell) {}

  async check(node: ComputeNode, timeoutMs: number, signal?: AbortSignal): Promise<ReachabilityResult> {
    const result = await this.shell.exec(node, 'true', { timeoutMs, signal })
    if (!result.failure) {
      return { node, state: 'reachable' }
    }
    return { node, state: 'unreachable', failure: result.failure }
  }
}
