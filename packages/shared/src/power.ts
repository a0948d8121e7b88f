/**
 * Reachability and power lifecycle types
 */

import type { ComputeNode } from './profile.js'

export type Reachability = 'reachable' | 'unreachable'

export type ProbeFailureKind =
  | 'timeout'
  | 'refused'
  | 'no-route'
  | 'auth'
  | 'host-key'
  | 'closed'
  | 'jump'
  | 'cancelled'
  | 'exit'

export interface ProbeFailure {
  kind: ProbeFailureKind
  message: string
}

export interface ReachabilityResult {
  node: ComputeNode
  state: Reachability
  failure?: ProbeFailure
}

export interface ClusterStatusReport {
  ok: boolean
  reachable: ComputeNode[]
  unreachable: ReachabilityResult[]
}

export type PowerAction = 'shutdown' | 'restart'

export type PowerOutcome = 'acknowledged' | 'already-down' | 'failed'

export interface PowerActionResult {
  node: ComputeNode
  outcome: PowerOutcome
  failure?: ProbeFailure
}

export interface PowerReport {
  ok: boolean
  action: PowerAction
  results: PowerActionResult[]
}

export interface PollTick {
  tick: number
  reachable: ComputeNode[]
  pending: ComputeNode[]
}

export interface WaitReport {
  ok: boolean
  cancelled: boolean
  timedOut: boolean
  ticks: number
  elapsedMs: number
  reachable: ComputeNode[]
  unreachable: ComputeNode[]
}

export interface WakeReport extends WaitReport {
  woken: ComputeNode[]
}
