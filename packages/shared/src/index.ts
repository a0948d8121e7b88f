/**
 * Shared types for Coldstart
 * @module @coldstart/shared
 */

// Profile types
export type {
  ComputeNode,
  HardwareProfile,
  ProfileSummary,
} from './profile.js'

// Remote execution types
export type { RemoteExecutionResult } from './remote.js'

// Power lifecycle types
export type {
  Reachability,
  ProbeFailureKind,
  ProbeFailure,
  ReachabilityResult,
  ClusterStatusReport,
  PowerAction,
  PowerOutcome,
  PowerActionResult,
  PowerReport,
  PollTick,
  WaitReport,
  WakeReport,
} from './power.js'
