/**
 * Remote execution types
 */

import type { ComputeNode } from './profile.js'

export interface RemoteExecutionResult {
  exitCode: number
  stdout: string
  stderr: string
  node?: ComputeNode
}
