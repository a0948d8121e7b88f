/**
 * Error taxonomy for Coldstart
 * Every failure a command reports carries a stable code
 */

import type { ComputeNode, ReachabilityResult } from '@coldstart/shared'

export class ColdstartError extends Error {
  readonly code: string

  constructor(code: string, message: string) {
    super(message)
    this.name = new.target.name
    this.code = code
  }
}

export class ConfigError extends ColdstartError {
  constructor(readonly key: string, message: string) {
    super('CONFIG_INVALID', `Invalid config "${key}": ${message}`)
  }
}

export class ProfileNotFoundError extends ColdstartError {
  constructor(readonly version: string, path: string) {
    super('PROFILE_NOT_FOUND', `No hardware profile "${version}" (expected ${path})`)
  }
}

export class NoActiveProfileError extends ColdstartError {
  constructor() {
    super(
      'NO_ACTIVE_PROFILE',
      'No hardware profile selected. Run "coldstart hardware set <version>" first.'
    )
  }
}

export class ProfileInvalidError extends ColdstartError {
  constructor(readonly version: string, readonly field: string, reason: string) {
    super('PROFILE_INVALID', `Hardware profile "${version}" is invalid at ${field}: ${reason}`)
  }
}

export class SyncError extends ColdstartError {
  constructor(readonly alias: string, readonly diagnostic: string) {
    super('SYNC_FAILED', `Failed to sync project to ${alias}: ${diagnostic}`)
  }
}

export class RemoteExecError extends ColdstartError {
  constructor(readonly alias: string, readonly diagnostic: string) {
    super('REMOTE_EXEC_FAILED', `Connection to ${alias} failed: ${diagnostic}`)
  }
}

export class NodeAddressError extends ColdstartError {
  constructor(readonly node: string, readonly address: string) {
    super('NODE_ADDRESS_INVALID', `Node ${node} has a malformed address "${address}"`)
  }
}

export class NodesUnreachableError extends ColdstartError {
  constructor(readonly unreachable: ReachabilityResult[]) {
    super(
      'NODES_UNREACHABLE',
      `Unreachable nodes: [${unreachable.map((r) => r.node.name).join(', ')}]`
    )
  }

  get nodes(): ComputeNode[] {
    return this.unreachable.map((r) => r.node)
  }
}

export interface TeardownFailure {
  step: string
  reason: string
}

export class TeardownError extends ColdstartError {
  constructor(readonly failures: TeardownFailure[]) {
    super(
      'TEARDOWN_FAILED',
      `${failures.length} teardown step(s) failed: ${failures.map((f) => f.step).join('; ')}`
    )
  }
}

export class PlaybookFailedError extends ColdstartError {
  constructor(readonly playbook: string, readonly exitCode: number) {
    super('PLAYBOOK_FAILED', `Playbook ${playbook} failed with exit code ${exitCode}`)
  }
}

export class WakeError extends ColdstartError {
  constructor(readonly node: string, reason: string) {
    super('WAKE_FAILED', `Failed to send Wake-on-LAN packet to ${node}: ${reason}`)
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
