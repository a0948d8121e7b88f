/**
 * Coldstart Client - Main entry point
 * Exports all public APIs for use as library
 */

// Configuration
export {
  loadConfig,
  resolveConfig,
  defaultConfig,
  findProjectDir,
  type ColdstartConfig,
  type PlaybookName,
} from './config'

// Errors
export * from './errors'

// Logging
export { createLogger, type Logger } from './logger'

// Profiles and inventory
export { ProfileStore, parseProfile, normalizeMac } from './profile-store'
export { buildNodeList, renderInventory, renderHardwareVars } from './inventory'

// Remote execution
export { SshSession, LocalSession, type Session, type RunOptions } from './remote-session'
export { NodeShell, classifyFailure } from './node-shell'
export { SshReachability, type ReachabilityChecker } from './reachability'
export { runProcess, type ProcessRunner, type ProcessResult } from './process'

// Power lifecycle
export { PowerController, type WaitOptions } from './power-controller'
export { UdpWakeSender, SessionWakeSender, buildMagicPacket, type WakeSender } from './wake-on-lan'

// Provisioning
export { PlaybookRunner } from './playbook-runner'
export { ImageLifecycle } from './image-lifecycle'
export { runTeardown, type TeardownStep } from './teardown'

// Command context
export { createContext, type CommandContext, type GlobalOptions } from './context'

// Re-export shared types for convenience
export type * from '@coldstart/shared'
