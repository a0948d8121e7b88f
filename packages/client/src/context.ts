/**
 * Command context
 *
 * Everything a command handler needs, resolved once per invocation and
 * passed explicitly. Handlers never read config or selection files directly.
 */

import { dirname, isAbsolute, join } from 'node:path'
import type { HardwareProfile } from '@coldstart/shared'
import {
  findProjectDir,
  getGeneratedDir,
  getLogsDir,
  loadConfig,
  PROJECT_DIR_NAME,
  type ColdstartConfig,
} from './config'
import { ConfigError } from './errors'
import { ImageLifecycle } from './image-lifecycle'
import { createLogger, type Logger } from './logger'
import { NodeShell } from './node-shell'
import { PlaybookRunner } from './playbook-runner'
import { PowerController } from './power-controller'
import { runProcess, type ProcessRunner } from './process'
import { ACTIVE_SELECTION_FILE, ProfileStore } from './profile-store'
import { SshReachability, type ReachabilityChecker } from './reachability'
import { LocalSession, SshSession, type Session } from './remote-session'
import { SessionWakeSender, UdpWakeSender, type WakeSender } from './wake-on-lan'

export interface GlobalOptions {
  /** Drive the control host over ssh (default) or run on it directly */
  remote?: boolean
  debug?: boolean
  cwd?: string
}

export interface ContextOverrides {
  runner?: ProcessRunner
  logger?: Logger
  waker?: (profile: HardwareProfile) => WakeSender
  reachability?: (profile: HardwareProfile) => ReachabilityChecker
}

export interface CommandContext {
  readonly projectDir: string
  readonly projectRoot: string
  readonly config: ColdstartConfig
  readonly remote: boolean
  readonly logger: Logger
  readonly store: ProfileStore
  readonly session: Session
  readonly playbooks: PlaybookRunner
  readonly image: ImageLifecycle
  /** Active profile, read from disk on first use and fixed for the rest of the run */
  activeProfile(): HardwareProfile
  nodeShell(profile: HardwareProfile): NodeShell
  power(profile: HardwareProfile): PowerController
}

export function createContext(options: GlobalOptions = {}, overrides: ContextOverrides = {}): CommandContext {
  const projectDir = findProjectDir(options.cwd)
  if (!projectDir) {
    throw new ConfigError(
      PROJECT_DIR_NAME,
      `no ${PROJECT_DIR_NAME} directory found. Run "coldstart init" to set up a project.`
    )
  }

  const projectRoot = dirname(projectDir)
  const config = loadConfig(projectDir)
  const remote = options.remote ?? true
  const runner = overrides.runner ?? runProcess
  const logger = overrides.logger ?? createLogger({ debug: options.debug, logsDir: getLogsDir(projectDir) })

  const hardwareDir = isAbsolute(config.hardware_dir)
    ? config.hardware_dir
    : join(projectRoot, config.hardware_dir)
  const store = new ProfileStore(hardwareDir, join(projectDir, ACTIVE_SELECTION_FILE))

  const session: Session = remote
    ? new SshSession({
        projectRoot,
        remoteDir: config.remote.dir,
        excludes: config.remote.excludes,
        logger,
        runner,
      })
    : new LocalSession({ projectRoot, logger, runner })

  const playbooks = new PlaybookRunner({
    session,
    config,
    projectRoot,
    generatedDir: getGeneratedDir(projectDir),
    logger,
  })

  const image = new ImageLifecycle({ session, playbooks, config, logger })

  const nodeShell = (profile: HardwareProfile): NodeShell =>
    new NodeShell({
      user: config.ssh.user,
      connectTimeoutSeconds: config.ssh.connect_timeout_seconds,
      jumpHost: remote ? profile.controlHostAlias : null,
      runner,
    })

  const waker = (profile: HardwareProfile): WakeSender => {
    if (overrides.waker) return overrides.waker(profile)
    return remote
      ? new SessionWakeSender(session, profile.controlHostAlias, profile.computeInterface, config.power.wol_port)
      : new UdpWakeSender(profile.computeInterface, config.power.wol_port)
  }

  const power = (profile: HardwareProfile): PowerController => {
    const shell = nodeShell(profile)
    return new PowerController({
      reachability: overrides.reachability?.(profile) ?? new SshReachability(shell),
      commander: shell,
      waker: waker(profile),
      logger,
      pollIntervalMs: config.power.poll_interval_ms,
      // Room for ssh's own connect timeout to report first
      probeTimeoutMs: config.ssh.connect_timeout_seconds * 1000 + 2000,
      commandTimeoutMs: config.power.command_timeout_ms,
      shutdownCommand: config.power.shutdown_command,
      restartCommand: config.power.restart_command,
    })
  }

  let active: HardwareProfile | null = null
  const activeProfile = (): HardwareProfile => {
    active ??= store.loadActiveProfile()
    return active
  }

  return {
    projectDir,
    projectRoot,
    config,
    remote,
    logger,
    store,
    session,
    playbooks,
    image,
    activeProfile,
    nodeShell,
    power,
  }
}
