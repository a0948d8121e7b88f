/**
 * Remote sessions on the control host
 *
 * The project tree is mirrored to the control host with rsync and commands
 * run inside the mirror over ssh. Host aliases, keys and users all come from
 * the operator's ssh config.
 */

import { posix } from 'node:path'
import type { RemoteExecutionResult } from '@coldstart/shared'
import { errorMessage, RemoteExecError, SyncError } from './errors'
import type { Logger } from './logger'
import { runProcess, type ProcessOptions, type ProcessResult, type ProcessRunner } from './process'

/** ssh reserves this exit status for its own failures */
export const SSH_TRANSPORT_FAILURE = 255

export interface RunOptions {
  /** Capture output instead of streaming it to the terminal */
  capture?: boolean
  signal?: AbortSignal
  timeoutMs?: number
  /** Skip the mirror step when the tree is known to be current */
  sync?: boolean
}

export interface Session {
  /** True when commands cross the network to the control host */
  readonly remote: boolean
  sync(alias: string): Promise<void>
  run(alias: string, command: string, options?: RunOptions): Promise<RemoteExecutionResult>
}

export interface SshSessionOptions {
  projectRoot: string
  remoteDir: string
  excludes: string[]
  logger: Logger
  runner?: ProcessRunner
}

function lastLine(text: string): string {
  const lines = text.trim().split('\n').filter(Boolean)
  return lines[lines.length - 1] ?? ''
}

function diagnostic(stderr: string, exitCode: number): string {
  return lastLine(stderr) || `exit code ${exitCode}`
}

export class SshSession implements Session {
  readonly remote = true
  private readonly runner: ProcessRunner
  private readonly logger: Logger

  constructor(private readonly options: SshSessionOptions) {
    this.runner = options.runner ?? runProcess
    this.logger = options.logger.child('REMOTE')
  }

  get remoteDir(): string {
    return this.options.remoteDir
  }

  /**
   * Mirror the local project tree to the control host, deletions included
   */
  async sync(alias: string): Promise<void> {
    const { projectRoot, remoteDir, excludes } = this.options
    const parent = posix.dirname(remoteDir)

    this.logger.debug(`Ensuring ${alias}:${parent} exists`)
    const mkdir = await this.spawn('ssh', [alias, `mkdir -p ${parent}`], {}, (reason) => new SyncError(alias, reason))
    if (mkdir.exitCode !== 0) {
      throw new SyncError(alias, diagnostic(mkdir.stderr, mkdir.exitCode))
    }

    const args = [
      '-az',
      '--delete',
      ...excludes.flatMap((pattern) => ['--exclude', pattern]),
      `${projectRoot}/`,
      `${alias}:${remoteDir}`,
    ]
    this.logger.debug(`rsync ${args.join(' ')}`)
    const rsync = await this.spawn('rsync', args, {}, (reason) => new SyncError(alias, reason))
    if (rsync.exitCode !== 0) {
      throw new SyncError(alias, diagnostic(rsync.stderr, rsync.exitCode))
    }
  }

  /**
   * Sync, then run a command inside the mirrored directory.
   * A non-zero exit is a normal result; only ssh's own failure throws.
   */
  async run(alias: string, command: string, options: RunOptions = {}): Promise<RemoteExecutionResult> {
    if (options.sync !== false) {
      await this.sync(alias)
    }

    const remoteCommand = `cd ${this.options.remoteDir} && ${command}`
    this.logger.debug(`ssh ${alias} '${remoteCommand}'`)
    const result = await this.spawn(
      'ssh',
      [alias, remoteCommand],
      { stream: !options.capture, signal: options.signal, timeoutMs: options.timeoutMs },
      (reason) => new RemoteExecError(alias, reason)
    )

    if (result.exitCode === SSH_TRANSPORT_FAILURE) {
      throw new RemoteExecError(alias, diagnostic(result.stderr, result.exitCode))
    }

    return {
      exitCode: result.exitCode,
      stdout: result.stdout,
      stderr: result.stderr,
    }
  }

  /** A missing ssh or rsync binary surfaces as the caller's error type */
  private async spawn(
    file: string,
    args: string[],
    options: ProcessOptions,
    wrap: (reason: string) => Error
  ): Promise<ProcessResult> {
    try {
      return await this.runner(file, args, options)
    } catch (error) {
      throw wrap(errorMessage(error))
    }
  }
}

export interface LocalSessionOptions {
  projectRoot: string
  logger: Logger
  runner?: ProcessRunner
}

/**
 * Session used when running on the control host itself
 */
export class LocalSession implements Session {
  readonly remote = false
  private readonly runner: ProcessRunner
  private readonly logger: Logger

  constructor(private readonly options: LocalSessionOptions) {
    this.runner = options.runner ?? runProcess
    this.logger = options.logger.child('LOCAL')
  }

  async sync(_alias: string): Promise<void> {
    // Already running inside the project tree
  }

  async run(_alias: string, command: string, options: RunOptions = {}): Promise<RemoteExecutionResult> {
    this.logger.debug(`sh -c '${command}'`)
    const result = await this.runner('sh', ['-c', command], {
      cwd: this.options.projectRoot,
      stream: !options.capture,
      signal: options.signal,
      timeoutMs: options.timeoutMs,
    })
    return {
      exitCode: result.exitCode,
      stdout: result.stdout,
      stderr: result.stderr,
    }
  }
}
