/**
 * Test helpers: in-memory logger, scripted process runner, temp projects
 */

import { mkdirSync, mkdtempSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import YAML from 'yaml'
import type { Logger } from '../src/logger'
import type { ProcessOptions, ProcessResult, ProcessRunner } from '../src/process'

export type LogLevel = 'heading' | 'info' | 'success' | 'warn' | 'error' | 'detail' | 'debug'

export interface LogEntry {
  level: LogLevel
  message: string
}

export class MemoryLogger implements Logger {
  constructor(readonly entries: LogEntry[] = []) {}

  heading(message: string): void { this.entries.push({ level: 'heading', message }) }
  info(message: string): void { this.entries.push({ level: 'info', message }) }
  success(message: string): void { this.entries.push({ level: 'success', message }) }
  warn(message: string): void { this.entries.push({ level: 'warn', message }) }
  error(message: string): void { this.entries.push({ level: 'error', message }) }
  detail(message: string): void { this.entries.push({ level: 'detail', message }) }
  debug(message: string): void { this.entries.push({ level: 'debug', message }) }

  child(_scope: string): Logger {
    return new MemoryLogger(this.entries)
  }

  messages(level: LogLevel): string[] {
    return this.entries.filter((e) => e.level === level).map((e) => e.message)
  }
}

export interface RecordedCall {
  file: string
  args: string[]
  options: ProcessOptions
}

type Matcher = (call: RecordedCall) => boolean
type Reply = Partial<ProcessResult> | ((call: RecordedCall) => Partial<ProcessResult>)

/**
 * Stand-in for spawning ssh/rsync/sh. Later rules win; unmatched calls exit 0.
 */
export class FakeRunner {
  readonly calls: RecordedCall[] = []
  private readonly rules: Array<{ match: Matcher; reply: Reply }> = []

  on(match: Matcher, reply: Reply): this {
    this.rules.push({ match, reply })
    return this
  }

  readonly run: ProcessRunner = async (file, args, options = {}) => {
    const call: RecordedCall = { file, args, options }
    this.calls.push(call)

    const rule = [...this.rules].reverse().find((r) => r.match(call))
    const reply = rule ? (typeof rule.reply === 'function' ? rule.reply(call) : rule.reply) : {}
    return {
      exitCode: 0,
      stdout: '',
      stderr: '',
      timedOut: false,
      aborted: false,
      ...reply,
    }
  }

  callsTo(file: string): RecordedCall[] {
    return this.calls.filter((c) => c.file === file)
  }
}

/** An ssh call addressed to a compute node at ip */
export function toNode(ip: string): Matcher {
  return (call) => call.file === 'ssh' && call.args.some((arg) => arg.endsWith(`@${ip}`))
}

/** An ssh call to the control host whose remote command contains text */
export function onControl(text: string): Matcher {
  return (call) =>
    call.file === 'ssh' &&
    !call.args.includes('BatchMode=yes') &&
    (call.args[call.args.length - 1] ?? '').includes(text)
}

export const TIMEOUT: Partial<ProcessResult> = {
  exitCode: 255,
  stderr: 'ssh: connect to host 192.168.1.101 port 22: Connection timed out\n',
}

export const PROFILE_01 = {
  version: '0.1',
  control_host: 'control',
  compute_interface: 'enp3s0',
  driver_role: 'gpu-vendor-a',
  compute_nodes: [
    { name: 'node0', mac: 'AA:BB:CC:DD:EE:00', ip: '192.168.1.100' },
    { name: 'node1', mac: 'aa-bb-cc-dd-ee-01', ip: '192.168.1.101' },
  ],
}

export interface ProjectSetup {
  config?: Record<string, unknown>
  profiles?: Record<string, unknown>
  active?: string
}

/**
 * Create a project directory with .coldstart/config.yaml and hardware profiles
 */
export function createProject(setup: ProjectSetup = {}): string {
  const root = mkdtempSync(join(tmpdir(), 'coldstart-test-'))
  const projectDir = join(root, '.coldstart')
  mkdirSync(projectDir, { recursive: true })
  mkdirSync(join(root, 'hardware'), { recursive: true })

  const config = {
    power: { poll_interval_ms: 1 },
    ...setup.config,
  }
  writeFileSync(join(projectDir, 'config.yaml'), YAML.stringify(config))

  for (const [version, doc] of Object.entries(setup.profiles ?? {})) {
    writeFileSync(join(root, 'hardware', `${version}.yaml`), YAML.stringify(doc))
  }

  if (setup.active) {
    writeFileSync(join(projectDir, 'active-hardware'), `${setup.active}\n`)
  }
  return root
}
