/**
 * Client configuration
 * Loads and manages .coldstart/config.yaml
 */

import { readFileSync, existsSync } from 'node:fs'
import { join, dirname, basename } from 'node:path'
import YAML from 'yaml'
import { ConfigError } from './errors'

export const PROJECT_DIR_NAME = '.coldstart'

export interface BindMount {
  source: string
  target: string
}

export interface NfsExport {
  path: string
  clients: string
}

export type PlaybookName =
  | 'control_configure'
  | 'control_test'
  | 'compute_configure'
  | 'compute_test'
  | 'image_build'
  | 'image_copy'
  | 'image_clean'

export const PLAYBOOK_NAMES: readonly PlaybookName[] = [
  'control_configure',
  'control_test',
  'compute_configure',
  'compute_test',
  'image_build',
  'image_copy',
  'image_clean',
]

export interface ColdstartConfig {
  // Directory of hardware profile documents, relative to the project root
  hardware_dir: string

  // Where the project tree is mirrored on the control host
  remote: {
    dir: string
    excludes: string[]
  }

  ssh: {
    user: string
    connect_timeout_seconds: number
  }

  power: {
    poll_interval_ms: number
    command_timeout_ms: number
    // How long restarted nodes get to drop off the network
    settle_timeout_ms: number
    shutdown_command: string
    restart_command: string
    wol_port: number
  }

  ansible: {
    dir: string
    become: boolean
    playbooks: Record<PlaybookName, string>
  }

  // Resources created by the image build, in creation order
  image: {
    bind_mounts: BindMount[]
    nfs_exports: NfsExport[]
  }
}

/**
 * Find .coldstart directory by walking up from current directory
 */
export function findProjectDir(startDir: string = process.cwd()): string | null {
  let dir = startDir

  while (true) {
    const projectDir = join(dir, PROJECT_DIR_NAME)
    if (existsSync(projectDir)) {
      return projectDir
    }
    const parent = dirname(dir)
    if (parent === dir) {
      return null
    }
    dir = parent
  }
}

/**
 * Get logs directory for debug output
 */
export function getLogsDir(projectDir: string): string {
  return join(projectDir, 'logs')
}

/**
 * Get directory for generated inventory and variable files
 */
export function getGeneratedDir(projectDir: string): string {
  return join(projectDir, 'generated')
}

/**
 * Defaults for a project rooted at projectRoot
 */
export function defaultConfig(projectRoot: string): ColdstartConfig {
  return {
    hardware_dir: 'hardware',
    remote: {
      dir: `~/remote/${basename(projectRoot)}`,
      excludes: ['.git', `${PROJECT_DIR_NAME}/logs`, 'node_modules'],
    },
    ssh: {
      user: 'root',
      connect_timeout_seconds: 5,
    },
    power: {
      poll_interval_ms: 1000,
      command_timeout_ms: 15000,
      settle_timeout_ms: 120000,
      shutdown_command: 'systemctl poweroff --no-block',
      restart_command: 'systemctl reboot --no-block',
      wol_port: 9,
    },
    ansible: {
      dir: 'ansible',
      become: true,
      playbooks: {
        control_configure: 'control_configure.yml',
        control_test: 'control_test.yml',
        compute_configure: 'compute_configure.yml',
        compute_test: 'compute_test.yml',
        image_build: 'image_build.yml',
        image_copy: 'image_copy.yml',
        image_clean: 'image_clean.yml',
      },
    },
    image: {
      bind_mounts: [],
      nfs_exports: [],
    },
  }
}

type Section = Record<string, unknown>

function isSection(value: unknown): value is Section {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function section(raw: Section, key: string): Section {
  const value = raw[key]
  if (value === undefined || value === null) {
    return {}
  }
  if (!isSection(value)) {
    throw new ConfigError(key, 'expected a mapping')
  }
  return value
}

function stringValue(raw: Section, key: string, path: string, fallback: string): string {
  const value = raw[key]
  if (value === undefined || value === null) return fallback
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigError(path, 'expected a non-empty string')
  }
  return value
}

function numberValue(raw: Section, key: string, path: string, fallback: number): number {
  const value = raw[key]
  if (value === undefined || value === null) return fallback
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    throw new ConfigError(path, 'expected a positive number')
  }
  return value
}

function booleanValue(raw: Section, key: string, path: string, fallback: boolean): boolean {
  const value = raw[key]
  if (value === undefined || value === null) return fallback
  if (typeof value !== 'boolean') {
    throw new ConfigError(path, 'expected true or false')
  }
  return value
}

function listValue<T>(
  raw: Section,
  key: string,
  path: string,
  parse: (item: unknown, itemPath: string) => T
): T[] | undefined {
  const value = raw[key]
  if (value === undefined || value === null) return undefined
  if (!Array.isArray(value)) {
    throw new ConfigError(path, 'expected a list')
  }
  return value.map((item, index) => parse(item, `${path}[${index}]`))
}

function parseString(item: unknown, path: string): string {
  if (typeof item !== 'string' || item === '') {
    throw new ConfigError(path, 'expected a non-empty string')
  }
  return item
}

function parseBindMount(item: unknown, path: string): BindMount {
  if (!isSection(item)) throw new ConfigError(path, 'expected { source, target }')
  return {
    source: parseString(item.source, `${path}.source`),
    target: parseString(item.target, `${path}.target`),
  }
}

function parseNfsExport(item: unknown, path: string): NfsExport {
  if (!isSection(item)) throw new ConfigError(path, 'expected { path, clients }')
  return {
    path: parseString(item.path, `${path}.path`),
    clients: parseString(item.clients, `${path}.clients`),
  }
}

/**
 * Merge a parsed config document over the defaults
 */
export function resolveConfig(raw: unknown, projectRoot: string): ColdstartConfig {
  const defaults = defaultConfig(projectRoot)
  if (raw === undefined || raw === null) {
    return defaults
  }
  if (!isSection(raw)) {
    throw new ConfigError('(root)', 'expected a mapping')
  }

  const remote = section(raw, 'remote')
  const ssh = section(raw, 'ssh')
  const power = section(raw, 'power')
  const ansible = section(raw, 'ansible')
  const playbooks = section(ansible, 'playbooks')
  const image = section(raw, 'image')

  for (const key of Object.keys(playbooks)) {
    if (!PLAYBOOK_NAMES.some((name) => name === key)) {
      throw new ConfigError(`ansible.playbooks.${key}`, 'unknown playbook')
    }
  }

  const resolvedPlaybooks = { ...defaults.ansible.playbooks }
  for (const name of PLAYBOOK_NAMES) {
    resolvedPlaybooks[name] = stringValue(
      playbooks,
      name,
      `ansible.playbooks.${name}`,
      defaults.ansible.playbooks[name]
    )
  }

  return {
    hardware_dir: stringValue(raw, 'hardware_dir', 'hardware_dir', defaults.hardware_dir),
    remote: {
      dir: stringValue(remote, 'dir', 'remote.dir', defaults.remote.dir),
      excludes:
        listValue(remote, 'excludes', 'remote.excludes', parseString) ??
        defaults.remote.excludes,
    },
    ssh: {
      user: stringValue(ssh, 'user', 'ssh.user', defaults.ssh.user),
      connect_timeout_seconds: numberValue(
        ssh,
        'connect_timeout_seconds',
        'ssh.connect_timeout_seconds',
        defaults.ssh.connect_timeout_seconds
      ),
    },
    power: {
      poll_interval_ms: numberValue(
        power,
        'poll_interval_ms',
        'power.poll_interval_ms',
        defaults.power.poll_interval_ms
      ),
      command_timeout_ms: numberValue(
        power,
        'command_timeout_ms',
        'power.command_timeout_ms',
        defaults.power.command_timeout_ms
      ),
      settle_timeout_ms: numberValue(
        power,
        'settle_timeout_ms',
        'power.settle_timeout_ms',
        defaults.power.settle_timeout_ms
      ),
      shutdown_command: stringValue(
        power,
        'shutdown_command',
        'power.shutdown_command',
        defaults.power.shutdown_command
      ),
      restart_command: stringValue(
        power,
        'restart_command',
        'power.restart_command',
        defaults.power.restart_command
      ),
      wol_port: numberValue(power, 'wol_port', 'power.wol_port', defaults.power.wol_port),
    },
    ansible: {
      dir: stringValue(ansible, 'dir', 'ansible.dir', defaults.ansible.dir),
      become: booleanValue(ansible, 'become', 'ansible.become', defaults.ansible.become),
      playbooks: resolvedPlaybooks,
    },
    image: {
      bind_mounts:
        listValue(image, 'bind_mounts', 'image.bind_mounts', parseBindMount) ?? [],
      nfs_exports:
        listValue(image, 'nfs_exports', 'image.nfs_exports', parseNfsExport) ?? [],
    },
  }
}

/**
 * Load configuration from .coldstart/config.yaml
 *
 * A missing config file means all defaults.
 */
export function loadConfig(projectDir: string): ColdstartConfig {
  const projectRoot = dirname(projectDir)
  const configPath = join(projectDir, 'config.yaml')
  if (!existsSync(configPath)) {
    return defaultConfig(projectRoot)
  }

  const configText = readFileSync(configPath, 'utf-8')
  let raw: unknown
  try {
    raw = YAML.parse(configText)
  } catch (error) {
    throw new ConfigError(configPath, error instanceof Error ? error.message : String(error))
  }
  return resolveConfig(raw, projectRoot)
}
