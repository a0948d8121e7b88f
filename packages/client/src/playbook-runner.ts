/**
 * Ansible playbook runner
 *
 * Playbooks run on the control host inside the mirrored tree. The inventory
 * and hardware variables are written into the tree first so the sync
 * carries them across.
 */

import { mkdirSync, writeFileSync } from 'node:fs'
import { join, relative } from 'node:path'
import type { HardwareProfile } from '@coldstart/shared'
import type { ColdstartConfig, PlaybookName } from './config'
import { PlaybookFailedError } from './errors'
import { buildNodeList, renderHardwareVars, renderInventory } from './inventory'
import type { Logger } from './logger'
import type { Session } from './remote-session'

export interface PlaybookRunnerOptions {
  session: Session
  config: ColdstartConfig
  projectRoot: string
  generatedDir: string
  logger: Logger
}

export interface PlaybookRunOptions {
  /** Restrict the run to an inventory group or host pattern */
  limit?: string
}

export class PlaybookRunner {
  private readonly logger: Logger

  constructor(private readonly options: PlaybookRunnerOptions) {
    this.logger = options.logger.child('ANSIBLE')
  }

  /**
   * Write inventory.ini and hardware-vars.yaml, returning their paths
   * relative to the project root
   */
  writeInputs(profile: HardwareProfile): { inventory: string; vars: string } {
    const { generatedDir, projectRoot, config } = this.options
    mkdirSync(generatedDir, { recursive: true })

    const inventoryPath = join(generatedDir, 'inventory.ini')
    const varsPath = join(generatedDir, 'hardware-vars.yaml')
    writeFileSync(inventoryPath, renderInventory(buildNodeList(profile), config.ssh.user), 'utf-8')
    writeFileSync(varsPath, renderHardwareVars(profile), 'utf-8')

    return {
      inventory: relative(projectRoot, inventoryPath),
      vars: relative(projectRoot, varsPath),
    }
  }

  buildCommand(
    name: PlaybookName,
    inputs: { inventory: string; vars: string },
    options: PlaybookRunOptions = {}
  ): string {
    const { ansible } = this.options.config
    const parts = [
      'ansible-playbook',
      '-i', inputs.inventory,
      '-e', `@${inputs.vars}`,
      `${ansible.dir}/${ansible.playbooks[name]}`,
    ]
    if (ansible.become) parts.push('--become')
    if (options.limit) parts.push('--limit', options.limit)
    return parts.join(' ')
  }

  /**
   * Run a playbook against the profile. Output streams to the terminal as
   * it is produced; a failing run throws PlaybookFailedError.
   */
  async run(name: PlaybookName, profile: HardwareProfile, options: PlaybookRunOptions = {}): Promise<void> {
    const inputs = this.writeInputs(profile)
    const command = this.buildCommand(name, inputs, options)
    this.logger.debug(command)

    const result = await this.options.session.run(profile.controlHostAlias, command)
    if (result.exitCode !== 0) {
      throw new PlaybookFailedError(this.options.config.ansible.playbooks[name], result.exitCode)
    }
  }
}
