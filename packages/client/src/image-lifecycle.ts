/**
 * Golden image lifecycle on the control host
 */

import type { HardwareProfile } from '@coldstart/shared'
import type { BindMount, ColdstartConfig, NfsExport } from './config'
import type { Logger } from './logger'
import type { PlaybookRunner } from './playbook-runner'
import type { Session } from './remote-session'
import { runTeardown, type TeardownStep } from './teardown'

export interface ImageLifecycleOptions {
  session: Session
  playbooks: PlaybookRunner
  config: ColdstartConfig
  logger: Logger
}

function quote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`
}

export function unexportCommand(nfsExport: NfsExport): string {
  return `sudo exportfs -u ${quote(`${nfsExport.clients}:${nfsExport.path}`)}`
}

export function unmountCommand(mount: BindMount): string {
  const target = quote(mount.target)
  return `if mountpoint -q ${target}; then sudo umount ${target}; fi`
}

export class ImageLifecycle {
  private readonly logger: Logger

  constructor(private readonly options: ImageLifecycleOptions) {
    this.logger = options.logger.child('IMAGE')
  }

  async build(profile: HardwareProfile): Promise<void> {
    await this.options.playbooks.run('image_build', profile)
  }

  async copy(profile: HardwareProfile): Promise<void> {
    await this.options.playbooks.run('image_copy', profile)
  }

  /**
   * Steps in the order the build acquires them: bind mounts, then exports
   */
  teardownSteps(profile: HardwareProfile): TeardownStep[] {
    const { image } = this.options.config
    const alias = profile.controlHostAlias

    const mounts = image.bind_mounts.map((mount) =>
      this.remoteStep(alias, `Unmounted ${mount.target}`, unmountCommand(mount))
    )
    const exports = image.nfs_exports.map((nfsExport) =>
      this.remoteStep(
        alias,
        `Unexported ${nfsExport.path} (${nfsExport.clients})`,
        unexportCommand(nfsExport)
      )
    )
    return [...mounts, ...exports]
  }

  /**
   * Tear down exports and mounts, then remove the image. The playbook only
   * runs once every resource has been released.
   */
  async clean(profile: HardwareProfile): Promise<void> {
    const steps = this.teardownSteps(profile)
    if (steps.length > 0) {
      await this.options.session.sync(profile.controlHostAlias)
      await runTeardown(steps, this.logger)
    }
    await this.options.playbooks.run('image_clean', profile)
  }

  private remoteStep(alias: string, description: string, command: string): TeardownStep {
    return {
      description,
      release: async () => {
        const result = await this.options.session.run(alias, command, { capture: true, sync: false })
        if (result.exitCode !== 0) {
          throw new Error(result.stderr.trim() || `exit code ${result.exitCode}`)
        }
      },
    }
  }
}
