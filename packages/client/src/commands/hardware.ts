/**
 * Hardware profile selection commands
 */

import { Command } from 'commander'
import type { CommandContext, GlobalOptions } from '../context'
import { execute, EXIT_OK } from './invoke'

export async function hardwareSet(ctx: CommandContext, version: string): Promise<number> {
  const profile = ctx.store.setActive(version)
  ctx.logger.success(
    `Hardware profile ${profile.version} selected (${profile.computeNodes.length} compute nodes via ${profile.controlHostAlias})`
  )
  return EXIT_OK
}

export async function hardwareGet(ctx: CommandContext): Promise<number> {
  ctx.logger.info(ctx.store.getActive())
  return EXIT_OK
}

export async function hardwareList(ctx: CommandContext): Promise<number> {
  const profiles = ctx.store.listProfiles()
  if (profiles.length === 0) {
    ctx.logger.info('No hardware profiles found')
    return EXIT_OK
  }
  for (const profile of profiles) {
    ctx.logger.info(`${profile.active ? '*' : ' '} ${profile.version}`)
  }
  return EXIT_OK
}

export function registerHardwareCommands(program: Command, globals: () => GlobalOptions): void {
  const hardware = program
    .command('hardware')
    .description('Select the hardware profile of the cluster')

  hardware
    .command('set')
    .description('Select the active hardware profile')
    .argument('<version>', 'Profile version (hardware/<version>.yaml)')
    .action((version: string) => execute(globals, hardwareSet, version))

  hardware
    .command('get')
    .description('Print the active hardware profile version')
    .action(() => execute(globals, hardwareGet))

  hardware
    .command('list')
    .description('List available hardware profiles')
    .action(() => execute(globals, hardwareList))
}
