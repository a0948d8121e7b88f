/**
 * Golden image commands
 */

import { Command } from 'commander'
import type { CommandContext, GlobalOptions } from '../context'
import { execute, EXIT_OK } from './invoke'

export async function imageBuild(ctx: CommandContext): Promise<number> {
  const profile = ctx.activeProfile()
  ctx.logger.heading(`Building image for hardware ${profile.version}...`)
  await ctx.image.build(profile)
  ctx.logger.success('Image built')
  return EXIT_OK
}

export async function imageCopy(ctx: CommandContext): Promise<number> {
  const profile = ctx.activeProfile()
  ctx.logger.heading('Copying image into place...')
  await ctx.image.copy(profile)
  ctx.logger.success('Image copied')
  return EXIT_OK
}

export async function imageClean(ctx: CommandContext): Promise<number> {
  const profile = ctx.activeProfile()
  ctx.logger.heading('Cleaning image...')
  await ctx.image.clean(profile)
  ctx.logger.success('Image cleaned')
  return EXIT_OK
}

export function registerImageCommands(program: Command, globals: () => GlobalOptions): void {
  const image = program
    .command('image')
    .description('Manage the compute node golden image')

  image
    .command('build')
    .description('Build the golden image on the control host')
    .action(() => execute(globals, imageBuild))

  image
    .command('copy')
    .description('Copy the built image to where compute nodes boot from')
    .action(() => execute(globals, imageCopy))

  image
    .command('clean')
    .description('Tear down exports and mounts, then remove the image')
    .action(() => execute(globals, imageClean))
}
