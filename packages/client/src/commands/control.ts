/**
 * Control host commands
 */

import { Command } from 'commander'
import type { CommandContext, GlobalOptions } from '../context'
import { execute, EXIT_OK } from './invoke'

/**
 * Run a command in the mirrored tree on the control host and mirror its exit code
 */
export async function controlCmd(ctx: CommandContext, command: string[]): Promise<number> {
  const profile = ctx.activeProfile()
  const result = await ctx.session.run(profile.controlHostAlias, command.join(' '))
  return result.exitCode
}

export async function controlConfigure(ctx: CommandContext): Promise<number> {
  const profile = ctx.activeProfile()
  ctx.logger.heading(`Configuring control host ${profile.controlHostAlias}...`)
  await ctx.playbooks.run('control_configure', profile, { limit: 'control' })
  ctx.logger.success('Control host configuration complete')
  return EXIT_OK
}

export async function controlTest(ctx: CommandContext): Promise<number> {
  const profile = ctx.activeProfile()
  ctx.logger.heading(`Testing control host ${profile.controlHostAlias}...`)
  await ctx.playbooks.run('control_test', profile, { limit: 'control' })
  ctx.logger.success('Control host tests passed')
  return EXIT_OK
}

export function registerControlCommands(program: Command, globals: () => GlobalOptions): void {
  const control = program
    .command('control')
    .description('Manage the control host')
    .enablePositionalOptions()

  control
    .command('cmd')
    .description('Run a command on the control host inside the synced project tree')
    .argument('<command...>', 'Command to run')
    .passThroughOptions()
    .allowUnknownOption()
    .action((command: string[]) => execute(globals, controlCmd, command))

  control
    .command('configure')
    .description('Run the control host configuration playbook')
    .action(() => execute(globals, controlConfigure))

  control
    .command('test')
    .description('Run the control host test playbook')
    .action(() => execute(globals, controlTest))
}
