#!/usr/bin/env tsx
/**
 * Coldstart CLI
 * Main entry point for command-line interface
 */

import { Command } from 'commander'
import { readFileSync } from 'node:fs'
import { join, dirname } from 'node:path'
import { fileURLToPath } from 'node:url'

// Get package.json path
const __filename = fileURLToPath(import.meta.url)
const __dirname = dirname(__filename)
const packageJson: unknown = JSON.parse(
  readFileSync(join(__dirname, '..', 'package.json'), 'utf-8')
)
const version =
  typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson
    ? String(packageJson.version)
    : '0.0.0'

// Import command implementations
import type { GlobalOptions } from './context'
import { createLogger } from './logger'
import { initProject } from './commands/init'
import { registerHardwareCommands } from './commands/hardware'
import { registerControlCommands } from './commands/control'
import { registerComputeCommands } from './commands/compute'
import { registerImageCommands } from './commands/image'
import { registerClusterCommands } from './commands/cluster'

const program = new Command()

program
  .name('coldstart')
  .description('Control plane for a cluster of network-booted compute nodes')
  .version(version)
  .option('--no-remote', 'Run on the control host itself instead of over ssh')
  .option('--debug', 'Enable debug logging', false)
  // Global options go before the command so `control cmd ls -la` reaches the host intact
  .enablePositionalOptions()

const globals = (): GlobalOptions => {
  const options = program.opts<{ remote: boolean; debug: boolean }>()
  return { remote: options.remote, debug: options.debug }
}

// Init command
program
  .command('init')
  .description('Initialize Coldstart in current directory')
  .option('--remote-dir <path>', 'Where the project is mirrored on the control host')
  .option('--user <user>', 'ssh user for compute nodes')
  .action((options: { remoteDir?: string; user?: string }) => {
    process.exitCode = initProject(process.cwd(), options, createLogger())
  })

registerHardwareCommands(program, globals)
registerControlCommands(program, globals)
registerComputeCommands(program, globals)
registerImageCommands(program, globals)
registerClusterCommands(program, globals)

// Parse arguments
await program.parseAsync()
