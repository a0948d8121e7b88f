/**
 * Init command implementation
 * Creates .coldstart directory and configuration
 */

import { mkdirSync, writeFileSync, existsSync } from 'node:fs'
import { join } from 'node:path'
import YAML from 'yaml'
import { defaultConfig, PROJECT_DIR_NAME } from '../config'
import { ACTIVE_SELECTION_FILE } from '../profile-store'
import type { Logger } from '../logger'
import { EXIT_FAILURE, EXIT_OK } from './invoke'

export interface InitOptions {
  remoteDir?: string
  user?: string
}

export function initProject(cwd: string, options: InitOptions, logger: Logger): number {
  const projectDir = join(cwd, PROJECT_DIR_NAME)
  const configPath = join(projectDir, 'config.yaml')

  if (existsSync(configPath)) {
    logger.warn(`Configuration already exists at ${configPath}`)
    logger.info('To reconfigure, edit the file manually or delete it and run init again')
    return EXIT_FAILURE
  }

  logger.info(`📁 Creating ${PROJECT_DIR_NAME} directory structure...`)
  mkdirSync(join(projectDir, 'logs'), { recursive: true })
  mkdirSync(join(projectDir, 'generated'), { recursive: true })

  const config = defaultConfig(cwd)
  if (options.remoteDir) config.remote.dir = options.remoteDir
  if (options.user) config.ssh.user = options.user

  writeFileSync(configPath, YAML.stringify(config), 'utf-8')
  logger.success(`Created: ${configPath}`)

  const hardwareDir = join(cwd, config.hardware_dir)
  if (!existsSync(hardwareDir)) {
    mkdirSync(hardwareDir, { recursive: true })
    logger.success(`Created: ${hardwareDir}`)
  }

  const gitignorePath = join(projectDir, '.gitignore')
  writeFileSync(
    gitignorePath,
    `# Coldstart runtime files
${ACTIVE_SELECTION_FILE}
logs/
generated/
`,
    'utf-8'
  )
  logger.success(`Created: ${gitignorePath}`)

  logger.info('')
  logger.info('🎉 Coldstart initialized successfully!')
  logger.info('')
  logger.info('Next steps:')
  logger.info(`  1. Review configuration: ${PROJECT_DIR_NAME}/config.yaml`)
  logger.info(`  2. Describe your hardware: ${config.hardware_dir}/<version>.yaml`)
  logger.info('  3. Select it: coldstart hardware set <version>')
  logger.info('  4. Check the cluster: coldstart status')
  return EXIT_OK
}
