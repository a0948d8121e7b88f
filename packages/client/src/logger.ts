/**
 * Console and debug-file logging
 */

import { appendFileSync, mkdirSync } from 'node:fs'
import { join } from 'node:path'
import chalk from 'chalk'

export interface Logger {
  heading(message: string): void
  info(message: string): void
  success(message: string): void
  warn(message: string): void
  error(message: string): void
  detail(message: string): void
  debug(message: string): void
  child(scope: string): Logger
}

export interface LoggerOptions {
  debug?: boolean
  logsDir?: string | null
  scope?: string
}

/**
 * Path of today's debug log inside the logs directory
 */
export function debugLogPath(logsDir: string, now: Date = new Date()): string {
  const dateStr = now.toISOString().split('T')[0]
  return join(logsDir, `coldstart-${dateStr}.log`)
}

class ConsoleLogger implements Logger {
  private readonly scope: string
  private logFile: string | null = null

  constructor(private readonly options: LoggerOptions) {
    this.scope = options.scope ?? 'CLI'
    if (options.debug && options.logsDir) {
      try {
        mkdirSync(options.logsDir, { recursive: true })
        this.logFile = debugLogPath(options.logsDir)
      } catch {
        this.logFile = null
      }
    }
  }

  heading(message: string): void {
    console.log(chalk.bold(message))
    this.write(message)
  }

  info(message: string): void {
    console.log(message)
    this.write(message)
  }

  success(message: string): void {
    console.log(chalk.green(`✓ ${message}`))
    this.write(message)
  }

  warn(message: string): void {
    console.warn(chalk.yellow(`⚠️  ${message}`))
    this.write(`WARN ${message}`)
  }

  error(message: string): void {
    console.error(chalk.red(`✗ ${message}`))
    this.write(`ERROR ${message}`)
  }

  detail(message: string): void {
    console.log(chalk.gray(`    ${message}`))
    this.write(message)
  }

  debug(message: string): void {
    if (!this.options.debug) {
      return
    }
    console.log(chalk.gray(`[${this.scope}] ${message}`))
    this.write(message)
  }

  child(scope: string): Logger {
    return new ConsoleLogger({ ...this.options, scope })
  }

  private write(message: string): void {
    if (!this.logFile) {
      return
    }
    const line = `[${new Date().toISOString()}] [${this.scope}] ${message}\n`
    try {
      appendFileSync(this.logFile, line)
    } catch {
      // best effort
      this.logFile = null
    }
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new ConsoleLogger(options)
}
