/**
 * Child process execution for ssh, rsync and local shell commands
 */

import { spawn } from 'node:child_process'

/** Exit code reported for a child killed by the timeout */
export const EXIT_TIMED_OUT = 124
/** Exit code reported for a child killed through the AbortSignal */
export const EXIT_ABORTED = 130

export interface ProcessResult {
  exitCode: number
  stdout: string
  stderr: string
  timedOut: boolean
  aborted: boolean
}

export interface ProcessOptions {
  cwd?: string
  timeoutMs?: number
  signal?: AbortSignal
  /** Tee output to this process's stdout/stderr while capturing it */
  stream?: boolean
}

export type ProcessRunner = (
  file: string,
  args: string[],
  options?: ProcessOptions
) => Promise<ProcessResult>

/**
 * Spawn a process and collect its output
 *
 * Resolves for every exit, including non-zero codes, timeouts and aborts.
 * Rejects only when the executable cannot be started.
 */
export const runProcess: ProcessRunner = (file, args, options = {}) => {
  const { cwd, timeoutMs, signal, stream = false } = options

  return new Promise<ProcessResult>((resolve, reject) => {
    if (signal?.aborted) {
      resolve({ exitCode: EXIT_ABORTED, stdout: '', stderr: '', timedOut: false, aborted: true })
      return
    }

    const child = spawn(file, args, {
      cwd,
      stdio: ['ignore', 'pipe', 'pipe'],
    })

    let stdout = ''
    let stderr = ''
    let timedOut = false
    let aborted = false
    let settled = false

    child.stdout.on('data', (chunk: Buffer) => {
      stdout += chunk.toString()
      if (stream) process.stdout.write(chunk)
    })
    child.stderr.on('data', (chunk: Buffer) => {
      stderr += chunk.toString()
      if (stream) process.stderr.write(chunk)
    })

    const timer = timeoutMs
      ? setTimeout(() => {
          timedOut = true
          child.kill('SIGTERM')
        }, timeoutMs)
      : null

    const onAbort = () => {
      aborted = true
      child.kill('SIGTERM')
    }
    signal?.addEventListener('abort', onAbort, { once: true })

    const cleanup = () => {
      settled = true
      if (timer) clearTimeout(timer)
      signal?.removeEventListener('abort', onAbort)
    }

    child.on('error', (error) => {
      if (settled) return
      cleanup()
      reject(new Error(`Failed to start ${file}: ${error.message}`))
    })

    child.on('close', (code, killSignal) => {
      if (settled) return
      cleanup()
      let exitCode = code ?? 1
      if (code === null && killSignal === 'SIGTERM') {
        if (aborted) exitCode = EXIT_ABORTED
        else if (timedOut) exitCode = EXIT_TIMED_OUT
      }
      resolve({ exitCode, stdout, stderr, timedOut, aborted })
    })
  })
}
