/**
 * Safe subprocess execution using argv arrays (no shell interpolation).
 *
 * WHY: Package-manager commands carry user-supplied reference parts
 * (names, versions). Passing argv directly to spawn means none of it is
 * ever interpreted by a shell.
 */

import { spawn } from 'node:child_process'
import { CommandError } from '@toolcache/core'

/**
 * Result of a command execution.
 */
export interface ExecResult {
  exitCode: number
  stdout: string
  stderr: string
}

/**
 * Options for command execution.
 */
export interface ExecOptions {
  /** Working directory for the command (defaults to cwd) */
  cwd?: string | undefined
  /** Environment variables added to the inherited environment */
  env?: Record<string, string> | undefined
  /** Timeout in milliseconds (default: 300000ms = 5 minutes) */
  timeout?: number | undefined
  /** If true, don't throw on non-zero exit code */
  ignoreExitCode?: boolean | undefined
}

/** Signature shared by runCommand and test doubles */
export type CommandRunner = (
  command: string,
  args: string[],
  options?: ExecOptions
) => Promise<ExecResult>

/**
 * Execute a command safely using an argv array.
 *
 * @throws CommandError if the command cannot start, times out, or exits
 *   non-zero (unless ignoreExitCode is true)
 *
 * @example
 * ```typescript
 * const result = await runCommand('cargo', ['--version'])
 * ```
 */
export const runCommand: CommandRunner = (command, args, options = {}) => {
  const { cwd, env, timeout = 300_000, ignoreExitCode = false } = options
  const display = [command, ...args].join(' ')

  return new Promise<ExecResult>((resolve, reject) => {
    const proc = spawn(command, args, {
      cwd,
      env: env ? { ...process.env, ...env } : process.env,
      stdio: ['ignore', 'pipe', 'pipe'],
    })

    let stdout = ''
    let stderr = ''
    let settled = false
    proc.stdout.setEncoding('utf8')
    proc.stderr.setEncoding('utf8')
    proc.stdout.on('data', (chunk: string) => {
      stdout += chunk
    })
    proc.stderr.on('data', (chunk: string) => {
      stderr += chunk
    })

    const timeoutId = setTimeout(() => {
      if (settled) return
      settled = true
      proc.kill()
      reject(new CommandError(display, -1, `Timeout exceeded (${timeout}ms)`))
    }, timeout)

    proc.on('error', (err) => {
      if (settled) return
      settled = true
      clearTimeout(timeoutId)
      reject(new CommandError(display, -1, err.message))
    })

    proc.on('close', (code) => {
      if (settled) return
      settled = true
      clearTimeout(timeoutId)
      const exitCode = code ?? -1
      if (exitCode !== 0 && !ignoreExitCode) {
        reject(new CommandError(display, exitCode, stderr.trim()))
        return
      }
      resolve({ exitCode, stdout, stderr })
    })
  })
}
