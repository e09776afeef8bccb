/**
 * Tests for the native tier with a fake command runner.
 */

import * as fs from 'node:fs'
import * as os from 'node:os'
import * as path from 'node:path'
import { CommandError, NotFoundError, createLogger } from '@toolcache/core'
import { parseReference } from '@toolcache/resolver'
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest'

import type { CommandRunner, ExecOptions } from '../exec.js'
import { NativeTier } from './native.js'
import type { TierContext } from './types.js'

const OK = { exitCode: 0, stdout: '', stderr: '' }

describe('NativeTier', () => {
  let workDir: string
  let context: TierContext

  beforeEach(async () => {
    workDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'native-test-'))
    context = { workDir, logger: createLogger('test') }
  })

  afterEach(async () => {
    await fs.promises.rm(workDir, { recursive: true, force: true })
  })

  test('installs a crate with cargo into the scratch directory', async () => {
    const runner = vi.fn<CommandRunner>(async (_command, args) => {
      if (args[0] === 'install') {
        await fs.promises.mkdir(path.join(workDir, 'bin'), { recursive: true })
        await fs.promises.writeFile(path.join(workDir, 'bin', 'ripgrep'), 'rg-binary')
      }
      return OK
    })
    const tier = new NativeTier({ runner, hostPlatform: 'linux-x86_64' })

    const outcome = await tier.attempt(parseReference('cargo/crates/ripgrep:14.1.0'), context)

    expect(outcome).toEqual({
      status: 'success',
      content: Buffer.from('rg-binary'),
      executable: true,
    })
    expect(runner.mock.calls.map((call) => [call[0], ...call[1]])).toEqual([
      ['cargo', '--version'],
      ['cargo', 'install', 'ripgrep', '--version', '14.1.0', '--root', workDir, '--locked'],
    ])
  })

  test('installs a go module with GOBIN pointed at the scratch directory', async () => {
    let installEnv: ExecOptions['env']
    const runner = vi.fn<CommandRunner>(async (_command, args, options) => {
      if (args[0] === 'install') {
        installEnv = options?.env
        await fs.promises.writeFile(path.join(workDir, 'gopls'), 'gopls-binary')
      }
      return OK
    })
    const tier = new NativeTier({ runner, hostPlatform: 'linux-x86_64' })

    const outcome = await tier.attempt(parseReference('go/golang.org/x/tools/gopls:0.16.1'), context)

    expect(outcome.status).toBe('success')
    expect(runner.mock.calls[1]?.[1]).toEqual(['install', 'golang.org/x/tools/gopls@v0.16.1'])
    expect(installEnv).toEqual({ GOBIN: workDir })
  })

  test('skips when the package manager is missing, probing only once', async () => {
    const runner = vi.fn<CommandRunner>(async (command, args) => {
      throw new CommandError([command, ...args].join(' '), -1, 'spawn cargo ENOENT')
    })
    const tier = new NativeTier({ runner, hostPlatform: 'linux-x86_64' })
    const ref = parseReference('cargo/crates/ripgrep:14.1.0')

    expect(await tier.attempt(ref, context)).toEqual({ status: 'skip', reason: 'cargo not found' })
    expect(await tier.attempt(ref, context)).toEqual({ status: 'skip', reason: 'cargo not found' })
    expect(runner).toHaveBeenCalledTimes(1)
  })

  test('skips references built for another platform', async () => {
    const runner = vi.fn<CommandRunner>(async () => OK)
    const tier = new NativeTier({ runner, hostPlatform: 'linux-x86_64' })

    const outcome = await tier.attempt(parseReference('cargo/crates/ripgrep:14.1.0-darwin-arm64'), context)

    expect(outcome).toEqual({
      status: 'skip',
      reason: 'darwin-arm64 is not the host platform (linux-x86_64)',
    })
    expect(runner).not.toHaveBeenCalled()
  })

  test('treats amd64 as the host x86_64', async () => {
    const runner = vi.fn<CommandRunner>(async () => OK)
    const tier = new NativeTier({ runner, hostPlatform: 'linux-x86_64' })

    const outcome = await tier.attempt(parseReference('cargo/crates/ripgrep:14.1.0-linux-amd64'), context)

    // Reaches the install step; the fake runner writes no binary
    expect(outcome.status).toBe('fail')
    expect(runner).toHaveBeenCalledTimes(2)
  })

  test('skips ecosystems without a package manager and when disabled', async () => {
    const runner = vi.fn<CommandRunner>(async () => OK)

    expect(
      await new NativeTier({ runner }).attempt(parseReference('github/protocolbuffers/protoc:31.1'), context)
    ).toEqual({ status: 'skip', reason: 'no package manager for ecosystem "github"' })
    expect(
      await new NativeTier({ runner, enabled: false }).attempt(
        parseReference('cargo/crates/ripgrep:14.1.0'),
        context
      )
    ).toEqual({ status: 'skip', reason: 'disabled in settings' })
    expect(runner).not.toHaveBeenCalled()
  })

  test('a failing install command is a failure', async () => {
    const runner = vi.fn<CommandRunner>(async (command, args) => {
      if (args[0] === 'install') {
        throw new CommandError([command, ...args].join(' '), 101, 'error: could not find `ripgrep`')
      }
      return OK
    })
    const tier = new NativeTier({ runner, hostPlatform: 'linux-x86_64' })

    const outcome = await tier.attempt(parseReference('cargo/crates/ripgrep:99.0.0'), context)

    if (outcome.status !== 'fail') throw new Error('expected failure')
    expect(outcome.error).toBeInstanceOf(CommandError)
  })

  test('an install that produces no binary is NotFound', async () => {
    const tier = new NativeTier({ runner: vi.fn<CommandRunner>(async () => OK), hostPlatform: 'linux-x86_64' })

    const outcome = await tier.attempt(parseReference('cargo/crates/ripgrep:14.1.0'), context)

    if (outcome.status !== 'fail') throw new Error('expected failure')
    expect(outcome.error).toBeInstanceOf(NotFoundError)
  })
})
