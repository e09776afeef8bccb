/**
 * Native tier: build or install through the host's package manager.
 *
 * WHY: When the host already has the ecosystem's own tool (cargo, go),
 * installing through it needs no registry or download configuration.
 * Tool availability is probed once per tier instance with its version
 * command.
 */

import { readFile } from 'node:fs/promises'
import { join } from 'node:path'
import {
  type ArtifactReference,
  CommandError,
  NotFoundError,
  detectPlatform,
  formatReference,
  samePlatform,
} from '@toolcache/core'

import { type CommandRunner, runCommand } from '../exec.js'
import type { InstallTier, TierContext, TierOutcome } from './types.js'

/** How one package manager installs a single binary into a directory */
export interface NativeInstaller {
  /** Executable name */
  tool: string
  /** Ecosystems it serves */
  ecosystems: string[]
  /** Arguments that print the tool's version */
  versionArgs: string[]
  /** Install command for a reference into outDir */
  installCommand(ref: ArtifactReference, outDir: string): { args: string[]; env?: Record<string, string> }
  /** Where the installed binary ends up */
  binaryPath(ref: ArtifactReference, outDir: string): string
}

const EXE_SUFFIX = process.platform === 'win32' ? '.exe' : ''

export const CARGO_INSTALLER: NativeInstaller = {
  tool: 'cargo',
  ecosystems: ['cargo', 'crates.io'],
  versionArgs: ['--version'],
  installCommand: (ref, outDir) => ({
    args: ['install', ref.name, '--version', ref.version, '--root', outDir, '--locked'],
  }),
  binaryPath: (ref, outDir) => join(outDir, 'bin', `${ref.name}${EXE_SUFFIX}`),
}

export const GO_INSTALLER: NativeInstaller = {
  tool: 'go',
  ecosystems: ['go', 'golang'],
  versionArgs: ['version'],
  installCommand: (ref, outDir) => ({
    args: [
      'install',
      `${ref.namespace}/${ref.name}@${ref.version.startsWith('v') ? ref.version : `v${ref.version}`}`,
    ],
    env: { GOBIN: outDir },
  }),
  binaryPath: (ref, outDir) => join(outDir, `${ref.name}${EXE_SUFFIX}`),
}

export const DEFAULT_NATIVE_INSTALLERS: readonly NativeInstaller[] = [CARGO_INSTALLER, GO_INSTALLER]

export interface NativeTierOptions {
  enabled?: boolean | undefined
  installers?: readonly NativeInstaller[] | undefined
  runner?: CommandRunner | undefined
  /** Host platform override */
  hostPlatform?: string | null | undefined
  /** Install command timeout in ms (default: 10 minutes) */
  timeoutMs?: number | undefined
}

/**
 * Installs through cargo or go when the reference's ecosystem has one.
 */
export class NativeTier implements InstallTier {
  readonly name = 'native' as const
  private readonly enabled: boolean
  private readonly installers: readonly NativeInstaller[]
  private readonly run: CommandRunner
  private readonly hostPlatform: string | null
  private readonly timeoutMs: number
  private readonly available = new Map<string, Promise<boolean>>()

  constructor(options: NativeTierOptions = {}) {
    this.enabled = options.enabled ?? true
    this.installers = options.installers ?? DEFAULT_NATIVE_INSTALLERS
    this.run = options.runner ?? runCommand
    this.hostPlatform =
      options.hostPlatform === undefined ? detectPlatform() : options.hostPlatform
    this.timeoutMs = options.timeoutMs ?? 600_000
  }

  /**
   * Whether a tool answers its version command. Cached per tool.
   */
  isAvailable(installer: NativeInstaller): Promise<boolean> {
    let probe = this.available.get(installer.tool)
    if (!probe) {
      probe = this.run(installer.tool, installer.versionArgs, { timeout: 10_000 }).then(
        () => true,
        () => false
      )
      this.available.set(installer.tool, probe)
    }
    return probe
  }

  async attempt(ref: ArtifactReference, context: TierContext): Promise<TierOutcome> {
    if (!this.enabled) {
      return { status: 'skip', reason: 'disabled in settings' }
    }

    const installer = this.installers.find((i) => i.ecosystems.includes(ref.ecosystem))
    if (!installer) {
      return { status: 'skip', reason: `no package manager for ecosystem "${ref.ecosystem}"` }
    }

    // A package manager builds for the host only
    if (ref.platform && (!this.hostPlatform || !samePlatform(ref.platform, this.hostPlatform))) {
      return {
        status: 'skip',
        reason: `${ref.platform} is not the host platform (${this.hostPlatform ?? 'unknown'})`,
      }
    }

    if (!(await this.isAvailable(installer))) {
      return { status: 'skip', reason: `${installer.tool} not found` }
    }

    const { args, env } = installer.installCommand(ref, context.workDir)
    context.logger.debug('Installing with package manager', {
      ref: formatReference(ref),
      tool: installer.tool,
    })

    try {
      await this.run(installer.tool, args, { cwd: context.workDir, env, timeout: this.timeoutMs })
    } catch (err) {
      if (err instanceof CommandError) {
        return { status: 'fail', error: err }
      }
      throw err
    }

    const binaryPath = installer.binaryPath(ref, context.workDir)
    try {
      const content = await readFile(binaryPath)
      return { status: 'success', content, executable: true }
    } catch {
      return {
        status: 'fail',
        error: new NotFoundError(formatReference(ref), `${installer.tool} produced no ${binaryPath}`),
      }
    }
  }
}
