/**
 * Host platform detection in reference syntax (`<os>-<arch>`).
 */

const OS_NAMES: Partial<Record<NodeJS.Platform, string>> = {
  linux: 'linux',
  darwin: 'darwin',
  win32: 'windows',
  freebsd: 'freebsd',
}

const ARCH_NAMES: Record<string, string> = {
  x64: 'x86_64',
  arm64: 'aarch64',
  ia32: 'i386',
  arm: 'armv7',
}

/**
 * Map a Node platform/arch pair to a reference platform string.
 *
 * macOS on Apple silicon is published as `darwin-arm64`; every other
 * 64-bit ARM host as `<os>-aarch64`.
 */
export function platformFor(platform: NodeJS.Platform, arch: string): string | null {
  const os = OS_NAMES[platform]
  const cpu = ARCH_NAMES[arch]
  if (!os || !cpu) {
    return null
  }
  if (os === 'darwin' && cpu === 'aarch64') {
    return 'darwin-arm64'
  }
  return `${os}-${cpu}`
}

/** Platform of the running host, or null when it has no reference spelling */
export function detectPlatform(): string | null {
  return platformFor(process.platform, process.arch)
}

const ARCH_ALIASES: Record<string, string> = {
  amd64: 'x86_64',
  arm64: 'aarch64',
}

function normalizePlatform(value: string): string {
  const dash = value.indexOf('-')
  if (dash === -1) return value
  const arch = value.slice(dash + 1)
  return `${value.slice(0, dash)}-${ARCH_ALIASES[arch] ?? arch}`
}

/** Compare platforms treating `amd64`/`x86_64` and `arm64`/`aarch64` as one arch */
export function samePlatform(a: string, b: string): boolean {
  return normalizePlatform(a) === normalizePlatform(b)
}
