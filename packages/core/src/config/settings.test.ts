import * as fs from 'node:fs'
import * as os from 'node:os'
import * as path from 'node:path'
import { describe, expect, test } from 'vitest'

import { ConfigParseError, ConfigValidationError } from '../errors.js'
import { DEFAULT_SETTINGS, parseSettingsToml, readSettings } from './settings.js'

const CHECKSUM = `sha256:${'b'.repeat(64)}`

describe('parseSettingsToml', () => {
  test('empty document yields defaults', () => {
    expect(parseSettingsToml('')).toEqual(DEFAULT_SETTINGS)
  })

  test('normalizes every section', () => {
    const settings = parseSettingsToml(`
[cache]
max_size_mb = 2
retention_days = 7

[network]
timeout_ms = 5000
retries = 1

[native]
enabled = false

[[registries]]
ecosystem = "github"
url = "https://registry.example.test/"

[[downloads]]
repository = "github/protocolbuffers/protoc"
url = "https://downloads.example.test/{version}/protoc-{platform}"
checksum_url = "https://downloads.example.test/{version}/protoc-{platform}.sha256"

[downloads.checksums]
"31.1-linux-x86_64" = "${CHECKSUM}"
`)

    expect(settings).toEqual({
      cache: { maxSizeBytes: 2 * 1024 * 1024, retentionDays: 7 },
      network: { timeoutMs: 5000, retries: 1 },
      native: { enabled: false },
      registries: [{ ecosystem: 'github', url: 'https://registry.example.test' }],
      downloads: [
        {
          repository: 'github/protocolbuffers/protoc',
          url: 'https://downloads.example.test/{version}/protoc-{platform}',
          checksumUrl: 'https://downloads.example.test/{version}/protoc-{platform}.sha256',
          executable: true,
          checksums: { '31.1-linux-x86_64': CHECKSUM },
        },
      ],
    })
  })

  test('rejects malformed TOML', () => {
    expect(() => parseSettingsToml('[cache', 'x.toml')).toThrow(ConfigParseError)
  })

  test('rejects unknown keys and bad checksums', () => {
    expect(() => parseSettingsToml('[cache]\nsize = 1')).toThrow(ConfigValidationError)
    expect(() =>
      parseSettingsToml(`
[[downloads]]
repository = "a/b/c"
url = "https://x.test"
[downloads.checksums]
"1.0" = "md5:abc"
`)
    ).toThrow(ConfigValidationError)
  })

  test('reports the offending property', () => {
    try {
      parseSettingsToml('[network]\nproxy = "x"')
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigValidationError)
      if (err instanceof ConfigValidationError) {
        expect(err.validationErrors[0]?.message).toBe('unknown property "proxy"')
        expect(err.validationErrors[0]?.path).toBe('/network')
      }
    }
  })
})

describe('readSettings', () => {
  test('missing file yields defaults', async () => {
    const dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'settings-test-'))
    try {
      expect(await readSettings(path.join(dir, 'config.toml'))).toEqual(DEFAULT_SETTINGS)
    } finally {
      await fs.promises.rm(dir, { recursive: true, force: true })
    }
  })

  test('reads a file from disk', async () => {
    const dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'settings-test-'))
    try {
      const file = path.join(dir, 'config.toml')
      await fs.promises.writeFile(file, '[network]\nretries = 0\n')
      const settings = await readSettings(file)
      expect(settings.network).toEqual({ timeoutMs: 30_000, retries: 0 })
    } finally {
      await fs.promises.rm(dir, { recursive: true, force: true })
    }
  })
})
