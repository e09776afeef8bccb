/**
 * Tests for paths module.
 */

import { homedir } from 'node:os'
import { join } from 'node:path'
import { afterEach, describe, expect, it } from 'vitest'

import { PathResolver, decodeRefKey, encodeRefKey, getToolcacheHome } from './paths.js'

const HEX = `ab${'0'.repeat(62)}`

describe('getToolcacheHome', () => {
  const originalEnv = process.env['TOOLCACHE_HOME']

  afterEach(() => {
    if (originalEnv !== undefined) {
      process.env['TOOLCACHE_HOME'] = originalEnv
    } else {
      delete process.env['TOOLCACHE_HOME']
    }
  })

  it('should return default when TOOLCACHE_HOME not set', () => {
    delete process.env['TOOLCACHE_HOME']
    expect(getToolcacheHome()).toBe(join(homedir(), '.toolcache'))
  })

  it('should return env var when TOOLCACHE_HOME is set', () => {
    process.env['TOOLCACHE_HOME'] = '/custom/path'
    expect(getToolcacheHome()).toBe('/custom/path')
  })
})

describe('PathResolver', () => {
  const paths = new PathResolver({ home: '/test/tc' })

  it('should fan blobs out on the first two hex chars', () => {
    expect(paths.blob(`sha256:${HEX}`)).toBe(`/test/tc/blobs/ab/${HEX}`)
  })

  it('should keep one record file per reference', () => {
    expect(paths.refRecord('github/protocolbuffers/protoc:31.1')).toBe(
      '/test/tc/index/refs/github%2Fprotocolbuffers%2Fprotoc%3A31.1.json'
    )
  })

  it('should place back-links under the digest', () => {
    expect(paths.digestLink(`sha256:${HEX}`, 'a/b/c:1')).toBe(
      `/test/tc/index/digests/ab/${HEX}/a%2Fb%2Fc%3A1`
    )
  })

  it('should build team and metrics paths', () => {
    expect(paths.usageLog('platform')).toBe('/test/tc/teams/platform/usage.jsonl')
    expect(paths.usageLock('platform')).toBe('/test/tc/teams/platform/usage.lock')
    expect(paths.resolutionLog).toBe('/test/tc/metrics/resolutions.jsonl')
    expect(paths.settings).toBe('/test/tc/config.toml')
    expect(paths.temp).toBe('/test/tc/tmp')
  })
})

describe('ref keys', () => {
  it('should round-trip multi-segment references', () => {
    const ref = 'go/golang.org/x/tools/gopls:0.16.0-linux-x86_64'
    const key = encodeRefKey(ref)
    expect(key.includes('/')).toBe(false)
    expect(decodeRefKey(key)).toBe(ref)
  })
})
