/**
 * Tests for the registry tier and the distribution client.
 */

import { NotFoundError, RegistryError, createLogger } from '@toolcache/core'
import { parseReference } from '@toolcache/resolver'
import { computeDigest } from '@toolcache/store'
import { describe, expect, test, vi } from 'vitest'

import { type FetchFn, RegistryClient, parseManifest } from '../registry-client.js'
import { EXECUTABLE_ANNOTATION, RegistryTier } from './registry.js'
import type { TierContext } from './types.js'

const BYTES = Buffer.from('buf-binary')
const DIGEST = computeDigest(BYTES)
const BASE = 'https://registry.example.invalid'
const MANIFEST_URL = `${BASE}/v2/bufbuild/buf/manifests/1.47.2-linux-x86_64`
const BLOB_URL = `${BASE}/v2/bufbuild/buf/blobs/${DIGEST}`

const ref = parseReference('buf/bufbuild/buf:1.47.2-linux-x86_64')
const context: TierContext = { workDir: '/unused', logger: createLogger('test') }

function manifest(annotations?: Record<string, string>): string {
  return JSON.stringify({
    schemaVersion: 2,
    layers: [
      {
        mediaType: 'application/octet-stream',
        digest: DIGEST,
        size: BYTES.byteLength,
        ...(annotations ? { annotations } : {}),
      },
    ],
  })
}

function registry(routes: Record<string, () => Response>) {
  return vi.fn<FetchFn>(async (url) => {
    const route = routes[url]
    return route ? route() : new Response('not found', { status: 404 })
  })
}

describe('RegistryTier', () => {
  test('skips ecosystems without a registry', async () => {
    const tier = new RegistryTier({ registries: [] })
    expect(await tier.attempt(ref, context)).toEqual({
      status: 'skip',
      reason: 'no registry configured for ecosystem "buf"',
    })
  })

  test('pulls the first layer and vouches for its digest', async () => {
    const fetch = registry({
      [MANIFEST_URL]: () => new Response(manifest()),
      [BLOB_URL]: () => new Response(BYTES),
    })
    const tier = new RegistryTier({ registries: [{ ecosystem: 'buf', url: `${BASE}/` }], fetch })

    const outcome = await tier.attempt(ref, context)

    expect(outcome).toEqual({
      status: 'success',
      content: new Uint8Array(BYTES),
      digest: DIGEST,
      executable: true,
    })
    expect(fetch.mock.calls.map((call) => call[0])).toEqual([MANIFEST_URL, BLOB_URL])
  })

  test('honours the non-executable annotation', async () => {
    const fetch = registry({
      [MANIFEST_URL]: () => new Response(manifest({ [EXECUTABLE_ANNOTATION]: 'false' })),
      [BLOB_URL]: () => new Response(BYTES),
    })
    const tier = new RegistryTier({ registries: [{ ecosystem: 'buf', url: BASE }], fetch })

    expect(await tier.attempt(ref, context)).toMatchObject({ status: 'success', executable: false })
  })

  test('a missing tag is a NotFound failure', async () => {
    const tier = new RegistryTier({ registries: [{ ecosystem: 'buf', url: BASE }], fetch: registry({}) })

    const outcome = await tier.attempt(ref, context)

    if (outcome.status !== 'fail') throw new Error('expected failure')
    expect(outcome.error).toBeInstanceOf(NotFoundError)
  })

  test('a manifest without layers fails', async () => {
    const fetch = registry({
      [MANIFEST_URL]: () => new Response(JSON.stringify({ schemaVersion: 2, layers: [] })),
    })
    const tier = new RegistryTier({ registries: [{ ecosystem: 'buf', url: BASE }], fetch })

    const outcome = await tier.attempt(ref, context)

    if (outcome.status !== 'fail') throw new Error('expected failure')
    expect(outcome.error).toBeInstanceOf(RegistryError)
    expect(outcome.error.message).toBe(`Registry error for ${MANIFEST_URL}: manifest has no layers`)
  })

  test('server errors are registry failures', async () => {
    const fetch = registry({ [MANIFEST_URL]: () => new Response('oops', { status: 500 }) })
    const tier = new RegistryTier({ registries: [{ ecosystem: 'buf', url: BASE }], fetch })

    const outcome = await tier.attempt(ref, context)

    if (outcome.status !== 'fail') throw new Error('expected failure')
    expect(outcome.error).toBeInstanceOf(RegistryError)
    expect(outcome.error.message).toBe(`Registry error for ${MANIFEST_URL}: HTTP 500`)
  })
})

describe('parseManifest', () => {
  test('rejects layers without a valid digest', () => {
    expect(
      parseManifest({ schemaVersion: 2, layers: [{ mediaType: 'x', digest: 'md5:abc', size: 1 }] })
    ).toBeNull()
  })

  test('rejects documents without layers', () => {
    expect(parseManifest({ schemaVersion: 2 })).toBeNull()
  })
})

describe('RegistryClient.listTags', () => {
  const tagsUrl = `${BASE}/v2/bufbuild/buf/tags/list`

  test('returns published tags', async () => {
    const client = new RegistryClient({
      baseUrl: BASE,
      fetch: registry({
        [tagsUrl]: () => new Response(JSON.stringify({ name: 'bufbuild/buf', tags: ['1.47.2', '1.9.0'] })),
      }),
    })
    expect(await client.listTags('bufbuild/buf')).toEqual(['1.47.2', '1.9.0'])
  })

  test('treats null tags and unknown repositories as empty', async () => {
    const client = new RegistryClient({
      baseUrl: BASE,
      fetch: registry({
        [tagsUrl]: () => new Response(JSON.stringify({ name: 'bufbuild/buf', tags: null })),
      }),
    })
    expect(await client.listTags('bufbuild/buf')).toEqual([])
    expect(await client.listTags('bufbuild/other')).toEqual([])
  })
})
