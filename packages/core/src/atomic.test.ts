/**
 * Tests for atomic file writes.
 */

import * as fs from 'node:fs'
import * as os from 'node:os'
import * as path from 'node:path'
import { afterEach, beforeEach, describe, expect, test } from 'vitest'

import { atomicWrite, atomicWriteJson, getTmpPath, isTmpName } from './atomic.js'

describe('atomicWrite', () => {
  let tmpDir: string

  beforeEach(async () => {
    tmpDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'atomic-test-'))
  })

  afterEach(async () => {
    await fs.promises.rm(tmpDir, { recursive: true, force: true })
  })

  test('writes string content and creates parents', async () => {
    const filePath = path.join(tmpDir, 'a', 'b', 'file.txt')
    await atomicWrite(filePath, 'hello')
    expect(await fs.promises.readFile(filePath, 'utf8')).toBe('hello')
  })

  test('overwrites existing content', async () => {
    const filePath = path.join(tmpDir, 'file.txt')
    await atomicWrite(filePath, 'first')
    await atomicWrite(filePath, 'second')
    expect(await fs.promises.readFile(filePath, 'utf8')).toBe('second')
  })

  test('leaves no temporary files behind', async () => {
    const filePath = path.join(tmpDir, 'file.bin')
    await atomicWrite(filePath, Buffer.from([1, 2, 3]), { fsync: false })
    expect(await fs.promises.readdir(tmpDir)).toEqual(['file.bin'])
  })

  test('stages through tmpDir when given', async () => {
    const staging = path.join(tmpDir, 'staging')
    const filePath = path.join(tmpDir, 'out', 'file.bin')
    await atomicWrite(filePath, 'data', { tmpDir: staging })
    expect(await fs.promises.readFile(filePath, 'utf8')).toBe('data')
    expect(await fs.promises.readdir(staging)).toEqual([])
  })

  test('applies the requested mode', async () => {
    const filePath = path.join(tmpDir, 'tool')
    await atomicWrite(filePath, '#!/bin/sh\n', { mode: 0o755 })
    const stat = await fs.promises.stat(filePath)
    expect(stat.mode & 0o777).toBe(0o755)
  })
})

describe('atomicWriteJson', () => {
  test('writes pretty JSON with trailing newline', async () => {
    const tmpDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'atomic-test-'))
    try {
      const filePath = path.join(tmpDir, 'data.json')
      await atomicWriteJson(filePath, { a: 1 })
      expect(await fs.promises.readFile(filePath, 'utf8')).toBe('{\n  "a": 1\n}\n')
    } finally {
      await fs.promises.rm(tmpDir, { recursive: true, force: true })
    }
  })
})

describe('getTmpPath', () => {
  test('produces hidden tmp names beside the target', () => {
    const tmp = getTmpPath('/x/y/target.json')
    expect(path.dirname(tmp)).toBe('/x/y')
    expect(isTmpName(path.basename(tmp))).toBe(true)
    expect(path.basename(tmp).startsWith('.target.json.')).toBe(true)
  })

  test('isTmpName rejects ordinary names', () => {
    expect(isTmpName('abc123')).toBe(false)
    expect(isTmpName('.hidden')).toBe(false)
  })
})
