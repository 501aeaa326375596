import { describe, test, expect, beforeAll, afterAll } from 'vitest'
import { rm } from 'fs/promises'
import { join } from 'path'
import { Sha256ContentHasher } from '../../src/integrity/content-hasher'
import { makeTempDir, sha256Hex, writeAsset } from '../fixtures/services'

describe('Sha256ContentHasher', () => {
  const hasher = new Sha256ContentHasher()
  let dir: string

  beforeAll(async () => {
    dir = await makeTempDir()
  })

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  test('should return the lowercase hex SHA-256 of the file', async () => {
    const path = await writeAsset(dir, 'hello.wasm', 'hello')

    expect(await hasher.digest(path)).toBe(
      '2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824',
    )
  })

  test('should hash empty files', async () => {
    const path = await writeAsset(dir, 'empty.wasm', '')

    expect(await hasher.digest(path)).toBe(
      'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855',
    )
  })

  test('should hash files larger than one read chunk', async () => {
    const content = 'x'.repeat(200_000)
    const path = await writeAsset(dir, 'large.wasm', content)

    expect(await hasher.digest(path)).toBe(sha256Hex(content))
  })

  test('should reject when the file does not exist', async () => {
    await expect(hasher.digest(join(dir, 'missing.wasm'))).rejects.toThrow(
      'ENOENT',
    )
  })
})
