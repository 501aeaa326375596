import { createHash } from 'crypto'
import { createReadStream } from 'fs'
import type { ContentHasher } from '../interfaces/adapters'

/**
 * Streams a file through SHA-256
 *
 * The data plane compares the digest byte-for-byte against what it fetched,
 * so the output is always lowercase hex.
 */
export class Sha256ContentHasher implements ContentHasher {
  async digest(path: string): Promise<string> {
    const hash = createHash('sha256')
    for await (const chunk of createReadStream(path)) {
      hash.update(chunk)
    }
    return hash.digest('hex')
  }
}

export const sha256Hasher: ContentHasher = new Sha256ContentHasher()
