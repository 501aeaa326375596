import { createHash } from 'crypto'
import { mkdtemp, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import pino from 'pino'
import type { ProtoAny } from '../../src/interfaces/envoy'
import type { Service } from '../../src/interfaces/service'
import { TYPE_URL_PREFIX } from '../../src/encoding/resource-encoder'
import { getProtoRoot } from '../../src/encoding/proto-root'
import type { LogLevel, Logger } from '../../src/interfaces/logger'
import { ControlPlaneLogger, createLogger } from '../../src/logger/pino-logger'

export const silentLogger = createLogger({ level: 'silent' })

/**
 * Logger whose JSON lines are kept in memory
 */
export function captureLogger(level: LogLevel = 'debug'): {
  logger: Logger
  records: () => Record<string, unknown>[]
} {
  const lines: string[] = []
  const instance = pino(
    { level },
    {
      write(line: string) {
        lines.push(line)
      },
    },
  )
  return {
    logger: new ControlPlaneLogger({ level }, instance),
    records: () => lines.map((line): Record<string, unknown> => JSON.parse(line)),
  }
}

export function makeService(overrides: Partial<Service> = {}): Service {
  return {
    id: 42,
    hosts: ['api.example.com'],
    policies: [],
    target_domain: 'backend.internal:8080',
    proxy_rules: [
      {
        pattern: '/widgets',
        http_method: 'GET',
        metric_system_name: 'hits',
        delta: 1,
      },
    ],
    ...overrides,
  }
}

export function sha256Hex(content: string | Uint8Array): string {
  return createHash('sha256').update(content).digest('hex')
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'envoy-service-compiler-'))
}

export async function writeAsset(
  dir: string,
  name: string,
  content: string,
): Promise<string> {
  const path = join(dir, name)
  await writeFile(path, content)
  return path
}

/**
 * Decode an `Any` back into a plain object with snake_case field names
 */
export function decodeAny(any: ProtoAny) {
  const typeName = any.type_url.slice(TYPE_URL_PREFIX.length)
  const MsgType = getProtoRoot().lookupType(typeName)
  return MsgType.toObject(MsgType.decode(any.value), { longs: Number })
}
