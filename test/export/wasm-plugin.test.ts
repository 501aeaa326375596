import { describe, test, expect, beforeAll, afterAll } from 'vitest'
import { mkdir, rm } from 'fs/promises'
import { join } from 'path'
import {
  buildMeteringPlugin,
  buildWasmPlugin,
  pluginName,
  serializeService,
} from '../../src/export/wasm-plugin'
import { mergeExportConfig, type ExportConfig } from '../../src/config/export-config'
import { EnvoyResourceEncoder, TYPE_NAMES } from '../../src/encoding/resource-encoder'
import { sha256Hasher } from '../../src/integrity/content-hasher'
import { ExportError } from '../../src/errors/export-error'
import {
  decodeAny,
  makeService,
  makeTempDir,
  sha256Hex,
  writeAsset,
} from '../fixtures/services'

describe('serializeService', () => {
  test('should write absent optional fields as null', () => {
    expect(serializeService(makeService())).toBe(
      '{"id":42,"hosts":["api.example.com"],"policies":[],' +
        '"target_domain":"backend.internal:8080",' +
        '"proxy_rules":[{"pattern":"/widgets","http_method":"GET","metric_system_name":"hits","delta":1}],' +
        '"oidc_issuer":null,"auth_config":null}',
    )
  })

  test('should keep a fixed key order regardless of input order', () => {
    const service = makeService({ oidc_issuer: 'https://id.example.com' })
    const reordered = {
      oidc_issuer: service.oidc_issuer,
      proxy_rules: service.proxy_rules,
      target_domain: service.target_domain,
      policies: service.policies,
      hosts: service.hosts,
      id: service.id,
    }
    expect(serializeService(reordered)).toBe(serializeService(service))
  })
})

describe('buildWasmPlugin', () => {
  const encoder = new EnvoyResourceEncoder()

  test('should name the VM, root and plugin after the service', () => {
    const wasm = buildWasmPlugin(
      {
        serviceId: 9,
        codeUri: 'http://assets.internal/static/billing.wasm',
        sha256: 'abc123',
        pluginConfiguration: '{}',
        vmConfiguration: 'vm config',
      },
      { assetCluster: 'wasm_files', fetchTimeoutSeconds: 100, runtime: 'envoy.wasm.runtime.v8' },
      encoder,
    )

    expect(pluginName(9)).toBe('Service::9')
    expect(wasm.config.name).toBe('Service::9')
    expect(wasm.config.root_id).toBe('Service::9')
    expect(wasm.config.vm_config.vm_id).toBe('Service::9')
    expect(wasm.config.vm_config.configuration).toBeDefined()
    if (wasm.config.vm_config.configuration) {
      expect(decodeAny(wasm.config.vm_config.configuration)).toEqual({
        value: 'vm config',
      })
    }
  })
})

describe('buildMeteringPlugin', () => {
  const encoder = new EnvoyResourceEncoder()
  let dir: string
  let config: ExportConfig

  beforeAll(async () => {
    dir = await makeTempDir()
    await mkdir(join(dir, 'static'))
    await writeAsset(join(dir, 'static'), 'filter.wasm', 'metering-binary')
    config = mergeExportConfig({ assetRoot: dir })
  })

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  test('should describe a remote, hash-pinned module', async () => {
    const service = makeService()
    const wasm = await buildMeteringPlugin(service, {
      config,
      encoder,
      hasher: sha256Hasher,
    })

    const vmConfig = wasm.config.vm_config
    expect(vmConfig.runtime).toBe('envoy.wasm.runtime.v8')
    expect(vmConfig.code.remote).toEqual({
      http_uri: {
        uri: 'http://control-plane-main:5001/static/filter.wasm',
        cluster: 'wasm_files',
        timeout: { seconds: 100, nanos: 0 },
      },
      sha256: sha256Hex('metering-binary'),
    })
    expect(vmConfig.configuration).toBeUndefined()
  })

  test('should carry the serialized service as plugin configuration', async () => {
    const service = makeService()
    const wasm = await buildMeteringPlugin(service, {
      config,
      encoder,
      hasher: sha256Hasher,
    })

    expect(wasm.config.configuration?.type_url).toBe(
      'type.googleapis.com/google.protobuf.StringValue',
    )
    if (wasm.config.configuration) {
      expect(decodeAny(wasm.config.configuration)).toEqual({
        value: serializeService(service),
      })
    }
  })

  test('should survive protobuf encoding', async () => {
    const wasm = await buildMeteringPlugin(makeService(), {
      config,
      encoder,
      hasher: sha256Hasher,
    })

    const decoded = decodeAny(encoder.toAny(TYPE_NAMES.wasm, wasm))
    expect(decoded.config.name).toBe('Service::42')
    expect(decoded.config.vm_config.code.remote.sha256).toBe(
      sha256Hex('metering-binary'),
    )
    expect(decoded.config.vm_config.code.remote.http_uri.timeout.seconds).toBe(100)
  })

  test('should fail with an asset integrity error when the module is missing', async () => {
    const missing = mergeExportConfig({ assetRoot: join(dir, 'nowhere') })

    const error = await buildMeteringPlugin(makeService(), {
      config: missing,
      encoder,
      hasher: sha256Hasher,
    }).catch((caught: unknown) => caught)

    expect(error).toBeInstanceOf(ExportError)
    if (error instanceof ExportError) {
      expect(error.code).toBe('AssetIntegrityFailure')
      expect(error.serviceId).toBe(42)
      expect(error.message).toContain(
        'service 42: could not compute SHA-256 of metering filter',
      )
    }
  })
})
