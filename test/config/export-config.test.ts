import { describe, test, expect } from 'vitest'
import {
  DEFAULT_EXPORT_CONFIG,
  exportConfigFromEnv,
  mergeExportConfig,
  validateExportConfig,
} from '../../src/config/export-config'

describe('export configuration', () => {
  describe('validateExportConfig', () => {
    test('should accept the defaults', () => {
      expect(validateExportConfig({ ...DEFAULT_EXPORT_CONFIG })).toEqual({
        valid: true,
        errors: undefined,
      })
    })

    test('should collect every problem', () => {
      const result = validateExportConfig({
        ...DEFAULT_EXPORT_CONFIG,
        assetBaseUri: 'control-plane-main:5001',
        assetCluster: '',
        listenerPort: 0,
        discoveryTimeoutMs: -1,
      })

      expect(result.valid).toBe(false)
      expect(result.errors).toEqual([
        'assetBaseUri must be an http(s) URL',
        'assetCluster must not be empty',
        'listenerPort must be an integer between 1 and 65535',
        'discoveryTimeoutMs must be positive',
      ])
    })
  })

  describe('mergeExportConfig', () => {
    test('should fill unspecified fields from the defaults', () => {
      const config = mergeExportConfig({ listenerPort: 8080 })

      expect(config.listenerPort).toBe(8080)
      expect(config.assetCluster).toBe('wasm_files')
      expect(config.assetFetchTimeoutSeconds).toBe(100)
      expect(config.wasmRuntime).toBe('envoy.wasm.runtime.v8')
    })

    test('should drop trailing slashes from the asset base URI', () => {
      expect(
        mergeExportConfig({ assetBaseUri: 'https://assets.example.com/' }).assetBaseUri,
      ).toBe('https://assets.example.com')
    })

    test('should throw on invalid overrides', () => {
      expect(() => mergeExportConfig({ listenerPort: 70000 })).toThrow(
        'Invalid export configuration: listenerPort must be an integer between 1 and 65535',
      )
    })
  })

  describe('exportConfigFromEnv', () => {
    test('should read overrides from the environment', () => {
      expect(
        exportConfigFromEnv({
          CONTROL_PLANE_ASSET_BASE_URI: 'http://assets.internal:8000',
          CONTROL_PLANE_METERING_ASSET: 'static/metering.wasm',
          CONTROL_PLANE_ASSET_ROOT: '/srv/control-plane',
          CONTROL_PLANE_LISTENER_PORT: '10000',
        }),
      ).toEqual({
        assetBaseUri: 'http://assets.internal:8000',
        meteringAssetPath: 'static/metering.wasm',
        assetRoot: '/srv/control-plane',
        listenerPort: 10000,
      })
    })

    test('should ignore unset and empty variables', () => {
      expect(exportConfigFromEnv({ CONTROL_PLANE_ASSET_BASE_URI: '' })).toEqual({})
    })

    test('should let validation catch a non-numeric port', () => {
      const overrides = exportConfigFromEnv({ CONTROL_PLANE_LISTENER_PORT: 'eighty' })
      expect(() => mergeExportConfig(overrides)).toThrow(
        'listenerPort must be an integer between 1 and 65535',
      )
    })
  })
})
