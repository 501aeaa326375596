/**
 * Export configuration schema and validation
 */

/**
 * Validation result returned by configuration validators
 */
export interface ValidationResult {
  valid: boolean
  errors?: string[]
}

/**
 * Settings shared by every service compiled in one control plane
 */
export interface ExportConfig {
  /**
   * Base URI the data plane fetches WASM binaries from
   * @default 'http://control-plane-main:5001'
   */
  assetBaseUri: string

  /**
   * Metering filter binary, relative to `assetRoot` locally and to
   * `assetBaseUri` remotely
   * @default 'static/filter.wasm'
   */
  meteringAssetPath: string

  /**
   * Local directory `meteringAssetPath` resolves against
   * @default process.cwd()
   */
  assetRoot: string

  /**
   * Cluster the data plane uses to reach `assetBaseUri`
   * @default 'wasm_files'
   */
  assetCluster: string

  /**
   * Remote fetch timeout for WASM binaries
   * @default 100
   */
  assetFetchTimeoutSeconds: number

  /**
   * @default '0.0.0.0'
   */
  listenerAddress: string

  /**
   * @default 80
   */
  listenerPort: number

  /**
   * @default 'ingress_http'
   */
  statPrefix: string

  /**
   * Upstream connect timeout for generated clusters
   * @default 5
   */
  connectTimeoutSeconds: number

  /**
   * @default 'envoy.wasm.runtime.v8'
   */
  wasmRuntime: string

  /**
   * Timeout for each identity provider metadata request
   * @default 5000
   */
  discoveryTimeoutMs: number
}

export const DEFAULT_EXPORT_CONFIG: Readonly<ExportConfig> = {
  assetBaseUri: 'http://control-plane-main:5001',
  meteringAssetPath: 'static/filter.wasm',
  assetRoot: process.cwd(),
  assetCluster: 'wasm_files',
  assetFetchTimeoutSeconds: 100,
  listenerAddress: '0.0.0.0',
  listenerPort: 80,
  statPrefix: 'ingress_http',
  connectTimeoutSeconds: 5,
  wasmRuntime: 'envoy.wasm.runtime.v8',
  discoveryTimeoutMs: 5000,
}

/**
 * Validates an export configuration
 */
export function validateExportConfig(config: ExportConfig): ValidationResult {
  const errors: string[] = []

  if (!/^https?:\/\/[^/]+/.test(config.assetBaseUri)) {
    errors.push('assetBaseUri must be an http(s) URL')
  }

  if (!config.meteringAssetPath) {
    errors.push('meteringAssetPath must not be empty')
  }

  if (!config.assetCluster) {
    errors.push('assetCluster must not be empty')
  }

  if (
    !Number.isInteger(config.listenerPort) ||
    config.listenerPort < 1 ||
    config.listenerPort > 65535
  ) {
    errors.push('listenerPort must be an integer between 1 and 65535')
  }

  if (config.assetFetchTimeoutSeconds <= 0) {
    errors.push('assetFetchTimeoutSeconds must be positive')
  }

  if (config.connectTimeoutSeconds <= 0) {
    errors.push('connectTimeoutSeconds must be positive')
  }

  if (config.discoveryTimeoutMs <= 0) {
    errors.push('discoveryTimeoutMs must be positive')
  }

  return {
    valid: errors.length === 0,
    errors: errors.length > 0 ? errors : undefined,
  }
}

/**
 * Merges user config with defaults
 * @throws Error when the merged configuration is invalid
 */
export function mergeExportConfig(
  userConfig: Partial<ExportConfig> = {},
): ExportConfig {
  const merged: ExportConfig = {
    ...DEFAULT_EXPORT_CONFIG,
    ...userConfig,
    assetBaseUri: (
      userConfig.assetBaseUri ?? DEFAULT_EXPORT_CONFIG.assetBaseUri
    ).replace(/\/+$/, ''),
  }

  const result = validateExportConfig(merged)
  if (!result.valid) {
    throw new Error(`Invalid export configuration: ${result.errors?.join('; ')}`)
  }

  return merged
}

/**
 * Reads configuration overrides from environment variables
 *
 * - `CONTROL_PLANE_ASSET_BASE_URI`
 * - `CONTROL_PLANE_METERING_ASSET`
 * - `CONTROL_PLANE_ASSET_ROOT`
 * - `CONTROL_PLANE_LISTENER_PORT`
 */
export function exportConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): Partial<ExportConfig> {
  const overrides: Partial<ExportConfig> = {}

  if (env.CONTROL_PLANE_ASSET_BASE_URI) {
    overrides.assetBaseUri = env.CONTROL_PLANE_ASSET_BASE_URI
  }
  if (env.CONTROL_PLANE_METERING_ASSET) {
    overrides.meteringAssetPath = env.CONTROL_PLANE_METERING_ASSET
  }
  if (env.CONTROL_PLANE_ASSET_ROOT) {
    overrides.assetRoot = env.CONTROL_PLANE_ASSET_ROOT
  }
  if (env.CONTROL_PLANE_LISTENER_PORT) {
    overrides.listenerPort = Number(env.CONTROL_PLANE_LISTENER_PORT)
  }

  return overrides
}
