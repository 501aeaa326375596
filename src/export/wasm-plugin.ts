/**
 * WASM plugin descriptors
 *
 * Every WASM filter the control plane emits fetches its binary from the
 * control plane over HTTP. The descriptor pins the SHA-256 of the binary and
 * the proxy refuses a download that does not match it.
 *
 * The metering filter receives the whole serialized `Service` as its plugin
 * configuration, which is how its mapping rules reach the data plane.
 */
import { resolve } from 'path'
import type { ContentHasher, ResourceEncoder } from '../interfaces/adapters'
import type { ProtoAny, VmConfig, Wasm } from '../interfaces/envoy'
import type { Service } from '../interfaces/service'
import type { ExportConfig } from '../config/export-config'
import { TYPE_NAMES } from '../encoding/resource-encoder'
import { ExportError, describeError } from '../errors/export-error'

/**
 * Remote fetch settings shared by every WASM filter
 */
export interface WasmRuntimeOptions {
  assetCluster: string
  fetchTimeoutSeconds: number
  runtime: string
}

export interface WasmPluginSpec {
  serviceId: number
  /** Where the proxy fetches the binary */
  codeUri: string
  /** Lowercase hex SHA-256 of the binary */
  sha256: string
  /** Plugin-level configuration string */
  pluginConfiguration: string
  /** VM-level configuration string */
  vmConfiguration?: string
}

export function pluginName(serviceId: number): string {
  return `Service::${serviceId}`
}

export function runtimeOptions(config: ExportConfig): WasmRuntimeOptions {
  return {
    assetCluster: config.assetCluster,
    fetchTimeoutSeconds: config.assetFetchTimeoutSeconds,
    runtime: config.wasmRuntime,
  }
}

function stringValue(encoder: ResourceEncoder, value: string): ProtoAny {
  return encoder.toAny(TYPE_NAMES.stringValue, { value })
}

/**
 * Serialize a service to the JSON document the metering filter imports.
 * Absent optional fields are written as `null`.
 */
export function serializeService(service: Service): string {
  return JSON.stringify({
    id: service.id,
    hosts: service.hosts,
    policies: service.policies,
    target_domain: service.target_domain,
    proxy_rules: service.proxy_rules.map((rule) => ({
      pattern: rule.pattern,
      http_method: rule.http_method,
      metric_system_name: rule.metric_system_name,
      delta: rule.delta,
    })),
    oidc_issuer: service.oidc_issuer ?? null,
    auth_config: service.auth_config ?? null,
  })
}

/**
 * Build a `Wasm` filter message whose VM, root and plugin are all named
 * after the service
 */
export function buildWasmPlugin(
  spec: WasmPluginSpec,
  runtime: WasmRuntimeOptions,
  encoder: ResourceEncoder,
): Wasm {
  const name = pluginName(spec.serviceId)

  const vmConfig: VmConfig = {
    vm_id: name,
    runtime: runtime.runtime,
    code: {
      remote: {
        http_uri: {
          uri: spec.codeUri,
          cluster: runtime.assetCluster,
          timeout: { seconds: runtime.fetchTimeoutSeconds, nanos: 0 },
        },
        sha256: spec.sha256,
      },
    },
  }

  if (spec.vmConfiguration !== undefined) {
    vmConfig.configuration = stringValue(encoder, spec.vmConfiguration)
  }

  return {
    config: {
      name,
      root_id: name,
      vm_config: vmConfig,
      configuration: stringValue(encoder, spec.pluginConfiguration),
    },
  }
}

export interface MeteringPluginOptions {
  config: ExportConfig
  encoder: ResourceEncoder
  hasher: ContentHasher
}

/**
 * Build the usage metering filter for a service
 *
 * @throws ExportError (`AssetIntegrityFailure`) when the metering binary cannot
 *   be read
 */
export async function buildMeteringPlugin(
  service: Service,
  { config, encoder, hasher }: MeteringPluginOptions,
): Promise<Wasm> {
  const localPath = resolve(config.assetRoot, config.meteringAssetPath)

  let sha256: string
  try {
    sha256 = await hasher.digest(localPath)
  } catch (error) {
    throw new ExportError(
      'AssetIntegrityFailure',
      service.id,
      `could not compute SHA-256 of metering filter ${localPath}: ${describeError(error)}`,
      { cause: error },
    )
  }

  const remotePath = config.meteringAssetPath.replace(/^\/+/, '')

  return buildWasmPlugin(
    {
      serviceId: service.id,
      codeUri: `${config.assetBaseUri}/${remotePath}`,
      sha256,
      pluginConfiguration: serializeService(service),
    },
    runtimeOptions(config),
    encoder,
  )
}
