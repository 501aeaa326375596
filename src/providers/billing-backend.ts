import { basename, resolve } from 'path'
import type {
  BillingBackendAdapter,
  ContentHasher,
  ResourceEncoder,
} from '../interfaces/adapters'
import type { Cluster, Wasm } from '../interfaces/envoy'
import type { BillingAuthConfig } from '../interfaces/service'
import type { Logger } from '../interfaces/logger'
import type { ExportConfig } from '../config/export-config'
import { DEFAULT_EXPORT_CONFIG } from '../config/export-config'
import { EnvoyResourceEncoder } from '../encoding/resource-encoder'
import { sha256Hasher } from '../integrity/content-hasher'
import { buildWasmPlugin, runtimeOptions } from '../export/wasm-plugin'
import { defaultLogger } from '../logger/pino-logger'
import { describeError } from '../errors/export-error'

/** VM configuration the billing filter expects */
export const BILLING_VM_CONFIGURATION = 'vm config'

export interface BillingPluginOptions {
  config: ExportConfig
  encoder: ResourceEncoder
  hasher: ContentHasher
}

/**
 * Build the billing filter described by a service's `auth_config`
 *
 * The binary is served by the control plane under `static/` with the same
 * file name it has locally. A relative `path` is resolved against the asset
 * root, like the metering binary.
 */
export async function buildBillingPlugin(
  descriptor: BillingAuthConfig,
  serviceId: number,
  { config, encoder, hasher }: BillingPluginOptions,
): Promise<Wasm> {
  const fileName = basename(descriptor.path)
  if (!fileName) {
    throw new Error(`billing filter path '${descriptor.path}' has no file name`)
  }

  const localPath = resolve(config.assetRoot, descriptor.path)

  let sha256: string
  try {
    sha256 = await hasher.digest(localPath)
  } catch (error) {
    throw new Error(
      `could not compute SHA-256 of billing filter ${localPath}: ${describeError(error)}`,
      { cause: error },
    )
  }

  return buildWasmPlugin(
    {
      serviceId,
      codeUri: `${config.assetBaseUri}/static/${fileName}`,
      sha256,
      vmConfiguration: BILLING_VM_CONFIGURATION,
      pluginConfiguration: JSON.stringify(descriptor.wasm_config, null, 2),
    },
    runtimeOptions(config),
    encoder,
  )
}

export interface WasmBillingBackendOptions {
  config?: ExportConfig
  encoder?: ResourceEncoder
  hasher?: ContentHasher
  logger?: Logger
}

/**
 * Default {@link BillingBackendAdapter}: a WASM filter talking to the billing
 * backend through a dedicated cluster
 */
export class WasmBillingBackendAdapter implements BillingBackendAdapter {
  readonly name = 'billing'

  private readonly options: BillingPluginOptions
  private readonly logger: Logger

  constructor(options: WasmBillingBackendOptions = {}) {
    this.options = {
      config: options.config ?? DEFAULT_EXPORT_CONFIG,
      encoder: options.encoder ?? new EnvoyResourceEncoder(),
      hasher: options.hasher ?? sha256Hasher,
    }
    this.logger = options.logger ?? defaultLogger
  }

  cluster(descriptor: BillingAuthConfig): Cluster {
    const { cluster_name, url } = descriptor.wasm_config.backend
    return this.options.encoder.buildCluster(cluster_name, url)
  }

  async buildPlugin(descriptor: BillingAuthConfig, serviceId: number): Promise<Wasm> {
    const plugin = await buildBillingPlugin(descriptor, serviceId, this.options)
    this.logger.debug('Billing plugin built', {
      serviceId,
      backend: descriptor.wasm_config.backend.cluster_name,
    })
    return plugin
  }
}
