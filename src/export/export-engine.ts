/**
 * Service → Envoy resource compiler
 *
 * Turns one `Service` into a keyed, ordered bundle of Envoy resources:
 * the routing cluster, one auxiliary cluster per auth provider, and the
 * listener carrying the provider, metering and router filters.
 *
 * @example
 * ```ts
 * const engine = new ExportEngine({ config: { assetRoot: '/srv/control-plane' } })
 * const bundle = await engine.exportService(service)
 * for (const entry of bundle) {
 *   publish(entry.key, engine.encodeExport(entry))
 * }
 * ```
 */
import type {
  AuthProvider,
  BillingBackendAdapter,
  ContentHasher,
  IdentityDiscoveryAdapter,
  ResourceEncoder,
} from '../interfaces/adapters'
import type {
  Cluster,
  EnvoyExport,
  EnvoyResource,
  HttpFilter,
  Listener,
  ProtoAny,
} from '../interfaces/envoy'
import type { Service } from '../interfaces/service'
import type { Logger } from '../interfaces/logger'
import { mergeExportConfig, type ExportConfig } from '../config/export-config'
import { EnvoyResourceEncoder, TYPE_NAMES } from '../encoding/resource-encoder'
import { sha256Hasher } from '../integrity/content-hasher'
import { OidcDiscoveryAdapter } from '../providers/oidc-discovery'
import { WasmBillingBackendAdapter } from '../providers/billing-backend'
import { defaultLogger } from '../logger/pino-logger'
import {
  ExportError,
  describeError,
  type ExportFailureKind,
} from '../errors/export-error'
import { FILTER_NAMES, composeHttpFilters, httpFilter } from './filter-chain'
import { buildMeteringPlugin } from './wasm-plugin'
import { buildListener, buildServiceCluster } from './listener'
import { ExportableServiceSchema, formatIssues } from '../mapping/service-schema'

const RESERVED_KEY_PREFIX = 'service::id::'

export function serviceClusterKey(serviceId: number): string {
  return `${RESERVED_KEY_PREFIX}${serviceId}::cluster`
}

export function serviceListenerKey(serviceId: number): string {
  return `${RESERVED_KEY_PREFIX}${serviceId}::listener`
}

/**
 * Providers a service registers, in the order their filters run
 */
export function resolveAuthProviders(service: Service): AuthProvider[] {
  const providers: AuthProvider[] = []
  if (service.oidc_issuer) {
    providers.push({ kind: 'oidc', issuer: service.oidc_issuer })
  }
  if (service.auth_config) {
    providers.push({ kind: 'billing', backend: service.auth_config })
  }
  return providers
}

/**
 * Ordered keyed collector for one service's resources.
 * Two providers may contribute the same auxiliary key only with the same
 * cluster; the entry keeps its first position.
 */
export class ExportBundle {
  private readonly entries = new Map<string, EnvoyResource>()

  constructor(
    private readonly serviceId: number,
    private readonly encoder: ResourceEncoder,
  ) {}

  addCluster(key: string, cluster: Cluster): void {
    this.entries.set(key, { kind: 'cluster', cluster })
  }

  addAuxiliaryCluster(cluster: Cluster): void {
    if (cluster.name.startsWith(RESERVED_KEY_PREFIX)) {
      throw new ExportError(
        'EncodingFailure',
        this.serviceId,
        `auxiliary cluster '${cluster.name}' collides with a reserved key`,
      )
    }

    const existing = this.entries.get(cluster.name)
    if (existing) {
      if (existing.kind !== 'cluster' || !this.sameCluster(existing.cluster, cluster)) {
        throw new ExportError(
          'EncodingFailure',
          this.serviceId,
          `auxiliary cluster '${cluster.name}' is contributed twice with different settings`,
        )
      }
      return
    }
    this.addCluster(cluster.name, cluster)
  }

  addListener(key: string, listener: Listener): void {
    this.entries.set(key, { kind: 'listener', listener })
  }

  toArray(): EnvoyExport[] {
    return Array.from(this.entries, ([key, config]) => ({ key, config }))
  }

  private sameCluster(a: Cluster, b: Cluster): boolean {
    return Buffer.from(this.encoder.encode(TYPE_NAMES.cluster, a)).equals(
      Buffer.from(this.encoder.encode(TYPE_NAMES.cluster, b)),
    )
  }
}

interface ProviderContribution {
  cluster: Cluster
  filter: HttpFilter
}

export interface ExportEngineOptions {
  config?: Partial<ExportConfig>
  encoder?: ResourceEncoder
  hasher?: ContentHasher
  identityAdapter?: IdentityDiscoveryAdapter
  billingAdapter?: BillingBackendAdapter
  logger?: Logger
}

export class ExportEngine {
  readonly config: ExportConfig
  private readonly encoder: ResourceEncoder
  private readonly hasher: ContentHasher
  private readonly identityAdapter: IdentityDiscoveryAdapter
  private readonly billingAdapter: BillingBackendAdapter
  private readonly logger: Logger

  constructor(options: ExportEngineOptions = {}) {
    this.config = mergeExportConfig(options.config)
    this.logger = options.logger ?? defaultLogger
    this.encoder =
      options.encoder ??
      new EnvoyResourceEncoder({
        connectTimeoutSeconds: this.config.connectTimeoutSeconds,
      })
    this.hasher = options.hasher ?? sha256Hasher
    this.identityAdapter =
      options.identityAdapter ??
      new OidcDiscoveryAdapter({
        encoder: this.encoder,
        timeoutMs: this.config.discoveryTimeoutMs,
        logger: this.logger,
      })
    this.billingAdapter =
      options.billingAdapter ??
      new WasmBillingBackendAdapter({
        config: this.config,
        encoder: this.encoder,
        hasher: this.hasher,
        logger: this.logger,
      })
  }

  /**
   * Compile one service
   *
   * The service must be one the metering filter will import, with at least
   * one host; anything else is rejected before a resource is built.
   *
   * @returns the service cluster, the provider clusters, then the listener
   * @throws ExportError; no partial bundle is ever returned
   */
  async exportService(service: Service): Promise<EnvoyExport[]> {
    const startTime = Date.now()
    const log = this.logger.child({ serviceId: service.id })

    try {
      const validation = ExportableServiceSchema.safeParse(service)
      if (!validation.success) {
        throw new ExportError(
          'EncodingFailure',
          service.id,
          `invalid service: ${formatIssues(validation.error).join('; ')}`,
          { cause: validation.error },
        )
      }

      const bundle = new ExportBundle(service.id, this.encoder)

      bundle.addCluster(
        serviceClusterKey(service.id),
        await this.attempt(service.id, 'EncodingFailure', 'cannot build service cluster', () =>
          buildServiceCluster(service, this.encoder),
        ),
      )

      const providerFilters: HttpFilter[] = []
      for (const provider of resolveAuthProviders(service)) {
        const contribution = await this.activateProvider(service.id, provider)
        bundle.addAuxiliaryCluster(contribution.cluster)
        providerFilters.push(contribution.filter)
      }

      const metering = await buildMeteringPlugin(service, {
        config: this.config,
        encoder: this.encoder,
        hasher: this.hasher,
      })

      const listener = await this.attempt(
        service.id,
        'EncodingFailure',
        'cannot build listener',
        () => {
          const httpFilters = composeHttpFilters(
            this.encoder,
            providerFilters,
            httpFilter(this.encoder, FILTER_NAMES.wasm, TYPE_NAMES.wasm, metering),
          )
          return buildListener(service, httpFilters, this.encoder, this.config)
        },
      )
      bundle.addListener(serviceListenerKey(service.id), listener)

      const entries = bundle.toArray()
      const duration = Date.now() - startTime
      log.info('Service exported', { resources: entries.length, duration })
      log.logMetrics('export', 'service', duration, {
        serviceId: service.id,
        resources: entries.length,
      })
      return entries
    } catch (error) {
      const exportError =
        error instanceof ExportError
          ? error
          : new ExportError('EncodingFailure', service.id, describeError(error), {
              cause: error,
            })
      log.error('Service export failed', exportError, {
        code: exportError.code,
        adapter: exportError.adapter,
      })
      throw exportError
    }
  }

  /**
   * Compile several services concurrently and merge their bundles.
   * A key emitted by more than one service keeps the later service's value.
   *
   * The batch is all-or-nothing: when any service fails, nothing is returned
   * and the first failure is thrown.
   *
   * @throws ExportError when two services share an id or any service fails
   */
  async exportServices(services: Service[]): Promise<EnvoyExport[]> {
    const seen = new Set<number>()
    for (const service of services) {
      if (seen.has(service.id)) {
        throw new ExportError(
          'EncodingFailure',
          service.id,
          'duplicate service id in export batch',
        )
      }
      seen.add(service.id)
    }

    const bundles = await Promise.all(
      services.map((service) => this.exportService(service)),
    )

    const merged = new Map<string, EnvoyResource>()
    for (const bundle of bundles) {
      for (const entry of bundle) {
        merged.set(entry.key, entry.config)
      }
    }
    return Array.from(merged, ([key, config]) => ({ key, config }))
  }

  /**
   * Wire form of a compiled resource
   */
  encodeExport(entry: EnvoyExport): ProtoAny {
    const resource = entry.config
    switch (resource.kind) {
      case 'cluster':
        return this.encoder.toAny(TYPE_NAMES.cluster, resource.cluster)
      case 'listener':
        return this.encoder.toAny(TYPE_NAMES.listener, resource.listener)
      default: {
        const unreachable: never = resource
        throw new Error(`unknown resource ${JSON.stringify(unreachable)}`)
      }
    }
  }

  private async activateProvider(
    serviceId: number,
    provider: AuthProvider,
  ): Promise<ProviderContribution> {
    switch (provider.kind) {
      case 'oidc': {
        const adapter = this.identityAdapter.name
        const discovery = await this.attempt(
          serviceId,
          'AdapterFailure',
          `identity discovery for '${provider.issuer}' failed`,
          () => this.identityAdapter.discover(provider.issuer),
          adapter,
        )
        const filter = await this.attempt(
          serviceId,
          'EncodingFailure',
          'cannot encode JWT authentication filter',
          () =>
            httpFilter(
              this.encoder,
              FILTER_NAMES.jwtAuthn,
              TYPE_NAMES.jwtAuthentication,
              discovery.filter,
            ),
        )
        return { cluster: discovery.cluster, filter }
      }
      case 'billing': {
        const adapter = this.billingAdapter.name
        const cluster = await this.attempt(
          serviceId,
          'AdapterFailure',
          'cannot build billing backend cluster',
          () => this.billingAdapter.cluster(provider.backend),
          adapter,
        )
        const plugin = await this.attempt(
          serviceId,
          'AdapterFailure',
          'cannot build billing plugin',
          () => this.billingAdapter.buildPlugin(provider.backend, serviceId),
          adapter,
        )
        const filter = await this.attempt(
          serviceId,
          'EncodingFailure',
          'cannot encode billing filter',
          () => httpFilter(this.encoder, FILTER_NAMES.wasm, TYPE_NAMES.wasm, plugin),
        )
        return { cluster, filter }
      }
      default: {
        const unreachable: never = provider
        throw new Error(`unknown auth provider ${JSON.stringify(unreachable)}`)
      }
    }
  }

  private async attempt<T>(
    serviceId: number,
    kind: ExportFailureKind,
    message: string,
    step: () => T | Promise<T>,
    adapter?: string,
  ): Promise<T> {
    try {
      return await step()
    } catch (error) {
      if (error instanceof ExportError) {
        throw error
      }
      throw new ExportError(kind, serviceId, `${message}: ${describeError(error)}`, {
        adapter,
        cause: error,
      })
    }
  }
}
