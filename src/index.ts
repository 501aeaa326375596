/**
 * Compiles backend service descriptors into Envoy proxy resources
 *
 * Each `Service` becomes a routing cluster, one cluster per auth provider it
 * registers, and a listener whose HTTP filters run authentication, usage
 * metering and routing in that order. The metering filter receives the
 * service itself as configuration; `MappingRuleEngine` is the logic it runs
 * per request.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { ExportEngine } from 'envoy-service-compiler'
 *
 * const engine = new ExportEngine({
 *   config: { assetRoot: '/srv/control-plane', listenerPort: 8080 },
 * })
 *
 * const bundle = await engine.exportService({
 *   id: 42,
 *   hosts: ['api.example.com'],
 *   policies: [],
 *   target_domain: 'https://backend.internal',
 *   proxy_rules: [
 *     { pattern: '/widgets', http_method: 'GET', metric_system_name: 'hits', delta: 1 },
 *   ],
 *   oidc_issuer: 'https://id.example.com',
 * })
 * // keys: service::id::42::cluster, oidc::id.example.com:443, service::id::42::listener
 * ```
 */

// ==================== CORE CLASSES ====================

// Export engine
export {
  ExportEngine,
  ExportBundle,
  resolveAuthProviders,
  serviceClusterKey,
  serviceListenerKey,
} from './export/export-engine'
export type { ExportEngineOptions } from './export/export-engine'

// Filter chain, plugins and listeners
export {
  FILTER_NAMES,
  httpFilter,
  routerFilter,
  composeHttpFilters,
} from './export/filter-chain'
export {
  buildWasmPlugin,
  buildMeteringPlugin,
  serializeService,
  pluginName,
} from './export/wasm-plugin'
export type {
  WasmPluginSpec,
  WasmRuntimeOptions,
  MeteringPluginOptions,
} from './export/wasm-plugin'
export {
  buildServiceCluster,
  buildListener,
  buildRouteConfiguration,
  serviceClusterName,
  listenerName,
} from './export/listener'

// Adapters
export {
  OidcDiscoveryAdapter,
  oidcProviderName,
  oidcClusterName,
} from './providers/oidc-discovery'
export type { OidcDiscoveryOptions, FetchLike } from './providers/oidc-discovery'
export {
  WasmBillingBackendAdapter,
  buildBillingPlugin,
  BILLING_VM_CONFIGURATION,
} from './providers/billing-backend'
export type { WasmBillingBackendOptions } from './providers/billing-backend'

// Encoding and integrity
export {
  EnvoyResourceEncoder,
  TYPE_NAMES,
  TYPE_URL_PREFIX,
  typeUrl,
  parseUpstreamAddress,
} from './encoding/resource-encoder'
export type { UpstreamAddress } from './encoding/resource-encoder'
export { getProtoRoot } from './encoding/proto-root'
export { Sha256ContentHasher, sha256Hasher } from './integrity/content-hasher'

// Data-plane rule engine
export { MappingRuleEngine } from './mapping/rule-engine'
export type { MatchResult, MappingRuleEngineOptions } from './mapping/rule-engine'
export {
  STANDARD_HTTP_METHODS,
  parseHttpMethod,
  sameMethod,
} from './mapping/http-method'
export type { HttpMethod, StandardHttpMethod } from './mapping/http-method'
export {
  ServiceSchema,
  ExportableServiceSchema,
  MappingRuleSchema,
} from './mapping/service-schema'

// Logger
export { ControlPlaneLogger, createLogger, defaultLogger } from './logger/pino-logger'

// ==================== CONFIGURATION ====================

export {
  DEFAULT_EXPORT_CONFIG,
  validateExportConfig,
  mergeExportConfig,
  exportConfigFromEnv,
} from './config/export-config'
export type { ExportConfig, ValidationResult } from './config/export-config'

// ==================== ERRORS ====================

export {
  ExportError,
  ConfigParseError,
  ConfigBusyError,
  describeError,
} from './errors/export-error'
export type { ExportFailureKind, ExportErrorJSON } from './errors/export-error'

// ==================== INTERFACES & TYPES ====================

export * from './interfaces'
