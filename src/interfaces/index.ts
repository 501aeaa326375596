/**
 * Type definitions shared by the export engine, its adapters and the rule
 * engine
 *
 * @example
 * ```ts
 * import type { Service, EnvoyExport } from 'envoy-service-compiler'
 * ```
 */

// Service descriptors
export type {
  JsonValue,
  MappingRule,
  PolicyConfig,
  BillingBackend,
  BillingWasmConfig,
  BillingAuthConfig,
  Service,
} from './service'

// Envoy resource shapes
export type {
  ProtoAny,
  Duration,
  SocketAddress,
  Address,
  TransportSocket,
  LbEndpoint,
  ClusterLoadAssignment,
  Cluster,
  RouteMatch,
  Route,
  VirtualHost,
  RouteConfiguration,
  HttpFilter,
  HttpConnectionManager,
  NetworkFilter,
  FilterChain,
  Listener,
  HttpUri,
  RemoteDataSource,
  VmConfig,
  PluginConfig,
  Wasm,
  RemoteJwks,
  JwtProvider,
  RequirementRule,
  JwtAuthentication,
  EnvoyResource,
  EnvoyExport,
} from './envoy'
export { DiscoveryType, LB_POLICY_ROUND_ROBIN, CODEC_TYPE_AUTO } from './envoy'

// Pluggable collaborators
export type {
  ResourceEncoder,
  ContentHasher,
  IdentityDiscovery,
  IdentityDiscoveryAdapter,
  BillingBackendAdapter,
  AuthProvider,
} from './adapters'

// Logging
export type { Logger, LoggerConfig, LogLevel } from './logger'
