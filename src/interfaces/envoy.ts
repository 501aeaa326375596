/**
 * Envoy v3 resource shapes
 *
 * Plain-object mirrors of the subset of the Envoy API this project emits.
 * Field names are the proto field names, so an object can be handed straight
 * to the protobuf encoder.
 */

/**
 * google.protobuf.Any
 */
export interface ProtoAny {
  type_url: string
  value: Uint8Array
}

/**
 * google.protobuf.Duration
 */
export interface Duration {
  seconds: number
  nanos?: number
}

export interface SocketAddress {
  address: string
  port_value: number
}

export interface Address {
  socket_address: SocketAddress
}

/**
 * Cluster discovery types (envoy.config.cluster.v3.Cluster.DiscoveryType)
 */
export const DiscoveryType = {
  STATIC: 0,
  STRICT_DNS: 1,
  LOGICAL_DNS: 2,
} as const

export type DiscoveryType = (typeof DiscoveryType)[keyof typeof DiscoveryType]

export const LB_POLICY_ROUND_ROBIN = 0
export const CODEC_TYPE_AUTO = 0

export interface TransportSocket {
  name: string
  typed_config: ProtoAny
}

export interface LbEndpoint {
  endpoint: { address: Address }
}

export interface ClusterLoadAssignment {
  cluster_name: string
  endpoints: Array<{ lb_endpoints: LbEndpoint[] }>
}

export interface Cluster {
  name: string
  type: DiscoveryType
  connect_timeout: Duration
  lb_policy: number
  load_assignment: ClusterLoadAssignment
  transport_socket?: TransportSocket
}

export interface RouteMatch {
  prefix: string
}

export interface Route {
  match: RouteMatch
  route: { cluster: string }
}

export interface VirtualHost {
  name: string
  domains: string[]
  routes: Route[]
}

export interface RouteConfiguration {
  name: string
  virtual_hosts: VirtualHost[]
}

/**
 * One entry of the HTTP connection manager's filter list:
 * a name plus a type-tagged, already encoded payload
 */
export interface HttpFilter {
  name: string
  typed_config: ProtoAny
}

export interface HttpConnectionManager {
  codec_type: number
  stat_prefix: string
  route_config: RouteConfiguration
  http_filters: HttpFilter[]
}

export interface NetworkFilter {
  name: string
  typed_config: ProtoAny
}

export interface FilterChain {
  filters: NetworkFilter[]
}

export interface Listener {
  name: string
  address: Address
  filter_chains: FilterChain[]
}

export interface HttpUri {
  uri: string
  cluster: string
  timeout: Duration
}

export interface RemoteDataSource {
  http_uri: HttpUri
  /** Lowercase hex SHA-256 of the fetched bytes */
  sha256: string
}

export interface VmConfig {
  vm_id: string
  runtime: string
  code: { remote: RemoteDataSource }
  configuration?: ProtoAny
}

export interface PluginConfig {
  name: string
  root_id: string
  vm_config: VmConfig
  configuration?: ProtoAny
}

/**
 * envoy.extensions.filters.http.wasm.v3.Wasm
 */
export interface Wasm {
  config: PluginConfig
}

export interface RemoteJwks {
  http_uri: HttpUri
  cache_duration?: Duration
}

export interface JwtProvider {
  issuer: string
  audiences?: string[]
  remote_jwks: RemoteJwks
  forward?: boolean
}

export interface RequirementRule {
  match: RouteMatch
  requires: { provider_name: string }
}

/**
 * envoy.extensions.filters.http.jwt_authn.v3.JwtAuthentication
 */
export interface JwtAuthentication {
  providers: Record<string, JwtProvider>
  rules: RequirementRule[]
}

/**
 * A compiled top-level resource
 */
export type EnvoyResource =
  | { kind: 'cluster'; cluster: Cluster }
  | { kind: 'listener'; listener: Listener }

/**
 * One keyed entry of a compiled bundle
 *
 * Keys are unique within one export; the distribution layer replaces an
 * existing resource when it receives one with the same key.
 */
export interface EnvoyExport {
  key: string
  config: EnvoyResource
}
