/**
 * Protobuf type hierarchy for the Envoy v3 messages this project emits
 *
 * Only the fields the builders set are defined. Field numbers match the
 * upstream envoyproxy/envoy v3 definitions; members of a oneof are declared
 * as plain fields since at most one of them is ever set.
 */
import protobuf from 'protobufjs'

type FieldSpec =
  | [name: string, id: number, type: string]
  | [name: string, id: number, type: string, rule: 'repeated']
  | [name: string, id: number, kind: 'map', keyType: string, valueType: string]

const CORE = 'envoy.config.core.v3'
const ROUTE = 'envoy.config.route.v3'
const HCM = 'envoy.extensions.filters.network.http_connection_manager.v3'
const JWT = 'envoy.extensions.filters.http.jwt_authn.v3'

const MESSAGES: Record<string, Record<string, FieldSpec[]>> = {
  'google.protobuf': {
    Any: [
      ['type_url', 1, 'string'],
      ['value', 2, 'bytes'],
    ],
    Duration: [
      ['seconds', 1, 'int64'],
      ['nanos', 2, 'int32'],
    ],
    StringValue: [['value', 1, 'string']],
  },
  [CORE]: {
    SocketAddress: [
      ['protocol', 1, 'int32'],
      ['address', 2, 'string'],
      ['port_value', 3, 'uint32'],
    ],
    Address: [['socket_address', 1, `${CORE}.SocketAddress`]],
    HttpUri: [
      ['uri', 1, 'string'],
      ['cluster', 2, 'string'],
      ['timeout', 3, 'google.protobuf.Duration'],
    ],
    RemoteDataSource: [
      ['http_uri', 1, `${CORE}.HttpUri`],
      ['sha256', 2, 'string'],
    ],
    AsyncDataSource: [['remote', 2, `${CORE}.RemoteDataSource`]],
    TransportSocket: [
      ['name', 1, 'string'],
      ['typed_config', 3, 'google.protobuf.Any'],
    ],
  },
  'envoy.extensions.transport_sockets.tls.v3': {
    UpstreamTlsContext: [['sni', 2, 'string']],
  },
  'envoy.config.endpoint.v3': {
    Endpoint: [['address', 1, `${CORE}.Address`]],
    LbEndpoint: [['endpoint', 1, 'envoy.config.endpoint.v3.Endpoint']],
    LocalityLbEndpoints: [
      ['lb_endpoints', 2, 'envoy.config.endpoint.v3.LbEndpoint', 'repeated'],
    ],
    ClusterLoadAssignment: [
      ['cluster_name', 1, 'string'],
      [
        'endpoints',
        2,
        'envoy.config.endpoint.v3.LocalityLbEndpoints',
        'repeated',
      ],
    ],
  },
  'envoy.config.cluster.v3': {
    Cluster: [
      ['name', 1, 'string'],
      ['type', 2, 'int32'],
      ['connect_timeout', 4, 'google.protobuf.Duration'],
      ['lb_policy', 6, 'int32'],
      ['transport_socket', 24, `${CORE}.TransportSocket`],
      [
        'load_assignment',
        33,
        'envoy.config.endpoint.v3.ClusterLoadAssignment',
      ],
    ],
  },
  [ROUTE]: {
    RouteMatch: [['prefix', 1, 'string']],
    RouteAction: [['cluster', 1, 'string']],
    Route: [
      ['match', 1, `${ROUTE}.RouteMatch`],
      ['route', 2, `${ROUTE}.RouteAction`],
    ],
    VirtualHost: [
      ['name', 1, 'string'],
      ['domains', 2, 'string', 'repeated'],
      ['routes', 3, `${ROUTE}.Route`, 'repeated'],
    ],
    RouteConfiguration: [
      ['name', 1, 'string'],
      ['virtual_hosts', 2, `${ROUTE}.VirtualHost`, 'repeated'],
    ],
  },
  'envoy.extensions.filters.http.router.v3': {
    Router: [],
  },
  [HCM]: {
    HttpFilter: [
      ['name', 1, 'string'],
      ['typed_config', 4, 'google.protobuf.Any'],
    ],
    HttpConnectionManager: [
      ['codec_type', 1, 'int32'],
      ['stat_prefix', 2, 'string'],
      ['route_config', 4, `${ROUTE}.RouteConfiguration`],
      ['http_filters', 5, `${HCM}.HttpFilter`, 'repeated'],
    ],
  },
  'envoy.config.listener.v3': {
    Filter: [
      ['name', 1, 'string'],
      ['typed_config', 4, 'google.protobuf.Any'],
    ],
    FilterChain: [
      ['filters', 3, 'envoy.config.listener.v3.Filter', 'repeated'],
    ],
    Listener: [
      ['name', 1, 'string'],
      ['address', 2, `${CORE}.Address`],
      ['filter_chains', 3, 'envoy.config.listener.v3.FilterChain', 'repeated'],
    ],
  },
  'envoy.extensions.wasm.v3': {
    VmConfig: [
      ['vm_id', 1, 'string'],
      ['runtime', 2, 'string'],
      ['code', 3, `${CORE}.AsyncDataSource`],
      ['configuration', 4, 'google.protobuf.Any'],
    ],
    PluginConfig: [
      ['name', 1, 'string'],
      ['root_id', 2, 'string'],
      ['vm_config', 3, 'envoy.extensions.wasm.v3.VmConfig'],
      ['configuration', 4, 'google.protobuf.Any'],
    ],
  },
  'envoy.extensions.filters.http.wasm.v3': {
    Wasm: [['config', 1, 'envoy.extensions.wasm.v3.PluginConfig']],
  },
  [JWT]: {
    RemoteJwks: [
      ['http_uri', 1, `${CORE}.HttpUri`],
      ['cache_duration', 2, 'google.protobuf.Duration'],
    ],
    JwtProvider: [
      ['issuer', 1, 'string'],
      ['audiences', 2, 'string', 'repeated'],
      ['remote_jwks', 3, `${JWT}.RemoteJwks`],
      ['forward', 5, 'bool'],
    ],
    JwtRequirement: [['provider_name', 1, 'string']],
    RequirementRule: [
      ['match', 1, `${ROUTE}.RouteMatch`],
      ['requires', 2, `${JWT}.JwtRequirement`],
    ],
    JwtAuthentication: [
      ['providers', 1, 'map', 'string', `${JWT}.JwtProvider`],
      ['rules', 2, `${JWT}.RequirementRule`, 'repeated'],
    ],
  },
}

function toField(spec: FieldSpec): protobuf.Field | protobuf.MapField {
  if (spec.length === 5) {
    const [name, id, , keyType, valueType] = spec
    return new protobuf.MapField(name, id, keyType, valueType)
  }
  const [name, id, type] = spec
  const rule = spec.length === 4 ? spec[3] : undefined
  return new protobuf.Field(name, id, type, rule)
}

let _root: protobuf.Root | undefined

export function getProtoRoot(): protobuf.Root {
  if (_root) return _root

  const root = new protobuf.Root()
  for (const [pkg, types] of Object.entries(MESSAGES)) {
    const namespace = root.define(pkg)
    for (const [typeName, fields] of Object.entries(types)) {
      const type = new protobuf.Type(typeName)
      for (const field of fields) {
        type.add(toField(field))
      }
      namespace.add(type)
    }
  }
  root.resolveAll()

  _root = root
  return root
}
