/**
 * Protobuf encoder and generic cluster builder
 *
 * @example
 * ```ts
 * const encoder = new EnvoyResourceEncoder({ connectTimeoutSeconds: 5 })
 * const cluster = encoder.buildCluster('Cluster::service::42', 'backend.internal:8080')
 * const any = encoder.toAny(TYPE_NAMES.cluster, cluster)
 * ```
 */
import { isIP } from 'net'
import type { ResourceEncoder } from '../interfaces/adapters'
import {
  DiscoveryType,
  LB_POLICY_ROUND_ROBIN,
  type Cluster,
  type ProtoAny,
} from '../interfaces/envoy'
import { getProtoRoot } from './proto-root'

export const TYPE_URL_PREFIX = 'type.googleapis.com/'

/**
 * Fully qualified names of the messages wrapped in `Any`
 */
export const TYPE_NAMES = {
  cluster: 'envoy.config.cluster.v3.Cluster',
  listener: 'envoy.config.listener.v3.Listener',
  httpConnectionManager:
    'envoy.extensions.filters.network.http_connection_manager.v3.HttpConnectionManager',
  router: 'envoy.extensions.filters.http.router.v3.Router',
  wasm: 'envoy.extensions.filters.http.wasm.v3.Wasm',
  jwtAuthentication:
    'envoy.extensions.filters.http.jwt_authn.v3.JwtAuthentication',
  stringValue: 'google.protobuf.StringValue',
  upstreamTlsContext:
    'envoy.extensions.transport_sockets.tls.v3.UpstreamTlsContext',
} as const

export function typeUrl(typeName: string): string {
  return `${TYPE_URL_PREFIX}${typeName}`
}

/**
 * Parsed form of an upstream address
 */
export interface UpstreamAddress {
  host: string
  port: number
  tls: boolean
}

const DEFAULT_PORTS: Record<string, number> = {
  'http:': 80,
  'https:': 443,
}

function parsePort(raw: string | undefined, fallback: number, address: string): number {
  if (raw === undefined || raw === '') {
    return fallback
  }
  const port = Number(raw)
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`invalid port in upstream address '${address}'`)
  }
  return port
}

/**
 * Parse `host`, `host:port`, `[v6]:port` or an `http(s)://` URL
 * @throws Error when the address is empty or malformed
 */
export function parseUpstreamAddress(address: string): UpstreamAddress {
  const trimmed = address.trim()
  if (!trimmed) {
    throw new Error('upstream address is empty')
  }

  if (trimmed.includes('://')) {
    let url: URL
    try {
      url = new URL(trimmed)
    } catch (error) {
      throw new Error(`invalid upstream URL '${address}'`, { cause: error })
    }
    const defaultPort = DEFAULT_PORTS[url.protocol]
    if (defaultPort === undefined) {
      throw new Error(`unsupported scheme '${url.protocol}' in '${address}'`)
    }
    const host = url.hostname.replace(/^\[(.*)\]$/, '$1')
    if (!host) {
      throw new Error(`missing host in upstream URL '${address}'`)
    }
    return {
      host,
      port: parsePort(url.port, defaultPort, address),
      tls: url.protocol === 'https:',
    }
  }

  const match =
    /^\[([^\]]+)\](?::(\d+))?$/.exec(trimmed) ??
    /^([^\s:/[\]]+)(?::(\d+))?$/.exec(trimmed)
  if (!match?.[1]) {
    throw new Error(`invalid upstream address '${address}'`)
  }

  return {
    host: match[1],
    port: parsePort(match[2], 80, address),
    tls: false,
  }
}

export interface EnvoyResourceEncoderOptions {
  /** @default 5 */
  connectTimeoutSeconds?: number
}

/**
 * protobufjs-backed {@link ResourceEncoder}
 */
export class EnvoyResourceEncoder implements ResourceEncoder {
  private readonly connectTimeoutSeconds: number

  constructor(options: EnvoyResourceEncoderOptions = {}) {
    this.connectTimeoutSeconds = options.connectTimeoutSeconds ?? 5
  }

  encode(typeName: string, message: object): Uint8Array {
    const MsgType = getProtoRoot().lookupType(typeName)
    const invalid = MsgType.verify(message)
    if (invalid) {
      throw new Error(`cannot encode ${typeName}: ${invalid}`)
    }
    return MsgType.encode(MsgType.fromObject(message)).finish()
  }

  toAny(typeName: string, message: object): ProtoAny {
    return {
      type_url: typeUrl(typeName),
      value: this.encode(typeName, message),
    }
  }

  buildCluster(name: string, address: string): Cluster {
    const upstream = parseUpstreamAddress(address)

    const cluster: Cluster = {
      name,
      type: isIP(upstream.host) ? DiscoveryType.STATIC : DiscoveryType.LOGICAL_DNS,
      connect_timeout: { seconds: this.connectTimeoutSeconds, nanos: 0 },
      lb_policy: LB_POLICY_ROUND_ROBIN,
      load_assignment: {
        cluster_name: name,
        endpoints: [
          {
            lb_endpoints: [
              {
                endpoint: {
                  address: {
                    socket_address: {
                      address: upstream.host,
                      port_value: upstream.port,
                    },
                  },
                },
              },
            ],
          },
        ],
      },
    }

    if (upstream.tls) {
      cluster.transport_socket = {
        name: 'envoy.transport_sockets.tls',
        typed_config: this.toAny(TYPE_NAMES.upstreamTlsContext, {
          sni: upstream.host,
        }),
      }
    }

    return cluster
  }
}
