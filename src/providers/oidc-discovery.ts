/**
 * OpenID Connect discovery adapter
 *
 * Resolves an issuer's discovery document and key set, then describes the
 * JWT authentication filter and the cluster the proxy uses to refresh keys.
 *
 * @example
 * ```ts
 * const oidc = new OidcDiscoveryAdapter({ timeoutMs: 3000 })
 * const { filter, cluster } = await oidc.discover('https://id.example.com/realms/main')
 * ```
 */
import { createLocalJWKSet } from 'jose'
import { z } from 'zod'
import type {
  IdentityDiscovery,
  IdentityDiscoveryAdapter,
  ResourceEncoder,
} from '../interfaces/adapters'
import type { JwtAuthentication } from '../interfaces/envoy'
import type { Logger } from '../interfaces/logger'
import {
  EnvoyResourceEncoder,
  parseUpstreamAddress,
} from '../encoding/resource-encoder'
import { defaultLogger } from '../logger/pino-logger'

const DiscoveryDocumentSchema = z
  .object({
    issuer: z.string().min(1),
    jwks_uri: z.string().url(),
  })
  .passthrough()

const JwkSchema = z.object({
  kty: z.string().min(1),
  kid: z.string().optional(),
  use: z.string().optional(),
  alg: z.string().optional(),
  n: z.string().optional(),
  e: z.string().optional(),
  crv: z.string().optional(),
  x: z.string().optional(),
  y: z.string().optional(),
  k: z.string().optional(),
})

const JwksSchema = z.object({
  keys: z.array(JwkSchema).min(1, 'key set has no keys'),
})

/**
 * The subset of `fetch` the adapter relies on
 */
export type FetchLike = (
  url: string,
  init: { signal: AbortSignal; headers: Record<string, string> },
) => Promise<Response>

export interface OidcDiscoveryOptions {
  encoder?: ResourceEncoder
  /** Injected for tests; defaults to the global `fetch` */
  fetch?: FetchLike
  /** Per-request timeout. @default 5000 */
  timeoutMs?: number
  /** How long the proxy caches fetched keys. @default 300 */
  jwksCacheSeconds?: number
  logger?: Logger
}

function stripTrailingSlashes(value: string): string {
  return value.replace(/\/+$/, '')
}

export function oidcProviderName(issuer: string): string {
  return `oidc::${new URL(issuer).host}`
}

export function oidcClusterName(jwksUri: string): string {
  const { host, port } = parseUpstreamAddress(jwksUri)
  return `oidc::${host}:${port}`
}

/**
 * Default {@link IdentityDiscoveryAdapter}
 */
export class OidcDiscoveryAdapter implements IdentityDiscoveryAdapter {
  readonly name = 'oidc'

  private readonly encoder: ResourceEncoder
  private readonly fetchImpl: FetchLike
  private readonly timeoutMs: number
  private readonly jwksCacheSeconds: number
  private readonly logger: Logger

  constructor(options: OidcDiscoveryOptions = {}) {
    this.encoder = options.encoder ?? new EnvoyResourceEncoder()
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init))
    this.timeoutMs = options.timeoutMs ?? 5000
    this.jwksCacheSeconds = options.jwksCacheSeconds ?? 300
    this.logger = options.logger ?? defaultLogger
  }

  /**
   * @throws Error when either document cannot be fetched or fails validation,
   *   or when the discovery document names a different issuer
   */
  async discover(issuer: string): Promise<IdentityDiscovery> {
    const base = stripTrailingSlashes(issuer)
    const providerName = oidcProviderName(base)

    const document = DiscoveryDocumentSchema.parse(
      await this.fetchJson(`${base}/.well-known/openid-configuration`),
    )
    if (stripTrailingSlashes(document.issuer) !== base) {
      throw new Error(
        `discovery document issuer '${document.issuer}' does not match '${issuer}'`,
      )
    }

    const jwks = JwksSchema.parse(await this.fetchJson(document.jwks_uri))
    createLocalJWKSet(jwks)

    const clusterName = oidcClusterName(document.jwks_uri)
    const jwksOrigin = new URL(document.jwks_uri).origin

    const filter: JwtAuthentication = {
      providers: {
        [providerName]: {
          issuer: document.issuer,
          remote_jwks: {
            http_uri: {
              uri: document.jwks_uri,
              cluster: clusterName,
              timeout: { seconds: Math.ceil(this.timeoutMs / 1000), nanos: 0 },
            },
            cache_duration: { seconds: this.jwksCacheSeconds, nanos: 0 },
          },
        },
      },
      rules: [
        {
          match: { prefix: '/' },
          requires: { provider_name: providerName },
        },
      ],
    }

    this.logger.debug('OIDC issuer resolved', {
      issuer: document.issuer,
      provider: providerName,
      cluster: clusterName,
      keys: jwks.keys.length,
    })

    return {
      filter,
      cluster: this.encoder.buildCluster(clusterName, jwksOrigin),
    }
  }

  private async fetchJson(url: string): Promise<unknown> {
    const response = await this.fetchImpl(url, {
      signal: AbortSignal.timeout(this.timeoutMs),
      headers: { accept: 'application/json' },
    })
    if (!response.ok) {
      throw new Error(`GET ${url} returned ${response.status}`)
    }
    const body: unknown = await response.json()
    return body
  }
}
