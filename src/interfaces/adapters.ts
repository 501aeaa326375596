import type { BillingAuthConfig } from './service'
import type { Cluster, JwtAuthentication, ProtoAny, Wasm } from './envoy'

/**
 * Serializes Envoy messages and builds generic upstream clusters
 */
export interface ResourceEncoder {
  /**
   * Encode a message to protobuf bytes
   * @param typeName - Fully qualified proto type name
   * @throws Error when the type is unknown or the message does not fit it
   */
  encode(typeName: string, message: object): Uint8Array

  /**
   * Encode a message and wrap it with its `type.googleapis.com/` type URL
   */
  toAny(typeName: string, message: object): ProtoAny

  /**
   * Build a single-endpoint cluster
   * @param address - `host`, `host:port` or an `http(s)://` URL
   * @throws Error when the address cannot be parsed
   */
  buildCluster(name: string, address: string): Cluster
}

/**
 * Computes the integrity digest of a file
 */
export interface ContentHasher {
  /**
   * @returns lowercase hex digest of the file's bytes
   */
  digest(path: string): Promise<string>
}

/**
 * What an identity provider contributes to a service's bundle
 */
export interface IdentityDiscovery {
  filter: JwtAuthentication
  cluster: Cluster
}

/**
 * Resolves identity provider metadata for an issuer
 */
export interface IdentityDiscoveryAdapter {
  readonly name: string
  discover(issuer: string): Promise<IdentityDiscovery>
}

/**
 * Builds the upstream cluster and in-proxy plugin of a billing/auth backend
 */
export interface BillingBackendAdapter {
  readonly name: string
  cluster(descriptor: BillingAuthConfig): Cluster
  buildPlugin(descriptor: BillingAuthConfig, serviceId: number): Promise<Wasm>
}

/**
 * Pluggable capability providers a service may register.
 * Their filters run ahead of metering in registration order.
 */
export type AuthProvider =
  | { kind: 'oidc'; issuer: string }
  | { kind: 'billing'; backend: BillingAuthConfig }
