/**
 * Service descriptor types
 *
 * A `Service` is the unit of configuration handed to the export engine and,
 * serialized as JSON, to the metering filter running inside the proxy. Field
 * names follow the wire format.
 */

/**
 * Any JSON-representable value
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue }

/**
 * Declarative rule correlating an HTTP method and path with a metering counter
 */
export interface MappingRule {
  /**
   * Request path compared by exact string equality
   * @example '/widgets'
   */
  pattern: string

  /**
   * HTTP method compared by exact string equality
   * @example 'GET'
   */
  http_method: string

  /**
   * Name of the metering counter this rule feeds
   * @example 'hits'
   */
  metric_system_name: string

  /**
   * Unsigned increment reported when the rule matches
   */
  delta: number
}

/**
 * Named policy with free-form configuration, passed through untouched
 */
export interface PolicyConfig {
  name: string
  configuration: JsonValue
}

/**
 * Upstream of the billing/auth backend
 */
export interface BillingBackend {
  [key: string]: JsonValue
  /** Envoy cluster name, also used as the bundle key */
  cluster_name: string
  /** Backend URL, e.g. `https://billing.example.com:8443` */
  url: string
}

/**
 * Configuration forwarded verbatim to the billing plugin
 */
export interface BillingWasmConfig {
  [key: string]: JsonValue
  backend: BillingBackend
}

/**
 * Billing/auth backend descriptor
 */
export interface BillingAuthConfig {
  /** Local path of the billing plugin binary */
  path: string
  wasm_config: BillingWasmConfig
}

/**
 * Backend service descriptor
 *
 * @example
 * ```ts
 * const service: Service = {
 *   id: 42,
 *   hosts: ['api.example.com'],
 *   policies: [],
 *   target_domain: 'backend.internal:8080',
 *   proxy_rules: [
 *     { pattern: '/widgets', http_method: 'GET', metric_system_name: 'hits', delta: 1 },
 *   ],
 * }
 * ```
 */
export interface Service {
  /** Unique across a deployment; every derived resource name embeds it */
  id: number
  /** Virtual host domains */
  hosts: string[]
  policies: PolicyConfig[]
  /** Single upstream address, `host`, `host:port` or a URL */
  target_domain: string
  proxy_rules: MappingRule[]
  /** Identity provider issuer URL */
  oidc_issuer?: string | null
  auth_config?: BillingAuthConfig | null
}
