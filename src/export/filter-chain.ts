/**
 * HTTP filter chain composition
 *
 * Envoy runs HTTP filters in declaration order and requires the router to be
 * the terminal filter. Provider filters (JWT authentication, billing) come
 * first in registration order, then the metering filter, then the router.
 */
import type { ResourceEncoder } from '../interfaces/adapters'
import type { HttpFilter } from '../interfaces/envoy'
import { TYPE_NAMES } from '../encoding/resource-encoder'

export const FILTER_NAMES = {
  jwtAuthn: 'envoy.filters.http.jwt_authn',
  wasm: 'envoy.filters.http.wasm',
  router: 'envoy.filters.http.router',
  httpConnectionManager: 'envoy.filters.network.http_connection_manager',
} as const

/**
 * Encode a message and wrap it as a named HTTP filter
 */
export function httpFilter(
  encoder: ResourceEncoder,
  name: string,
  typeName: string,
  message: object,
): HttpFilter {
  return {
    name,
    typed_config: encoder.toAny(typeName, message),
  }
}

export function routerFilter(encoder: ResourceEncoder): HttpFilter {
  return httpFilter(encoder, FILTER_NAMES.router, TYPE_NAMES.router, {})
}

/**
 * Order the HTTP filters of one listener
 *
 * @param providerFilters - Filters contributed by the service's auth providers,
 *   in registration order
 * @param meteringFilter - The usage metering WASM filter
 * @throws Error if a provider tries to contribute a router
 */
export function composeHttpFilters(
  encoder: ResourceEncoder,
  providerFilters: HttpFilter[],
  meteringFilter: HttpFilter,
): HttpFilter[] {
  for (const filter of providerFilters) {
    if (filter.name === FILTER_NAMES.router) {
      throw new Error('the router filter cannot be contributed by a provider')
    }
  }

  return [...providerFilters, meteringFilter, routerFilter(encoder)]
}
