/**
 * Routing cluster and listener synthesis
 *
 * Routing is flat: one virtual host matching the service's
 * domains and one catch-all route to the service's own cluster. Everything
 * policy-related happens in the HTTP filter chain.
 */
import type { ResourceEncoder } from '../interfaces/adapters'
import {
  CODEC_TYPE_AUTO,
  type Cluster,
  type HttpConnectionManager,
  type HttpFilter,
  type Listener,
  type RouteConfiguration,
} from '../interfaces/envoy'
import type { Service } from '../interfaces/service'
import type { ExportConfig } from '../config/export-config'
import { TYPE_NAMES } from '../encoding/resource-encoder'
import { FILTER_NAMES } from './filter-chain'

export function serviceClusterName(serviceId: number): string {
  return `Cluster::service::${serviceId}`
}

export function listenerName(serviceId: number): string {
  return `service ${serviceId}`
}

/**
 * Build the cluster the service's traffic is routed to
 * @throws Error when `target_domain` is not a valid address
 */
export function buildServiceCluster(
  service: Service,
  encoder: ResourceEncoder,
): Cluster {
  return encoder.buildCluster(
    serviceClusterName(service.id),
    service.target_domain,
  )
}

export function buildRouteConfiguration(service: Service): RouteConfiguration {
  return {
    name: `service_${service.id}_route`,
    virtual_hosts: [
      {
        name: `service_${service.id}_vhost`,
        domains: [...service.hosts],
        routes: [
          {
            match: { prefix: '/' },
            route: { cluster: serviceClusterName(service.id) },
          },
        ],
      },
    ],
  }
}

export type ListenerOptions = Pick<
  ExportConfig,
  'listenerAddress' | 'listenerPort' | 'statPrefix'
>

/**
 * Build the service's listener around an already ordered HTTP filter list
 */
export function buildListener(
  service: Service,
  httpFilters: HttpFilter[],
  encoder: ResourceEncoder,
  options: ListenerOptions,
): Listener {
  const connectionManager: HttpConnectionManager = {
    codec_type: CODEC_TYPE_AUTO,
    stat_prefix: options.statPrefix,
    route_config: buildRouteConfiguration(service),
    http_filters: httpFilters,
  }

  return {
    name: listenerName(service.id),
    address: {
      socket_address: {
        address: options.listenerAddress,
        port_value: options.listenerPort,
      },
    },
    filter_chains: [
      {
        filters: [
          {
            name: FILTER_NAMES.httpConnectionManager,
            typed_config: encoder.toAny(
              TYPE_NAMES.httpConnectionManager,
              connectionManager,
            ),
          },
        ],
      },
    ],
  }
}
