import { describe, test, expect } from 'vitest'
import {
  buildListener,
  buildRouteConfiguration,
  buildServiceCluster,
  listenerName,
  serviceClusterName,
} from '../../src/export/listener'
import { composeHttpFilters, httpFilter, FILTER_NAMES } from '../../src/export/filter-chain'
import { DEFAULT_EXPORT_CONFIG } from '../../src/config/export-config'
import { EnvoyResourceEncoder, TYPE_NAMES } from '../../src/encoding/resource-encoder'
import { DiscoveryType } from '../../src/interfaces/envoy'
import { decodeAny, makeService } from '../fixtures/services'

describe('service cluster', () => {
  const encoder = new EnvoyResourceEncoder()

  test('should be named after the service and point at its target', () => {
    const cluster = buildServiceCluster(
      makeService({ id: 7, target_domain: '192.168.1.20:3000' }),
      encoder,
    )

    expect(serviceClusterName(7)).toBe('Cluster::service::7')
    expect(cluster.name).toBe('Cluster::service::7')
    expect(cluster.type).toBe(DiscoveryType.STATIC)
    expect(
      cluster.load_assignment.endpoints[0]?.lb_endpoints[0]?.endpoint.address
        .socket_address,
    ).toEqual({ address: '192.168.1.20', port_value: 3000 })
  })

  test('should reject an unparseable target', () => {
    expect(() =>
      buildServiceCluster(makeService({ target_domain: 'not a host' }), encoder),
    ).toThrow("invalid upstream address 'not a host'")
  })
})

describe('route configuration', () => {
  test('should route every path of the service hosts to the service cluster', () => {
    const routes = buildRouteConfiguration(
      makeService({ id: 3, hosts: ['a.example.com', 'b.example.com'] }),
    )

    expect(routes).toEqual({
      name: 'service_3_route',
      virtual_hosts: [
        {
          name: 'service_3_vhost',
          domains: ['a.example.com', 'b.example.com'],
          routes: [
            {
              match: { prefix: '/' },
              route: { cluster: 'Cluster::service::3' },
            },
          ],
        },
      ],
    })
  })
})

describe('listener', () => {
  const encoder = new EnvoyResourceEncoder()
  const service = makeService()
  const metering = httpFilter(encoder, FILTER_NAMES.wasm, TYPE_NAMES.wasm, {
    config: { name: 'Service::42' },
  })
  const httpFilters = composeHttpFilters(encoder, [], metering)

  test('should bind the ingress address', () => {
    const listener = buildListener(service, httpFilters, encoder, DEFAULT_EXPORT_CONFIG)

    expect(listenerName(42)).toBe('service 42')
    expect(listener.name).toBe('service 42')
    expect(listener.address).toEqual({
      socket_address: { address: '0.0.0.0', port_value: 80 },
    })
  })

  test('should honour a configured port', () => {
    const listener = buildListener(service, httpFilters, encoder, {
      ...DEFAULT_EXPORT_CONFIG,
      listenerPort: 10000,
    })
    expect(listener.address.socket_address.port_value).toBe(10000)
  })

  test('should wrap the filters in one HTTP connection manager', () => {
    const listener = buildListener(service, httpFilters, encoder, DEFAULT_EXPORT_CONFIG)

    expect(listener.filter_chains).toHaveLength(1)
    const networkFilter = listener.filter_chains[0]?.filters[0]
    expect(networkFilter?.name).toBe(
      'envoy.filters.network.http_connection_manager',
    )

    if (networkFilter) {
      const manager = decodeAny(networkFilter.typed_config)
      expect(manager.stat_prefix).toBe('ingress_http')
      expect(manager.route_config.name).toBe('service_42_route')
      expect(manager.route_config.virtual_hosts[0].domains).toEqual([
        'api.example.com',
      ])
      expect(
        manager.http_filters.map((filter: { name: string }) => filter.name),
      ).toEqual(['envoy.filters.http.wasm', 'envoy.filters.http.router'])
    }
  })
})
