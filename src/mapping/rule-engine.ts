/**
 * Data-plane mapping rule engine
 *
 * Holds the configuration imported by the metering filter and turns each
 * request into the usage deltas it should be billed for. One engine instance
 * corresponds to one plugin instance; it is not shared between services.
 *
 * @example
 * ```ts
 * const engine = new MappingRuleEngine()
 * engine.import(pluginConfiguration)
 * engine.match('GET', '/widgets') // { matched: true, metrics: '{"hits":1}' }
 * ```
 */
import type { Service } from '../interfaces/service'
import type { Logger } from '../interfaces/logger'
import { defaultLogger } from '../logger/pino-logger'
import {
  ConfigBusyError,
  ConfigParseError,
  describeError,
} from '../errors/export-error'
import { parseHttpMethod, sameMethod, type HttpMethod } from './http-method'
import { ServiceSchema, formatIssues } from './service-schema'

export interface MatchResult {
  matched: boolean
  /** JSON object of metric name → delta */
  metrics: string
}

/**
 * JSON object of the deltas in insertion order. `Object.fromEntries` would
 * move integer-like metric names to the front.
 */
function metricsJson(deltas: Map<string, number>): string {
  const members = Array.from(
    deltas,
    ([metric, delta]) => `${JSON.stringify(metric)}:${JSON.stringify(delta)}`,
  )
  return `{${members.join(',')}}`
}

interface CompiledRule {
  pattern: string
  method: HttpMethod
  metric: string
  delta: number
}

interface ActiveConfiguration {
  service: Service
  rules: CompiledRule[]
}

export interface MappingRuleEngineOptions {
  logger?: Logger
}

export class MappingRuleEngine {
  private active: ActiveConfiguration | undefined
  private busy = false
  private readonly logger: Logger

  constructor(options: MappingRuleEngineOptions = {}) {
    this.logger = options.logger ?? defaultLogger
  }

  /**
   * Replace the active configuration
   *
   * @throws ConfigParseError when the document is not valid JSON or not a
   *   valid service; the previous configuration stays active
   * @throws ConfigBusyError when called while a match is in progress
   */
  import(configJson: string): Service {
    if (this.busy) {
      throw new ConfigBusyError()
    }

    let document: unknown
    try {
      document = JSON.parse(configJson)
    } catch (error) {
      this.logger.warn('Configuration rejected', { reason: 'invalid JSON' })
      throw new ConfigParseError(
        `configuration is not valid JSON: ${describeError(error)}`,
        [],
        error,
      )
    }

    const result = ServiceSchema.safeParse(document)
    if (!result.success) {
      const issues = formatIssues(result.error)
      this.logger.warn('Configuration rejected', { issues })
      throw new ConfigParseError(
        `configuration rejected: ${issues.join('; ')}`,
        issues,
        result.error,
      )
    }

    const service: Service = result.data
    const rules = service.proxy_rules.map(
      (rule): CompiledRule => ({
        pattern: rule.pattern,
        method: parseHttpMethod(rule.http_method),
        metric: rule.metric_system_name,
        delta: rule.delta,
      }),
    )

    this.active = { service, rules }

    this.logger.info('Configuration imported', {
      serviceId: service.id,
      rules: rules.length,
    })
    return service
  }

  /**
   * Usage deltas for a request. A metric named by several matching rules
   * takes the delta of the last one.
   */
  matchDeltas(method: string, path: string): Map<string, number> {
    const deltas = new Map<string, number>()
    const active = this.active
    if (!active) {
      return deltas
    }

    const requestMethod = parseHttpMethod(method)
    const traceMatches = this.logger.pino.isLevelEnabled('debug')
    const reentrant = this.busy
    this.busy = true
    try {
      for (const rule of active.rules) {
        if (rule.pattern !== path || !sameMethod(rule.method, requestMethod)) {
          continue
        }
        if (traceMatches) {
          this.logger.debug('Mapping rule matched', {
            method,
            path,
            metric: rule.metric,
            delta: rule.delta,
          })
        }
        deltas.set(rule.metric, rule.delta)
      }
    } catch (error) {
      this.logger.warn('Rule evaluation failed; reporting no usage', {
        method,
        path,
        error: describeError(error),
      })
      return new Map()
    } finally {
      this.busy = reentrant
    }

    return deltas
  }

  match(method: string, path: string): MatchResult {
    const deltas = this.matchDeltas(method, path)
    return {
      matched: deltas.size > 0,
      metrics: metricsJson(deltas),
    }
  }

  current(): Service | undefined {
    return this.active?.service
  }
}
