/**
 * Validation schema for the configuration document the metering filter
 * imports. It accepts what `serializeService` writes, including `null` for
 * absent optional fields.
 */
import { z } from 'zod'
import type { JsonValue } from '../interfaces/service'

const UINT32_MAX = 0xffffffff

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ]),
)

export const MappingRuleSchema = z.object({
  pattern: z.string(),
  http_method: z.string().min(1),
  metric_system_name: z.string().min(1),
  delta: z.number().int().nonnegative().max(UINT32_MAX),
})

const PolicySchema = z.union([
  z.string().transform((name) => ({ name, configuration: null })),
  z.object({
    name: z.string(),
    configuration: JsonValueSchema.default(null),
  }),
])

const BillingAuthConfigSchema = z.object({
  path: z.string(),
  wasm_config: z
    .object({
      backend: z
        .object({
          cluster_name: z.string().min(1),
          url: z.string().min(1),
        })
        .catchall(JsonValueSchema),
    })
    .catchall(JsonValueSchema),
})

export const ServiceSchema = z.object({
  id: z.number().int().nonnegative().max(UINT32_MAX),
  hosts: z.array(z.string()).default([]),
  policies: z.array(PolicySchema).default([]),
  target_domain: z.string().default(''),
  proxy_rules: z.array(MappingRuleSchema),
  oidc_issuer: z.string().nullable().optional(),
  auth_config: BillingAuthConfigSchema.nullable().optional(),
})

export type ServiceDocument = z.infer<typeof ServiceSchema>

/**
 * What the export engine accepts: a document the metering filter will
 * import, with at least one virtual host domain
 */
export const ExportableServiceSchema = ServiceSchema.extend({
  hosts: z.array(z.string().min(1)).min(1, 'at least one host is required'),
})

/**
 * Flatten zod issues into `path: message` strings
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)'
    return `${path}: ${issue.message}`
  })
}
