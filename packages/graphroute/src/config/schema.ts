/**
 * Connection Configuration
 *
 * Driver-level settings accepted by a Connection. Bolt drivers read the pool,
 * trust and timeout settings; http drivers read `database` and `http.headers`.
 */

import { z } from "zod"
import { ConfigurationError } from "../errors"

export const connectionConfigurationSchema = z
  .object({
    /** Database name (for multi-database setups) */
    database: z.string().min(1).optional(),
    /** Enable encryption. Forced on for bolt URIs that carry credentials. */
    encrypted: z.boolean().optional(),
    /** Trust settings for TLS */
    trust: z.enum(["TRUST_ALL_CERTIFICATES", "TRUST_SYSTEM_CA_SIGNED_CERTIFICATES"]).optional(),
    /** Connection pool settings */
    pool: z
      .object({
        maxSize: z.number().int().positive().optional(),
        acquisitionTimeout: z.number().int().nonnegative().optional(),
      })
      .strict()
      .optional(),
    /** Socket connect timeout in ms */
    connectionTimeout: z.number().int().nonnegative().optional(),
    userAgent: z.string().optional(),
    http: z
      .object({
        headers: z.record(z.string()).optional(),
      })
      .strict()
      .optional(),
  })
  .strict()

export type ConnectionConfiguration = z.infer<typeof connectionConfigurationSchema>

/**
 * Validate a configuration object, defaulting to an empty one.
 */
export function parseConfiguration(input: unknown): ConnectionConfiguration {
  if (input === undefined || input === null) {
    return {}
  }

  const result = connectionConfigurationSchema.safeParse(input)
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)"
      return `${path}: ${issue.message}`
    })
    throw new ConfigurationError(`Invalid connection configuration: ${issues.join("; ")}`, issues)
  }

  return result.data
}
