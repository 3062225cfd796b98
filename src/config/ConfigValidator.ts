// src/config/ConfigValidator.ts

import { z } from 'zod';

const LoggerConfigSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
    format: z.enum(['json', 'pretty']).optional(),
  })
  .optional();

const MetricsConfigSchema = z
  .object({
    enabled: z.boolean().optional(),
    port: z.number().int().min(1024).max(65535).optional(),
    path: z.string().startsWith('/').optional(),
  })
  .optional();

export const AuthorizeServerConfigSchema = z.object({
  // An empty list is valid and rejects every response_type.
  allowedResponseTypes: z.array(
    z
      .string()
      .min(1, 'Response types must be non-empty strings')
      .refine((value) => value.trim() === value, {
        message: 'Response types must not have surrounding whitespace',
      })
  ),
  logging: LoggerConfigSchema,
  metrics: MetricsConfigSchema,
});

export type AuthorizeServerConfig = z.infer<typeof AuthorizeServerConfigSchema>;

/**
 * Validate authorization server configuration
 *
 * @throws {z.ZodError} If configuration is invalid
 */
export function validateConfig(config: unknown): AuthorizeServerConfig {
  return AuthorizeServerConfigSchema.parse(config);
}

export type ConfigValidationResult =
  | { success: true; data: AuthorizeServerConfig }
  | { success: false; errors: string[] };

/**
 * Validate configuration and return readable `path: message` errors
 */
export function validateConfigSafe(config: unknown): ConfigValidationResult {
  const result = AuthorizeServerConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`),
  };
}
