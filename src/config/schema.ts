/**
 * Configuration Validation Schema
 *
 * Zod schemas for runtime validation of application configuration.
 * Provides detailed error messages when configuration is invalid.
 */

import { z } from 'zod';
import { LANGUAGE_TAG_PATTERN } from '../i18n/locale';

// =============================================================================
// Basic Type Schemas
// =============================================================================

export const NodeEnvSchema = z.enum(['development', 'production', 'test']);
export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);
export const RedirectStatusSchema = z.union([z.literal(302), z.literal(303)]);
export const TokenCarrierSchema = z.enum(['query', 'cookie']);

// =============================================================================
// Component Schemas
// =============================================================================

export const ServerConfigSchema = z.object({
  nodeEnv: NodeEnvSchema,
  port: z.number().int().min(0).max(65535),
  basePath: z
    .string()
    .regex(/^(\/[^/]+)*$/, 'must be empty or start with "/" and have no trailing "/"'),
});

export const I18nConfigSchema = z.object({
  defaultLocale: z.string().regex(LANGUAGE_TAG_PATTERN, 'must be a language tag such as "en" or "en-US"'),
});

export const MvcConfigSchema = z.object({
  viewFolder: z.string(),
  redirectStatus: RedirectStatusSchema,
});

export const RedirectScopeConfigSchema = z.object({
  ttlMs: z.number().int().min(1000),
  sweepIntervalMs: z.number().int().min(1000),
  carrier: TokenCarrierSchema,
  paramName: z.string().min(1),
  cookieName: z.string().min(1),
});

export const RedisConfigSchema = z.object({
  url: z.string(),
  enabled: z.boolean(),
});

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema,
});

// =============================================================================
// Main Config Schema
// =============================================================================

export const AppConfigSchema = z.object({
  server: ServerConfigSchema,
  i18n: I18nConfigSchema,
  mvc: MvcConfigSchema,
  redirectScope: RedirectScopeConfigSchema,
  redis: RedisConfigSchema,
  logging: LoggingConfigSchema,
});

// =============================================================================
// Validation Functions
// =============================================================================

export type ConfigValidationResult = {
  success: boolean;
  errors: string[];
};

/**
 * Validate configuration and return detailed errors
 */
export function validateConfigSchema(config: unknown): ConfigValidationResult {
  const result = AppConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, errors: [] };
  }

  const errors = result.error.issues.map((issue: z.ZodIssue) => {
    const path = issue.path.join('.');
    return `${path}: ${issue.message}`;
  });

  return { success: false, errors };
}

/**
 * Validate configuration and throw if invalid
 */
export function assertValidConfig(config: unknown): asserts config is ValidatedConfig {
  const result = validateConfigSchema(config);

  if (!result.success) {
    console.error('');
    console.error('================================================================================');
    console.error('CONFIGURATION VALIDATION FAILED');
    console.error('================================================================================');
    for (const error of result.errors) {
      console.error(`  - ${error}`);
    }
    console.error('');
    console.error('Please check your .env file and environment variables.');
    console.error('================================================================================');

    throw new Error(`Configuration validation failed: ${result.errors.join('; ')}`);
  }
}

export type ValidatedConfig = z.infer<typeof AppConfigSchema>;
