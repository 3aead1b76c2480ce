/**
 * Zod Schema Validation for Gateway Configuration
 *
 * Validated once at startup. Once loaded, the config object is trusted and
 * never re-validated on the request path.
 */

import { z } from 'zod';

// =============================================================================
// Primitive Schemas
// =============================================================================

/**
 * RPC URL schema (HTTP or HTTPS).
 */
export const RpcUrlSchema = z
  .string()
  .regex(/^https?:\/\//, 'RPC URL must start with http:// or https://');

/**
 * URL schema with protocol validation.
 */
export const UrlSchema = z.string().url('Invalid URL format');

export const PortSchema = z
  .number()
  .int()
  .min(0, 'Port cannot be negative')
  .max(65535, 'Port cannot exceed 65535');

export const PositiveIntSchema = z.number().int().positive('Must be a positive integer');

export const NonNegativeIntSchema = z.number().int().nonnegative('Cannot be negative');

export const BitcoinNetworkSchema = z.enum(['mainnet', 'testnet', 'regtest']);

// =============================================================================
// Gateway Config
// =============================================================================

export const ServerConfigSchema = z.object({
  host: z.string().min(1, 'Host cannot be empty'),
  port: PortSchema,
  debug: z.boolean(),
});

export const BitcoinNodeConfigSchema = z.object({
  rpcUrl: RpcUrlSchema,
  rpcUser: z.string(),
  rpcPassword: z.string(),
  network: BitcoinNetworkSchema,
});

export const RateLimitConfigSchema = z.object({
  maxRequests: PositiveIntSchema,
  windowMs: PositiveIntSchema,
});

export const RpcClientConfigSchema = z.object({
  timeoutMs: PositiveIntSchema,
  maxAttempts: PositiveIntSchema.max(10, 'At most 10 attempts per call'),
  backoffBaseMs: NonNegativeIntSchema,
  rateLimit: RateLimitConfigSchema,
});

export const ExternalApisConfigSchema = z.object({
  mempoolSpaceUrl: UrlSchema,
  coingeckoUrl: UrlSchema,
  fearGreedUrl: UrlSchema,
  timeoutMs: PositiveIntSchema,
});

export const GatewayConfigSchema = z.object({
  service: z.object({
    name: z.string().min(1),
    version: z.string().min(1),
  }),
  server: ServerConfigSchema,
  bitcoin: BitcoinNodeConfigSchema,
  rpc: RpcClientConfigSchema,
  apis: ExternalApisConfigSchema,
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type BitcoinNodeConfig = z.infer<typeof BitcoinNodeConfigSchema>;
export type RateLimitConfig = z.infer<typeof RateLimitConfigSchema>;
export type RpcClientConfig = z.infer<typeof RpcClientConfigSchema>;
export type ExternalApisConfig = z.infer<typeof ExternalApisConfigSchema>;
export type GatewayConfig = z.infer<typeof GatewayConfigSchema>;

// =============================================================================
// Validation Helpers
// =============================================================================

export interface ConfigIssue {
  path: string;
  message: string;
}

/**
 * Thrown when configuration fails validation. Carries every issue, not only
 * the first, so an operator can fix the environment in one pass.
 */
export class ConfigValidationError extends Error {
  constructor(
    readonly context: string,
    readonly issues: ConfigIssue[]
  ) {
    super(
      `Config validation failed for ${context}:\n` +
        issues.map((issue) => `  - ${issue.path}: ${issue.message}`).join('\n')
    );
    this.name = 'ConfigValidationError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Validate data and throw on failure.
 * Use at startup/load time, not in hot paths.
 */
export function validateOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, context: string): T {
  const result = schema.safeParse(data);

  if (result.success) {
    return result.data;
  }

  throw new ConfigValidationError(
    context,
    result.error.errors.map((e: z.ZodIssue) => ({
      path: e.path.join('.'),
      message: e.message,
    }))
  );
}
