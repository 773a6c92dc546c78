/**
 * Zod validation schemas for configuration
 */

import { z } from 'zod';

import type { TbxConfig } from './schema.js';

/**
 * Port number schema (1-65535)
 */
const portSchema = z.number().int().min(1).max(65535);

/**
 * Bar width in percent (0-100)
 */
const percentSchema = z.number().min(0).max(100);

/**
 * Output format schema
 */
export const outputFormatSchema = z.enum(['text', 'json']);

/**
 * Probe service endpoint schema
 */
export const probeServiceSchema = z.object({
  host: z.string().min(1),
  port: portSchema,
  timeoutMs: z.number().int().min(100),
});

/**
 * Statistics source schema
 */
export const statsSourceSchema = z.object({
  dbPath: z.string().min(1).nullable(),
  jsonPath: z.string().min(1).nullable(),
});

/**
 * Histogram display schema
 */
export const histogramConfigSchema = z.object({
  emptyRunThreshold: z.number().int().min(0),
  minBarWidth: percentSchema,
  logScale: z.boolean(),
});

/**
 * Output configuration schema
 */
export const outputConfigSchema = z.object({
  format: outputFormatSchema,
  color: z.boolean(),
});

/**
 * Complete configuration schema
 */
export const configSchema = z.object({
  probe: probeServiceSchema,
  stats: statsSourceSchema,
  histogram: histogramConfigSchema,
  output: outputConfigSchema,
});

/**
 * Partial configuration schema (config files, environment)
 */
export const partialConfigSchema = z.object({
  probe: probeServiceSchema.partial().optional(),
  stats: statsSourceSchema.partial().optional(),
  histogram: histogramConfigSchema.partial().optional(),
  output: outputConfigSchema.partial().optional(),
});

/**
 * Configuration as read from a file or the environment
 */
export type PartialConfig = z.infer<typeof partialConfigSchema>;

/**
 * Configuration validation error
 */
export class ConfigValidationError extends Error {
  constructor(public readonly errors: Array<{ path: string; message: string }>) {
    const errorMessages = errors.map((e) => `  ${e.path}: ${e.message}`).join('\n');
    super(`Configuration validation failed:\n${errorMessages}`);
    this.name = 'ConfigValidationError';
  }

  /**
   * Format error for CLI display
   */
  format(): string {
    return [
      'Configuration validation failed:',
      '',
      ...this.errors.map((e) => `  ${e.path}: ${e.message}`),
      '',
      'Use --help to see available options',
      'Use --show-config to see current configuration',
    ].join('\n');
  }
}

function toValidationError(error: z.ZodError): ConfigValidationError {
  return new ConfigValidationError(
    error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    })),
  );
}

/**
 * Validate a complete configuration
 * @throws ConfigValidationError if validation fails
 */
export function validateConfig(config: unknown): TbxConfig {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}

/**
 * Validate a partial configuration (from config file or environment)
 * @throws ConfigValidationError if validation fails
 */
export function validatePartialConfig(config: unknown): PartialConfig {
  const result = partialConfigSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}
