/**
 * Zod validation schemas for configuration
 */

import { z } from 'zod';

/**
 * Engine visit count schema
 */
const visitsSchema = z.number().int().min(1).max(1_000_000);

/**
 * GTP vertex schema (validated against the board later)
 */
const vertexSchema = z.string().regex(/^[A-HJ-Ta-hj-t]\d{1,2}$/, 'must be a GTP vertex like E5');

/**
 * Analysis profile schema
 */
export const analysisProfileSchema = z.enum(['quick', 'standard', 'deep']);

/**
 * Output format schema
 */
export const outputFormatSchema = z.enum(['table', 'json']);

/**
 * Analysis configuration schema
 */
export const analysisConfigSchema = z.object({
  profile: analysisProfileSchema,
  visits19: visitsSchema,
  visitsSmall: visitsSchema,
  lookupVisits: z.number().int().min(0),
  topMovesCount: z.number().int().min(1).max(361),
  engineTimeoutMs: z.number().int().min(100),
  defaultKomi: z.number().min(-100).max(100),
});

/**
 * Engine configuration schema
 */
export const engineConfigSchema = z.object({
  enabled: z.boolean(),
  command: z.string().min(1),
  modelPath: z.string().min(1),
  configPath: z.string().min(1),
  maxTimeMs: z.number().int().min(100),
  reportIntervalCs: z.number().int().min(1).max(1000),
});

/**
 * Databases configuration schema
 */
export const databasesConfigSchema = z.object({
  cachePath: z.string().min(1),
  openingBookPath: z.string().min(1),
});

const firstMovesSchema = z.object({
  9: vertexSchema,
  13: vertexSchema,
  19: vertexSchema,
});

/**
 * Opening book configuration schema
 */
export const openingBookConfigSchema = z.object({
  enabled: z.boolean(),
  syntheticFallback: z.boolean(),
  firstMoves: firstMovesSchema,
  syntheticVisits: visitsSchema,
  openingAlternatives: z.boolean(),
});

/**
 * Output configuration schema
 */
export const outputConfigSchema = z.object({
  format: outputFormatSchema,
});

/**
 * Complete configuration schema
 */
export const configSchema = z.object({
  analysis: analysisConfigSchema,
  engine: engineConfigSchema,
  databases: databasesConfigSchema,
  openingBook: openingBookConfigSchema,
  output: outputConfigSchema,
});

/**
 * Partial configuration schema (for config files and environment variables)
 */
export const partialConfigSchema = z
  .object({
    analysis: analysisConfigSchema.partial().optional(),
    engine: engineConfigSchema.partial().optional(),
    databases: databasesConfigSchema.partial().optional(),
    openingBook: openingBookConfigSchema
      .extend({ firstMoves: firstMovesSchema.partial() })
      .partial()
      .optional(),
    output: outputConfigSchema.partial().optional(),
  })
  .strict();

export type PartialGobookConfig = z.infer<typeof partialConfigSchema>;

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
export function validateConfig(config: unknown): void {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
}

/**
 * Validate and type a partial configuration (config file or environment)
 * @throws ConfigValidationError if validation fails
 */
export function parsePartialConfig(config: unknown): PartialGobookConfig {
  const result = partialConfigSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}
