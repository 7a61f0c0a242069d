/**
 * Configuration Schemas
 *
 * Zod schemas for runtime configuration. Values arrive as strings from the
 * environment (or stringified from the config file) and are coerced and
 * validated here.
 */

import { z } from 'zod';

// ============================================
// HELPER SCHEMAS
// ============================================

/**
 * Schema for parsing a string as a boolean.
 * Recognizes 'true', '1', 'yes' as true; everything else as false.
 */
export const booleanStringSchema = z
  .string()
  .optional()
  .transform((val) => {
    if (!val) return false;
    return ['true', '1', 'yes'].includes(val.toLowerCase());
  });

/**
 * Like booleanStringSchema, but an unset value falls back to `fallback`.
 */
export function booleanWithDefaultSchema(fallback: boolean) {
  return z
    .string()
    .optional()
    .transform((val) => {
      if (val === undefined || val === '') return fallback;
      return ['true', '1', 'yes'].includes(val.toLowerCase());
    });
}

/**
 * Schema for parsing a string as an integer with bounds.
 */
export function integerStringSchema(options: { min?: number; max?: number; default: number }) {
  let schema = z.coerce.number().int();

  if (options.min !== undefined) schema = schema.min(options.min);
  if (options.max !== undefined) schema = schema.max(options.max);

  return schema.default(options.default);
}

export const urlSchema = z.string().url();

// ============================================
// LOG CONFIGURATION
// ============================================

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);
export type LogLevel = z.infer<typeof logLevelSchema>;

export const logConfigSchema = z.object({
  level: logLevelSchema.default('info'),
  prettyPrint: booleanStringSchema,
});

export type LogConfig = z.infer<typeof logConfigSchema>;

// ============================================
// FETCHER CONFIGURATION
// ============================================

export const DEFAULT_DOCUMENTATION_URL = 'https://core.telegram.org/bots/api';

export const fetcherConfigSchema = z.object({
  url: urlSchema.default(DEFAULT_DOCUMENTATION_URL),
  timeoutMs: integerStringSchema({ min: 1000, max: 300000, default: 30000 }),
  maxAttempts: integerStringSchema({ min: 1, max: 10, default: 3 }),
});

export type FetcherConfig = z.infer<typeof fetcherConfigSchema>;

// ============================================
// PARSER CONFIGURATION
// ============================================

export const fieldIdentitySchema = z.enum(['name', 'tuple']);

export const parserConfigSchema = z.object({
  flushTrailingDeclaration: booleanWithDefaultSchema(true),
  fieldIdentity: fieldIdentitySchema.default('name'),
});

export type ParserConfig = z.infer<typeof parserConfigSchema>;

// ============================================
// ERROR FORMATTING
// ============================================

/**
 * Format Zod validation errors into readable messages.
 */
export function formatConfigErrors(error: z.ZodError<unknown>): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join('.');
      return `  - ${path}: ${issue.message}`;
    })
    .join('\n');
}

export class ConfigValidationError extends Error {
  constructor(
    public readonly section: string,
    public readonly zodError: z.ZodError
  ) {
    const formatted = formatConfigErrors(zodError);
    super(
      `Configuration validation failed for ${section}:\n${formatted}\n\n` +
      `Please check your environment variables or configuration file.`
    );
    this.name = 'ConfigValidationError';
  }
}

/**
 * Parse a config section, turning zod failures into ConfigValidationError.
 */
export function parseConfigSection<T extends z.ZodTypeAny>(
  section: string,
  schema: T,
  input: unknown
): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ConfigValidationError(section, result.error);
  }
  return result.data;
}
