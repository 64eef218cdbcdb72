/**
 * Configuration Schemas
 *
 * Zod schemas for runtime configuration. All environment variable parsing
 * goes through these schemas for consistent validation and error messages.
 */

import { z } from 'zod';
import { DEFAULT_FLIGHTS_BASE_URL } from '../core/request-encoder.js';

// ============================================
// HELPER SCHEMAS
// ============================================

/**
 * Boolean from an env string. 'true', '1' and 'yes' are true;
 * an unset value takes `defaultVal`.
 */
export function booleanStringSchema(defaultVal: boolean) {
  return z
    .string()
    .optional()
    .transform((val) => {
      if (val === undefined || val === '') return defaultVal;
      return ['true', '1', 'yes'].includes(val.toLowerCase());
    });
}

/**
 * Integer from an env string with bounds and a default
 */
export function integerStringSchema(options: { min?: number; max?: number; default: number }) {
  let schema = z.coerce.number().int();
  if (options.min !== undefined) schema = schema.min(options.min);
  if (options.max !== undefined) schema = schema.max(options.max);
  return z.preprocess((val) => (val === '' ? undefined : val), schema.default(options.default));
}

/**
 * Empty env strings count as unset
 */
const optionalString = z
  .string()
  .optional()
  .transform((val) => (val === undefined || val.trim() === '' ? undefined : val.trim()));

export const urlSchema = z.string().url();

// ============================================
// LOGGING
// ============================================

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const logConfigSchema = z.object({
  level: z.preprocess((val) => (val === '' ? undefined : val), logLevelSchema.default('info')),
  prettyPrint: booleanStringSchema(false),
});

export type LogConfig = z.infer<typeof logConfigSchema>;

// ============================================
// BROWSER
// ============================================

export const browserConfigSchema = z.object({
  headless: booleanStringSchema(true),
  navigationTimeoutMs: integerStringSchema({ min: 1000, max: 300000, default: 60000 }),
  selectorTimeoutMs: integerStringSchema({ min: 1000, max: 300000, default: 30000 }),
  baseUrl: z.preprocess(
    (val) => (val === '' ? undefined : val),
    urlSchema.default(DEFAULT_FLIGHTS_BASE_URL)
  ),
});

export type BrowserSettings = z.infer<typeof browserConfigSchema>;

// ============================================
// PROXY
// ============================================

/**
 * Proxy settings in the shape Playwright's launch() takes.
 * Credentials are only applied when both username and password are set.
 */
export const proxyConfigSchema = z
  .object({
    server: optionalString,
    username: optionalString,
    password: optionalString,
    bypass: optionalString,
  })
  .transform((config): ProxySettings | undefined => {
    if (!config.server) {
      return undefined;
    }
    const proxy: ProxySettings = { server: config.server };
    if (config.username && config.password) {
      proxy.username = config.username;
      proxy.password = config.password;
    }
    if (config.bypass) {
      proxy.bypass = config.bypass;
    }
    return proxy;
  });

export interface ProxySettings {
  server: string;
  username?: string;
  password?: string;
  bypass?: string;
}

// ============================================
// RECORD STORE
// ============================================

export const storeConfigSchema = z.object({
  dataDir: z.preprocess((val) => (val === '' ? undefined : val), z.string().default('./data/flights')),
  maxAgeMinutes: z.preprocess(
    (val) => (val === '' ? undefined : val),
    z.coerce.number().int().min(1).optional()
  ),
});

export type StoreConfig = z.infer<typeof storeConfigSchema>;

// ============================================
// RECOMMENDER
// ============================================

export const recommenderConfigSchema = z.object({
  apiKey: optionalString,
  baseUrl: z.preprocess(
    (val) => (val === '' ? undefined : val),
    urlSchema.default('https://api.together.xyz/v1')
  ),
  model: z.preprocess((val) => (val === '' ? undefined : val), z.string().default('deepseek-ai/DeepSeek-V3')),
  temperature: z.preprocess(
    (val) => (val === '' ? undefined : val),
    z.coerce.number().min(0).max(2).default(0.2)
  ),
});

export type RecommenderConfig = z.infer<typeof recommenderConfigSchema>;

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
      `Please check your environment variables or .env file.`
    );
    this.name = 'ConfigValidationError';
  }
}
