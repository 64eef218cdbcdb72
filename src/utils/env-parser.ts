/**
 * Environment Variable Parser
 *
 * Type-safe environment variable parsing with validation.
 * Centralizes all env var access; entry points load `.env` through
 * dotenv before anything here runs.
 */

import {
  logConfigSchema,
  browserConfigSchema,
  proxyConfigSchema,
  storeConfigSchema,
  recommenderConfigSchema,
  ConfigValidationError,
  type LogConfig,
  type BrowserSettings,
  type ProxySettings,
  type StoreConfig,
  type RecommenderConfig,
} from './config-schemas.js';

export type Env = Record<string, string | undefined>;

// ============================================
// ENVIRONMENT VARIABLE MAPPING
// ============================================

function mapEnvToLogConfig(env: Env) {
  return {
    level: env.LOG_LEVEL,
    prettyPrint: env.LOG_PRETTY,
  };
}

function mapEnvToBrowserConfig(env: Env) {
  return {
    headless: env.BROWSER_HEADLESS,
    navigationTimeoutMs: env.NAVIGATION_TIMEOUT_MS,
    selectorTimeoutMs: env.SELECTOR_TIMEOUT_MS,
    baseUrl: env.FLIGHTS_BASE_URL,
  };
}

function mapEnvToProxyConfig(env: Env) {
  return {
    server: env.PROXY_SERVER,
    username: env.PROXY_USERNAME,
    password: env.PROXY_PASSWORD,
    bypass: env.PROXY_BYPASS,
  };
}

function mapEnvToStoreConfig(env: Env) {
  return {
    dataDir: env.FLIGHT_DATA_DIR,
    maxAgeMinutes: env.FLIGHT_DATA_MAX_AGE_MINUTES,
  };
}

function mapEnvToRecommenderConfig(env: Env) {
  return {
    apiKey: env.RECOMMENDER_API_KEY || env.TOGETHER_API_KEY,
    baseUrl: env.RECOMMENDER_BASE_URL,
    model: env.RECOMMENDER_MODEL,
    temperature: env.RECOMMENDER_TEMPERATURE,
  };
}

// ============================================
// INDIVIDUAL CONFIG PARSERS
// ============================================

export function parseLogConfig(env: Env = process.env): LogConfig {
  const result = logConfigSchema.safeParse(mapEnvToLogConfig(env));
  if (!result.success) {
    throw new ConfigValidationError('logging', result.error);
  }
  return result.data;
}

export function parseBrowserConfig(env: Env = process.env): BrowserSettings {
  const result = browserConfigSchema.safeParse(mapEnvToBrowserConfig(env));
  if (!result.success) {
    throw new ConfigValidationError('browser', result.error);
  }
  return result.data;
}

/**
 * Returns undefined when no PROXY_SERVER is configured
 */
export function parseProxyConfig(env: Env = process.env): ProxySettings | undefined {
  const result = proxyConfigSchema.safeParse(mapEnvToProxyConfig(env));
  if (!result.success) {
    throw new ConfigValidationError('proxy', result.error);
  }
  return result.data;
}

export function parseStoreConfig(env: Env = process.env): StoreConfig {
  const result = storeConfigSchema.safeParse(mapEnvToStoreConfig(env));
  if (!result.success) {
    throw new ConfigValidationError('recordStore', result.error);
  }
  return result.data;
}

export function parseRecommenderConfig(env: Env = process.env): RecommenderConfig {
  const result = recommenderConfigSchema.safeParse(mapEnvToRecommenderConfig(env));
  if (!result.success) {
    throw new ConfigValidationError('recommender', result.error);
  }
  return result.data;
}

// ============================================
// FULL CONFIGURATION
// ============================================

export interface AdvisorEnvConfig {
  log: LogConfig;
  browser: BrowserSettings;
  proxy?: ProxySettings;
  store: StoreConfig;
  recommender: RecommenderConfig;
}

/**
 * Parse every section. Call early in an entry point to fail fast on misconfig.
 *
 * @throws ConfigValidationError naming the first invalid section
 */
export function parseAdvisorConfig(env: Env = process.env): AdvisorEnvConfig {
  return {
    log: parseLogConfig(env),
    browser: parseBrowserConfig(env),
    proxy: parseProxyConfig(env),
    store: parseStoreConfig(env),
    recommender: parseRecommenderConfig(env),
  };
}
