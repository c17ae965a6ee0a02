/**
 * Environment Variable Validation
 *
 * Centralized parsing and validation of every environment variable the
 * summarization core reads. Values are parsed by hand with defaults; all
 * problems are collected and reported together.
 */

// Load dotenv early so variables from .env are visible to the first getEnv() call
import * as dotenv from 'dotenv';
dotenv.config();

import { ConfigurationError } from '../types/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Helper function to safely parse a number from string with default
 */
function parseNumericEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseInt(value, 10);
  return isNaN(num) ? defaultValue : num;
}

function parseFloatEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseFloat(value);
  return isNaN(num) ? defaultValue : num;
}

export const LLM_PROVIDERS = ['openai', 'gemini', 'ionet'] as const;
export type LLMProviderName = (typeof LLM_PROVIDERS)[number];

function isProviderName(value: string): value is LLMProviderName {
  return (LLM_PROVIDERS as readonly string[]).includes(value);
}

const NODE_ENVS = ['development', 'production', 'test'] as const;
type NodeEnv = (typeof NODE_ENVS)[number];

function isNodeEnv(value: string): value is NodeEnv {
  return (NODE_ENVS as readonly string[]).includes(value);
}

/**
 * Environment configuration type
 */
export interface Env {
  NODE_ENV: NodeEnv;

  // Provider selection
  LLM_PROVIDER: LLMProviderName;

  // OpenAI
  OPENAI_API_KEY?: string;
  OPENAI_MODEL: string;

  // Gemini
  GEMINI_API_KEY?: string;
  GEMINI_MODEL: string;
  GEMINI_TIMEOUT: number;

  // io.net (OpenAI-compatible API)
  IONET_API_KEY?: string;
  IONET_BASE_URL: string;
  IONET_MODEL: string;

  // Generation parameters
  LLM_TEMPERATURE: number;
  LLM_MAX_TOKENS: number;

  // Rate limiting
  RATE_LIMIT_RPM: number;
  RATE_LIMIT_BURST: number;

  // Chunking and reduction
  CHUNK_SIZE: number;
  CHUNK_OVERLAP: number;
  SUMMARY_MAX_BATCH_SIZE: number;
}

let validatedEnv: Env | null = null;

/**
 * Parse and validate an environment source without touching the cache
 * @throws {ConfigurationError} listing every invalid variable
 */
export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const errors: string[] = [];

  const nodeEnv = source.NODE_ENV || 'development';
  if (!isNodeEnv(nodeEnv)) {
    errors.push(`NODE_ENV: Invalid value "${nodeEnv}". Must be development, production, or test.`);
  }

  const provider = (source.LLM_PROVIDER || 'gemini').toLowerCase();
  if (!isProviderName(provider)) {
    errors.push(`LLM_PROVIDER: Unknown provider "${provider}". Use ${LLM_PROVIDERS.join(', ')}.`);
  }

  const temperature = parseFloatEnv(source.LLM_TEMPERATURE, 0.3);
  if (temperature < 0 || temperature > 2) {
    errors.push(`LLM_TEMPERATURE: Invalid value "${source.LLM_TEMPERATURE}". Must be between 0 and 2.`);
  }

  const maxTokens = parseNumericEnv(source.LLM_MAX_TOKENS, 1500);
  if (maxTokens < 1) {
    errors.push(`LLM_MAX_TOKENS: Invalid value "${source.LLM_MAX_TOKENS}". Must be at least 1.`);
  }

  const rpm = parseFloatEnv(source.RATE_LIMIT_RPM, 5);
  if (rpm <= 0) {
    errors.push(`RATE_LIMIT_RPM: Invalid value "${source.RATE_LIMIT_RPM}". Must be greater than 0.`);
  }

  const burst = parseNumericEnv(source.RATE_LIMIT_BURST, 1);
  if (burst < 1) {
    errors.push(`RATE_LIMIT_BURST: Invalid value "${source.RATE_LIMIT_BURST}". Must be at least 1.`);
  }

  const chunkSize = parseNumericEnv(source.CHUNK_SIZE, 4000);
  const chunkOverlap = parseNumericEnv(source.CHUNK_OVERLAP, 200);
  if (chunkSize < 1) {
    errors.push(`CHUNK_SIZE: Invalid value "${source.CHUNK_SIZE}". Must be at least 1.`);
  }
  if (chunkOverlap < 0 || chunkOverlap >= chunkSize) {
    errors.push(`CHUNK_OVERLAP: Invalid value "${chunkOverlap}". Must be between 0 and CHUNK_SIZE - 1.`);
  }

  const maxBatchSize = parseNumericEnv(source.SUMMARY_MAX_BATCH_SIZE, 10);
  if (maxBatchSize < 2) {
    errors.push(`SUMMARY_MAX_BATCH_SIZE: Invalid value "${source.SUMMARY_MAX_BATCH_SIZE}". Must be at least 2.`);
  }

  if (errors.length > 0 || !isNodeEnv(nodeEnv) || !isProviderName(provider)) {
    logger.error({ errors }, 'Environment validation failed');
    throw new ConfigurationError('Environment', [], errors.join(' '));
  }

  return {
    NODE_ENV: nodeEnv,

    LLM_PROVIDER: provider,

    OPENAI_API_KEY: source.OPENAI_API_KEY || undefined,
    OPENAI_MODEL: source.OPENAI_MODEL || 'gpt-4o-mini',

    GEMINI_API_KEY: source.GEMINI_API_KEY || source.GOOGLE_API_KEY || undefined,
    GEMINI_MODEL: source.GEMINI_MODEL || 'gemini-2.0-flash',
    GEMINI_TIMEOUT: parseNumericEnv(source.GEMINI_TIMEOUT, 300000), // 5 minutes

    IONET_API_KEY: source.IONET_API_KEY || undefined,
    IONET_BASE_URL: source.IONET_BASE_URL || 'https://api.intelligence.io.solutions/api/v1',
    IONET_MODEL: source.IONET_MODEL || 'deepseek-ai/DeepSeek-V3',

    LLM_TEMPERATURE: temperature,
    LLM_MAX_TOKENS: maxTokens,

    RATE_LIMIT_RPM: rpm,
    RATE_LIMIT_BURST: burst,

    CHUNK_SIZE: chunkSize,
    CHUNK_OVERLAP: chunkOverlap,
    SUMMARY_MAX_BATCH_SIZE: maxBatchSize,
  };
}

/**
 * Validate and return environment variables
 * Validates on first call, then returns cached result
 */
export function validateEnv(): Env {
  if (validatedEnv) {
    return validatedEnv;
  }

  validatedEnv = parseEnv(process.env);
  return validatedEnv;
}

/**
 * Get validated environment variables
 */
export function getEnv(): Env {
  return validateEnv();
}

/**
 * Reset validated environment cache
 * Used for testing to allow re-validation after env vars change
 */
export function resetEnv(): void {
  validatedEnv = null;
}

