/**
 * Runtime configuration.
 *
 * Everything tunable comes from environment variables with the INTENTFLOW_
 * prefix (plus PORT). `loadConfig()` parses and validates them and returns
 * a frozen AppConfig; `validateConfig()` can be used on hand-built configs.
 *
 * Usage:
 *   const config = loadConfig();
 *   const breaker = new CircuitBreaker(config.breaker);
 */

import { LogFormat, LogLevel } from './logger';
import { LLMProvider, ProviderSettings, isLLMProvider } from './llm/provider';
import { RetryPolicy } from './engine/retry';

export interface BreakerSettings {
  failureThreshold: number;
  successThreshold: number;
  timeoutMs: number;
}

export interface FallbackSettings {
  maxPrimaryFailures: number;
  cooldownMs: number;
}

export interface AppConfig {
  port: number;
  logLevel: LogLevel;
  logFormat: LogFormat;
  /** Workflow creations allowed per session per minute. */
  planRateLimitPerMinute: number;
  retry: RetryPolicy;
  /** Delay inserted before each step dispatch. */
  interStepDelayMs: number;
  breaker: BreakerSettings;
  fallback: FallbackSettings;
  /** Status log of a session with no new entries is dropped after this long. */
  statusSessionTtlMs: number;
  /** Outbound-communication tools; their steps always need confirmation. */
  confirmationTools: string[];
  primary: ProviderSettings;
  secondary: ProviderSettings | null;
}

export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
}

/** Raised by loadConfig when the environment does not describe a usable config. */
export class ConfigError extends Error {
  public readonly errors: string[];

  constructor(errors: string[]) {
    super(`Invalid configuration: ${errors.join('; ')}`);
    this.name = 'ConfigError';
    this.errors = errors;
  }
}

type Env = Record<string, string | undefined>;

const LOG_LEVELS: readonly LogLevel[] = [LogLevel.Debug, LogLevel.Info, LogLevel.Warn, LogLevel.Error];
const LOG_FORMATS: readonly LogFormat[] = ['json', 'text'];

function readNumber(env: Env, key: string, fallback: number, errors: string[]): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    errors.push(`${key} must be a number, got "${raw}"`);
    return fallback;
  }
  return value;
}

function readList(env: Env, key: string, fallback: string[]): string[] {
  const raw = env[key];
  if (raw === undefined) return fallback;
  return raw.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
}

function readProvider(env: Env, prefix: string, fallback: LLMProvider | undefined, errors: string[]): ProviderSettings | null {
  const rawProvider = env[`${prefix}_PROVIDER`]?.trim() || fallback;
  if (!rawProvider) return null;
  if (!isLLMProvider(rawProvider)) {
    errors.push(`${prefix}_PROVIDER must be one of ollama, openai, custom; got "${rawProvider}"`);
    return null;
  }
  return {
    provider: rawProvider,
    model: env[`${prefix}_MODEL`]?.trim() || 'llama3',
    baseUrl: env[`${prefix}_BASE_URL`]?.trim() || undefined,
    apiKey: env[`${prefix}_API_KEY`] || undefined,
  };
}

/** Check a config for values the engine cannot run with. */
export function validateConfig(config: AppConfig): ConfigValidationResult {
  const errors: string[] = [];

  if (!Number.isInteger(config.port) || config.port < 0 || config.port > 65535) {
    errors.push('PORT must be an integer between 0 and 65535');
  }
  if (!Number.isInteger(config.planRateLimitPerMinute) || config.planRateLimitPerMinute < 1) {
    errors.push('INTENTFLOW_PLAN_RATE_LIMIT must be a positive integer');
  }
  if (!Number.isInteger(config.retry.maxAttempts) || config.retry.maxAttempts < 1) {
    errors.push('INTENTFLOW_MAX_ATTEMPTS must be at least 1');
  }
  if (config.retry.backoffBaseMs < 0) errors.push('INTENTFLOW_BACKOFF_BASE_MS cannot be negative');
  if (config.retry.backoffCapMs < config.retry.backoffBaseMs) {
    errors.push('INTENTFLOW_BACKOFF_CAP_MS must be at least INTENTFLOW_BACKOFF_BASE_MS');
  }
  if (config.interStepDelayMs < 0) errors.push('INTENTFLOW_STEP_DELAY_MS cannot be negative');
  if (config.breaker.failureThreshold < 1) errors.push('INTENTFLOW_BREAKER_FAILURE_THRESHOLD must be at least 1');
  if (config.breaker.successThreshold < 1) errors.push('INTENTFLOW_BREAKER_SUCCESS_THRESHOLD must be at least 1');
  if (config.breaker.timeoutMs <= 0) errors.push('INTENTFLOW_BREAKER_TIMEOUT_MS must be positive');
  if (config.fallback.maxPrimaryFailures < 1) errors.push('INTENTFLOW_FALLBACK_MAX_FAILURES must be at least 1');
  if (config.fallback.cooldownMs < 0) errors.push('INTENTFLOW_FALLBACK_COOLDOWN_MS cannot be negative');
  if (config.statusSessionTtlMs <= 0) errors.push('INTENTFLOW_STATUS_SESSION_TTL_MS must be positive');
  if (config.primary.provider === 'custom' && !config.primary.baseUrl) {
    errors.push('INTENTFLOW_PRIMARY_BASE_URL is required for the custom provider');
  }
  if (config.secondary?.provider === 'custom' && !config.secondary.baseUrl) {
    errors.push('INTENTFLOW_SECONDARY_BASE_URL is required for the custom provider');
  }

  return { valid: errors.length === 0, errors };
}

/** Read, validate and freeze the configuration. Throws ConfigError on any problem. */
export function loadConfig(env: Env = process.env): Readonly<AppConfig> {
  const errors: string[] = [];

  const rawLevel = env.INTENTFLOW_LOG_LEVEL?.trim().toLowerCase();
  const logLevel = LOG_LEVELS.find((l) => l === rawLevel);
  if (rawLevel && !logLevel) {
    errors.push(`INTENTFLOW_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`);
  }
  const rawFormat = env.INTENTFLOW_LOG_FORMAT?.trim().toLowerCase();
  const logFormat = LOG_FORMATS.find((f) => f === rawFormat);
  if (rawFormat && !logFormat) {
    errors.push(`INTENTFLOW_LOG_FORMAT must be one of ${LOG_FORMATS.join(', ')}`);
  }

  const config: AppConfig = {
    port: readNumber(env, 'PORT', 5000, errors),
    logLevel: logLevel ?? LogLevel.Info,
    logFormat: logFormat ?? 'json',
    planRateLimitPerMinute: readNumber(env, 'INTENTFLOW_PLAN_RATE_LIMIT', 30, errors),
    retry: {
      maxAttempts: readNumber(env, 'INTENTFLOW_MAX_ATTEMPTS', 3, errors),
      backoffBaseMs: readNumber(env, 'INTENTFLOW_BACKOFF_BASE_MS', 5000, errors),
      backoffCapMs: readNumber(env, 'INTENTFLOW_BACKOFF_CAP_MS', 30000, errors),
    },
    interStepDelayMs: readNumber(env, 'INTENTFLOW_STEP_DELAY_MS', 500, errors),
    breaker: {
      failureThreshold: readNumber(env, 'INTENTFLOW_BREAKER_FAILURE_THRESHOLD', 25, errors),
      successThreshold: readNumber(env, 'INTENTFLOW_BREAKER_SUCCESS_THRESHOLD', 2, errors),
      timeoutMs: readNumber(env, 'INTENTFLOW_BREAKER_TIMEOUT_MS', 60000, errors),
    },
    fallback: {
      maxPrimaryFailures: readNumber(env, 'INTENTFLOW_FALLBACK_MAX_FAILURES', 3, errors),
      cooldownMs: readNumber(env, 'INTENTFLOW_FALLBACK_COOLDOWN_MS', 60000, errors),
    },
    statusSessionTtlMs: readNumber(env, 'INTENTFLOW_STATUS_SESSION_TTL_MS', 86_400_000, errors),
    confirmationTools: readList(env, 'INTENTFLOW_CONFIRMATION_TOOLS', ['send_email']),
    primary: readProvider(env, 'INTENTFLOW_PRIMARY', 'ollama', errors) ?? { provider: 'ollama', model: 'llama3' },
    secondary: readProvider(env, 'INTENTFLOW_SECONDARY', undefined, errors),
  };

  errors.push(...validateConfig(config).errors);
  if (errors.length > 0) {
    throw new ConfigError(errors);
  }

  return Object.freeze(config);
}
