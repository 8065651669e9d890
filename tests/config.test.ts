import { AppConfig, ConfigError, loadConfig, validateConfig } from '../src/config';
import { LogLevel } from '../src/logger';

describe('loadConfig', () => {
  test('falls back to defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      port: 5000,
      logLevel: LogLevel.Info,
      logFormat: 'json',
      planRateLimitPerMinute: 30,
      retry: { maxAttempts: 3, backoffBaseMs: 5000, backoffCapMs: 30000 },
      interStepDelayMs: 500,
      breaker: { failureThreshold: 25, successThreshold: 2, timeoutMs: 60000 },
      fallback: { maxPrimaryFailures: 3, cooldownMs: 60000 },
      statusSessionTtlMs: 86_400_000,
      confirmationTools: ['send_email'],
      primary: { provider: 'ollama', model: 'llama3' },
      secondary: null,
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  test('reads overrides from the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      INTENTFLOW_LOG_LEVEL: ' DEBUG ',
      INTENTFLOW_LOG_FORMAT: 'Text',
      INTENTFLOW_MAX_ATTEMPTS: '5',
      INTENTFLOW_STEP_DELAY_MS: '0',
      INTENTFLOW_CONFIRMATION_TOOLS: 'send_email, send_sms ,,',
      INTENTFLOW_PRIMARY_PROVIDER: 'openai',
      INTENTFLOW_PRIMARY_MODEL: 'gpt-4o-mini',
      INTENTFLOW_PRIMARY_API_KEY: 'test-secret',
      INTENTFLOW_SECONDARY_PROVIDER: 'custom',
      INTENTFLOW_SECONDARY_BASE_URL: 'http://llm.internal.test:8000',
    });

    expect(config.port).toBe(8080);
    expect(config.logLevel).toBe(LogLevel.Debug);
    expect(config.logFormat).toBe('text');
    expect(config.retry).toEqual({ maxAttempts: 5, backoffBaseMs: 5000, backoffCapMs: 30000 });
    expect(config.interStepDelayMs).toBe(0);
    expect(config.confirmationTools).toEqual(['send_email', 'send_sms']);
    expect(config.primary).toEqual({ provider: 'openai', model: 'gpt-4o-mini', apiKey: 'test-secret' });
    expect(config.secondary).toEqual({ provider: 'custom', model: 'llama3', baseUrl: 'http://llm.internal.test:8000' });
  });

  test('an empty confirmation list disables the gate', () => {
    expect(loadConfig({ INTENTFLOW_CONFIRMATION_TOOLS: '' }).confirmationTools).toEqual([]);
  });

  test('collects every problem into one ConfigError', () => {
    let caught: unknown;
    try {
      loadConfig({ PORT: 'abc', INTENTFLOW_PRIMARY_PROVIDER: 'gemini', INTENTFLOW_LOG_LEVEL: 'loud' });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.errors).toEqual([
        'INTENTFLOW_LOG_LEVEL must be one of debug, info, warn, error',
        'PORT must be a number, got "abc"',
        'INTENTFLOW_PRIMARY_PROVIDER must be one of ollama, openai, custom; got "gemini"',
      ]);
      expect(caught.message).toBe(`Invalid configuration: ${caught.errors.join('; ')}`);
    }
  });

  test('requires a base URL for the custom provider', () => {
    expect(() => loadConfig({ INTENTFLOW_PRIMARY_PROVIDER: 'custom' })).toThrow(
      'Invalid configuration: INTENTFLOW_PRIMARY_BASE_URL is required for the custom provider',
    );
  });

  test('rejects a backoff cap below the base', () => {
    expect(() => loadConfig({ INTENTFLOW_BACKOFF_BASE_MS: '10000', INTENTFLOW_BACKOFF_CAP_MS: '5000' })).toThrow(
      'Invalid configuration: INTENTFLOW_BACKOFF_CAP_MS must be at least INTENTFLOW_BACKOFF_BASE_MS',
    );
  });
});

describe('validateConfig', () => {
  function baseConfig(): AppConfig {
    return { ...loadConfig({}) };
  }

  test('accepts the defaults', () => {
    expect(validateConfig(baseConfig())).toEqual({ valid: true, errors: [] });
  });

  test('reports out-of-range values', () => {
    const config: AppConfig = {
      ...baseConfig(),
      port: 70000,
      planRateLimitPerMinute: 0,
      retry: { maxAttempts: 0, backoffBaseMs: 100, backoffCapMs: 1000 },
      breaker: { failureThreshold: 1, successThreshold: 1, timeoutMs: 0 },
    };

    expect(validateConfig(config)).toEqual({
      valid: false,
      errors: [
        'PORT must be an integer between 0 and 65535',
        'INTENTFLOW_PLAN_RATE_LIMIT must be a positive integer',
        'INTENTFLOW_MAX_ATTEMPTS must be at least 1',
        'INTENTFLOW_BREAKER_TIMEOUT_MS must be positive',
      ],
    });
  });
});
