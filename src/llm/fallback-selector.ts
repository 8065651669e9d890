/**
 * Fallback Agent Selector — primary/secondary completion provider failover.
 *
 * A rate or quota failure from the primary is answered by the secondary
 * straight away. After `maxPrimaryFailures` consecutive rate-limit
 * failures the primary is put into a cooldown and every call goes to the
 * secondary until the cooldown elapses; the next call then probes the
 * primary again. Any other primary failure propagates unchanged.
 *
 * The selector is itself a CompletionProvider, so it composes with the
 * circuit breaker and with callers that only know the port.
 */

import { CompletionOptions, CompletionProvider, ChatMessage, LLMProviderError } from './provider';
import { StatusReporter } from '../status/status-reporter';
import { errorMessage } from '../domain/errors';
import { createLogger } from '../logger';

const log = createLogger({ component: 'fallback-selector' });

export interface FallbackSelectorConfig {
  /** Consecutive primary rate-limit failures before the cooldown starts. */
  maxPrimaryFailures: number;
  cooldownMs: number;
  /** Millisecond clock; defaults to Date.now. */
  now?: () => number;
}

export const DEFAULT_FALLBACK_CONFIG: FallbackSelectorConfig = {
  maxPrimaryFailures: 3,
  cooldownMs: 60_000,
};

/** Message fragments that identify a rate or quota failure. */
export const RATE_LIMIT_PATTERNS: readonly string[] = [
  '429',
  'rate limit',
  'quota exceeded',
  'too many requests',
  'resource exhausted',
];

export function isRateLimitError(err: unknown): boolean {
  if (err instanceof LLMProviderError && err.statusCode === 429) return true;
  const lower = errorMessage(err).toLowerCase();
  return RATE_LIMIT_PATTERNS.some((pattern) => lower.includes(pattern));
}

export interface FallbackStatus {
  usingFallback: boolean;
  primaryFailCount: number;
  cooldownUntil: string | null;
  primary: string;
  secondary: string | null;
}

export class FallbackAgentSelector implements CompletionProvider {
  readonly name: string;
  private readonly config: FallbackSelectorConfig;
  private readonly now: () => number;
  private primaryFailCount = 0;
  private cooldownUntil: number | null = null;

  constructor(
    private readonly primary: CompletionProvider,
    private readonly secondary: CompletionProvider | null,
    private readonly reporter?: StatusReporter,
    config?: Partial<FallbackSelectorConfig>,
  ) {
    this.config = { ...DEFAULT_FALLBACK_CONFIG, ...config };
    this.now = this.config.now ?? Date.now;
    this.name = secondary ? `fallback(${primary.name}|${secondary.name})` : primary.name;
  }

  async complete(request: string | ChatMessage[], options: CompletionOptions = {}): Promise<string> {
    if (this.secondary && this.cooldownUntil !== null) {
      if (this.now() < this.cooldownUntil) {
        return this.secondary.complete(request, options);
      }
      this.cooldownUntil = null;
      this.primaryFailCount = 0;
      log.info('Primary cooldown elapsed, probing primary', { primary: this.primary.name });
      await this.report(options.sessionId, `Cooldown over, trying ${this.primary.name} again`);
    }

    try {
      const result = await this.primary.complete(request, options);
      this.primaryFailCount = 0;
      return result;
    } catch (err) {
      if (!this.secondary || !isRateLimitError(err)) throw err;

      this.primaryFailCount++;
      log.warn('Primary provider rate-limited', {
        primary: this.primary.name,
        failures: this.primaryFailCount,
        error: errorMessage(err),
      });

      if (this.primaryFailCount >= this.config.maxPrimaryFailures) {
        this.cooldownUntil = this.now() + this.config.cooldownMs;
        await this.report(
          options.sessionId,
          `${this.primary.name} is rate-limited; using ${this.secondary.name} for the next ${Math.round(this.config.cooldownMs / 1000)}s`,
        );
      } else {
        await this.report(options.sessionId, `${this.primary.name} is rate-limited; retrying with ${this.secondary.name}`);
      }

      return this.secondary.complete(request, options);
    }
  }

  getStatus(): FallbackStatus {
    const cooling = this.cooldownUntil !== null && this.now() < this.cooldownUntil;
    return {
      usingFallback: cooling,
      primaryFailCount: this.primaryFailCount,
      cooldownUntil: cooling && this.cooldownUntil !== null ? new Date(this.cooldownUntil).toISOString() : null,
      primary: this.primary.name,
      secondary: this.secondary?.name ?? null,
    };
  }

  /** End any cooldown and forget the failure count. */
  reset(): void {
    this.cooldownUntil = null;
    this.primaryFailCount = 0;
  }

  private async report(sessionId: string | undefined, message: string): Promise<void> {
    if (!sessionId || !this.reporter) return;
    try {
      await this.reporter.append(sessionId, message);
    } catch (err) {
      log.warn('Status report failed', { sessionId, error: errorMessage(err) });
    }
  }
}
