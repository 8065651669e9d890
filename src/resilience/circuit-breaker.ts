/**
 * Circuit Breaker — per-service availability gate.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * STATES
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   closed     all calls pass; consecutive failures are counted
 *   open       all calls are rejected until `timeoutMs` has passed since
 *              the last recorded failure
 *   half_open  one probe call at a time; `successThreshold` probe
 *              successes close the circuit, any failure reopens it
 *
 * State is keyed by service name and shared by every workflow in the
 * process. It is independent of the executor's per-step retry counters.
 * Breaker state expires `2 × timeoutMs` after its last change and failure
 * counters `10 × timeoutMs` after theirs, so an idle service drifts back
 * to closed instead of accumulating stale counts.
 * ═══════════════════════════════════════════════════════════════════════════
 */

import { createTypedError, TypedError } from '../domain/errors';
import { TtlStore } from './ttl-store';
import { createLogger } from '../logger';

const log = createLogger({ component: 'circuit-breaker' });

export type CircuitState = 'closed' | 'open' | 'half_open';

export interface CircuitBreakerConfig {
  /** Consecutive failures that open the circuit. */
  failureThreshold: number;
  /** Half-open successes that close it again. */
  successThreshold: number;
  /** Time the circuit stays open after the last failure. */
  timeoutMs: number;
  /** Millisecond clock; defaults to Date.now. */
  now?: () => number;
  /** Which errors count as service failures in execute(); all by default. */
  isFailure?: (err: unknown) => boolean;
}

export const DEFAULT_CIRCUIT_BREAKER_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 25,
  successThreshold: 2,
  timeoutMs: 60_000,
};

export interface CircuitStatus {
  service: string;
  state: CircuitState;
  failureCount: number;
  successCount: number;
  threshold: number;
  successThreshold: number;
  timeoutMs: number;
  lastFailureAt: string | null;
}

interface StateRecord {
  state: CircuitState;
  lastFailureAt?: number;
  /** Set while a half-open probe is outstanding. */
  probeStartedAt?: number;
}

interface CounterRecord {
  failures: number;
  successes: number;
}

/** Thrown by execute() when the circuit rejects a call. */
export class CircuitOpenError extends Error {
  public readonly typedError: TypedError;
  public readonly service: string;

  constructor(service: string, retryAfterMs: number) {
    super(`Service temporarily unavailable: circuit for "${service}" is open`);
    this.name = 'CircuitOpenError';
    this.service = service;
    this.typedError = createTypedError({
      code: 'CIRCUIT.OPEN',
      message: this.message,
      retryable: true,
      details: { service, retryAfterMs },
      suggestedFixes: [
        { type: 'WAIT_AND_RETRY', params: { delayMs: retryAfterMs } },
      ],
    });
  }
}

export class CircuitBreaker {
  private readonly config: CircuitBreakerConfig;
  private readonly now: () => number;
  private readonly states: TtlStore<StateRecord>;
  private readonly counters: TtlStore<CounterRecord>;

  constructor(config?: Partial<CircuitBreakerConfig>) {
    this.config = { ...DEFAULT_CIRCUIT_BREAKER_CONFIG, ...config };
    this.now = this.config.now ?? Date.now;
    this.states = new TtlStore<StateRecord>({ now: this.now });
    this.counters = new TtlStore<CounterRecord>({ now: this.now });
  }

  private get stateTtl(): number {
    return this.config.timeoutMs * 2;
  }

  private get counterTtl(): number {
    return this.config.timeoutMs * 10;
  }

  private readState(service: string): StateRecord {
    return this.states.get(service) ?? { state: 'closed' };
  }

  private readCounters(service: string): CounterRecord {
    return this.counters.get(service) ?? { failures: 0, successes: 0 };
  }

  /**
   * Whether a call to `service` may proceed. In half_open this claims the
   * single probe slot, so callers must report the outcome.
   */
  isRequestAllowed(service: string): boolean {
    const now = this.now();
    const record = this.readState(service);

    if (record.state === 'closed') return true;

    if (record.state === 'open') {
      if (now - (record.lastFailureAt ?? 0) < this.config.timeoutMs) return false;
      this.states.update(service, this.stateTtl, () => ({
        state: 'half_open',
        lastFailureAt: record.lastFailureAt,
        probeStartedAt: now,
      }));
      this.counters.update(service, this.counterTtl, (c) => ({ failures: c?.failures ?? 0, successes: 0 }));
      log.info('Circuit half-open', { service });
      return true;
    }

    // A probe whose outcome was never reported stops blocking after one timeout.
    const probeActive = record.probeStartedAt !== undefined
      && now - record.probeStartedAt < this.config.timeoutMs;
    if (probeActive) return false;
    this.states.update(service, this.stateTtl, () => ({ ...record, probeStartedAt: now }));
    return true;
  }

  recordSuccess(service: string): void {
    const state = this.readState(service).state;

    if (state === 'half_open') {
      const counters = this.counters.update(service, this.counterTtl, (c) => ({
        failures: c?.failures ?? 0,
        successes: (c?.successes ?? 0) + 1,
      }));
      if (counters && counters.successes >= this.config.successThreshold) {
        this.states.delete(service);
        this.counters.delete(service);
        log.info('Circuit closed', { service });
      } else {
        this.states.update(service, this.stateTtl, (r) => (r ? { state: r.state, lastFailureAt: r.lastFailureAt } : r));
      }
      return;
    }

    if (state === 'closed') {
      this.counters.update(service, this.counterTtl, (c) => (c ? { failures: 0, successes: c.successes } : c));
    }
  }

  recordFailure(service: string): void {
    const now = this.now();
    const state = this.readState(service).state;

    const counters = this.counters.update(service, this.counterTtl, (c) => ({
      failures: (c?.failures ?? 0) + 1,
      successes: state === 'half_open' ? 0 : (c?.successes ?? 0),
    }));
    const failures = counters?.failures ?? 1;

    if (state === 'half_open' || state === 'open' || failures >= this.config.failureThreshold) {
      this.states.update(service, this.stateTtl, () => ({ state: 'open', lastFailureAt: now }));
      if (state !== 'open') {
        log.warn('Circuit opened', { service, failures, from: state });
      }
    }
  }

  /**
   * Snapshot for operators. An open circuit whose timeout has elapsed is
   * reported as half_open: the next request is admitted as a trial call, even
   * though the transition itself only happens in isRequestAllowed().
   */
  getStatus(service: string): CircuitStatus {
    const record = this.readState(service);
    const counters = this.readCounters(service);
    const trialDue = record.state === 'open'
      && this.now() - (record.lastFailureAt ?? 0) >= this.config.timeoutMs;
    return {
      service,
      state: trialDue ? 'half_open' : record.state,
      failureCount: counters.failures,
      successCount: counters.successes,
      threshold: this.config.failureThreshold,
      successThreshold: this.config.successThreshold,
      timeoutMs: this.config.timeoutMs,
      lastFailureAt: record.lastFailureAt !== undefined ? new Date(record.lastFailureAt).toISOString() : null,
    };
  }

  /** Forget everything about a service. */
  reset(service: string): void {
    this.states.delete(service);
    this.counters.delete(service);
  }

  /**
   * Run `fn` through the breaker: reject when the circuit does not allow the
   * call, otherwise record the outcome.
   */
  async execute<T>(service: string, fn: () => Promise<T>): Promise<T> {
    if (!this.isRequestAllowed(service)) {
      const record = this.readState(service);
      const retryAfterMs = Math.max(0, (record.lastFailureAt ?? this.now()) + this.config.timeoutMs - this.now());
      throw new CircuitOpenError(service, retryAfterMs);
    }

    try {
      const result = await fn();
      this.recordSuccess(service);
      return result;
    } catch (err) {
      const isFailure = this.config.isFailure ?? (() => true);
      if (isFailure(err)) {
        this.recordFailure(service);
      } else {
        this.release(service);
      }
      throw err;
    }
  }

  /** Free a half-open probe slot without counting the outcome either way. */
  private release(service: string): void {
    this.states.update(service, this.stateTtl, (r) =>
      r && r.state === 'half_open' ? { state: r.state, lastFailureAt: r.lastFailureAt } : r,
    );
  }
}
