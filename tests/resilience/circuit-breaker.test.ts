import { CircuitBreaker, CircuitOpenError } from '../../src/resilience/circuit-breaker';
import { isTransientError, NonRetryableStepError } from '../../src/engine/retry';

describe('CircuitBreaker', () => {
  let clock: number;
  let breaker: CircuitBreaker;

  beforeEach(() => {
    clock = 0;
    breaker = new CircuitBreaker({
      failureThreshold: 3,
      successThreshold: 2,
      timeoutMs: 1000,
      now: () => clock,
    });
  });

  function openCircuit(service: string = 'svc'): void {
    breaker.recordFailure(service);
    breaker.recordFailure(service);
    breaker.recordFailure(service);
  }

  test('starts closed', () => {
    expect(breaker.isRequestAllowed('svc')).toBe(true);
    expect(breaker.getStatus('svc')).toEqual({
      service: 'svc',
      state: 'closed',
      failureCount: 0,
      successCount: 0,
      threshold: 3,
      successThreshold: 2,
      timeoutMs: 1000,
      lastFailureAt: null,
    });
  });

  test('opens after the failure threshold', () => {
    breaker.recordFailure('svc');
    breaker.recordFailure('svc');
    expect(breaker.getStatus('svc').state).toBe('closed');

    breaker.recordFailure('svc');
    clock = 500;

    expect(breaker.isRequestAllowed('svc')).toBe(false);
    expect(breaker.getStatus('svc')).toMatchObject({
      state: 'open',
      failureCount: 3,
      lastFailureAt: '1970-01-01T00:00:00.000Z',
    });
  });

  test('a success while closed resets the consecutive failure count', () => {
    breaker.recordFailure('svc');
    breaker.recordFailure('svc');
    breaker.recordSuccess('svc');
    breaker.recordFailure('svc');
    breaker.recordFailure('svc');

    expect(breaker.getStatus('svc')).toMatchObject({ state: 'closed', failureCount: 2 });
  });

  test('allows exactly one probe after the timeout', () => {
    openCircuit();
    clock = 1000;

    expect(breaker.isRequestAllowed('svc')).toBe(true);
    expect(breaker.getStatus('svc').state).toBe('half_open');
    expect(breaker.isRequestAllowed('svc')).toBe(false);
  });

  test('status shows half_open once the open timeout has elapsed', () => {
    openCircuit();
    clock = 999;
    expect(breaker.getStatus('svc').state).toBe('open');

    clock = 1000;
    expect(breaker.getStatus('svc')).toMatchObject({ state: 'half_open', failureCount: 3 });
    expect(breaker.getStatus('svc').state).toBe('half_open');

    expect(breaker.isRequestAllowed('svc')).toBe(true);
    expect(breaker.isRequestAllowed('svc')).toBe(false);
    expect(breaker.getStatus('svc').state).toBe('half_open');
  });

  test('closes after enough half-open successes', () => {
    openCircuit();
    clock = 1000;

    expect(breaker.isRequestAllowed('svc')).toBe(true);
    breaker.recordSuccess('svc');
    expect(breaker.getStatus('svc')).toMatchObject({ state: 'half_open', successCount: 1 });

    expect(breaker.isRequestAllowed('svc')).toBe(true);
    breaker.recordSuccess('svc');
    expect(breaker.getStatus('svc')).toMatchObject({ state: 'closed', failureCount: 0, successCount: 0 });
  });

  test('any half-open failure reopens the circuit', () => {
    openCircuit();
    clock = 1000;
    breaker.isRequestAllowed('svc');
    breaker.recordSuccess('svc');

    breaker.isRequestAllowed('svc');
    breaker.recordFailure('svc');

    expect(breaker.getStatus('svc')).toMatchObject({ state: 'open', lastFailureAt: '1970-01-01T00:00:01.000Z' });
    clock = 1999;
    expect(breaker.isRequestAllowed('svc')).toBe(false);
  });

  test('a probe that never reports stops blocking after one timeout', () => {
    openCircuit();
    clock = 1000;
    breaker.isRequestAllowed('svc');

    clock = 1999;
    expect(breaker.isRequestAllowed('svc')).toBe(false);
    clock = 2000;
    expect(breaker.isRequestAllowed('svc')).toBe(true);
  });

  test('keeps services apart', () => {
    openCircuit('a');
    expect(breaker.isRequestAllowed('a')).toBe(false);
    expect(breaker.isRequestAllowed('b')).toBe(true);
  });

  test('reset forgets a service', () => {
    openCircuit();
    breaker.reset('svc');
    expect(breaker.getStatus('svc').state).toBe('closed');
    expect(breaker.isRequestAllowed('svc')).toBe(true);
  });

  test('an idle open circuit expires back to closed', () => {
    openCircuit();
    clock = 2000;
    expect(breaker.getStatus('svc').state).toBe('closed');
  });

  describe('execute', () => {
    test('passes results through and counts failures', async () => {
      await expect(breaker.execute('svc', async () => 'ok')).resolves.toBe('ok');
      await expect(breaker.execute('svc', async () => { throw new Error('boom'); })).rejects.toThrow('boom');
      expect(breaker.getStatus('svc').failureCount).toBe(1);
    });

    test('rejects calls while open without running them', async () => {
      openCircuit();
      clock = 250;
      const fn = jest.fn(async () => 'never');

      const err: unknown = await breaker.execute('svc', fn).catch((e: unknown) => e);

      expect(fn).not.toHaveBeenCalled();
      expect(err).toBeInstanceOf(CircuitOpenError);
      if (err instanceof CircuitOpenError) {
        expect(err.message).toBe('Service temporarily unavailable: circuit for "svc" is open');
        expect(err.typedError).toMatchObject({ code: 'CIRCUIT.OPEN', retryable: true, details: { service: 'svc', retryAfterMs: 750 } });
      }
    });

    test('only counts failures the classifier accepts', async () => {
      const selective = new CircuitBreaker({ failureThreshold: 1, isFailure: isTransientError, now: () => clock });

      await expect(selective.execute('svc', async () => { throw new NonRetryableStepError('bad input'); }))
        .rejects.toThrow('bad input');
      expect(selective.getStatus('svc')).toMatchObject({ state: 'closed', failureCount: 0 });

      await expect(selective.execute('svc', async () => { throw new Error('503 Service Unavailable'); }))
        .rejects.toThrow('503');
      expect(selective.getStatus('svc').state).toBe('open');
    });
  });
});
