import { describe, it, expect } from 'vitest';
import { CircuitBreaker, CircuitState } from '@/stability/circuitBreaker';
import { CircuitOpenError, TimeoutError } from '@/utils/errors';

const fail = () => Promise.reject(new Error('boom'));
const succeed = () => Promise.resolve('ok');

describe('CircuitBreaker', () => {
  it('opens after the failure threshold and rejects fast', async () => {
    let t = 0;
    const breaker = new CircuitBreaker('svc', { failureThreshold: 2, resetTimeout: 1000 }, () => t);

    await expect(breaker.execute(fail)).rejects.toThrow('boom');
    expect(breaker.getState()).toBe(CircuitState.CLOSED);
    await expect(breaker.execute(fail)).rejects.toThrow('boom');
    expect(breaker.getState()).toBe(CircuitState.OPEN);

    t = 999;
    await expect(breaker.execute(succeed)).rejects.toBeInstanceOf(CircuitOpenError);
  });

  it('half-opens after the reset timeout and closes on enough successes', async () => {
    let t = 0;
    const breaker = new CircuitBreaker(
      'svc',
      { failureThreshold: 1, successThreshold: 2, resetTimeout: 1000 },
      () => t,
    );
    await expect(breaker.execute(fail)).rejects.toThrow('boom');

    t = 1000;
    await expect(breaker.execute(succeed)).resolves.toBe('ok');
    expect(breaker.getState()).toBe(CircuitState.HALF_OPEN);
    await expect(breaker.execute(succeed)).resolves.toBe('ok');
    expect(breaker.getState()).toBe(CircuitState.CLOSED);
  });

  it('reopens on a failure while half-open', async () => {
    let t = 0;
    const breaker = new CircuitBreaker('svc', { failureThreshold: 3, resetTimeout: 100 }, () => t);
    await breaker.execute(fail).catch(() => undefined);
    await breaker.execute(fail).catch(() => undefined);
    await breaker.execute(fail).catch(() => undefined);
    expect(breaker.getState()).toBe(CircuitState.OPEN);

    t = 100;
    await expect(breaker.execute(fail)).rejects.toThrow('boom');
    expect(breaker.snapshot()).toEqual({
      name: 'svc',
      state: CircuitState.OPEN,
      failureCount: 4,
      successCount: 0,
      lastFailureTime: 100,
    });
  });

  it('times out slow calls', async () => {
    const breaker = new CircuitBreaker('slow', { timeout: 10 });

    const pending = breaker.execute(() => new Promise<string>(() => undefined));

    await expect(pending).rejects.toBeInstanceOf(TimeoutError);
    await expect(breaker.execute(() => new Promise<string>(() => undefined))).rejects.toThrow(
      'slow timed out after 10ms',
    );
  });

  it('resets to closed', async () => {
    const breaker = new CircuitBreaker('svc', { failureThreshold: 1 });
    await breaker.execute(fail).catch(() => undefined);

    breaker.reset();

    expect(breaker.getState()).toBe(CircuitState.CLOSED);
    await expect(breaker.execute(succeed)).resolves.toBe('ok');
  });
});
