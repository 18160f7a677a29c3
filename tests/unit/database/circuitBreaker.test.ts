import { CircuitBreaker, CircuitBreakerOpenError, CircuitState } from '../../../src/infrastructure/database/CircuitBreaker.js';
import { RecordingLogger } from '../../helpers/fakes.js';

const fail = async (): Promise<never> => {
  throw new Error('ECONNREFUSED');
};
const succeed = async () => 'ok';

describe('CircuitBreaker', () => {
  beforeEach(() => {
    jest.useFakeTimers();
    jest.setSystemTime(new Date('2024-03-01T12:00:00Z'));
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('should pass results through while closed', async () => {
    const breaker = new CircuitBreaker();
    await expect(breaker.execute(succeed)).resolves.toBe('ok');
    expect(breaker.getState()).toBe(CircuitState.CLOSED);
  });

  it('should open after the failure threshold and fail fast', async () => {
    const logger = new RecordingLogger();
    const breaker = new CircuitBreaker({ threshold: 2, resetTimeoutMs: 1000, logger });
    const fn = jest.fn(succeed);

    await expect(breaker.execute(fail)).rejects.toThrow('ECONNREFUSED');
    expect(breaker.getState()).toBe(CircuitState.CLOSED);
    await expect(breaker.execute(fail)).rejects.toThrow('ECONNREFUSED');
    expect(breaker.getState()).toBe(CircuitState.OPEN);

    await expect(breaker.execute(fn)).rejects.toThrow(CircuitBreakerOpenError);
    await expect(breaker.execute(fn)).rejects.toThrow('Circuit breaker is OPEN. Next attempt at 2024-03-01T12:00:01.000Z');
    expect(fn).not.toHaveBeenCalled();
    expect(logger.messages('warn')).toEqual(['Circuit CLOSED -> OPEN']);
  });

  it('should reset the failure count after a success', async () => {
    const breaker = new CircuitBreaker({ threshold: 2 });

    await expect(breaker.execute(fail)).rejects.toThrow();
    await breaker.execute(succeed);
    await expect(breaker.execute(fail)).rejects.toThrow();

    expect(breaker.getState()).toBe(CircuitState.CLOSED);
  });

  it('should close after enough successful trial calls', async () => {
    const breaker = new CircuitBreaker({ threshold: 1, resetTimeoutMs: 1000, halfOpenSuccesses: 2 });
    await expect(breaker.execute(fail)).rejects.toThrow();

    jest.advanceTimersByTime(1000);
    await breaker.execute(succeed);
    expect(breaker.getState()).toBe(CircuitState.HALF_OPEN);

    await breaker.execute(succeed);
    expect(breaker.getState()).toBe(CircuitState.CLOSED);
  });

  it('should reopen when a trial call fails', async () => {
    const breaker = new CircuitBreaker({ threshold: 1, resetTimeoutMs: 1000 });
    await expect(breaker.execute(fail)).rejects.toThrow();

    jest.advanceTimersByTime(1000);
    await expect(breaker.execute(fail)).rejects.toThrow('ECONNREFUSED');

    expect(breaker.getState()).toBe(CircuitState.OPEN);
  });
});
