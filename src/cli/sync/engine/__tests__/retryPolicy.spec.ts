import { GatewayError } from '../errors';
import { RetryPolicy } from '../retryPolicy';
import { ErrorKind } from '../types';

describe('RetryPolicy', () => {
  it('retries transient kinds until the attempts run out', () => {
    const policy = new RetryPolicy({ maxRetryAttempts: 2, retryBackoffBaseMs: 100 });

    expect(policy.shouldRetry('Locked', 1)).toBe(true);
    expect(policy.shouldRetry('TransientIO', 2)).toBe(true);
    expect(policy.shouldRetry('TransientIO', 3)).toBe(false);
    expect(policy.shouldRetry('NotFound', 1)).toBe(false);
    expect(policy.shouldRetry('GatewayUnavailable', 1)).toBe(false);
  });

  it('doubles the backoff after each attempt', () => {
    const policy = new RetryPolicy({ maxRetryAttempts: 3, retryBackoffBaseMs: 100 });

    expect([1, 2, 3].map(attempt => policy.backoffMs(attempt))).toEqual([100, 200, 400]);
  });

  it('never retries when no retries are configured', () => {
    expect(new RetryPolicy({ maxRetryAttempts: 0, retryBackoffBaseMs: 0 }).shouldRetry('Locked', 1)).toBe(false);
  });

  it('runs the operation again after a transient failure', async () => {
    const policy = new RetryPolicy({ maxRetryAttempts: 2, retryBackoffBaseMs: 0 });
    const retries: Array<[number, ErrorKind]> = [];
    const operation = jest
      .fn<Promise<string>, [number]>()
      .mockRejectedValueOnce(new GatewayError('TransientIO', 'timeout'))
      .mockRejectedValueOnce(new GatewayError('Locked', 'locked'))
      .mockResolvedValue('done');

    const result = await policy.run(operation, { onRetry: (attempt, kind) => retries.push([attempt, kind]) });

    expect(result).toBe('done');
    expect(operation.mock.calls).toEqual([[1], [2], [3]]);
    expect(retries).toEqual([
      [1, 'TransientIO'],
      [2, 'Locked'],
    ]);
  });

  it('gives up on permanent failures right away', async () => {
    const policy = new RetryPolicy({ maxRetryAttempts: 2, retryBackoffBaseMs: 0 });
    const operation = jest.fn<Promise<string>, [number]>().mockRejectedValue(new GatewayError('AccessDenied', 'denied'));

    await expect(policy.run(operation)).rejects.toThrow('denied');
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('gives up once the last attempt failed', async () => {
    const policy = new RetryPolicy({ maxRetryAttempts: 1, retryBackoffBaseMs: 0 });
    const operation = jest.fn<Promise<string>, [number]>().mockRejectedValue(new GatewayError('Locked', 'locked'));

    await expect(policy.run(operation)).rejects.toThrow(GatewayError);
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('stops retrying once the signal aborts', async () => {
    const policy = new RetryPolicy({ maxRetryAttempts: 5, retryBackoffBaseMs: 0 });
    const controller = new AbortController();
    const operation = jest.fn<Promise<string>, [number]>().mockImplementation(async () => {
      controller.abort();
      throw new GatewayError('Locked', 'locked');
    });

    await expect(policy.run(operation, { signal: controller.signal })).rejects.toThrow('locked');
    expect(operation).toHaveBeenCalledTimes(1);
  });
});
