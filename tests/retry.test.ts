import { afterEach, beforeEach, describe, expect, it, type MockInstance, vi } from 'vitest';
import { SubprocessError, TransientBackendError } from '../src/errors.js';
import {
  classifyError,
  classifySubprocessOutput,
  exponentialBackoff,
  isTransientError,
  RetryExecutor,
  retrying,
} from '../src/retry.js';

function systemError(code: string): Error {
  return Object.assign(new Error(`connect ${code}`), { code });
}

function recordingSleep() {
  const delays: number[] = [];
  const sleep = async (ms: number) => {
    delays.push(ms);
  };
  return { delays, sleep };
}

// ============ Classification ============

describe('classifyError', () => {
  it('uses the kind of a TransientBackendError', () => {
    expect(classifyError(new TransientBackendError('timeout', 'slow'))).toBe('timeout');
  });

  it('classifies Node system error codes', () => {
    expect(classifyError(systemError('ECONNREFUSED'))).toBe('connection');
    expect(classifyError(systemError('ECONNRESET'))).toBe('connection');
    expect(classifyError(systemError('ETIMEDOUT'))).toBe('timeout');
    expect(classifyError(systemError('ENOENT'))).toBeNull();
  });

  it('classifies timeouts by error name', () => {
    const error = new Error('The operation was aborted due to timeout');
    error.name = 'TimeoutError';
    expect(classifyError(error)).toBe('timeout');
  });

  it('classifies HTTP 500 and 503 responses', () => {
    expect(classifyError(Object.assign(new Error('down'), { status: 503 }))).toBe(
      'service-unavailable',
    );
    expect(classifyError(Object.assign(new Error('boom'), { status: 500 }))).toBe(
      'internal-server-error',
    );
    expect(classifyError(Object.assign(new Error('missing'), { status: 404 }))).toBeNull();
  });

  it('classifies subprocess failures by their stderr', () => {
    const transient = new SubprocessError('hub download', 1, 'requests.exceptions.ConnectionError');
    const fatal = new SubprocessError('hub download', 2, 'No such model');
    expect(classifyError(transient)).toBe('connection');
    expect(classifyError(fatal)).toBeNull();
  });

  it('does not retry plain errors or non-errors', () => {
    expect(isTransientError(new Error('ConnectionError in message only'))).toBe(false);
    expect(isTransientError('ConnectionError')).toBe(false);
    expect(isTransientError(undefined)).toBe(false);
  });
});

describe('classifySubprocessOutput', () => {
  it('maps each network pattern to its kind', () => {
    expect(classifySubprocessOutput('ReadTimeout: read timed out')).toBe('timeout');
    expect(classifySubprocessOutput('503 ServiceUnavailable')).toBe('service-unavailable');
    expect(classifySubprocessOutput('500 InternalServerError')).toBe('internal-server-error');
    expect(classifySubprocessOutput('Segmentation fault')).toBeNull();
  });
});

describe('exponentialBackoff', () => {
  it('doubles from one second without a cap', () => {
    expect([0, 1, 2, 3, 10].map(exponentialBackoff)).toEqual([1000, 2000, 4000, 8000, 1024000]);
  });
});

// ============ RetryExecutor ============

describe('RetryExecutor', () => {
  let warn: MockInstance;

  beforeEach(() => {
    warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns the result of a successful first attempt without sleeping', async () => {
    const { delays, sleep } = recordingSleep();
    const op = vi.fn(async () => 'ok');
    await expect(new RetryExecutor({ sleep }).execute(op)).resolves.toBe('ok');
    expect(op).toHaveBeenCalledTimes(1);
    expect(delays).toEqual([]);
  });

  it('retries connection failures and returns the eventual result', async () => {
    const { delays, sleep } = recordingSleep();
    const op = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(systemError('ECONNREFUSED'))
      .mockRejectedValueOnce(systemError('ECONNREFUSED'))
      .mockResolvedValueOnce('generated');

    await expect(new RetryExecutor({ sleep }).execute(op)).resolves.toBe('generated');
    expect(op).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([1000, 2000]);
    expect(warn).toHaveBeenCalledTimes(2);
    expect(warn).toHaveBeenNthCalledWith(
      1,
      expect.stringContaining('Attempt 1 failed: Error: connect ECONNREFUSED'),
    );
    expect(warn).toHaveBeenNthCalledWith(2, expect.stringContaining('retryInMs=2000'));
  });

  it('invokes the operation maxAttempts times and rethrows the last error', async () => {
    const { delays, sleep } = recordingSleep();
    const errors = [1, 2, 3].map((i) => new TransientBackendError('connection', `failure ${i}`));
    let calls = 0;
    const op = async () => {
      const error = errors[calls++];
      throw error;
    };

    const executor = new RetryExecutor({ maxAttempts: 3, sleep });
    await expect(executor.execute(op)).rejects.toBe(errors[2]);
    expect(calls).toBe(3);
    expect(delays).toEqual([1000, 2000]);
  });

  it('sleeps 2^0 + ... + 2^(n-1) seconds before succeeding on attempt n', async () => {
    const { delays, sleep } = recordingSleep();
    let calls = 0;
    const op = async () => {
      calls++;
      if (calls <= 4) throw new TransientBackendError('service-unavailable', 'busy');
      return calls;
    };

    await expect(new RetryExecutor({ sleep }).execute(op)).resolves.toBe(5);
    expect(delays.reduce((a, b) => a + b, 0)).toBe(15000);
  });

  it('raises fatal subprocess errors immediately', async () => {
    const { delays, sleep } = recordingSleep();
    const fatal = new SubprocessError('convert', 1, 'ValueError: unsupported architecture');
    const op = vi.fn(async () => {
      throw fatal;
    });

    await expect(new RetryExecutor({ sleep }).execute(op)).rejects.toBe(fatal);
    expect(op).toHaveBeenCalledTimes(1);
    expect(delays).toEqual([]);
    expect(warn).not.toHaveBeenCalled();
  });

  it('logs the stderr of retried subprocess failures', async () => {
    const { sleep } = recordingSleep();
    const op = vi
      .fn<() => Promise<number>>()
      .mockRejectedValueOnce(new SubprocessError('fetch', 1, 'huggingface ConnectionError'))
      .mockResolvedValueOnce(7);

    await expect(new RetryExecutor({ sleep }).execute(op)).resolves.toBe(7);
    expect(warn).toHaveBeenCalledWith(
      expect.stringContaining('Attempt 1 failed: huggingface ConnectionError'),
    );
  });

  it('accepts a custom policy', async () => {
    const { delays, sleep } = recordingSleep();
    const executor = new RetryExecutor({
      maxAttempts: 2,
      backoff: () => 5,
      isRetriable: (e) => e instanceof RangeError,
      sleep,
    });
    const op = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new RangeError('flaky'))
      .mockResolvedValueOnce('done');

    await expect(executor.execute(op)).resolves.toBe('done');
    expect(delays).toEqual([5]);
  });

  it('rejects a non-positive attempt budget', () => {
    expect(() => new RetryExecutor({ maxAttempts: 0 })).toThrow(
      'maxAttempts must be a positive integer, got 0',
    );
  });
});

describe('retrying', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('routes every call of the wrapped function through the executor', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const { delays, sleep } = recordingSleep();
    const fn = vi
      .fn<(a: number, b: number) => Promise<number>>()
      .mockRejectedValueOnce(systemError('ETIMEDOUT'))
      .mockImplementation(async (a, b) => a + b);

    const wrapped = retrying(fn, new RetryExecutor({ sleep }));
    await expect(wrapped(2, 3)).resolves.toBe(5);
    await expect(wrapped(4, 4)).resolves.toBe(8);
    expect(fn).toHaveBeenCalledTimes(3);
    expect(fn).toHaveBeenLastCalledWith(4, 4);
    expect(delays).toEqual([1000]);
  });
});
