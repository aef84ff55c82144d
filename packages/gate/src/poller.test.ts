import { afterEach, describe, expect, it, vi } from 'vitest';
import type { Endpoint, ProbeOutcome } from '@readygate/shared';
import { parseEndpoint } from './parser';
import { pollUntilOpen } from './poller';
import type { Prober } from './prober';

const refused: ProbeOutcome = { kind: 'closed', reason: 'connect ECONNREFUSED' };

function sequence(...outcomes: ProbeOutcome[]): Prober {
  let index = 0;
  return async () => {
    const outcome = outcomes[Math.min(index, outcomes.length - 1)];
    index += 1;
    return outcome;
  };
}

describe('pollUntilOpen', () => {
  const endpoint: Endpoint = parseEndpoint('tcp://db:5432');

  afterEach(() => {
    vi.useRealTimers();
  });

  it('succeeds without sleeping when the first probe is open', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const result = await pollUntilOpen(endpoint, 30, { prober: sequence({ kind: 'open' }), sleep });
    expect(result).toEqual({ endpoint: 'tcp://db:5432', protocol: 'tcp', status: 'succeeded', attempts: 1, elapsedMs: 0 });
    expect(sleep).not.toHaveBeenCalled();
  });

  it('sleeps one interval between closed probes', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const result = await pollUntilOpen(endpoint, 30, { prober: sequence(refused, refused, { kind: 'open' }), sleep });
    expect(result).toMatchObject({ status: 'succeeded', attempts: 3, elapsedMs: 2000 });
    expect(sleep.mock.calls).toEqual([[1000], [1000]]);
  });

  it('gives up on invalid endpoints without using the budget', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const invalid = parseEndpoint('tcp://:80');
    const result = await pollUntilOpen(invalid, 30, { sleep });
    expect(result).toEqual({
      endpoint: 'tcp://:80',
      protocol: 'unknown',
      status: 'timed_out',
      cause: 'invalid',
      reason: 'missing host',
      attempts: 1,
      elapsedMs: 0
    });
    expect(sleep).not.toHaveBeenCalled();
  });

  it('times out once the elapsed counter reaches the budget', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const result = await pollUntilOpen(endpoint, 2, { prober: sequence(refused), sleep });
    expect(result).toEqual({
      endpoint: 'tcp://db:5432',
      protocol: 'tcp',
      status: 'timed_out',
      cause: 'timeout',
      reason: 'not reachable after 2s (connect ECONNREFUSED)',
      attempts: 3,
      elapsedMs: 2000
    });
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it('probes exactly once with a zero budget', async () => {
    const prober = vi.fn(sequence(refused));
    const result = await pollUntilOpen(endpoint, 0, { prober, sleep: async () => {} });
    expect(result).toMatchObject({ status: 'timed_out', cause: 'timeout', attempts: 1 });
    expect(prober).toHaveBeenCalledTimes(1);
  });

  it('honours a custom interval', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const result = await pollUntilOpen(endpoint, 1, { prober: sequence(refused), sleep, intervalMs: 250 });
    expect(result).toMatchObject({ status: 'timed_out', attempts: 5, elapsedMs: 1000 });
    expect(sleep).toHaveBeenCalledTimes(4);
  });

  it('takes about the budget in wall-clock time, not less', async () => {
    vi.useFakeTimers();
    const started = Date.now();
    let settled = false;
    const pending = pollUntilOpen(endpoint, 2, { prober: sequence(refused) }).then((result) => {
      settled = true;
      return result;
    });

    await vi.advanceTimersByTimeAsync(1999);
    expect(settled).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    const result = await pending;
    expect(result.status).toBe('timed_out');
    expect(Date.now() - started).toBe(2000);
  });
});
