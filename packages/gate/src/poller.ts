import type { Logger } from 'pino';
import type { Endpoint, PollResult } from '@readygate/shared';
import { sleep } from '@readygate/util';
import type { SleepFn } from '@readygate/util';
import { endpointWaitSeconds, probeAttempts } from './metrics';
import { createProber } from './prober';
import type { Prober } from './prober';

export const DEFAULT_TIMEOUT_SEC = 30;
export const DEFAULT_INTERVAL_MS = 1_000;

export type PollDeps = {
  prober?: Prober;
  sleep?: SleepFn;
  intervalMs?: number;
  logger?: Logger;
};

const defaultProber = createProber();

function finish(result: PollResult): PollResult {
  endpointWaitSeconds.observe({ protocol: result.protocol, status: result.status }, result.elapsedMs / 1000);
  return result;
}

/**
 * Probes `endpoint` until it opens or `timeoutSec` worth of intervals have
 * been slept. Elapsed time counts sleeps only, so probe latency stretches the
 * wall-clock cadence. At least one probe is always made.
 */
export async function pollUntilOpen(
  endpoint: Endpoint,
  timeoutSec: number = DEFAULT_TIMEOUT_SEC,
  deps: PollDeps = {}
): Promise<PollResult> {
  const prober = deps.prober ?? defaultProber;
  const wait = deps.sleep ?? sleep;
  const intervalMs = deps.intervalMs ?? DEFAULT_INTERVAL_MS;
  const budgetMs = timeoutSec * 1000;
  const base = { endpoint: endpoint.raw, protocol: endpoint.protocol };
  let attempts = 0;
  let elapsedMs = 0;

  for (;;) {
    attempts += 1;
    const outcome = await prober(endpoint);
    probeAttempts.inc({ protocol: endpoint.protocol, outcome: outcome.kind });

    if (outcome.kind === 'open') {
      return finish({ ...base, status: 'succeeded', attempts, elapsedMs });
    }
    if (outcome.kind === 'invalid') {
      return finish({ ...base, status: 'timed_out', cause: 'invalid', reason: outcome.reason, attempts, elapsedMs });
    }

    deps.logger?.debug({ endpoint: endpoint.raw, attempt: attempts, reason: outcome.reason }, 'endpoint not ready');
    if (elapsedMs >= budgetMs) {
      return finish({
        ...base,
        status: 'timed_out',
        cause: 'timeout',
        reason: `not reachable after ${timeoutSec}s (${outcome.reason})`,
        attempts,
        elapsedMs
      });
    }
    await wait(intervalMs);
    elapsedMs += intervalMs;
  }
}
