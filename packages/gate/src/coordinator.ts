import type { Logger } from 'pino';
import { createLogger } from '@readygate/logger';
import type { EndpointTarget, OverallResult, PollResult } from '@readygate/shared';
import { toErrorMessage } from '@readygate/util';
import { endpointsGauge } from './metrics';
import { parseEndpoint } from './parser';
import { pollUntilOpen } from './poller';
import type { PollDeps } from './poller';

export type WaitDeps = PollDeps;

// Library default: fixed settings, no config file or environment lookup.
const DEFAULT_LOGGING = { level: 'info', debug: false, quiet: false } as const;

type NormalizedTarget = { url: string; timeoutSec: number };

function normalizeTarget(target: EndpointTarget, timeoutSec: number): NormalizedTarget {
  if (typeof target === 'string') {
    return { url: target, timeoutSec };
  }
  return { url: target.url, timeoutSec: target.timeoutSec ?? timeoutSec };
}

async function pollTarget(target: NormalizedTarget, deps: WaitDeps & { logger: Logger }): Promise<PollResult> {
  const endpoint = parseEndpoint(target.url);
  const { logger } = deps;
  if (endpoint.protocol === 'unknown') {
    logger.warn({ endpoint: endpoint.raw, reason: endpoint.reason }, 'invalid endpoint, not waiting for it');
  } else {
    logger.debug({ endpoint: endpoint.raw, timeoutSec: target.timeoutSec }, 'waiting for endpoint');
  }

  const result = await pollUntilOpen(endpoint, target.timeoutSec, deps);
  if (result.status === 'succeeded') {
    logger.info({ endpoint: result.endpoint, attempts: result.attempts, elapsedMs: result.elapsedMs }, 'endpoint is up');
  } else if (result.cause === 'timeout') {
    logger.error({ endpoint: result.endpoint, attempts: result.attempts, reason: result.reason }, 'timed out waiting for endpoint');
  }
  return result;
}

function crashed(target: NormalizedTarget, err: unknown): PollResult {
  return {
    endpoint: target.url,
    protocol: parseEndpoint(target.url).protocol,
    status: 'timed_out',
    cause: 'error',
    reason: toErrorMessage(err),
    attempts: 0,
    elapsedMs: 0
  };
}

function aggregate(results: PollResult[], logger: Logger): OverallResult {
  const failed = results.filter((result) => result.status !== 'succeeded').map((result) => result.endpoint);
  endpointsGauge.set({ state: 'up' }, results.length - failed.length);
  endpointsGauge.set({ state: 'failed' }, failed.length);
  if (failed.length === 0) {
    logger.info({ count: results.length }, 'all endpoints are up');
    return { status: 'all_up', results };
  }
  logger.error({ failed, total: results.length }, 'endpoints did not become ready');
  return { status: 'failed', failed, results };
}

/**
 * Waits for every target concurrently and reports one verdict. Siblings are
 * never cancelled: each endpoint runs its full budget so the result lists
 * every endpoint that is down, not just the first.
 */
export async function waitForAll(
  targets: readonly EndpointTarget[],
  timeoutSec: number,
  deps: WaitDeps = {}
): Promise<OverallResult> {
  const logger = deps.logger ?? createLogger('gate', {}, DEFAULT_LOGGING);
  const pollDeps = { ...deps, logger };

  if (targets.length === 0) {
    logger.debug('no endpoints to wait for');
    return aggregate([], logger);
  }

  const normalized = targets.map((target) => normalizeTarget(target, timeoutSec));
  if (normalized.length === 1) {
    const [target] = normalized;
    try {
      return aggregate([await pollTarget(target, pollDeps)], logger);
    } catch (err) {
      logger.error({ endpoint: target.url, err }, 'poller failed unexpectedly');
      return aggregate([crashed(target, err)], logger);
    }
  }

  const settled = await Promise.allSettled(normalized.map((target) => pollTarget(target, pollDeps)));
  const results = settled.map((outcome, index) => {
    if (outcome.status === 'fulfilled') {
      return outcome.value;
    }
    logger.error({ endpoint: normalized[index].url, err: outcome.reason }, 'poller failed unexpectedly');
    return crashed(normalized[index], outcome.reason);
  });
  return aggregate(results, logger);
}
