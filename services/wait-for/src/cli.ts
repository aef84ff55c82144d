import type { Logger } from 'pino';
import yargs from 'yargs';
import { loadConfig } from '@readygate/config';
import { createProber, parseEndpoint, waitForAll } from '@readygate/gate';
import type { Prober } from '@readygate/gate';
import { createLogger } from '@readygate/logger';
import { writeMetricsTextfile } from '@readygate/metrics';
import { ConfigError, ReadygateError } from '@readygate/shared';
import { toErrorMessage } from '@readygate/util';
import type { SleepFn } from '@readygate/util';
import { argvSource, configSource, envSource, firstNonEmpty } from './endpointSource';
import { assertProbeSupport } from './preflight';

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_FATAL = 2;

export type CliDeps = {
  env?: Record<string, string | undefined>;
  prober?: Prober;
  sleep?: SleepFn;
  logger?: Logger;
};

function parseArgs(argv: string[]) {
  return yargs(argv)
    .scriptName('readygate')
    .usage('$0 [endpoints..]\n\nWaits until every tcp://host:port, udp://host:port or unix://path endpoint accepts connections.')
    .option('timeout', { alias: 't', type: 'number', describe: 'Seconds to wait per endpoint (default 30)' })
    .option('probe-timeout', { type: 'number', describe: 'Milliseconds before a single probe gives up' })
    .option('quiet', { alias: 'q', type: 'boolean', describe: 'Only log errors' })
    .option('debug', { alias: 'd', type: 'boolean', describe: 'Log every probe attempt' })
    .option('config', { type: 'string', describe: 'YAML config file' })
    .option('metrics-textfile', { type: 'string', describe: 'Write Prometheus metrics to this file on exit' })
    .strictOptions()
    .fail((msg, err) => {
      throw new ConfigError(msg || toErrorMessage(err));
    })
    .help()
    .parseSync();
}

export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  let logger = deps.logger;
  try {
    const args = parseArgs(argv);
    const env = deps.env ?? process.env;
    const cfg = loadConfig({
      forceReload: true,
      configPath: args.config,
      env,
      overrides: {
        wait: { timeoutSec: args.timeout, probeTimeoutMs: args['probe-timeout'] },
        logging: { quiet: args.quiet ? true : undefined, debug: args.debug ? true : undefined },
        metrics: { textfilePath: args['metrics-textfile'] }
      }
    });
    logger = logger ?? createLogger('wait-for', {}, cfg.logging);

    const source = firstNonEmpty(
      argvSource(args._.map(String)),
      configSource(cfg.endpoints),
      envSource(env, new RegExp(cfg.discovery.envPattern))
    );
    const targets = source();
    logger.debug({ targets }, 'resolved endpoints');

    assertProbeSupport(targets.map((target) => parseEndpoint(typeof target === 'string' ? target : target.url)));

    const result = await waitForAll(targets, cfg.wait.timeoutSec, {
      prober: deps.prober ?? createProber({ probeTimeoutMs: cfg.wait.probeTimeoutMs, udpSettleMs: cfg.wait.udpSettleMs }),
      sleep: deps.sleep,
      intervalMs: cfg.wait.intervalMs,
      logger
    });

    if (cfg.metrics.textfilePath) {
      try {
        await writeMetricsTextfile(cfg.metrics.textfilePath);
      } catch (err) {
        logger.warn({ err, path: cfg.metrics.textfilePath }, 'failed to write metrics textfile');
      }
    }

    return result.status === 'all_up' ? EXIT_OK : EXIT_FAILED;
  } catch (err) {
    if (!(err instanceof ReadygateError)) {
      throw err;
    }
    const fatalLogger = logger ?? createLogger('wait-for', {}, { level: 'error', debug: false, quiet: false });
    fatalLogger.error({ code: err.code }, err.message);
    return EXIT_FATAL;
  }
}
