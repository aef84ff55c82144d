import fs from 'fs';
import path from 'path';
import YAML from 'yaml';
import { ConfigError } from '@readygate/shared';
import { deepMerge, isPlainObject } from '@readygate/util';
import type { PlainObject } from '@readygate/util';
import { configSchema } from './schema';
import type { ReadygateConfig } from './schema';

export type { EndpointEntry, LogLevel, ReadygateConfig } from './schema';
export { configSchema } from './schema';

type Env = Record<string, string | undefined>;

type EnvCaster = (value: string) => unknown;

type EnvMapping = [path: string, envKey: string, caster: EnvCaster];

export type LoadConfigOptions = {
  forceReload?: boolean;
  configPath?: string;
  env?: Env;
  overrides?: PlainObject;
};

let cachedConfig: ReadygateConfig | null = null;

const DEFAULT_CONFIG_PATH = path.resolve(process.cwd(), 'config', 'readygate.yaml');

function parseFlag(value: string): boolean {
  const normalized = value.trim().toLowerCase();
  return normalized === '1' || normalized === 'true';
}

const envMap: EnvMapping[] = [
  ['wait.timeoutSec', 'WAIT_TIMEOUT', (v) => Number(v)],
  ['wait.intervalMs', 'WAIT_INTERVAL_MS', (v) => Number(v)],
  ['wait.probeTimeoutMs', 'WAIT_PROBE_TIMEOUT_MS', (v) => Number(v)],
  ['wait.udpSettleMs', 'WAIT_UDP_SETTLE_MS', (v) => Number(v)],
  ['logging.level', 'LOG_LEVEL', (v) => v],
  ['logging.debug', 'DEBUG', parseFlag],
  ['logging.quiet', 'QUIET', parseFlag],
  ['discovery.envPattern', 'READYGATE_ENV_PATTERN', (v) => v],
  ['metrics.textfilePath', 'READYGATE_METRICS_TEXTFILE', (v) => v]
];

function setPath(target: PlainObject, dottedKey: string, value: unknown): void {
  const segments = dottedKey.split('.');
  let cursor: PlainObject = target;
  for (let i = 0; i < segments.length - 1; i += 1) {
    const segment = segments[i];
    const next = cursor[segment];
    if (isPlainObject(next)) {
      cursor = next;
    } else {
      const created: PlainObject = {};
      cursor[segment] = created;
      cursor = created;
    }
  }
  cursor[segments[segments.length - 1]] = value;
}

function loadFileConfig(env: Env, customPath?: string): PlainObject {
  const pathToUse = customPath ?? env.READYGATE_CONFIG ?? DEFAULT_CONFIG_PATH;
  if (!fs.existsSync(pathToUse)) {
    if (pathToUse !== DEFAULT_CONFIG_PATH) {
      throw new ConfigError(`Config file not found at ${pathToUse}`);
    }
    return {};
  }
  const raw = fs.readFileSync(pathToUse, 'utf-8');
  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (err) {
    throw new ConfigError(`Failed to parse ${pathToUse}`, [err instanceof Error ? err.message : String(err)]);
  }
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Config file ${pathToUse} must contain a mapping`);
  }
  return parsed;
}

function applyEnv(config: PlainObject, env: Env): PlainObject {
  const mutated: PlainObject = deepMerge({}, config);
  for (const [pathKey, envKey, caster] of envMap) {
    const envVal = env[envKey];
    if (envVal !== undefined && envVal !== '') {
      setPath(mutated, pathKey, caster(envVal));
    }
  }
  return mutated;
}

export function loadConfig(options?: LoadConfigOptions): ReadygateConfig {
  if (!options?.forceReload && cachedConfig) {
    return cachedConfig;
  }
  const env = options?.env ?? process.env;
  const fileConfig = loadFileConfig(env, options?.configPath);
  const withEnv = applyEnv(fileConfig, env);
  const merged = deepMerge(withEnv, options?.overrides);
  const parsed = configSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw new ConfigError('Invalid configuration', issues);
  }
  cachedConfig = parsed.data;
  return parsed.data;
}

export function getConfig(): ReadygateConfig {
  if (!cachedConfig) {
    return loadConfig();
  }
  return cachedConfig;
}
