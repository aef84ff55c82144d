import type { EndpointEntry } from '@readygate/config';
import type { EndpointSource, EndpointTarget } from '@readygate/shared';

type Env = Record<string, string | undefined>;

export function argvSource(args: readonly string[]): EndpointSource {
  return () => args.filter((arg) => arg.length > 0);
}

export function configSource(entries: readonly EndpointEntry[]): EndpointSource {
  return () =>
    entries.map((entry): EndpointTarget =>
      entry.timeoutSec === undefined ? entry.url : { url: entry.url, timeoutSec: entry.timeoutSec }
    );
}

/**
 * Link-style service variables, e.g. `DB_1_PORT=tcp://10.0.0.5:5432`.
 * Values without a scheme are ignored. Result is deduplicated and sorted.
 */
export function envSource(env: Env, keyPattern: RegExp): EndpointSource {
  return () => {
    const found = new Set<string>();
    for (const [key, value] of Object.entries(env)) {
      if (!value || !keyPattern.test(key) || !value.includes('://')) {
        continue;
      }
      found.add(value);
    }
    return [...found].sort();
  };
}

export function firstNonEmpty(...sources: EndpointSource[]): EndpointSource {
  return () => {
    for (const source of sources) {
      const targets = source();
      if (targets.length > 0) {
        return targets;
      }
    }
    return [];
  };
}
