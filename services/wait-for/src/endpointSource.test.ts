import { describe, expect, it } from 'vitest';
import { argvSource, configSource, envSource, firstNonEmpty } from './endpointSource';

const LINK_PATTERN = /^[A-Z0-9_]+_[0-9]+_PORT$/;

describe('envSource', () => {
  it('collects link-style service variables, deduplicated and sorted', () => {
    const source = envSource(
      {
        DB_1_PORT: 'tcp://10.0.0.5:5432',
        DB_2_PORT: 'tcp://10.0.0.5:5432',
        CACHE_1_PORT: 'tcp://10.0.0.6:6379',
        DB_1_PORT_5432_TCP_PORT: '5432',
        WEB_PORT: 'tcp://10.0.0.7:80',
        HOME: '/root'
      },
      LINK_PATTERN
    );
    expect(source()).toEqual(['tcp://10.0.0.5:5432', 'tcp://10.0.0.6:6379']);
  });

  it('ignores matching keys whose value has no scheme', () => {
    expect(envSource({ DNS_1_PORT: '53', EMPTY_1_PORT: '' }, LINK_PATTERN)()).toEqual([]);
  });
});

describe('firstNonEmpty', () => {
  it('prefers explicit arguments over config and environment', () => {
    const source = firstNonEmpty(
      argvSource(['tcp://a:1']),
      configSource([{ url: 'tcp://b:2' }]),
      envSource({ C_1_PORT: 'tcp://c:3' }, LINK_PATTERN)
    );
    expect(source()).toEqual(['tcp://a:1']);
  });

  it('falls through to config entries, keeping per-endpoint timeouts', () => {
    const source = firstNonEmpty(argvSource(['']), configSource([{ url: 'tcp://b:2', timeoutSec: 5 }, { url: 'tcp://c:3' }]));
    expect(source()).toEqual([{ url: 'tcp://b:2', timeoutSec: 5 }, 'tcp://c:3']);
  });

  it('yields nothing when every source is empty', () => {
    expect(firstNonEmpty(argvSource([]), configSource([]))()).toEqual([]);
  });
});
