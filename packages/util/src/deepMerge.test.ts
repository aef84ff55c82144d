import { describe, expect, it } from 'vitest';
import { deepMerge } from './deepMerge';

describe('deepMerge', () => {
  it('merges nested objects without touching the target', () => {
    const target = { wait: { timeoutSec: 30, intervalMs: 1000 }, logging: { quiet: false } };
    const merged = deepMerge(target, { wait: { timeoutSec: 5 } });
    expect(merged).toEqual({ wait: { timeoutSec: 5, intervalMs: 1000 }, logging: { quiet: false } });
    expect(target.wait.timeoutSec).toBe(30);
  });

  it('replaces arrays instead of concatenating them', () => {
    const merged = deepMerge({ endpoints: [{ url: 'tcp://a:1' }] }, { endpoints: [{ url: 'tcp://b:2' }] });
    expect(merged.endpoints).toEqual([{ url: 'tcp://b:2' }]);
  });

  it('skips undefined values from the source', () => {
    const merged = deepMerge({ metrics: { textfilePath: '/tmp/x.prom' } }, { metrics: { textfilePath: undefined } });
    expect(merged).toEqual({ metrics: { textfilePath: '/tmp/x.prom' } });
  });
});
