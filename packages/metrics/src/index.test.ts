import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterAll, afterEach, describe, expect, it } from 'vitest';
import { registerCounter, resetMetrics, writeMetricsTextfile } from './index';

const writes = registerCounter({ name: 'metrics_textfile_test_total', help: 'test counter', labelNames: ['kind'] });

describe('writeMetricsTextfile', () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'readygate-metrics-'));

  afterEach(() => {
    resetMetrics();
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('writes the registry in text exposition format, creating the directory', async () => {
    writes.inc({ kind: 'a' }, 2);
    const target = path.join(dir, 'nested', 'out.prom');
    await writeMetricsTextfile(target);

    const body = fs.readFileSync(target, 'utf-8');
    expect(body).toContain('# TYPE metrics_textfile_test_total counter');
    expect(body).toContain('metrics_textfile_test_total{kind="a"} 2');
    expect(fs.readdirSync(path.dirname(target))).toEqual(['out.prom']);
  });
});
