import fs from 'fs';
import path from 'path';
import { Counter, Gauge, Histogram, Registry } from 'prom-client';

export type { Counter, Gauge, Histogram } from 'prom-client';

const registry = new Registry();

export type CounterOpts = {
  name: string;
  help: string;
  labelNames?: string[];
};

export function registerCounter(opts: CounterOpts): Counter<string> {
  const counter = new Counter({ ...opts, registers: [registry] });
  return counter;
}

export type GaugeOpts = CounterOpts;

export function registerGauge(opts: GaugeOpts): Gauge<string> {
  const gauge = new Gauge({ ...opts, registers: [registry] });
  return gauge;
}

export type HistogramOpts = CounterOpts & {
  buckets?: number[];
};

export function registerHistogram(opts: HistogramOpts): Histogram<string> {
  const histogram = new Histogram({ ...opts, registers: [registry] });
  return histogram;
}

export function getRegistry(): Registry {
  return registry;
}

export function resetMetrics(): void {
  registry.resetMetrics();
}

/**
 * Writes the registry in Prometheus text format for the node_exporter
 * textfile collector. Written to a temp file, then renamed into place.
 */
export async function writeMetricsTextfile(filePath: string): Promise<void> {
  const body = await registry.metrics();
  const dir = path.dirname(filePath);
  await fs.promises.mkdir(dir, { recursive: true });
  const tmp = path.join(dir, `.${path.basename(filePath)}.${process.pid}.tmp`);
  await fs.promises.writeFile(tmp, body, 'utf-8');
  await fs.promises.rename(tmp, filePath);
}
