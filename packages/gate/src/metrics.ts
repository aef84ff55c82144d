import type { Counter, Gauge, Histogram } from '@readygate/metrics';
import { registerCounter, registerGauge, registerHistogram } from '@readygate/metrics';

export const probeAttempts: Counter<string> = registerCounter({
  name: 'readygate_probe_attempts_total',
  help: 'Probe attempts by protocol and outcome',
  labelNames: ['protocol', 'outcome']
});

export const endpointWaitSeconds: Histogram<string> = registerHistogram({
  name: 'readygate_endpoint_wait_seconds',
  help: 'Time spent polling an endpoint until it opened or gave up',
  labelNames: ['protocol', 'status'],
  buckets: [0, 1, 2, 5, 10, 30, 60, 120, 300]
});

export const endpointsGauge: Gauge<string> = registerGauge({
  name: 'readygate_endpoints',
  help: 'Endpoints by final state in the last wait',
  labelNames: ['state']
});
