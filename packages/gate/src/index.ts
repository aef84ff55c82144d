export { waitForAll } from './coordinator';
export type { WaitDeps } from './coordinator';
export { parseEndpoint } from './parser';
export { DEFAULT_INTERVAL_MS, DEFAULT_TIMEOUT_SEC, pollUntilOpen } from './poller';
export type { PollDeps } from './poller';
export { createProber, DEFAULT_PROBE_TIMEOUT_MS, DEFAULT_UDP_SETTLE_MS, probeEndpoint } from './prober';
export type { Prober, ProberOptions } from './prober';
