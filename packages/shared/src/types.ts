export type Protocol = 'tcp' | 'udp' | 'unix' | 'unknown';

export type NetworkEndpoint = {
  protocol: 'tcp' | 'udp';
  raw: string;
  host: string;
  port: number;
};

export type SocketEndpoint = {
  protocol: 'unix';
  raw: string;
  path: string;
};

// Never probed: either malformed or an unsupported scheme.
export type InvalidEndpoint = {
  protocol: 'unknown';
  raw: string;
  reason: string;
};

export type Endpoint = NetworkEndpoint | SocketEndpoint | InvalidEndpoint;

export type ProbeOutcome =
  | { kind: 'open' }
  | { kind: 'closed'; reason: string }
  | { kind: 'invalid'; reason: string };

type PollStats = {
  endpoint: string;
  protocol: Protocol;
  attempts: number;
  elapsedMs: number;
};

export type PollResult =
  | (PollStats & { status: 'succeeded' })
  | (PollStats & { status: 'timed_out'; cause: 'timeout' | 'invalid' | 'error'; reason: string });

export type OverallResult =
  | { status: 'all_up'; results: PollResult[] }
  | { status: 'failed'; failed: string[]; results: PollResult[] };

export type EndpointTarget = string | { url: string; timeoutSec?: number };

export type EndpointSource = () => readonly EndpointTarget[];
