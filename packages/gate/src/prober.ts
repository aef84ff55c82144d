import dgram from 'dgram';
import net from 'net';
import type { Endpoint, ProbeOutcome } from '@readygate/shared';

export const DEFAULT_PROBE_TIMEOUT_MS = 3_000;
export const DEFAULT_UDP_SETTLE_MS = 250;

export type Prober = (endpoint: Endpoint) => Promise<ProbeOutcome>;

export type ProberOptions = {
  probeTimeoutMs?: number;
  udpSettleMs?: number;
};

type ResolvedProberOptions = Required<ProberOptions>;

function closed(reason: string): ProbeOutcome {
  return { kind: 'closed', reason };
}

function assertNever(value: never): never {
  throw new Error(`Unhandled endpoint: ${JSON.stringify(value)}`);
}

function connectStream(target: net.NetConnectOpts, timeoutMs: number): Promise<ProbeOutcome> {
  return new Promise((resolve) => {
    const socket = net.createConnection(target);
    let settled = false;

    const finish = (outcome: ProbeOutcome) => {
      if (settled) return;
      settled = true;
      socket.destroy();
      resolve(outcome);
    };

    socket.setTimeout(timeoutMs);
    socket.once('connect', () => finish({ kind: 'open' }));
    socket.once('timeout', () => finish(closed(`timeout after ${timeoutMs}ms`)));
    socket.on('error', (err) => finish(closed(err.message)));
  });
}

/**
 * UDP has no handshake. A zero-length datagram goes out on a connected socket
 * and the probe waits `udpSettleMs` for an ICMP-driven error (ECONNREFUSED).
 * "open" therefore only means nothing rejected the datagram: a silent
 * listener, a filtered port, or a dropped ICMP reply all read as open.
 */
function sendDatagram(host: string, port: number, options: ResolvedProberOptions): Promise<ProbeOutcome> {
  return new Promise((resolve) => {
    const socket = dgram.createSocket(net.isIPv6(host) ? 'udp6' : 'udp4');
    let settled = false;
    let timer: NodeJS.Timeout | null = null;

    const finish = (outcome: ProbeOutcome) => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      socket.close();
      resolve(outcome);
    };

    // Guards name resolution that never answers.
    timer = setTimeout(() => finish(closed(`timeout after ${options.probeTimeoutMs}ms`)), options.probeTimeoutMs);

    socket.on('error', (err) => finish(closed(err.message)));
    socket.once('connect', () => {
      socket.send(Buffer.alloc(0), (err) => {
        if (err) {
          finish(closed(err.message));
          return;
        }
        if (timer) clearTimeout(timer);
        timer = setTimeout(() => finish({ kind: 'open' }), options.udpSettleMs);
      });
    });
    socket.connect(port, host);
  });
}

export function probeEndpoint(endpoint: Endpoint, options: ResolvedProberOptions): Promise<ProbeOutcome> {
  switch (endpoint.protocol) {
    case 'unknown':
      return Promise.resolve({ kind: 'invalid', reason: endpoint.reason });
    case 'unix':
      return connectStream({ path: endpoint.path }, options.probeTimeoutMs);
    case 'tcp':
      return connectStream({ host: endpoint.host, port: endpoint.port }, options.probeTimeoutMs);
    case 'udp':
      return sendDatagram(endpoint.host, endpoint.port, options);
    default:
      return assertNever(endpoint);
  }
}

export function createProber(options: ProberOptions = {}): Prober {
  const probeTimeoutMs = options.probeTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
  const resolved: ResolvedProberOptions = {
    probeTimeoutMs,
    udpSettleMs: Math.min(options.udpSettleMs ?? DEFAULT_UDP_SETTLE_MS, probeTimeoutMs)
  };
  return (endpoint) => probeEndpoint(endpoint, resolved);
}
