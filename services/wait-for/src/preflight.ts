import dgram from 'dgram';
import net from 'net';
import type { Endpoint } from '@readygate/shared';
import { ToolingUnavailableError } from '@readygate/shared';

export type SocketRuntime = {
  createConnection?: unknown;
  createSocket?: unknown;
};

const nodeRuntime: SocketRuntime = {
  createConnection: net.createConnection,
  createSocket: dgram.createSocket
};

export function assertProbeSupport(endpoints: readonly Endpoint[], runtime: SocketRuntime = nodeRuntime): void {
  const protocols = new Set(endpoints.map((endpoint) => endpoint.protocol));
  const missing: string[] = [];
  if ((protocols.has('tcp') || protocols.has('unix')) && typeof runtime.createConnection !== 'function') {
    missing.push('net.createConnection');
  }
  if (protocols.has('udp') && typeof runtime.createSocket !== 'function') {
    missing.push('dgram.createSocket');
  }
  if (missing.length > 0) {
    throw new ToolingUnavailableError(missing);
  }
}
