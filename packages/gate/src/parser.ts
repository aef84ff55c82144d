import type { Endpoint, InvalidEndpoint, NetworkEndpoint } from '@readygate/shared';

const SCHEME_SEPARATOR = '://';
const PORT_PATTERN = /^[0-9]+$/;

function isNetworkProtocol(value: string): value is NetworkEndpoint['protocol'] {
  return value === 'tcp' || value === 'udp';
}

function invalid(raw: string, reason: string): InvalidEndpoint {
  return { protocol: 'unknown', raw, reason };
}

// Host and port split on the last colon of the whole string, so
// `tcp://a:b:80` yields host `a:b`. IPv6 literals get no special handling.
function parseHostPort(protocol: NetworkEndpoint['protocol'], raw: string, restStart: number): Endpoint {
  const colon = raw.lastIndexOf(':');
  if (colon < restStart) {
    return invalid(raw, 'missing port');
  }
  const host = raw.slice(restStart, colon);
  const port = raw.slice(colon + 1);
  if (!host) {
    return invalid(raw, 'missing host');
  }
  if (!port) {
    return invalid(raw, 'missing port');
  }
  if (!PORT_PATTERN.test(port)) {
    return invalid(raw, `invalid port "${port}"`);
  }
  const portNumber = Number(port);
  if (portNumber < 1 || portNumber > 65535) {
    return invalid(raw, `port ${port} out of range`);
  }
  return { protocol, raw, host, port: portNumber };
}

export function parseEndpoint(raw: string): Endpoint {
  const separator = raw.indexOf(SCHEME_SEPARATOR);
  if (separator === -1) {
    return invalid(raw, `missing "${SCHEME_SEPARATOR}" separator`);
  }
  const protocol = raw.slice(0, separator);
  const restStart = separator + SCHEME_SEPARATOR.length;
  const rest = raw.slice(restStart);
  if (!protocol) {
    return invalid(raw, 'missing protocol');
  }
  if (!rest) {
    return invalid(raw, 'missing address');
  }
  if (protocol === 'unix') {
    return { protocol: 'unix', raw, path: rest };
  }
  if (isNetworkProtocol(protocol)) {
    return parseHostPort(protocol, raw, restStart);
  }
  return invalid(raw, `unsupported protocol "${protocol}"`);
}
