export type {
  Endpoint,
  EndpointSource,
  EndpointTarget,
  InvalidEndpoint,
  NetworkEndpoint,
  OverallResult,
  PollResult,
  ProbeOutcome,
  Protocol,
  SocketEndpoint
} from './types';
export { ConfigError, ReadygateError, ToolingUnavailableError } from './errors';
export type { ReadygateErrorCode } from './errors';
