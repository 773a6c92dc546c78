/**
 * @tbx/grpc-client - gRPC client for the tablebase probing service
 *
 * Implements the probe capability of @tbx/core over the service
 * described in services/protos/tablebase.proto.
 */

export const VERSION = '0.1.0';

// Re-export clients
export {
  BaseGrpcClient,
  TablebaseClient,
  DEFAULT_TABLEBASE_CONFIG,
  moveProbeToResult,
  toProbeTable,
  type ClientConfig,
} from './clients/index.js';

// Re-export types
export type {
  MoveProbe,
  ProbeRequest,
  ProbeResponse,
  TablebaseHealthCheckResponse,
} from './types/index.js';

// Re-export errors
export {
  GrpcClientError,
  ConnectionError,
  TimeoutError,
  InvalidArgumentError,
  ServiceUnavailableError,
  InternalError,
  mapGrpcError,
  type CallContext,
} from './errors.js';
