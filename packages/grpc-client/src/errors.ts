/**
 * Error classes for gRPC client operations
 */

import { status } from '@grpc/grpc-js';

/**
 * Base error class for gRPC client errors
 */
export class GrpcClientError extends Error {
  constructor(
    message: string,
    public readonly code?: number,
    public readonly details?: string,
  ) {
    super(message);
    this.name = 'GrpcClientError';
    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, GrpcClientError);
    }
  }
}

/**
 * Error thrown when connection to gRPC service fails
 */
export class ConnectionError extends GrpcClientError {
  constructor(
    public readonly host: string,
    public readonly port: number,
    cause?: Error,
  ) {
    super(
      `Failed to connect to gRPC service at ${host}:${port}${cause ? `: ${cause.message}` : ''}`,
      status.UNAVAILABLE,
      cause?.message,
    );
    this.name = 'ConnectionError';
  }
}

/**
 * Error thrown when a gRPC call runs past its deadline
 */
export class TimeoutError extends GrpcClientError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number,
  ) {
    super(`Operation '${operation}' timed out after ${timeoutMs}ms`, status.DEADLINE_EXCEEDED);
    this.name = 'TimeoutError';
  }
}

/**
 * Error thrown when the service rejects the request (e.g. malformed FEN)
 */
export class InvalidArgumentError extends GrpcClientError {
  constructor(message: string) {
    super(message, status.INVALID_ARGUMENT);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Error thrown when the service is unavailable
 */
export class ServiceUnavailableError extends GrpcClientError {
  constructor(service: string, reason?: string) {
    super(`Service '${service}' is unavailable${reason ? `: ${reason}` : ''}`, status.UNAVAILABLE);
    this.name = 'ServiceUnavailableError';
  }
}

/**
 * Error thrown for internal service errors
 */
export class InternalError extends GrpcClientError {
  constructor(message: string) {
    super(message, status.INTERNAL);
    this.name = 'InternalError';
  }
}

/**
 * Call being made when an error occurred
 */
export interface CallContext {
  service: string;
  operation: string;
  timeoutMs: number;
}

/**
 * Map gRPC status code to appropriate error class
 */
export function mapGrpcError(
  code: number,
  message: string,
  details?: string,
  context?: CallContext,
): GrpcClientError {
  switch (code) {
    case status.INVALID_ARGUMENT:
      return new InvalidArgumentError(message);
    case status.DEADLINE_EXCEEDED:
      return new TimeoutError(context?.operation ?? message, context?.timeoutMs ?? 0);
    case status.UNAVAILABLE:
      return new ServiceUnavailableError(context?.service ?? 'service', details || message);
    case status.INTERNAL:
      return new InternalError(message);
    default:
      return new GrpcClientError(message, code, details);
  }
}
