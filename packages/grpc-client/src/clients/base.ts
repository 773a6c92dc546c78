/**
 * Base gRPC client with proto loading and connection management
 */

import * as path from 'path';
import { fileURLToPath } from 'url';

import * as grpc from '@grpc/grpc-js';
import * as protoLoader from '@grpc/proto-loader';
import type { z } from 'zod';

import { ConnectionError, GrpcClientError, InternalError, mapGrpcError } from '../errors.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/**
 * Configuration for gRPC client connections
 */
export interface ClientConfig {
  /** Host to connect to */
  host: string;
  /** Port to connect to */
  port: number;
  /** Deadline in milliseconds for each RPC call */
  timeoutMs?: number;
}

/**
 * Proto loader options for proper camelCase handling
 */
const PROTO_LOADER_OPTIONS: protoLoader.Options = {
  keepCase: false, // Convert snake_case to camelCase
  longs: Number,
  enums: String,
  defaults: true,
  oneofs: true,
};

/**
 * Cache for loaded proto definitions
 */
const protoCache = new Map<string, grpc.GrpcObject>();

function isServiceConstructor(value: unknown): value is grpc.ServiceClientConstructor {
  return typeof value === 'function' && 'service' in value;
}

function isGrpcObject(value: unknown): value is grpc.GrpcObject {
  return typeof value === 'object' && value !== null && !('format' in value);
}

/**
 * Base class for gRPC clients with common functionality
 */
export abstract class BaseGrpcClient {
  protected client: grpc.Client | null = null;
  protected readonly config: Required<ClientConfig>;
  private service: grpc.ServiceDefinition | null = null;
  private connectionPromise: Promise<grpc.Client> | null = null;

  constructor(config: ClientConfig) {
    this.config = {
      host: config.host,
      port: config.port,
      timeoutMs: config.timeoutMs ?? 30000,
    };
  }

  /**
   * Get the path to the proto file
   */
  protected abstract getProtoPath(): string;

  /**
   * Get the service name within the proto
   */
  protected abstract getServiceName(): string;

  /**
   * Get the package name for the service
   */
  protected abstract getPackageName(): string;

  /**
   * Get the proto root directory
   */
  protected getProtoRoot(): string {
    // Navigate from packages/grpc-client/src/clients/ to services/protos/
    return path.resolve(__dirname, '../../../../services/protos');
  }

  /**
   * Load proto definition and cache it
   */
  protected async loadProto(): Promise<grpc.GrpcObject> {
    const fullProtoPath = path.join(this.getProtoRoot(), this.getProtoPath());

    const cached = protoCache.get(fullProtoPath);
    if (cached) {
      return cached;
    }

    const packageDefinition = await protoLoader.load(fullProtoPath, {
      ...PROTO_LOADER_OPTIONS,
      includeDirs: [this.getProtoRoot()],
    });

    const proto = grpc.loadPackageDefinition(packageDefinition);
    protoCache.set(fullProtoPath, proto);
    return proto;
  }

  /**
   * Navigate to the service constructor in the proto object
   */
  protected getServiceConstructor(proto: grpc.GrpcObject): grpc.ServiceClientConstructor {
    let current: grpc.GrpcObject = proto;

    for (const part of this.getPackageName().split('.')) {
      const next = current[part];
      if (!isGrpcObject(next)) {
        throw new GrpcClientError(`Package '${this.getPackageName()}' not found in proto`);
      }
      current = next;
    }

    const ServiceConstructor = current[this.getServiceName()];
    if (!isServiceConstructor(ServiceConstructor)) {
      throw new GrpcClientError(
        `Service '${this.getServiceName()}' not found in package '${this.getPackageName()}'`,
      );
    }

    return ServiceConstructor;
  }

  /**
   * Ensure connection is established (lazy initialization)
   */
  protected async ensureConnected(): Promise<grpc.Client> {
    if (this.client) {
      return this.client;
    }

    // Prevent multiple simultaneous connection attempts
    if (this.connectionPromise) {
      return this.connectionPromise;
    }

    this.connectionPromise = this.connect();

    try {
      this.client = await this.connectionPromise;
      return this.client;
    } finally {
      this.connectionPromise = null;
    }
  }

  /**
   * Establish connection to the gRPC service
   */
  private async connect(): Promise<grpc.Client> {
    try {
      const proto = await this.loadProto();
      const ServiceConstructor = this.getServiceConstructor(proto);
      this.service = ServiceConstructor.service;

      return new ServiceConstructor(this.address, grpc.credentials.createInsecure());
    } catch (err) {
      if (err instanceof GrpcClientError) {
        throw err;
      }
      throw new ConnectionError(
        this.config.host,
        this.config.port,
        err instanceof Error ? err : undefined,
      );
    }
  }

  private findMethod(method: string): grpc.MethodDefinition<object, object> | undefined {
    if (!this.service) {
      return undefined;
    }
    return Object.entries(this.service).find(
      ([name, definition]) => name === method || definition.originalName === method,
    )?.[1];
  }

  /**
   * Make a unary RPC call with a deadline, validating the response
   *
   * @param method - Method name as in the proto or its camelCase form
   * @param request - Request message
   * @param responseSchema - Shape the decoded response must have
   */
  protected async unaryCall<TRequest extends object, TResponse>(
    method: string,
    request: TRequest,
    responseSchema: z.ZodType<TResponse, z.ZodTypeDef, unknown>,
  ): Promise<TResponse> {
    const client = await this.ensureConnected();
    const definition = this.findMethod(method);
    if (!definition) {
      throw new GrpcClientError(`Method '${method}' not found on service`);
    }

    const context = {
      service: this.getServiceName(),
      operation: method,
      timeoutMs: this.config.timeoutMs,
    };
    const deadline = new Date(Date.now() + this.config.timeoutMs);

    const response = await new Promise<object | undefined>((resolve, reject) => {
      client.makeUnaryRequest(
        definition.path,
        definition.requestSerialize,
        definition.responseDeserialize,
        request,
        new grpc.Metadata(),
        { deadline },
        (err, value) => {
          if (err) {
            reject(mapGrpcError(err.code, err.message, err.details, context));
          } else {
            resolve(value);
          }
        },
      );
    });

    const parsed = responseSchema.safeParse(response);
    if (!parsed.success) {
      throw new InternalError(`Malformed '${method}' response: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  /**
   * Close the connection
   */
  public close(): void {
    if (this.client) {
      this.client.close();
      this.client = null;
    }
  }

  /**
   * Get the server address
   */
  public get address(): string {
    return `${this.config.host}:${this.config.port}`;
  }
}
