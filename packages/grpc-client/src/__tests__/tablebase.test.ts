import * as path from 'path';
import { fileURLToPath } from 'url';

import * as grpc from '@grpc/grpc-js';
import * as protoLoader from '@grpc/proto-loader';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import {
  TablebaseClient,
  DEFAULT_TABLEBASE_CONFIG,
  moveProbeToResult,
  toProbeTable,
} from '../clients/tablebase.js';
import { InvalidArgumentError, ServiceUnavailableError, TimeoutError } from '../errors.js';
import type { MoveProbe } from '../types/tablebase.js';

const PROTO_PATH = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  '../../../../services/protos/tablebase.proto',
);

function move(overrides: Partial<MoveProbe> & { uci: string }): MoveProbe {
  return { wdl: 0, dtz: 0, hasDtz: false, dtm: 0, hasDtm: false, zeroing: false, ...overrides };
}

function isGrpcObject(value: unknown): value is grpc.GrpcObject {
  return typeof value === 'object' && value !== null;
}

function isServiceConstructor(value: unknown): value is grpc.ServiceClientConstructor {
  return typeof value === 'function' && 'service' in value;
}

function tablebaseService(): grpc.ServiceDefinition {
  const proto = grpc.loadPackageDefinition(
    protoLoader.loadSync(PROTO_PATH, { keepCase: false, longs: Number, defaults: true }),
  );
  const tbx = proto['tbx'];
  const pkg = isGrpcObject(tbx) ? tbx['tablebase'] : undefined;
  const ctor = isGrpcObject(pkg) ? pkg['TablebaseService'] : undefined;
  if (!isServiceConstructor(ctor)) {
    throw new Error('TablebaseService missing from proto');
  }
  return ctor.service;
}

async function startServer(implementation: grpc.UntypedServiceImplementation): Promise<{
  server: grpc.Server;
  port: number;
}> {
  const server = new grpc.Server();
  server.addService(tablebaseService(), implementation);
  const port = await new Promise<number>((resolve, reject) => {
    server.bindAsync('127.0.0.1:0', grpc.ServerCredentials.createInsecure(), (err, bound) =>
      err ? reject(err) : resolve(bound),
    );
  });
  return { server, port };
}

describe('TablebaseClient', () => {
  let client: TablebaseClient;

  beforeEach(() => {
    client = new TablebaseClient();
  });

  afterEach(() => {
    client.close();
  });

  describe('constructor', () => {
    it('should use default config when no config provided', () => {
      expect(client.address).toBe('localhost:50061');
    });

    it('should use custom host when provided', () => {
      const customClient = new TablebaseClient({ host: 'tablebase-server' });
      expect(customClient.address).toBe('tablebase-server:50061');
      customClient.close();
    });

    it('should use full custom config when provided', () => {
      const customClient = new TablebaseClient({
        host: 'tablebase-server',
        port: 9000,
        timeoutMs: 120000,
      });
      expect(customClient.address).toBe('tablebase-server:9000');
      customClient.close();
    });
  });

  describe('DEFAULT_TABLEBASE_CONFIG', () => {
    it('should have correct default values', () => {
      expect(DEFAULT_TABLEBASE_CONFIG.host).toBe('localhost');
      expect(DEFAULT_TABLEBASE_CONFIG.port).toBe(50061);
      expect(DEFAULT_TABLEBASE_CONFIG.timeoutMs).toBe(10000);
    });
  });

  describe('close', () => {
    it('should be safe to call multiple times', () => {
      client.close();
      client.close();
      expect(() => client.close()).not.toThrow();
    });
  });
});

describe('moveProbeToResult', () => {
  it('should turn a lost reply position into a win for the mover', () => {
    expect(
      moveProbeToResult(
        move({ uci: 'b1b8', wdl: -2, dtz: -15, hasDtz: true, dtm: -20, hasDtm: true }),
      ),
    ).toEqual({ outcome: { kind: 'win', dtz: 15 }, dtm: 20, zeroing: false });
  });

  it('should keep frustration across the perspective change', () => {
    expect(moveProbeToResult(move({ uci: 'a1a2', wdl: 1, dtz: 101, hasDtz: true })).outcome).toEqual({
      kind: 'blessed-loss',
      dtz: -101,
    });
  });

  it('should ignore distances the server did not set', () => {
    expect(moveProbeToResult(move({ uci: 'c1d3', wdl: 0, zeroing: true }))).toEqual({
      outcome: { kind: 'draw' },
      dtm: null,
      zeroing: true,
    });
    expect(moveProbeToResult(move({ uci: 'c1d3', wdl: -2 })).outcome).toEqual({
      kind: 'win',
      dtz: null,
    });
  });
});

describe('toProbeTable', () => {
  it('should key results by lowercase UCI', () => {
    const table = toProbeTable([move({ uci: 'A7A8Q', wdl: -2, dtz: -1, hasDtz: true })]);

    expect([...table.keys()]).toEqual(['a7a8q']);
    expect(table.get('a7a8q')?.outcome).toEqual({ kind: 'win', dtz: 1 });
  });
});

describe('TablebaseClient against an in-process server', () => {
  let server: grpc.Server | null = null;
  let client: TablebaseClient | null = null;

  afterEach(() => {
    client?.close();
    server?.forceShutdown();
    client = null;
    server = null;
  });

  it('should probe moves and report health', async () => {
    const requests: string[] = [];
    const started = await startServer({
      probe: (
        call: grpc.ServerUnaryCall<{ fen: string }, unknown>,
        callback: grpc.sendUnaryData<unknown>,
      ) => {
        requests.push(call.request.fen);
        callback(null, {
          moves: [
            { uci: 'b1b8', wdl: -2, dtz: -15, hasDtz: true },
            { uci: 'a1a2', wdl: 0 },
          ],
        });
      },
      healthCheck: (_call: grpc.ServerUnaryCall<unknown, unknown>, callback: grpc.sendUnaryData<unknown>) => {
        callback(null, { healthy: true, version: 'test', maxPieces: 5 });
      },
    });
    server = started.server;
    client = new TablebaseClient({ host: '127.0.0.1', port: started.port });

    const table = await client.probe('8/8/8/8/8/2k5/8/KR6 w - - 0 1');

    expect(requests).toEqual(['8/8/8/8/8/2k5/8/KR6 w - - 0 1']);
    expect(table.get('b1b8')).toEqual({ outcome: { kind: 'win', dtz: 15 }, dtm: null, zeroing: false });
    expect(table.get('a1a2')?.outcome).toEqual({ kind: 'draw' });
    expect(await client.healthCheck()).toEqual({ healthy: true, version: 'test', maxPieces: 5 });
  });

  it('should map rejected requests to typed errors', async () => {
    const started = await startServer({
      probe: (_call: grpc.ServerUnaryCall<unknown, unknown>, callback: grpc.sendUnaryData<unknown>) => {
        callback({ code: grpc.status.INVALID_ARGUMENT, details: 'Invalid FEN' });
      },
      healthCheck: (_call: grpc.ServerUnaryCall<unknown, unknown>, callback: grpc.sendUnaryData<unknown>) => {
        callback({ code: grpc.status.UNAVAILABLE, details: 'Tables not mounted' });
      },
    });
    server = started.server;
    client = new TablebaseClient({ host: '127.0.0.1', port: started.port });

    await expect(client.probe('garbage')).rejects.toBeInstanceOf(InvalidArgumentError);
    await expect(client.healthCheck()).rejects.toBeInstanceOf(ServiceUnavailableError);
  });

  it('should fail with TimeoutError past the deadline', async () => {
    const started = await startServer({
      // Never answers
      probe: () => undefined,
      healthCheck: () => undefined,
    });
    server = started.server;
    client = new TablebaseClient({ host: '127.0.0.1', port: started.port, timeoutMs: 200 });

    const error = await client.probe('8/8/8/8/8/2k5/8/KR6 w - - 0 1').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error).toMatchObject({ operation: 'probe', timeoutMs: 200 });
  });
});
