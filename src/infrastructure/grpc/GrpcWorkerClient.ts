import * as grpc from '@grpc/grpc-js';
import * as protoLoader from '@grpc/proto-loader';
import { z } from 'zod';
import { errorMessage, ExecutionFailedError, WorkerUnavailableError } from '../../core/errors.js';
import { IWorkerClient, ProcessRequest, ProcessResponse } from '../../core/interfaces/IWorkerClient.js';
import { createLogger, Logger } from '../../utils/logger.js';

const SERVICE_NAME = 'gateway.worker.WorkerRPC';

const HealthStatus = z.object({ status: z.string() });
const EndpointList = z.object({ endpoints: z.array(z.string()) });
const DataResponse = z.object({
  request_id: z.string(),
  code: z.number(),
  message: z.string(),
  payload: z.instanceof(Buffer),
});

type MethodDefinition = protoLoader.MethodDefinition<object, object>;

function isServiceDefinition(
  definition: protoLoader.AnyDefinition | undefined
): definition is protoLoader.ServiceDefinition {
  return definition !== undefined && !('format' in definition);
}

/**
 * Client for the WorkerRPC service, loaded from its .proto at run time
 */
export class GrpcWorkerClient implements IWorkerClient {
  private clients: Map<string, grpc.Client> = new Map();
  private methods: Record<'Check' | 'EndpointDiscovery' | 'Process', MethodDefinition>;

  constructor(
    protoPath: string,
    private defaultTimeoutMs: number = 5000,
    private logger: Logger = createLogger('GrpcWorkerClient')
  ) {
    const packageDefinition = protoLoader.loadSync(protoPath, {
      keepCase: true,
      longs: String,
      enums: String,
      defaults: true,
      oneofs: true,
    });

    const service = packageDefinition[SERVICE_NAME];
    if (!isServiceDefinition(service)) {
      throw new Error(`Service ${SERVICE_NAME} not found in ${protoPath}`);
    }
    const method = (name: string): MethodDefinition => {
      const definition = service[name];
      if (!definition) {
        throw new Error(`Method ${name} not found on ${SERVICE_NAME}`);
      }
      return definition;
    };
    this.methods = {
      Check: method('Check'),
      EndpointDiscovery: method('EndpointDiscovery'),
      Process: method('Process'),
    };
  }

  private client(address: string): grpc.Client {
    let client = this.clients.get(address);
    if (!client) {
      client = new grpc.Client(address, grpc.credentials.createInsecure());
      this.clients.set(address, client);
    }
    return client;
  }

  private unary(address: string, method: MethodDefinition, timeoutMs: number): Promise<object> {
    return new Promise((resolve, reject) => {
      this.client(address).makeUnaryRequest(
        method.path,
        method.requestSerialize,
        method.responseDeserialize,
        {},
        new grpc.Metadata(),
        { deadline: Date.now() + timeoutMs },
        (error: grpc.ServiceError | null, value?: object) => {
          if (error) {
            reject(toWorkerError(error, address));
          } else if (value === undefined) {
            reject(new ExecutionFailedError(`Empty response from ${address}`, address));
          } else {
            resolve(value);
          }
        }
      );
    });
  }

  async isReady(address: string, timeoutMs: number = this.defaultTimeoutMs): Promise<boolean> {
    try {
      const response = HealthStatus.parse(await this.unary(address, this.methods.Check, timeoutMs));
      return response.status === 'SERVING';
    } catch (error) {
      this.logger.debug(`Readiness probe to ${address} failed: ${errorMessage(error)}`);
      return false;
    }
  }

  async discoverEndpoints(address: string, timeoutMs: number = this.defaultTimeoutMs): Promise<string[]> {
    const response = EndpointList.parse(
      await this.unary(address, this.methods.EndpointDiscovery, timeoutMs)
    );
    return response.endpoints;
  }

  process(address: string, request: ProcessRequest, signal?: AbortSignal): Promise<ProcessResponse> {
    const method = this.methods.Process;

    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(new ExecutionFailedError(`Call to ${address} aborted before start`, address));
        return;
      }

      const call = this.client(address).makeBidiStreamRequest(
        method.path,
        method.requestSerialize,
        method.responseDeserialize,
        new grpc.Metadata(),
        {}
      );
      let settled = false;
      const finish = (outcome: () => void) => {
        if (settled) return;
        settled = true;
        signal?.removeEventListener('abort', onAbort);
        outcome();
      };
      const onAbort = () => {
        finish(() => reject(new ExecutionFailedError(`Call to ${address} aborted`, address)));
        call.cancel();
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      call.on('data', (raw: unknown) => {
        const parsed = DataResponse.safeParse(raw);
        if (!parsed.success) {
          finish(() => reject(new ExecutionFailedError(`Malformed response from ${address}`, address)));
          call.cancel();
          return;
        }
        const response = parsed.data;
        if (response.request_id !== request.requestId) {
          this.logger.debug(`Ignoring response for ${response.request_id} on ${address}`);
          return;
        }
        if (response.code !== 0) {
          finish(() =>
            reject(new ExecutionFailedError(response.message || `Worker returned code ${response.code}`, address))
          );
          return;
        }
        finish(() => {
          try {
            resolve({ requestId: response.request_id, payload: decodePayload(response.payload) });
          } catch (error) {
            reject(new ExecutionFailedError(`Undecodable payload from ${address}`, address, { cause: error }));
          }
        });
      });
      call.on('error', (error: grpc.ServiceError) => finish(() => reject(toWorkerError(error, address))));
      call.on('end', () =>
        finish(() => reject(new ExecutionFailedError(`Stream from ${address} ended without a response`, address)))
      );

      call.write({
        request_id: request.requestId,
        endpoint: request.endpoint,
        executor: request.executor,
        parameters: JSON.stringify(request.parameters),
        payload: Buffer.from(JSON.stringify(request.payload)),
      });
      call.end();
    });
  }

  close(): void {
    for (const client of this.clients.values()) {
      client.close();
    }
    this.clients.clear();
  }
}

function decodePayload(payload: Buffer): unknown {
  return payload.length === 0 ? null : JSON.parse(payload.toString('utf8'));
}

/**
 * UNAVAILABLE means the node could not be reached at all
 */
export function toWorkerError(error: grpc.ServiceError, address: string): ExecutionFailedError {
  if (error.code === grpc.status.UNAVAILABLE) {
    return new WorkerUnavailableError(`Worker ${address} unavailable: ${error.details}`, address, {
      cause: error,
    });
  }
  return new ExecutionFailedError(`Worker ${address} failed: ${error.details || error.message}`, address, {
    cause: error,
  });
}
