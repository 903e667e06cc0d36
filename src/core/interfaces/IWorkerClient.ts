/**
 * Request sent to a worker's data-processing call
 */
export interface ProcessRequest {
  requestId: string;
  executor: string;
  endpoint: string;
  parameters: Record<string, unknown>;
  payload: Record<string, unknown>;
}

export interface ProcessResponse {
  requestId: string;
  payload: unknown;
}

/**
 * Interface for the RPC surface exposed by discovered nodes
 */
export interface IWorkerClient {
  /**
   * Lightweight health probe used before a node is admitted to rotation
   */
  isReady(address: string, timeoutMs?: number): Promise<boolean>;

  /**
   * Enumerate the endpoints a node serves
   */
  discoverEndpoints(address: string, timeoutMs?: number): Promise<string[]>;

  /**
   * Streamed request/response call. Rejects with ExecutionFailedError when the node
   * reports an error and with WorkerUnavailableError when the node cannot be reached.
   */
  process(address: string, request: ProcessRequest, signal?: AbortSignal): Promise<ProcessResponse>;

  close(): void;
}
