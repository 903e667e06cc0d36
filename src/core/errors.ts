export type GatewayErrorCode =
  | 'VALIDATION'
  | 'CONFLICT'
  | 'NOT_FOUND'
  | 'NO_CAPACITY'
  | 'EXECUTION_FAILED'
  | 'TIMEOUT'
  | 'DISCOVERY_UNAVAILABLE'
  | 'STORE_UNAVAILABLE'
  | 'CONFIG';

/**
 * Base class for every error the gateway reports
 */
export abstract class GatewayError extends Error {
  abstract readonly code: GatewayErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Submission rejected before persistence
 */
export class ValidationError extends GatewayError {
  readonly code = 'VALIDATION';

  constructor(message: string, readonly issues: string[] = []) {
    super(message);
  }
}

/**
 * Compare-and-swap lost: the stored state did not match the expected one
 */
export class ConflictError extends GatewayError {
  readonly code = 'CONFLICT';

  constructor(readonly jobId: string, readonly expected: string, readonly actual: string) {
    super(`Job ${jobId} is ${actual}, expected ${expected}`);
  }
}

export class NotFoundError extends GatewayError {
  readonly code = 'NOT_FOUND';

  constructor(readonly jobId: string) {
    super(`Job not found: ${jobId}`);
  }
}

/**
 * No discovered node can take the job; does not consume retry budget
 */
export class NoCapacityError extends GatewayError {
  readonly code = 'NO_CAPACITY';

  constructor(readonly executor?: string) {
    super(executor ? `No capacity for executor ${executor}` : 'No capacity available');
  }
}

export class ExecutionFailedError extends GatewayError {
  readonly code = 'EXECUTION_FAILED';

  constructor(message: string, readonly address?: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * The node could not be reached at all; its connection is retired from rotation
 */
export class WorkerUnavailableError extends ExecutionFailedError {}

export class ExecutionTimeoutError extends GatewayError {
  readonly code = 'TIMEOUT';

  constructor(readonly deadlineMs: number, readonly address?: string) {
    super(`Execution exceeded deadline of ${deadlineMs}ms`);
  }
}

export class DiscoveryUnavailableError extends GatewayError {
  readonly code = 'DISCOVERY_UNAVAILABLE';
}

export class StoreUnavailableError extends GatewayError {
  readonly code = 'STORE_UNAVAILABLE';
}

export class ConfigError extends GatewayError {
  readonly code = 'CONFIG';

  constructor(message: string, readonly issues: string[] = []) {
    super(message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
