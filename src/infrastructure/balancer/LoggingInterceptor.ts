import { errorMessage } from '../../core/errors.js';
import { Logger } from '../../utils/logger.js';
import { LoadBalancerInterceptor } from './LoadBalancer.js';

export function createLoggingInterceptor(logger: Logger): LoadBalancerInterceptor {
  return {
    onConnectionAcquired: (connection) =>
      logger.debug(`Acquired ${connection.address} (${connection.executor}), in flight: ${connection.inFlight}`),
    onConnectionReleased: (connection) =>
      logger.debug(`Released ${connection.address} (${connection.executor})`),
    onConnectionFailed: (connection, error) =>
      logger.warn(`Connection ${connection.address} (${connection.executor}) failed: ${errorMessage(error)}`),
    onConnectionsUpdated: (connections) =>
      logger.info(`Connections updated: ${connections.map((c) => c.address).join(', ') || 'none'}`),
  };
}
