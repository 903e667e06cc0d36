import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { JobService } from '../../application/services/JobService.js';
import { DatabaseConnection } from '../../infrastructure/database/DatabaseConnection.js';
import { errorResult, jsonBlock, textResult, ToolResult } from './toolResult.js';

export function createHealthCheckHandler(
  jobService: JobService,
  dbConnection: DatabaseConnection | null,
  clock: () => Date = () => new Date()
) {
  return async (): Promise<ToolResult> => {
    try {
      const health = await jobService.getHealth();
      const report = {
        timestamp: clock().toISOString(),
        ...health,
        database: dbConnection
          ? { path: dbConnection.getDatabasePath(), sizeBytes: dbConnection.getDatabaseSize() }
          : { path: 'memory', sizeBytes: 0 },
      };
      return textResult(`# Health: ${health.status}\n\n${jsonBlock(report)}`);
    } catch (error) {
      return errorResult('Health check failed', error);
    }
  };
}

/**
 * Register the health-check tool
 */
export function registerHealthCheckTool(
  server: McpServer,
  jobService: JobService,
  dbConnection: DatabaseConnection | null
) {
  server.tool(
    'health-check',
    'Check the health of the gateway: job store, scheduler, discovery and capacity',
    {},
    createHealthCheckHandler(jobService, dbConnection)
  );
}
