import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { JobService } from '../../application/services/JobService.js';
import { errorResult, jsonBlock, textResult, ToolResult } from './toolResult.js';

export function createNodeToolHandlers(jobService: JobService) {
  return {
    async listNodes(): Promise<ToolResult> {
      try {
        const nodes = jobService.listNodes();
        if (nodes.length === 0) {
          return textResult('# Discovered nodes\n\nNo nodes discovered');
        }

        const byExecutor = new Map<string, string[]>();
        for (const node of nodes) {
          byExecutor.set(node.executor, [...(byExecutor.get(node.executor) ?? []), node.address]);
        }
        const summary = Array.from(byExecutor.entries())
          .map(([executor, addresses]) => `- **${executor}**: ${addresses.join(', ')}`)
          .join('\n');

        return textResult(`# Discovered nodes\n\n${summary}\n\n${jsonBlock(nodes)}`);
      } catch (error) {
        return errorResult('Error listing nodes', error);
      }
    },
  };
}

export function registerNodeTools(server: McpServer, jobService: JobService) {
  const handlers = createNodeToolHandlers(jobService);

  server.tool('list-nodes', 'List worker nodes discovered through the coordination service', {}, () =>
    handlers.listNodes()
  );
}
