import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { JobService } from '../../application/services/JobService.js';
import { JobRecord, WorkState } from '../../core/entities/WorkInfo.js';
import { errorResult, jsonBlock, textResult, ToolResult } from './toolResult.js';

export const submitJobShape = {
  name: z.string().describe('Job name (not unique)'),
  data: z.record(z.unknown()).optional().describe('Payload passed to the executor'),
  priority: z.number().int().optional().describe('Higher runs first (default 0)'),
  executor: z.string().optional().describe('Executor to route to; any executor when omitted'),
  endpoint: z.string().optional().describe('Executor endpoint (default /)'),
  retry_limit: z.number().int().optional().describe('Retries after the first failure (default 0)'),
  retry_delay: z.number().optional().describe('Seconds before a retry'),
  retry_backoff: z.boolean().optional().describe('Exponential instead of fixed retry delay'),
  start_after: z.string().optional().describe('ISO timestamp before which the job is not run (default now)'),
  expire_in_seconds: z.number().optional().describe('Execution deadline once started; 0 disables'),
  keep_until: z.string().optional().describe('ISO timestamp until which the record is retained'),
  on_complete: z.boolean().optional().describe('Emit a completion record on reaching a terminal state'),
};

export const jobIdShape = {
  job_id: z.string().describe('The ID of the job'),
};

export const listJobsShape = {
  state: z.nativeEnum(WorkState).optional().describe('Filter jobs by state (optional)'),
};

export type SubmitJobArgs = z.infer<z.ZodObject<typeof submitJobShape>>;
export type JobIdArgs = z.infer<z.ZodObject<typeof jobIdShape>>;
export type ListJobsArgs = z.infer<z.ZodObject<typeof listJobsShape>>;

export function formatJob(job: JobRecord) {
  return {
    id: job.id,
    name: job.name,
    state: job.state,
    priority: job.priority,
    executor: job.executor,
    endpoint: job.endpoint,
    attempts: job.attempts,
    retryCount: job.retryCount,
    retryLimit: job.retryLimit,
    startAfter: job.startAfter.toISOString(),
    keepUntil: job.keepUntil.toISOString(),
    createdAt: job.createdAt.toISOString(),
    startedAt: job.startedAt?.toISOString(),
    completedAt: job.completedAt?.toISOString(),
    error: job.error,
  };
}

/**
 * Handlers behind the job tools, usable without an MCP server
 */
export function createJobToolHandlers(jobService: JobService, clock: () => Date = () => new Date()) {
  return {
    async submitJob(args: SubmitJobArgs): Promise<ToolResult> {
      try {
        const result = await jobService.submitJob({
          name: args.name,
          data: args.data,
          priority: args.priority,
          executor: args.executor,
          endpoint: args.endpoint,
          retryLimit: args.retry_limit,
          retryDelay: args.retry_delay,
          retryBackoff: args.retry_backoff,
          startAfter: args.start_after ?? clock(),
          expireInSeconds: args.expire_in_seconds,
          keepUntil: args.keep_until,
          onComplete: args.on_complete,
        });

        if (!result.ok) {
          return {
            isError: true,
            content: [
              {
                type: 'text',
                text: `Submission rejected:\n${result.error.issues.map((issue) => `- ${issue}`).join('\n')}`,
              },
            ],
          };
        }

        const note = result.deduplicated ? ' (existing job with the same name and payload)' : '';
        return textResult(
          `Job submitted${note}\n\n**Job ID**: \`${result.jobId}\`\n\nUse \`status\` with this ID to follow it.`
        );
      } catch (error) {
        return errorResult('Error submitting job', error);
      }
    },

    async jobStatus({ job_id }: JobIdArgs): Promise<ToolResult> {
      try {
        const job = await jobService.getJobStatus(job_id);
        if (!job) {
          return { isError: true, content: [{ type: 'text', text: `Job not found: ${job_id}` }] };
        }

        const sections = [`# Job ${job.id}: ${job.state}`, jsonBlock(formatJob(job))];
        if (job.result !== undefined) {
          sections.push('## Result', jsonBlock(job.result));
        }
        return textResult(sections.join('\n\n'));
      } catch (error) {
        return errorResult('Error checking job status', error);
      }
    },

    async cancelJob({ job_id }: JobIdArgs): Promise<ToolResult> {
      try {
        const result = await jobService.cancelJob(job_id);
        if (!result.ok) {
          return {
            isError: true,
            content: [{ type: 'text', text: `Cannot cancel job: ${result.error.message}` }],
          };
        }
        return textResult(`Job ${job_id} cancelled`);
      } catch (error) {
        return errorResult('Error cancelling job', error);
      }
    },

    async listJobs({ state }: ListJobsArgs): Promise<ToolResult> {
      try {
        const jobs = await jobService.listJobs(state);
        const stats = await jobService.getStatistics();

        const text = `# Jobs

## Statistics
- Total: ${stats.total}
- Created: ${stats[WorkState.CREATED]}
- Active: ${stats[WorkState.ACTIVE]}
- Completed: ${stats[WorkState.COMPLETED]}
- Failed: ${stats[WorkState.FAILED]}
- Cancelled: ${stats[WorkState.CANCELLED]}

## ${state ? `Jobs in state ${state}` : 'All jobs'}
${jobs.length === 0 ? 'No jobs found' : jsonBlock(jobs.map(formatJob))}`;

        return textResult(text);
      } catch (error) {
        return errorResult('Error listing jobs', error);
      }
    },
  };
}

/**
 * Register all job management tools
 */
export function registerJobManagementTools(server: McpServer, jobService: JobService) {
  const handlers = createJobToolHandlers(jobService);

  server.tool(
    'submit',
    'Submit a job for execution on a discovered worker. Returns immediately with the job ID.',
    submitJobShape,
    (args) => handlers.submitJob(args)
  );

  server.tool('status', 'Get the state, attempts and result of a job', jobIdShape, (args) =>
    handlers.jobStatus(args)
  );

  server.tool('cancel', 'Cancel a job that has not finished yet', jobIdShape, (args) =>
    handlers.cancelJob(args)
  );

  server.tool('list-jobs', 'List jobs with per-state statistics', listJobsShape, (args) =>
    handlers.listJobs(args)
  );
}
