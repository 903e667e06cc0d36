import { errorMessage } from '../../core/errors.js';

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

export function textResult(text: string): ToolResult {
  return { content: [{ type: 'text', text }] };
}

export function errorResult(prefix: string, error: unknown): ToolResult {
  return {
    isError: true,
    content: [{ type: 'text', text: `${prefix}: ${errorMessage(error)}` }],
  };
}

export function jsonBlock(value: unknown): string {
  return `\`\`\`json\n${JSON.stringify(value, null, 2)}\n\`\`\``;
}
