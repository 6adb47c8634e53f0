import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ZodType, ZodTypeDef } from 'zod';
import type { ClusterService } from '../../cluster/ClusterService.js';
import { MetricsUnavailableError } from '../../errors/AgentErrors.js';
import { ResourceNotFoundError } from '../../kubernetes/ErrorHandling.js';

/**
 * Base interface for the cluster MCP tools
 */
export interface BaseTool {
  /**
   * The tool definition for MCP registration
   */
  tool: Tool;

  /**
   * Execute the tool with the raw call arguments
   */
  execute(params: unknown, cluster: ClusterService): Promise<unknown>;
}

/**
 * Common parameter schemas used across multiple tools
 */
export const CommonSchemas = {
  namespace: {
    type: 'string',
    description: 'Kubernetes namespace (defaults to all namespaces if not specified)',
  },
  labelSelector: {
    type: 'string',
    description: 'Label selector to filter resources (e.g., "app=nginx")',
  },
} as const;

export interface ToolErrorPayload {
  error: string;
  hint?: string;
}

export interface ToolRunOptions {
  /** Returned alongside the error when the cluster answered 404 */
  notFoundHint?: string;
}

export function toolErrorPayload(
  error: MetricsUnavailableError,
  notFoundHint?: string,
): ToolErrorPayload {
  const payload: ToolErrorPayload = { error: error.message };
  if (notFoundHint && error.cause instanceof ResourceNotFoundError) {
    payload.hint = notFoundHint;
  }
  return payload;
}

/**
 * Validate the arguments, run the tool body and turn cluster failures into an error payload.
 * Anything other than a cluster failure propagates.
 */
export async function runClusterTool<T, R>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  params: unknown,
  body: (args: T) => Promise<R>,
  options: ToolRunOptions = {},
): Promise<R | ToolErrorPayload> {
  const parsed = schema.safeParse(params ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const detail = issue
      ? `${issue.path.length > 0 ? `${issue.path.join('.')}: ` : ''}${issue.message}`
      : 'invalid input';
    return { error: `Invalid arguments: ${detail}` };
  }

  try {
    return await body(parsed.data);
  } catch (error) {
    if (error instanceof MetricsUnavailableError) {
      return toolErrorPayload(error, options.notFoundHint);
    }
    throw error;
  }
}
