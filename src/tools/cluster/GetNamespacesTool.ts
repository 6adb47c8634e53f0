import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { ClusterService } from '../../cluster/ClusterService.js';
import { presentNamespaces } from '../../server/presenters.js';
import { BaseTool, runClusterTool } from './BaseTool.js';

const ParamsSchema = z.object({});

/**
 * List namespaces in a Kubernetes cluster
 */
export class GetNamespacesTool implements BaseTool {
  tool: Tool = {
    name: 'get_namespaces',
    description:
      'List all Namespace resources in the current Kubernetes cluster (similar to `kubectl get namespaces`)',
    inputSchema: {
      type: 'object',
      properties: {},
    },
  };

  async execute(params: unknown, cluster: ClusterService): Promise<unknown> {
    return runClusterTool(ParamsSchema, params, async () =>
      presentNamespaces(await cluster.listNamespaces()),
    );
  }
}
