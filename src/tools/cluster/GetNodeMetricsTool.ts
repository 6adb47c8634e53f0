import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { ClusterService } from '../../cluster/ClusterService.js';
import { presentNodeMetrics } from '../../server/presenters.js';
import { BaseTool, runClusterTool } from './BaseTool.js';

const ParamsSchema = z.object({
  node_name: z.string().min(1).optional(),
});

/**
 * Per-node CPU and memory usage
 */
export class GetNodeMetricsTool implements BaseTool {
  tool: Tool = {
    name: 'get_node_metrics',
    description:
      'CPU and memory usage of each node in the current Kubernetes cluster, or of a single node',
    inputSchema: {
      type: 'object',
      properties: {
        node_name: {
          type: 'string',
          description: 'Name of the node. If not specified, returns every node.',
        },
      },
    },
  };

  async execute(params: unknown, cluster: ClusterService): Promise<unknown> {
    return runClusterTool(
      ParamsSchema,
      params,
      async ({ node_name }) => {
        const nodes = presentNodeMetrics(await cluster.getNodeMetrics(node_name));
        return { count: nodes.length, nodes };
      },
      { notFoundHint: 'No node with that name; list nodes with get_cluster_info' },
    );
  }
}
