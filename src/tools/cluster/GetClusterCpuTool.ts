import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { ClusterService } from '../../cluster/ClusterService.js';
import { presentClusterCpu } from '../../server/presenters.js';
import { BaseTool, runClusterTool } from './BaseTool.js';

const ParamsSchema = z.object({});

/**
 * Cluster-wide CPU usage against allocatable capacity (similar to `kubectl top nodes`, summed)
 */
export class GetClusterCpuTool implements BaseTool {
  tool: Tool = {
    name: 'get_cluster_cpu',
    description:
      'Total CPU usage and capacity of the current Kubernetes cluster in cores, with a per-node breakdown',
    inputSchema: {
      type: 'object',
      properties: {},
    },
  };

  async execute(params: unknown, cluster: ClusterService): Promise<unknown> {
    return runClusterTool(ParamsSchema, params, async () =>
      presentClusterCpu(await cluster.getClusterCpu()),
    );
  }
}
