import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { ClusterService } from '../../cluster/ClusterService.js';
import { presentClusterMemory } from '../../server/presenters.js';
import { BaseTool, runClusterTool } from './BaseTool.js';

const ParamsSchema = z.object({});

export class GetClusterMemoryTool implements BaseTool {
  tool: Tool = {
    name: 'get_cluster_memory',
    description:
      'Total memory usage and capacity of the current Kubernetes cluster in GiB, with a per-node breakdown',
    inputSchema: {
      type: 'object',
      properties: {},
    },
  };

  async execute(params: unknown, cluster: ClusterService): Promise<unknown> {
    return runClusterTool(ParamsSchema, params, async () =>
      presentClusterMemory(await cluster.getClusterMemory()),
    );
  }
}
