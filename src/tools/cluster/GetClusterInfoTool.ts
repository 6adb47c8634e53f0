import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { ClusterService } from '../../cluster/ClusterService.js';
import { presentClusterInfo } from '../../server/presenters.js';
import { BaseTool, runClusterTool } from './BaseTool.js';

const ParamsSchema = z.object({});

export class GetClusterInfoTool implements BaseTool {
  tool: Tool = {
    name: 'get_cluster_info',
    description:
      'Kubernetes server version, node and namespace counts, and each node with its readiness and roles',
    inputSchema: {
      type: 'object',
      properties: {},
    },
  };

  async execute(params: unknown, cluster: ClusterService): Promise<unknown> {
    return runClusterTool(ParamsSchema, params, async () =>
      presentClusterInfo(await cluster.getClusterInfo()),
    );
  }
}
