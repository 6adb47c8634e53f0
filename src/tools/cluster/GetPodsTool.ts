import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { ClusterService } from '../../cluster/ClusterService.js';
import { presentPods } from '../../server/presenters.js';
import { BaseTool, CommonSchemas, runClusterTool } from './BaseTool.js';

const ParamsSchema = z.object({
  namespace: z.string().min(1).optional(),
  label_selector: z.string().min(1).optional(),
});

/**
 * List pods with their phase and container states (similar to `kubectl get pods`)
 */
export class GetPodsTool implements BaseTool {
  tool: Tool = {
    name: 'get_pods',
    description:
      'List pods in the current Kubernetes cluster with their status, node and container states',
    inputSchema: {
      type: 'object',
      properties: {
        namespace: CommonSchemas.namespace,
        label_selector: CommonSchemas.labelSelector,
      },
    },
  };

  async execute(params: unknown, cluster: ClusterService): Promise<unknown> {
    return runClusterTool(ParamsSchema, params, async ({ namespace, label_selector }) =>
      presentPods(await cluster.listPods(namespace, label_selector)),
    );
  }
}
