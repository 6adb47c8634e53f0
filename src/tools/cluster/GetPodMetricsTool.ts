import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { ClusterService } from '../../cluster/ClusterService.js';
import { presentPodMetrics } from '../../server/presenters.js';
import { BaseTool, CommonSchemas, runClusterTool } from './BaseTool.js';

const ParamsSchema = z.object({
  namespace: z.string().min(1).optional(),
  pod_name: z.string().min(1).optional(),
});

/**
 * Get pod metrics from the metrics.k8s.io API (similar to `kubectl top pods`)
 */
export class GetPodMetricsTool implements BaseTool {
  tool: Tool = {
    name: 'get_pod_metrics',
    description:
      'Fetch CPU and memory usage for pods in the current Kubernetes cluster (similar to `kubectl top pods`)',
    inputSchema: {
      type: 'object',
      properties: {
        namespace: {
          ...CommonSchemas.namespace,
          description:
            'Kubernetes namespace to fetch pod metrics from. If not specified, fetches metrics from all namespaces.',
        },
        pod_name: {
          type: 'string',
          description: 'Optional pod name. Matched across all namespaces when no namespace is given.',
        },
      },
    },
  };

  async execute(params: unknown, cluster: ClusterService): Promise<unknown> {
    return runClusterTool(
      ParamsSchema,
      params,
      async ({ namespace, pod_name }) =>
        presentPodMetrics(await cluster.getPodMetrics(namespace, pod_name)),
      { notFoundHint: 'The pod does not exist or metrics-server is not installed' },
    );
  }
}
