import type { V1Node } from '@kubernetes/client-node';
import { Logger } from 'winston';
import { BaseResourceOperations } from '../BaseResourceOperations.js';
import { KubernetesClient } from '../KubernetesClient.js';
import type { ClusterInfo } from '../../cluster/types.js';

const ROLE_LABEL_PREFIX = 'node-role.kubernetes.io/';

export function nodeRoles(node: V1Node): string[] {
  return Object.keys(node.metadata?.labels ?? {})
    .filter((label) => label.startsWith(ROLE_LABEL_PREFIX))
    .map((label) => label.slice(ROLE_LABEL_PREFIX.length))
    .filter((role) => role.length > 0)
    .sort();
}

function readyCondition(node: V1Node): 'True' | 'False' | 'Unknown' {
  const status = node.status?.conditions?.find((c) => c.type === 'Ready')?.status;
  return status === 'True' || status === 'False' ? status : 'Unknown';
}

/**
 * Server version plus node and namespace counts
 */
export class ClusterInfoOperations extends BaseResourceOperations {
  constructor(client: KubernetesClient, logger?: Logger) {
    super(client, 'ClusterInfo', logger);
  }

  async get(): Promise<ClusterInfo> {
    try {
      const [version, nodes, namespaces] = await Promise.all([
        this.client.version.getCode(),
        this.client.core.listNode(),
        this.client.core.listNamespace(),
      ]);

      return {
        version: {
          major: version.body.major,
          minor: version.body.minor,
          gitVersion: version.body.gitVersion,
          platform: version.body.platform,
        },
        nodeCount: nodes.body.items.length,
        namespaceCount: namespaces.body.items.length,
        nodes: nodes.body.items.map((node) => ({
          name: node.metadata?.name ?? '',
          ready: readyCondition(node),
          roles: nodeRoles(node),
        })),
      };
    } catch (error) {
      this.handleApiError(error, 'Get');
    }
  }
}
