import type { V1Namespace, V1NamespaceList } from '@kubernetes/client-node';
import { Logger } from 'winston';
import { BaseResourceOperations } from '../BaseResourceOperations.js';
import { KubernetesClient } from '../KubernetesClient.js';
import type { NamespaceSummary } from '../../cluster/types.js';

export function toNamespaceSummary(namespace: V1Namespace): NamespaceSummary {
  return {
    name: namespace.metadata?.name ?? '',
    status: namespace.status?.phase ?? null,
    createdAt: namespace.metadata?.creationTimestamp?.toISOString() ?? null,
    labels: namespace.metadata?.labels ?? {},
  };
}

/**
 * Namespace operations implementation - Read-only operations
 */
export class NamespaceOperations extends BaseResourceOperations {
  constructor(client: KubernetesClient, logger?: Logger) {
    super(client, 'Namespace', logger);
  }

  /**
   * List Namespaces
   */
  async list(): Promise<V1NamespaceList> {
    try {
      const response = await this.client.core.listNamespace();
      return response.body;
    } catch (error) {
      this.handleApiError(error, 'List');
    }
  }

  async listSummaries(): Promise<NamespaceSummary[]> {
    const result = await this.list();
    return result.items.map(toNamespaceSummary);
  }
}
