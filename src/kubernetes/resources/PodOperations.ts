import type { V1ContainerStatus, V1Pod, V1PodList } from '@kubernetes/client-node';
import { Logger } from 'winston';
import {
  BaseResourceOperations,
  ResourceOperationOptions,
  isAllNamespaces,
} from '../BaseResourceOperations.js';
import { KubernetesClient } from '../KubernetesClient.js';
import {
  POD_PHASES,
  type ContainerStatusSummary,
  type PodPhase,
  type PodSummary,
} from '../../cluster/types.js';

function toPodPhase(phase: string | undefined): PodPhase {
  return POD_PHASES.find((known) => known === phase) ?? 'Unknown';
}

function toContainerStatus(status: V1ContainerStatus): ContainerStatusSummary {
  const base = { name: status.name, ready: status.ready, restartCount: status.restartCount };
  const state = status.state;
  if (state?.running) {
    return { ...base, state: 'running', reason: null };
  }
  if (state?.waiting) {
    return { ...base, state: 'waiting', reason: state.waiting.reason ?? null };
  }
  if (state?.terminated) {
    return { ...base, state: 'terminated', reason: state.terminated.reason ?? null };
  }
  return { ...base, state: 'unknown', reason: null };
}

export function toPodSummary(pod: V1Pod): PodSummary {
  const statuses = pod.status?.containerStatuses ?? [];
  // Containers without a status yet (e.g. still pending) are reported from the spec
  const containers = (pod.spec?.containers ?? []).map(
    (container): ContainerStatusSummary => {
      const status = statuses.find((s) => s.name === container.name);
      return status
        ? toContainerStatus(status)
        : { name: container.name, ready: false, restartCount: 0, state: 'unknown', reason: null };
    },
  );

  return {
    name: pod.metadata?.name ?? '',
    namespace: pod.metadata?.namespace ?? 'default',
    status: toPodPhase(pod.status?.phase),
    nodeName: pod.spec?.nodeName ?? null,
    podIp: pod.status?.podIP ?? null,
    containers,
    createdAt: pod.metadata?.creationTimestamp?.toISOString() ?? null,
  };
}

/**
 * Pod operations implementation - Read-only operations
 */
export class PodOperations extends BaseResourceOperations {
  constructor(client: KubernetesClient, logger?: Logger) {
    super(client, 'Pod', logger);
  }

  /**
   * List pods in one namespace, or across all of them
   */
  async list(options?: ResourceOperationOptions): Promise<V1PodList> {
    try {
      const namespace = options?.namespace;

      if (namespace && !isAllNamespaces(namespace)) {
        const response = await this.client.core.listNamespacedPod(
          namespace,
          undefined,
          undefined,
          undefined,
          undefined,
          options?.labelSelector,
        );
        return response.body;
      }

      const response = await this.client.core.listPodForAllNamespaces(
        undefined,
        undefined,
        undefined,
        options?.labelSelector,
      );
      return response.body;
    } catch (error) {
      this.handleApiError(error, 'List');
    }
  }

  /**
   * Pod summaries for a namespace (absent or "all" for every namespace)
   */
  async collectPods(namespace?: string, labelSelector?: string): Promise<PodSummary[]> {
    this.logger?.debug(
      `Listing pods in ${namespace || 'all namespaces'}${labelSelector ? ` matching ${labelSelector}` : ''}`,
    );
    const result = await this.list({ namespace, labelSelector });
    return result.items.map(toPodSummary);
  }
}
