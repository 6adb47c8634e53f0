import type { V1Node } from '@kubernetes/client-node';
import { Logger } from 'winston';
import { z } from 'zod';
import { KubernetesClient } from '../KubernetesClient.js';
import { BaseResourceOperations, isAllNamespaces } from '../BaseResourceOperations.js';
import { convertApiError } from '../ErrorHandling.js';
import { parseCpuCores, parseMemoryBytes } from '../utils/QuantityParser.js';
import { MetricsUnavailableError } from '../../errors/AgentErrors.js';
import type {
  ClusterSnapshot,
  ContainerMetricSummary,
  NodeMetric,
  PodMetricSummary,
} from '../../cluster/types.js';

// metrics.k8s.io/v1beta1, only the fields read here
const ResourceUsageSchema = z
  .object({
    cpu: z.string().optional(),
    memory: z.string().optional(),
  })
  .passthrough();

const NodeMetricsSchema = z
  .object({
    metadata: z.object({ name: z.string() }).passthrough(),
    timestamp: z.string().optional(),
    window: z.string().optional(),
    usage: ResourceUsageSchema,
  })
  .passthrough();

const NodeMetricsListSchema = z
  .object({
    items: z.array(NodeMetricsSchema).default([]),
  })
  .passthrough();

const PodMetricsSchema = z
  .object({
    metadata: z
      .object({
        name: z.string(),
        namespace: z.string().optional(),
      })
      .passthrough(),
    containers: z
      .array(
        z
          .object({
            name: z.string(),
            usage: ResourceUsageSchema,
          })
          .passthrough(),
      )
      .default([]),
  })
  .passthrough();

const PodMetricsListSchema = z
  .object({
    items: z.array(PodMetricsSchema).default([]),
  })
  .passthrough();

export type NodeMetrics = z.infer<typeof NodeMetricsSchema>;
export type PodMetrics = z.infer<typeof PodMetricsSchema>;

/**
 * Usage reading for one node as reported by the metrics API
 */
export interface NodeUsage {
  cpuUsageCores: number | null;
  memoryUsageBytes: number | null;
}

export function isNodeReady(node: V1Node): boolean {
  const condition = node.status?.conditions?.find((c) => c.type === 'Ready');
  return condition?.status === 'True';
}

function toNodeUsage(metrics: NodeMetrics): NodeUsage {
  return {
    cpuUsageCores: parseCpuCores(metrics.usage.cpu),
    memoryUsageBytes: parseMemoryBytes(metrics.usage.memory),
  };
}

function toNodeMetric(nodeName: string, node: V1Node, usage: NodeUsage | undefined): NodeMetric {
  const capacity: Record<string, string> = node.status?.capacity ?? {};
  return {
    nodeName,
    cpuUsageCores: usage?.cpuUsageCores ?? null,
    cpuCapacityCores: parseCpuCores(capacity.cpu) ?? 0,
    memoryUsageBytes: usage?.memoryUsageBytes ?? null,
    memoryCapacityBytes: parseMemoryBytes(capacity.memory) ?? 0,
    ready: isNodeReady(node),
  };
}

function toPodMetricSummary(metrics: PodMetrics, fallbackNamespace: string): PodMetricSummary {
  const containers: ContainerMetricSummary[] = metrics.containers.map((container) => ({
    name: container.name,
    cpuCores: parseCpuCores(container.usage.cpu) ?? 0,
    memoryBytes: parseMemoryBytes(container.usage.memory) ?? 0,
  }));
  return {
    name: metrics.metadata.name,
    namespace: metrics.metadata.namespace ?? fallbackNamespace,
    totalCpuCores: containers.reduce((sum, c) => sum + c.cpuCores, 0),
    totalMemoryBytes: containers.reduce((sum, c) => sum + c.memoryBytes, 0),
    containers,
  };
}

/**
 * Node and pod usage from the metrics.k8s.io aggregated API, joined with node capacity
 * from the core API.
 */
export class MetricOperations extends BaseResourceOperations {
  private static readonly METRICS_API_GROUP = 'metrics.k8s.io';
  private static readonly METRICS_API_VERSION = 'v1beta1';

  constructor(client: KubernetesClient, logger?: Logger) {
    super(client, 'Metrics', logger);
  }

  /**
   * Raw usage readings for all nodes
   */
  public async listNodeMetrics(): Promise<NodeMetrics[]> {
    this.logger?.debug('Fetching node metrics using CustomObjectsApi');
    let body: unknown;
    try {
      const response = await this.client.customObjects.listClusterCustomObject(
        MetricOperations.METRICS_API_GROUP,
        MetricOperations.METRICS_API_VERSION,
        'nodes',
      );
      body = response.body;
    } catch (error) {
      this.handleApiError(error, 'ListNodeMetrics');
    }
    return this.parseBody(NodeMetricsListSchema, body, 'ListNodeMetrics').items;
  }

  /**
   * Capacity, readiness and usage of every node.
   *
   * The node list and the metrics are fetched concurrently. Failing to list nodes is fatal;
   * failing to read metrics yields nodes with null usage and a warning.
   */
  public async collectNodeMetrics(): Promise<ClusterSnapshot> {
    const [nodesResult, metricsResult] = await Promise.allSettled([
      this.client.core.listNode(),
      this.listNodeMetrics(),
    ]);

    if (nodesResult.status === 'rejected') {
      const error = convertApiError(nodesResult.reason);
      throw new MetricsUnavailableError(`Failed to list nodes: ${error.message}`, error);
    }

    const warnings: string[] = [];
    const usageByNode = new Map<string, NodeUsage>();

    if (metricsResult.status === 'rejected') {
      const error = convertApiError(metricsResult.reason);
      this.logger?.warn(`Node metrics unavailable: ${error.message}`);
      warnings.push(`Node metrics unavailable: ${error.message}`);
    } else {
      for (const item of metricsResult.value) {
        usageByNode.set(item.metadata.name, toNodeUsage(item));
      }
    }

    const nodes: NodeMetric[] = [];
    const knownNodes = new Set<string>();
    for (const node of nodesResult.value.body.items) {
      const name = node.metadata?.name;
      if (!name) continue;
      knownNodes.add(name);
      nodes.push(toNodeMetric(name, node, usageByNode.get(name)));
    }

    for (const name of usageByNode.keys()) {
      if (!knownNodes.has(name)) {
        warnings.push(`Metrics reported for unknown node ${name}; skipped`);
      }
    }

    return { nodes, collectedAt: new Date(), warnings };
  }

  /**
   * Capacity, readiness and usage of one node. A missing metrics reading leaves usage null.
   */
  public async getNodeMetricsByName(nodeName: string): Promise<NodeMetric> {
    this.logger?.debug(`Fetching metrics for node: ${nodeName}`);
    const [nodeResult, metricsResult] = await Promise.allSettled([
      this.client.core.readNode(nodeName),
      this.client.customObjects.getClusterCustomObject(
        MetricOperations.METRICS_API_GROUP,
        MetricOperations.METRICS_API_VERSION,
        'nodes',
        nodeName,
      ),
    ]);

    if (nodeResult.status === 'rejected') {
      this.handleApiError(nodeResult.reason, 'GetNode', nodeName);
    }

    let usage: NodeUsage | undefined;
    if (metricsResult.status === 'fulfilled') {
      usage = toNodeUsage(
        this.parseBody(NodeMetricsSchema, metricsResult.value.body, 'GetNodeMetrics'),
      );
    } else {
      this.logger?.warn(
        `No metrics for node ${nodeName}: ${convertApiError(metricsResult.reason).message}`,
      );
    }

    return toNodeMetric(nodeName, nodeResult.value.body, usage);
  }

  /**
   * Pod usage for a namespace (absent or "all" for every namespace), optionally one pod
   */
  public async collectPodMetrics(
    namespace?: string,
    podName?: string,
  ): Promise<PodMetricSummary[]> {
    this.logger?.debug(
      `Fetching pod metrics for namespace: ${namespace || 'all'}${podName ? `, pod: ${podName}` : ''}`,
    );

    if (podName && namespace && !isAllNamespaces(namespace)) {
      let podBody: unknown;
      try {
        const response = await this.client.customObjects.getNamespacedCustomObject(
          MetricOperations.METRICS_API_GROUP,
          MetricOperations.METRICS_API_VERSION,
          namespace,
          'pods',
          podName,
        );
        podBody = response.body;
      } catch (error) {
        this.handleApiError(error, 'GetPodMetrics', `${namespace}/${podName}`);
      }
      const metrics = this.parseBody(PodMetricsSchema, podBody, 'GetPodMetrics');
      return [toPodMetricSummary(metrics, namespace)];
    }

    let body: unknown;
    try {
      const response =
        namespace && !isAllNamespaces(namespace)
          ? await this.client.customObjects.listNamespacedCustomObject(
              MetricOperations.METRICS_API_GROUP,
              MetricOperations.METRICS_API_VERSION,
              namespace,
              'pods',
            )
          : await this.client.customObjects.listClusterCustomObject(
              MetricOperations.METRICS_API_GROUP,
              MetricOperations.METRICS_API_VERSION,
              'pods',
            );
      body = response.body;
    } catch (error) {
      this.handleApiError(error, 'ListPodMetrics');
    }

    const fallbackNamespace = namespace && !isAllNamespaces(namespace) ? namespace : 'default';
    return this.parseBody(PodMetricsListSchema, body, 'ListPodMetrics')
      .items.filter((item) => !podName || item.metadata.name === podName)
      .map((item) => toPodMetricSummary(item, fallbackNamespace));
  }
}
