import { Logger } from 'winston';
import {
  ClusterInfoOperations,
  KubernetesClient,
  MetricOperations,
  NamespaceOperations,
  PodOperations,
  convertApiError,
} from '../kubernetes/index.js';
import { MetricsUnavailableError } from '../errors/AgentErrors.js';
import { withTimeout } from '../utils/Timeout.js';
import { aggregate } from './ClusterAggregator.js';
import type {
  ClusterAggregate,
  ClusterInfo,
  ClusterSnapshot,
  NamespaceSummary,
  NodeBreakdown,
  PodMetricSummary,
  PodSummary,
} from './types.js';

export interface ClusterServiceOptions {
  /** Upper bound for every cluster call */
  metricsTimeoutMs: number;
  logger?: Logger;
}

/**
 * Read-only cluster facade shared by the HTTP routes, the RAG pipeline and the MCP tools.
 * Every call is bounded by the metrics timeout and fails with MetricsUnavailableError.
 */
export class ClusterService {
  private readonly metrics: MetricOperations;
  private readonly pods: PodOperations;
  private readonly namespaces: NamespaceOperations;
  private readonly info: ClusterInfoOperations;
  private readonly metricsTimeoutMs: number;
  private readonly logger?: Logger;

  constructor(
    private readonly client: KubernetesClient,
    options: ClusterServiceOptions,
  ) {
    this.metricsTimeoutMs = options.metricsTimeoutMs;
    this.logger = options.logger;
    this.metrics = new MetricOperations(client, options.logger);
    this.pods = new PodOperations(client, options.logger);
    this.namespaces = new NamespaceOperations(client, options.logger);
    this.info = new ClusterInfoOperations(client, options.logger);
  }

  private async run<T>(label: string, operation: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(operation(), this.metricsTimeoutMs, label);
    } catch (error) {
      if (error instanceof MetricsUnavailableError) {
        throw error;
      }
      const converted = convertApiError(error);
      this.logger?.warn(`${label} failed: ${converted.message}`);
      throw new MetricsUnavailableError(`${label} failed: ${converted.message}`, converted);
    }
  }

  async collectSnapshot(): Promise<ClusterSnapshot> {
    return this.run('Collecting node metrics', () => this.metrics.collectNodeMetrics());
  }

  async getClusterCpu(): Promise<ClusterAggregate> {
    return aggregate(await this.collectSnapshot());
  }

  async getClusterMemory(): Promise<ClusterAggregate> {
    return aggregate(await this.collectSnapshot());
  }

  /**
   * Per-node breakdown for every node, or just the named one
   */
  async getNodeMetrics(nodeName?: string): Promise<readonly NodeBreakdown[]> {
    if (!nodeName) {
      return (await this.getClusterCpu()).nodes;
    }
    const node = await this.run(`Reading metrics for node ${nodeName}`, () =>
      this.metrics.getNodeMetricsByName(nodeName),
    );
    return aggregate({ nodes: [node], collectedAt: new Date(), warnings: [] }).nodes;
  }

  async listPods(namespace?: string, labelSelector?: string): Promise<PodSummary[]> {
    return this.run('Listing pods', () => this.pods.collectPods(namespace, labelSelector));
  }

  async getPodMetrics(namespace?: string, podName?: string): Promise<PodMetricSummary[]> {
    return this.run('Reading pod metrics', () =>
      this.metrics.collectPodMetrics(namespace, podName),
    );
  }

  async getClusterInfo(): Promise<ClusterInfo> {
    return this.run('Reading cluster info', () => this.info.get());
  }

  async listNamespaces(): Promise<NamespaceSummary[]> {
    return this.run('Listing namespaces', () => this.namespaces.listSummaries());
  }

  /**
   * Never throws; a timeout counts as unreachable
   */
  async isReachable(): Promise<boolean> {
    try {
      return await withTimeout(this.client.testConnection(), this.metricsTimeoutMs, 'Cluster ping');
    } catch (error) {
      this.logger?.debug(
        `Cluster ping failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      return false;
    }
  }
}
