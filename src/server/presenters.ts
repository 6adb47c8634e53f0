/**
 * snake_case wire shapes shared by the HTTP routes and the MCP tools
 */
import type {
  ClusterAggregate,
  ClusterInfo,
  NamespaceSummary,
  NodeBreakdown,
  PodMetricSummary,
  PodSummary,
} from '../cluster/types.js';
import { BYTES_PER_GIB, BYTES_PER_MIB } from '../kubernetes/utils/QuantityParser.js';
import type { QueryResult, RetrievedDocument } from '../rag/types.js';

export function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function roundOrNull(value: number | null, digits: number): number | null {
  return value === null ? null : round(value, digits);
}

function gib(bytes: number | null): number | null {
  return bytes === null ? null : round(bytes / BYTES_PER_GIB, 2);
}

function clusterMeta(aggregate: ClusterAggregate) {
  return {
    node_count: aggregate.nodeCount,
    ready_node_count: aggregate.readyNodeCount,
    not_ready_nodes: [...aggregate.notReadyNodes],
    nodes_without_metrics: [...aggregate.nodesWithoutMetrics],
    warnings: [...aggregate.warnings],
    collected_at: aggregate.collectedAt.toISOString(),
    metrics_available: true,
  };
}

export function presentClusterCpu(aggregate: ClusterAggregate) {
  return {
    cluster_cpu: {
      total_usage_cores: round(aggregate.cpu.totalUsage, 3),
      total_capacity_cores: round(aggregate.cpu.totalCapacity, 3),
      utilization_percent: round(aggregate.cpu.utilizationPercent, 2),
    },
    nodes: aggregate.nodes.map((node) => ({
      node: node.nodeName,
      ready: node.ready,
      usage_cores: roundOrNull(node.cpu.usage, 3),
      capacity_cores: round(node.cpu.capacity, 3),
      utilization_percent: roundOrNull(node.cpu.utilizationPercent, 2),
    })),
    ...clusterMeta(aggregate),
  };
}

export function presentClusterMemory(aggregate: ClusterAggregate) {
  return {
    cluster_memory: {
      total_usage_gi: round(aggregate.memory.totalUsage / BYTES_PER_GIB, 2),
      total_capacity_gi: round(aggregate.memory.totalCapacity / BYTES_PER_GIB, 2),
      utilization_percent: round(aggregate.memory.utilizationPercent, 2),
    },
    nodes: aggregate.nodes.map((node) => ({
      node: node.nodeName,
      ready: node.ready,
      usage_gi: gib(node.memory.usage),
      capacity_gi: gib(node.memory.capacity),
      utilization_percent: roundOrNull(node.memory.utilizationPercent, 2),
    })),
    ...clusterMeta(aggregate),
  };
}

export function presentNodeMetrics(nodes: readonly NodeBreakdown[]) {
  return nodes.map((node) => ({
    node: node.nodeName,
    ready: node.ready,
    has_metrics: node.hasMetrics,
    cpu: {
      usage_cores: roundOrNull(node.cpu.usage, 3),
      capacity_cores: round(node.cpu.capacity, 3),
      utilization_percent: roundOrNull(node.cpu.utilizationPercent, 2),
    },
    memory: {
      usage_gi: gib(node.memory.usage),
      capacity_gi: gib(node.memory.capacity),
      utilization_percent: roundOrNull(node.memory.utilizationPercent, 2),
    },
  }));
}

export function presentPods(pods: readonly PodSummary[]) {
  return {
    count: pods.length,
    pods: pods.map((pod) => ({
      name: pod.name,
      namespace: pod.namespace,
      status: pod.status,
      node: pod.nodeName,
      ip: pod.podIp,
      containers: pod.containers.map((c) => ({
        name: c.name,
        ready: c.ready,
        restart_count: c.restartCount,
        state: c.state,
        reason: c.reason,
      })),
      created: pod.createdAt,
    })),
  };
}

export function presentPodMetrics(pods: readonly PodMetricSummary[]) {
  return {
    count: pods.length,
    pods: pods.map((pod) => ({
      name: pod.name,
      namespace: pod.namespace,
      cpu_cores: round(pod.totalCpuCores, 3),
      memory_mi: round(pod.totalMemoryBytes / BYTES_PER_MIB, 2),
      containers: pod.containers.map((c) => ({
        name: c.name,
        cpu_cores: round(c.cpuCores, 3),
        memory_mi: round(c.memoryBytes / BYTES_PER_MIB, 2),
      })),
    })),
  };
}

export function presentClusterInfo(info: ClusterInfo) {
  return {
    version: {
      major: info.version.major,
      minor: info.version.minor,
      git_version: info.version.gitVersion,
      platform: info.version.platform,
    },
    nodes_count: info.nodeCount,
    namespaces_count: info.namespaceCount,
    nodes: info.nodes.map((node) => ({
      name: node.name,
      ready: node.ready,
      roles: [...node.roles],
    })),
  };
}

export function presentNamespaces(namespaces: readonly NamespaceSummary[]) {
  return {
    count: namespaces.length,
    namespaces: namespaces.map((ns) => ({
      name: ns.name,
      status: ns.status,
      created: ns.createdAt,
      labels: { ...ns.labels },
    })),
  };
}

function presentDocument(doc: RetrievedDocument) {
  return {
    id: doc.id,
    text: doc.text,
    score: doc.score,
    metadata: { ...doc.metadata },
  };
}

export function presentQueryResult(result: QueryResult) {
  return {
    query: result.query,
    matches: result.matches.map(presentDocument),
    response: result.response,
    cluster_context_included: result.clusterContextIncluded,
    cluster_context_omitted: result.clusterContextOmitted,
  };
}
