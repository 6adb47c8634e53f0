import type {
  ClusterAggregate,
  ClusterSnapshot,
  NodeBreakdown,
  NodeMetric,
  NodeResourceBreakdown,
  ResourceAggregate,
} from './types.js';

export function utilizationPercent(usage: number, capacity: number): number {
  return capacity > 0 ? (100 * usage) / capacity : 0;
}

function resourceBreakdown(usage: number | null, capacity: number): NodeResourceBreakdown {
  return {
    usage,
    capacity,
    utilizationPercent: usage === null ? null : utilizationPercent(usage, capacity),
  };
}

/**
 * Sum one resource over the nodes that have a reading for it. Nodes without a reading
 * contribute neither usage nor capacity.
 */
function sumResource(
  nodes: readonly NodeMetric[],
  usageOf: (node: NodeMetric) => number | null,
  capacityOf: (node: NodeMetric) => number,
): ResourceAggregate {
  let totalUsage = 0;
  let totalCapacity = 0;
  for (const node of nodes) {
    const usage = usageOf(node);
    if (usage === null) continue;
    totalUsage += usage;
    totalCapacity += capacityOf(node);
  }
  return {
    totalUsage,
    totalCapacity,
    utilizationPercent: utilizationPercent(totalUsage, totalCapacity),
  };
}

/**
 * Cluster-wide CPU and memory totals plus a per-node breakdown.
 *
 * Nodes are processed in name order so totals do not depend on the order the API listed
 * them in. Readiness never excludes a node from the totals.
 */
export function aggregate(snapshot: ClusterSnapshot): ClusterAggregate {
  const nodes = [...snapshot.nodes].sort((a, b) =>
    a.nodeName < b.nodeName ? -1 : a.nodeName > b.nodeName ? 1 : 0,
  );

  const breakdown: NodeBreakdown[] = nodes.map((node) => ({
    nodeName: node.nodeName,
    ready: node.ready,
    hasMetrics: node.cpuUsageCores !== null && node.memoryUsageBytes !== null,
    cpu: resourceBreakdown(node.cpuUsageCores, node.cpuCapacityCores),
    memory: resourceBreakdown(node.memoryUsageBytes, node.memoryCapacityBytes),
  }));

  return {
    cpu: sumResource(
      nodes,
      (n) => n.cpuUsageCores,
      (n) => n.cpuCapacityCores,
    ),
    memory: sumResource(
      nodes,
      (n) => n.memoryUsageBytes,
      (n) => n.memoryCapacityBytes,
    ),
    nodeCount: nodes.length,
    readyNodeCount: nodes.filter((n) => n.ready).length,
    notReadyNodes: breakdown.filter((n) => !n.ready).map((n) => n.nodeName),
    nodesWithoutMetrics: breakdown.filter((n) => !n.hasMetrics).map((n) => n.nodeName),
    nodes: breakdown,
    collectedAt: snapshot.collectedAt,
    warnings: snapshot.warnings,
  };
}

/**
 * Nodes ordered by CPU utilization, busiest first. Nodes without a CPU reading come last.
 */
export function busiestNodes(aggregateResult: ClusterAggregate, limit: number): NodeBreakdown[] {
  return [...aggregateResult.nodes]
    .sort((a, b) => (b.cpu.utilizationPercent ?? -1) - (a.cpu.utilizationPercent ?? -1))
    .slice(0, Math.max(0, limit));
}
