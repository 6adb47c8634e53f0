/**
 * Plain value records for cluster state. They are rebuilt for every request and never
 * shared between requests.
 */

export interface NodeMetric {
  readonly nodeName: string;
  /** null when the metrics source has no reading for this node */
  readonly cpuUsageCores: number | null;
  readonly cpuCapacityCores: number;
  readonly memoryUsageBytes: number | null;
  readonly memoryCapacityBytes: number;
  readonly ready: boolean;
}

export interface ClusterSnapshot {
  readonly nodes: readonly NodeMetric[];
  readonly collectedAt: Date;
  /** Partial-data conditions met while collecting */
  readonly warnings: readonly string[];
}

export const POD_PHASES = ['Pending', 'Running', 'Succeeded', 'Failed', 'Unknown'] as const;

export type PodPhase = (typeof POD_PHASES)[number];

export interface ContainerStatusSummary {
  readonly name: string;
  readonly ready: boolean;
  readonly restartCount: number;
  readonly state: 'running' | 'waiting' | 'terminated' | 'unknown';
  readonly reason: string | null;
}

export interface PodSummary {
  readonly name: string;
  readonly namespace: string;
  readonly status: PodPhase;
  /** null while the pod is unscheduled */
  readonly nodeName: string | null;
  readonly podIp: string | null;
  readonly containers: readonly ContainerStatusSummary[];
  readonly createdAt: string | null;
}

export interface ContainerMetricSummary {
  readonly name: string;
  readonly cpuCores: number;
  readonly memoryBytes: number;
}

export interface PodMetricSummary {
  readonly name: string;
  readonly namespace: string;
  readonly totalCpuCores: number;
  readonly totalMemoryBytes: number;
  readonly containers: readonly ContainerMetricSummary[];
}

export interface NamespaceSummary {
  readonly name: string;
  readonly status: string | null;
  readonly createdAt: string | null;
  readonly labels: Readonly<Record<string, string>>;
}

export interface ClusterInfo {
  readonly version: {
    readonly major: string;
    readonly minor: string;
    readonly gitVersion: string;
    readonly platform: string;
  };
  readonly nodeCount: number;
  readonly namespaceCount: number;
  readonly nodes: readonly {
    readonly name: string;
    readonly ready: 'True' | 'False' | 'Unknown';
    readonly roles: readonly string[];
  }[];
}

export interface ResourceAggregate {
  readonly totalUsage: number;
  readonly totalCapacity: number;
  readonly utilizationPercent: number;
}

export interface NodeResourceBreakdown {
  readonly usage: number | null;
  readonly capacity: number;
  readonly utilizationPercent: number | null;
}

export interface NodeBreakdown {
  readonly nodeName: string;
  readonly ready: boolean;
  readonly hasMetrics: boolean;
  readonly cpu: NodeResourceBreakdown;
  readonly memory: NodeResourceBreakdown;
}

export interface ClusterAggregate {
  /** Cores */
  readonly cpu: ResourceAggregate;
  /** Bytes */
  readonly memory: ResourceAggregate;
  readonly nodeCount: number;
  readonly readyNodeCount: number;
  readonly notReadyNodes: readonly string[];
  readonly nodesWithoutMetrics: readonly string[];
  readonly nodes: readonly NodeBreakdown[];
  readonly collectedAt: Date;
  readonly warnings: readonly string[];
}
