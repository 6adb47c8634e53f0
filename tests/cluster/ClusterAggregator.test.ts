import { aggregate, busiestNodes, utilizationPercent } from '../../src/cluster/ClusterAggregator';
import type { ClusterSnapshot, NodeMetric } from '../../src/cluster/types';

const GIB = 1024 ** 3;

function node(
  nodeName: string,
  cpu: [number | null, number],
  memory: [number | null, number] = [GIB, 4 * GIB],
  ready = true,
): NodeMetric {
  return {
    nodeName,
    cpuUsageCores: cpu[0],
    cpuCapacityCores: cpu[1],
    memoryUsageBytes: memory[0],
    memoryCapacityBytes: memory[1],
    ready,
  };
}

function snapshot(nodes: NodeMetric[], warnings: string[] = []): ClusterSnapshot {
  return { nodes, collectedAt: new Date('2024-05-01T10:00:00Z'), warnings };
}

describe('ClusterAggregator', () => {
  describe('utilizationPercent', () => {
    it('should return 0 for zero capacity', () => {
      expect(utilizationPercent(5, 0)).toBe(0);
    });

    it('should compute a percentage', () => {
      expect(utilizationPercent(1, 4)).toBe(25);
    });
  });

  describe('aggregate', () => {
    it('should report 50% CPU for {1/2, 3/6} cores', () => {
      const result = aggregate(snapshot([node('a', [1, 2]), node('b', [3, 6])]));

      expect(result.cpu).toEqual({ totalUsage: 4, totalCapacity: 8, utilizationPercent: 50 });
    });

    it('should report zero utilization for an empty cluster', () => {
      const result = aggregate(snapshot([]));

      expect(result.cpu).toEqual({ totalUsage: 0, totalCapacity: 0, utilizationPercent: 0 });
      expect(result.memory.utilizationPercent).toBe(0);
      expect(result.nodeCount).toBe(0);
    });

    it('should report zero utilization when capacity is zero', () => {
      const result = aggregate(snapshot([node('a', [0.5, 0], [GIB, 0])]));

      expect(result.cpu.utilizationPercent).toBe(0);
      expect(result.memory.utilizationPercent).toBe(0);
    });

    it('should not depend on node order', () => {
      const nodes = [
        node('c', [0.1, 2], [3 * GIB, 8 * GIB]),
        node('a', [0.7, 4], [GIB, 4 * GIB]),
        node('b', [0.2, 1], [2 * GIB, 2 * GIB]),
      ];
      const forward = aggregate(snapshot(nodes));
      const reversed = aggregate(snapshot([...nodes].reverse()));

      expect(reversed.cpu).toEqual(forward.cpu);
      expect(reversed.memory).toEqual(forward.memory);
      expect(forward.nodes.map((n) => n.nodeName)).toEqual(['a', 'b', 'c']);
      expect(forward.memory.totalUsage).toBe(6 * GIB);
    });

    it('should exclude nodes without a reading from both usage and capacity', () => {
      const result = aggregate(snapshot([node('a', [1, 4]), node('b', [null, 4], [null, GIB])]));

      expect(result.cpu).toEqual({ totalUsage: 1, totalCapacity: 4, utilizationPercent: 25 });
      expect(result.nodesWithoutMetrics).toEqual(['b']);
      expect(result.nodes[1]).toEqual({
        nodeName: 'b',
        ready: true,
        hasMetrics: false,
        cpu: { usage: null, capacity: 4, utilizationPercent: null },
        memory: { usage: null, capacity: GIB, utilizationPercent: null },
      });
    });

    it('should count not-ready nodes without excluding them', () => {
      const result = aggregate(
        snapshot([node('a', [1, 2]), node('b', [1, 2], undefined, false)], ['partial']),
      );

      expect(result.nodeCount).toBe(2);
      expect(result.readyNodeCount).toBe(1);
      expect(result.notReadyNodes).toEqual(['b']);
      expect(result.cpu.totalUsage).toBe(2);
      expect(result.warnings).toEqual(['partial']);
      expect(result.collectedAt.toISOString()).toBe('2024-05-01T10:00:00.000Z');
    });
  });

  describe('busiestNodes', () => {
    it('should order by CPU utilization and put nodes without metrics last', () => {
      const result = aggregate(
        snapshot([node('idle', [0.1, 4]), node('dark', [null, 4]), node('hot', [3, 4])]),
      );

      expect(busiestNodes(result, 3).map((n) => n.nodeName)).toEqual(['hot', 'idle', 'dark']);
      expect(busiestNodes(result, 1).map((n) => n.nodeName)).toEqual(['hot']);
      expect(busiestNodes(result, 0)).toEqual([]);
    });
  });
});
