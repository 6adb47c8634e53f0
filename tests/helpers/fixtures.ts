import type { ClusterSnapshot } from '../../src/cluster/types';
import type { RetrievedDocument } from '../../src/rag/types';

export const GIB = 1024 ** 3;

/**
 * Two nodes at 50% CPU and memory overall; node-b is not ready
 */
export function twoNodeSnapshot(): ClusterSnapshot {
  return {
    nodes: [
      {
        nodeName: 'a',
        cpuUsageCores: 1,
        cpuCapacityCores: 2,
        memoryUsageBytes: GIB,
        memoryCapacityBytes: 4 * GIB,
        ready: true,
      },
      {
        nodeName: 'b',
        cpuUsageCores: 3,
        cpuCapacityCores: 6,
        memoryUsageBytes: 3 * GIB,
        memoryCapacityBytes: 4 * GIB,
        ready: false,
      },
    ],
    collectedAt: new Date('2024-05-01T10:00:00Z'),
    warnings: [],
  };
}

export const TWO_NODE_BLOCK = [
  'Live cluster state (collected 2024-05-01T10:00:00.000Z):',
  'Nodes: 2 (1 not ready)',
  'CPU: 4.000 / 8.000 cores (50.00%)',
  'Memory: 4.00 / 8.00 GiB (50.00%)',
  'Busiest nodes:',
  '- a: CPU 50.00%, memory 25.00%',
  '- b [NotReady]: CPU 50.00%, memory 75.00%',
].join('\n');

export function doc(id: string, score: number, text: string = `document ${id}`): RetrievedDocument {
  return { id, text, score, metadata: {} };
}
