import { aggregate, busiestNodes } from '../cluster/ClusterAggregator.js';
import type { ClusterAggregate, ClusterSnapshot } from '../cluster/types.js';
import { BYTES_PER_GIB } from '../kubernetes/utils/QuantityParser.js';
import { isClusterRelevant } from './RelevanceClassifier.js';
import type { FusedContext, FusionOptions, RetrievedDocument } from './types.js';

const PART_SEPARATOR = '\n\n';
const BUSIEST_NODE_COUNT = 3;
const DEFAULT_UNAVAILABLE_REASON = 'Cluster metrics unavailable';

function percent(value: number | null): string {
  return value === null ? 'n/a' : `${value.toFixed(2)}%`;
}

function gib(bytes: number): string {
  return (bytes / BYTES_PER_GIB).toFixed(2);
}

/**
 * Plain-text summary of the cluster for the prompt, one fact per line
 */
export function renderClusterBlock(summary: ClusterAggregate): string {
  const { cpu, memory } = summary;
  const notReady = summary.nodeCount - summary.readyNodeCount;
  const lines = [
    `Live cluster state (collected ${summary.collectedAt.toISOString()}):`,
    `Nodes: ${summary.nodeCount} (${notReady} not ready)`,
    `CPU: ${cpu.totalUsage.toFixed(3)} / ${cpu.totalCapacity.toFixed(3)} cores ` +
      `(${percent(cpu.utilizationPercent)})`,
    `Memory: ${gib(memory.totalUsage)} / ${gib(memory.totalCapacity)} GiB ` +
      `(${percent(memory.utilizationPercent)})`,
  ];

  const busiest = busiestNodes(summary, BUSIEST_NODE_COUNT);
  if (busiest.length > 0) {
    lines.push('Busiest nodes:');
    for (const node of busiest) {
      const state = node.ready ? '' : ' [NotReady]';
      lines.push(
        `- ${node.nodeName}${state}: CPU ${percent(node.cpu.utilizationPercent)}, ` +
          `memory ${percent(node.memory.utilizationPercent)}`,
      );
    }
  }

  if (summary.nodesWithoutMetrics.length > 0) {
    lines.push(`Nodes without metrics: ${summary.nodesWithoutMetrics.join(', ')}`);
  }

  return lines.join('\n');
}

/**
 * Longest prefix made of whole lines that fits in maxChars
 */
export function truncateAtLines(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  let result = '';
  for (const line of text.split('\n')) {
    const next = result ? `${result}\n${line}` : line;
    if (next.length > maxChars) break;
    result = next;
  }
  return result;
}

function renderParts(docs: readonly RetrievedDocument[], clusterContext: string | null): string {
  const parts = docs.map((doc) => doc.text);
  if (clusterContext) parts.push(clusterContext);
  return parts.join(PART_SEPARATOR);
}

/**
 * The context string handed to the prompt builder
 */
export function renderContext(fused: FusedContext): string {
  return renderParts(fused.retrievedDocs, fused.clusterContext);
}

/**
 * Merge retrieved documents with live cluster state under a character budget.
 *
 * Documents are ranked by score (stable for ties) and cut to topK. The cluster block is
 * added only for cluster-relevant queries and is truncated to its own budget first; then the
 * lowest-scored documents are dropped until the rendered context fits. Documents are never
 * cut mid-text.
 */
export function fuse(
  query: string,
  retrievedDocs: readonly RetrievedDocument[],
  clusterSnapshot: ClusterSnapshot | null | undefined,
  options: FusionOptions,
): FusedContext {
  const charBudget = Math.max(0, options.charBudget);
  const ranked = [...retrievedDocs]
    .sort((a, b) => b.score - a.score)
    .slice(0, Math.max(0, options.topK));

  let clusterContext: string | null = null;
  let clusterContextOmitted: string | null = null;

  if (isClusterRelevant(query)) {
    if (clusterSnapshot) {
      const block = truncateAtLines(
        renderClusterBlock(aggregate(clusterSnapshot)),
        Math.min(options.clusterCharBudget, charBudget),
      );
      if (block) {
        clusterContext = block;
      } else {
        clusterContextOmitted = 'Cluster context does not fit in the character budget';
      }
    } else {
      clusterContextOmitted = options.clusterUnavailableReason ?? DEFAULT_UNAVAILABLE_REASON;
    }
  }

  const kept = [...ranked];
  let rendered = renderParts(kept, clusterContext);
  while (rendered.length > charBudget && kept.length > 0) {
    kept.pop();
    rendered = renderParts(kept, clusterContext);
  }

  return {
    retrievedDocs: kept,
    clusterContext,
    totalCharBudget: charBudget,
    usedChars: rendered.length,
    droppedDocuments: ranked.length - kept.length,
    clusterContextOmitted,
  };
}
