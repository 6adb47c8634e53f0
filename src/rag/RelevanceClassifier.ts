/**
 * Words that mark a query as being about the cluster's live state.
 */
export const CLUSTER_KEYWORDS: readonly string[] = [
  'cpu',
  'memory',
  'cluster',
  'pod',
  'node',
  'utilization',
  'resource',
  'usage',
];

/**
 * Case-insensitive substring match against CLUSTER_KEYWORDS, so "pods" and "nodes" match too.
 */
export function isClusterRelevant(query: string): boolean {
  const normalized = query.toLowerCase();
  return CLUSTER_KEYWORDS.some((keyword) => normalized.includes(keyword));
}
