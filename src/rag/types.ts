export interface RetrievedDocument {
  readonly id: string;
  readonly text: string;
  /** Similarity in [0, 1], higher is closer */
  readonly score: number;
  readonly metadata: Readonly<Record<string, string>>;
}

export interface FusedContext {
  /** At most topK documents, best first */
  readonly retrievedDocs: readonly RetrievedDocument[];
  readonly clusterContext: string | null;
  readonly totalCharBudget: number;
  /** Length of the rendered context */
  readonly usedChars: number;
  /** Documents removed to stay within the budget */
  readonly droppedDocuments: number;
  /** Why live cluster context is missing although the query asked for it */
  readonly clusterContextOmitted: string | null;
}

export interface FusionOptions {
  topK: number;
  charBudget: number;
  clusterCharBudget: number;
  /** Reason to report when the query is cluster-relevant but no snapshot was collected */
  clusterUnavailableReason?: string;
}

export interface QueryResult {
  query: string;
  matches: RetrievedDocument[];
  response: string;
  clusterContextIncluded: boolean;
  clusterContextOmitted: string | null;
}

export interface IngestResult {
  id: string;
  textLength: number;
}
