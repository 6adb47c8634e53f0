import { randomUUID } from 'node:crypto';
import { Logger } from 'winston';
import { UpstreamRequestError } from '../clients/http.js';
import type { ClusterSnapshot } from '../cluster/types.js';
import {
  GenerationFailureError,
  IngestionFailureError,
  RequestValidationError,
  RetrievalFailureError,
  isTimeoutError,
} from '../errors/AgentErrors.js';
import { errorMessage } from '../utils/Logger.js';
import { fuse, renderContext } from './ContextFusion.js';
import { buildRagPrompt } from './PromptBuilder.js';
import { isClusterRelevant } from './RelevanceClassifier.js';
import type { IngestResult, QueryResult, RetrievedDocument } from './types.js';

export interface Embedder {
  embed(text: string): Promise<number[]>;
}

export interface TextGenerator {
  generate(prompt: string): Promise<string>;
}

export interface VectorStore {
  search(vector: number[], limit: number): Promise<RetrievedDocument[]>;
  upsert(id: string, vector: number[], payload: Record<string, unknown>): Promise<void>;
}

export interface ClusterSnapshotSource {
  collectSnapshot(): Promise<ClusterSnapshot>;
}

export interface RagPipelineOptions {
  defaultTopK: number;
  contextCharBudget: number;
  clusterContextCharBudget: number;
}

export interface RagPipelineDeps {
  embedder: Embedder;
  generator: TextGenerator;
  vectorStore: VectorStore;
  /** null when the Kubernetes integration is disabled */
  cluster: ClusterSnapshotSource | null;
  options: RagPipelineOptions;
  logger?: Logger;
}

interface ClusterBranchResult {
  snapshot: ClusterSnapshot | null;
  reason?: string;
}

function timedOut(error: unknown): boolean {
  return error instanceof UpstreamRequestError ? error.timedOut : isTimeoutError(error);
}

/**
 * classify -> (embed -> search || collect snapshot) -> fuse -> generate
 */
export class RagPipeline {
  private readonly logger?: Logger;

  constructor(private readonly deps: RagPipelineDeps) {
    this.logger = deps.logger;
  }

  async query(prompt: string, topK?: number): Promise<QueryResult> {
    const query = prompt.trim();
    if (!query) {
      throw new RequestValidationError('prompt must not be empty');
    }
    const limit = topK ?? this.deps.options.defaultTopK;
    const relevant = isClusterRelevant(query);

    const [documents, cluster] = await Promise.all([
      this.retrieve(query, limit),
      relevant ? this.collectCluster() : Promise.resolve<ClusterBranchResult>({ snapshot: null }),
    ]);

    const fused = fuse(query, documents, cluster.snapshot, {
      topK: limit,
      charBudget: this.deps.options.contextCharBudget,
      clusterCharBudget: this.deps.options.clusterContextCharBudget,
      clusterUnavailableReason: cluster.reason,
    });
    this.logger?.debug(
      `Fused ${fused.retrievedDocs.length} documents (${fused.droppedDocuments} dropped), ` +
        `cluster context ${fused.clusterContext ? 'included' : 'absent'}, ` +
        `${fused.usedChars}/${fused.totalCharBudget} chars`,
    );

    const response = await this.generate(buildRagPrompt(query, renderContext(fused)));

    return {
      query,
      matches: [...fused.retrievedDocs],
      response,
      clusterContextIncluded: fused.clusterContext !== null,
      clusterContextOmitted: fused.clusterContextOmitted,
    };
  }

  async ingest(text: string, metadata: Record<string, string> = {}): Promise<IngestResult> {
    if (!text.trim()) {
      throw new RequestValidationError('text must not be empty');
    }

    let vector: number[];
    try {
      vector = await this.deps.embedder.embed(text);
    } catch (error) {
      throw new IngestionFailureError(`Embedding failed: ${errorMessage(error)}`, {
        timedOut: timedOut(error),
        cause: error,
      });
    }

    const id = randomUUID();
    try {
      await this.deps.vectorStore.upsert(id, vector, { ...metadata, text });
    } catch (error) {
      throw new IngestionFailureError(`Storing document failed: ${errorMessage(error)}`, {
        timedOut: timedOut(error),
        cause: error,
      });
    }

    this.logger?.info(`Ingested document ${id} (${text.length} chars)`);
    return { id, textLength: text.length };
  }

  private async retrieve(query: string, limit: number): Promise<RetrievedDocument[]> {
    let vector: number[];
    try {
      vector = await this.deps.embedder.embed(query);
    } catch (error) {
      throw new RetrievalFailureError(`Embedding the query failed: ${errorMessage(error)}`, {
        timedOut: timedOut(error),
        cause: error,
      });
    }

    try {
      return await this.deps.vectorStore.search(vector, limit);
    } catch (error) {
      throw new RetrievalFailureError(`Vector search failed: ${errorMessage(error)}`, {
        timedOut: timedOut(error),
        cause: error,
      });
    }
  }

  /**
   * Never rejects: a missing snapshot only removes the live context
   */
  private async collectCluster(): Promise<ClusterBranchResult> {
    if (!this.deps.cluster) {
      return { snapshot: null, reason: 'Kubernetes integration is disabled' };
    }
    try {
      return { snapshot: await this.deps.cluster.collectSnapshot() };
    } catch (error) {
      const reason = errorMessage(error);
      this.logger?.warn(`Continuing without cluster context: ${reason}`);
      return { snapshot: null, reason };
    }
  }

  private async generate(prompt: string): Promise<string> {
    try {
      return await this.deps.generator.generate(prompt);
    } catch (error) {
      throw new GenerationFailureError(`Generation failed: ${errorMessage(error)}`, {
        timedOut: timedOut(error),
        cause: error,
      });
    }
  }
}
