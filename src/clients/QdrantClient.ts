import { Logger } from 'winston';
import { z } from 'zod';
import type { RetrievedDocument } from '../rag/types.js';
import { errorMessage } from '../utils/Logger.js';
import { requestJson } from './http.js';

const CollectionsResponseSchema = z.object({
  result: z.object({
    collections: z.array(z.object({ name: z.string() })),
  }),
});

const OperationResponseSchema = z.object({ result: z.unknown() }).passthrough();

const SearchResponseSchema = z.object({
  result: z.array(
    z.object({
      id: z.union([z.string(), z.number()]),
      score: z.number(),
      payload: z.record(z.unknown()).nullish(),
    }),
  ),
});

export type SearchHit = z.infer<typeof SearchResponseSchema>['result'][number];

export type Distance = 'Cosine' | 'Dot' | 'Euclid';

export interface QdrantClientOptions {
  url: string;
  collection: string;
  searchTimeoutMs: number;
  writeTimeoutMs?: number;
  logger?: Logger;
}

function clampScore(score: number): number {
  if (!Number.isFinite(score)) return 0;
  return Math.min(1, Math.max(0, score));
}

/**
 * Map a search hit to a document: `text` from the payload, every other scalar payload
 * field as string metadata.
 */
export function toRetrievedDocument(hit: SearchHit): RetrievedDocument {
  const payload: Record<string, unknown> = hit.payload ?? {};
  const metadata: Record<string, string> = {};
  for (const [key, value] of Object.entries(payload)) {
    if (key === 'text') continue;
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      metadata[key] = String(value);
    }
  }
  const text = payload.text;
  return {
    id: String(hit.id),
    text: typeof text === 'string' ? text : '',
    score: clampScore(hit.score),
    metadata,
  };
}

/**
 * Minimal Qdrant REST client bound to one collection
 */
export class QdrantClient {
  private readonly baseUrl: string;
  private readonly logger?: Logger;

  constructor(private readonly options: QdrantClientOptions) {
    this.baseUrl = options.url.replace(/\/$/, '');
    this.logger = options.logger;
  }

  private get collectionUrl(): string {
    return `${this.baseUrl}/collections/${encodeURIComponent(this.options.collection)}`;
  }

  private get writeTimeoutMs(): number {
    return this.options.writeTimeoutMs ?? this.options.searchTimeoutMs;
  }

  async ping(): Promise<boolean> {
    try {
      await this.listCollections();
      return true;
    } catch (error) {
      this.logger?.debug(`Qdrant not reachable: ${errorMessage(error)}`);
      return false;
    }
  }

  async listCollections(): Promise<string[]> {
    const payload = await requestJson(`${this.baseUrl}/collections`, {
      timeoutMs: this.options.searchTimeoutMs,
      schema: CollectionsResponseSchema,
    });
    return payload.result.collections.map((c) => c.name);
  }

  async collectionExists(): Promise<boolean> {
    return (await this.listCollections()).includes(this.options.collection);
  }

  async createCollection(size: number, distance: Distance = 'Cosine'): Promise<void> {
    await requestJson(this.collectionUrl, {
      method: 'PUT',
      body: { vectors: { size, distance } },
      timeoutMs: this.writeTimeoutMs,
      schema: OperationResponseSchema,
    });
    this.logger?.info(`Created collection ${this.options.collection} (${size}, ${distance})`);
  }

  async upsert(id: string, vector: number[], payload: Record<string, unknown>): Promise<void> {
    await requestJson(`${this.collectionUrl}/points?wait=true`, {
      method: 'PUT',
      body: { points: [{ id, vector, payload }] },
      timeoutMs: this.writeTimeoutMs,
      schema: OperationResponseSchema,
    });
  }

  async search(vector: number[], limit: number): Promise<RetrievedDocument[]> {
    const payload = await requestJson(`${this.collectionUrl}/points/search`, {
      method: 'POST',
      body: { vector, limit, with_payload: true },
      timeoutMs: this.options.searchTimeoutMs,
      schema: SearchResponseSchema,
    });
    return payload.result.map(toRetrievedDocument);
  }
}
