import { Logger } from 'winston';
import { z } from 'zod';
import { errorMessage } from '../utils/Logger.js';
import { UpstreamRequestError, requestJson } from './http.js';

// /api/embeddings answers with `embedding`, /api/embed with `embeddings`
const EmbeddingResponseSchema = z.union([
  z.object({ embedding: z.array(z.number()) }),
  z.object({ embeddings: z.union([z.array(z.number()), z.array(z.array(z.number()))]) }),
]);

const GenerateResponseSchema = z.object({ response: z.string() }).passthrough();

const TagsResponseSchema = z.object({ models: z.array(z.unknown()).optional() }).passthrough();

export interface OllamaClientOptions {
  /** Full URL of the generate endpoint */
  generateUrl: string;
  /** Full URL of the embeddings endpoint */
  embedUrl: string;
  /** Server root, used for health checks */
  baseUrl: string;
  embedModel: string;
  generateModel: string;
  embedTimeoutMs: number;
  generateTimeoutMs: number;
  pingTimeoutMs?: number;
  logger?: Logger;
}

/**
 * Embedding and non-streaming generation against an Ollama server
 */
export class OllamaClient {
  private readonly logger?: Logger;

  constructor(private readonly options: OllamaClientOptions) {
    this.logger = options.logger;
  }

  async embed(text: string): Promise<number[]> {
    const payload = await requestJson(this.options.embedUrl, {
      method: 'POST',
      body: { model: this.options.embedModel, prompt: text },
      timeoutMs: this.options.embedTimeoutMs,
      schema: EmbeddingResponseSchema,
    });

    let vector: number[];
    if ('embedding' in payload) {
      vector = payload.embedding;
    } else {
      const values: (number | number[])[] = payload.embeddings;
      const first = values[0];
      vector = Array.isArray(first) ? first : values.filter(isNumber);
    }

    if (vector.length === 0) {
      throw new UpstreamRequestError(
        `Embedding model ${this.options.embedModel} returned an empty vector`,
      );
    }
    this.logger?.debug(`Embedded ${text.length} chars into ${vector.length} dimensions`);
    return vector;
  }

  async generate(prompt: string): Promise<string> {
    const payload = await requestJson(this.options.generateUrl, {
      method: 'POST',
      body: { model: this.options.generateModel, prompt, stream: false },
      timeoutMs: this.options.generateTimeoutMs,
      schema: GenerateResponseSchema,
    });
    return payload.response;
  }

  /**
   * True when the server answers its model listing
   */
  async ping(): Promise<boolean> {
    try {
      await requestJson(`${this.options.baseUrl}/api/tags`, {
        timeoutMs: this.options.pingTimeoutMs ?? 5_000,
        schema: TagsResponseSchema,
      });
      return true;
    } catch (error) {
      this.logger?.debug(`Ollama not reachable: ${errorMessage(error)}`);
      return false;
    }
  }
}

function isNumber(value: number | number[]): value is number {
  return typeof value === 'number';
}
