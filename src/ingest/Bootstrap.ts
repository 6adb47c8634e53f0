import { Logger } from 'winston';
import { z } from 'zod';
import { errorMessage } from '../utils/Logger.js';
import { sleep } from '../utils/Timeout.js';
import rawSampleDocuments from './sample-documents.json';

const SampleDocumentsSchema = z.array(
  z.object({
    text: z.string().min(1),
    metadata: z.record(z.string()).default({}),
  }),
);

export type SampleDocument = z.infer<typeof SampleDocumentsSchema>[number];

export const SAMPLE_DOCUMENTS: readonly SampleDocument[] =
  SampleDocumentsSchema.parse(rawSampleDocuments);

export interface BootstrapDeps {
  vectorStore: {
    ping(): Promise<boolean>;
    collectionExists(): Promise<boolean>;
    createCollection(size: number, distance?: 'Cosine'): Promise<void>;
  };
  llm: { ping(): Promise<boolean> };
  ingest(text: string, metadata: Record<string, string>): Promise<unknown>;
  options: {
    vectorSize: number;
    seedSampleDocuments: boolean;
    maxRetries: number;
    retryDelayMs: number;
  };
  documents?: readonly SampleDocument[];
  logger?: Logger;
  /** Injected in tests */
  delay?: (ms: number) => Promise<void>;
}

export interface BootstrapResult {
  vectorStoreReady: boolean;
  llmReady: boolean;
  collectionCreated: boolean;
  seededDocuments: number;
}

/**
 * Poll `isReady` until it answers true, at most `maxRetries` times
 */
export async function waitForService(
  name: string,
  isReady: () => Promise<boolean>,
  maxRetries: number,
  retryDelayMs: number,
  logger?: Logger,
  delay: (ms: number) => Promise<void> = sleep,
): Promise<boolean> {
  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    if (await isReady()) {
      logger?.info(`${name} is ready`);
      return true;
    }
    if (attempt < maxRetries) {
      logger?.info(`Waiting for ${name}... (${attempt}/${maxRetries})`);
      await delay(retryDelayMs);
    }
  }
  logger?.warn(`${name} not ready after ${maxRetries} attempts`);
  return false;
}

/**
 * Startup initialization. Creates the collection when missing and seeds it once.
 * Never throws; every failure is logged and reflected in the result.
 */
export async function bootstrap(deps: BootstrapDeps): Promise<BootstrapResult> {
  const { options, logger } = deps;
  const delay = deps.delay ?? sleep;
  const result: BootstrapResult = {
    vectorStoreReady: false,
    llmReady: false,
    collectionCreated: false,
    seededDocuments: 0,
  };

  try {
    result.vectorStoreReady = await waitForService(
      'Qdrant',
      () => deps.vectorStore.ping(),
      options.maxRetries,
      options.retryDelayMs,
      logger,
      delay,
    );
    if (!result.vectorStoreReady) {
      logger?.warn('Skipping initialization: vector store unavailable');
      return result;
    }

    result.llmReady = await waitForService(
      'Ollama',
      () => deps.llm.ping(),
      options.maxRetries,
      options.retryDelayMs,
      logger,
      delay,
    );
    if (!result.llmReady) {
      logger?.warn('Skipping initialization: LLM server unavailable');
      return result;
    }

    if (await deps.vectorStore.collectionExists()) {
      logger?.info('Collection already exists');
      return result;
    }

    await deps.vectorStore.createCollection(options.vectorSize, 'Cosine');
    result.collectionCreated = true;

    if (!options.seedSampleDocuments) {
      return result;
    }

    const documents = deps.documents ?? SAMPLE_DOCUMENTS;
    for (const [index, doc] of documents.entries()) {
      try {
        await deps.ingest(doc.text, doc.metadata);
        result.seededDocuments++;
      } catch (error) {
        logger?.warn(`Failed to ingest sample document ${index + 1}: ${errorMessage(error)}`);
      }
    }
    logger?.info(`Ingested ${result.seededDocuments}/${documents.length} sample documents`);
  } catch (error) {
    logger?.error(`Startup initialization failed: ${errorMessage(error)}`);
  }

  return result;
}
