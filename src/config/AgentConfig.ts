import { z } from 'zod';

const booleanFromEnv = (defaultValue: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((value) => (value === undefined ? defaultValue : value === 'true' || value === '1'));

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const positiveInt = (defaultValue: number) => z.coerce.number().int().positive().default(defaultValue);

/**
 * Environment variables understood by the agent, with their defaults.
 */
export const AgentEnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  HOST: z.string().default('0.0.0.0'),
  SERVER_MODE: z.enum(['http', 'mcp']).default('http'),
  MCP_TOOL_TIMEOUT_MS: positiveInt(30_000),

  OLLAMA_URL: z.string().url().default('http://ollama:11434/api/generate'),
  OLLAMA_EMBED_URL: z.string().url().default('http://ollama:11434/api/embeddings'),
  OLLAMA_BASE_URL: z.string().url().default('http://ollama:11434'),
  EMBED_MODEL: z.string().min(1).default('all-minilm'),
  GENERATE_MODEL: z.string().min(1).default('tinyllama'),

  QDRANT_URL: z.string().url().default('http://qdrant:6333'),
  COLLECTION_NAME: z.string().min(1).default('rag_memory'),
  VECTOR_SIZE: positiveInt(384),

  DEFAULT_TOP_K: positiveInt(3),
  CONTEXT_CHAR_BUDGET: positiveInt(4000),
  CLUSTER_CONTEXT_CHAR_BUDGET: positiveInt(800),

  EMBED_TIMEOUT_MS: positiveInt(30_000),
  SEARCH_TIMEOUT_MS: positiveInt(10_000),
  METRICS_TIMEOUT_MS: positiveInt(5_000),
  GENERATE_TIMEOUT_MS: positiveInt(120_000),

  SEED_SAMPLE_DOCUMENTS: booleanFromEnv(true),
  STARTUP_MAX_RETRIES: positiveInt(30),
  STARTUP_RETRY_DELAY_MS: positiveInt(2_000),

  K8S_ENABLED: booleanFromEnv(true),
  K8S_IN_CLUSTER: booleanFromEnv(false),
  KUBECONFIG: optionalString,
  K8S_CONTEXT: optionalString,
  K8S_API_SERVER: optionalString,
  K8S_BEARER_TOKEN: optionalString,
  K8S_SKIP_TLS_VERIFY: booleanFromEnv(false),

  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'verbose', 'debug', 'silly']).default('info'),
  LOG_ENABLE_FILE: booleanFromEnv(false),
  LOG_FILE: z.string().default('cluster-rag-agent.log'),
});

export type AgentEnv = z.infer<typeof AgentEnvSchema>;

export interface AgentConfig {
  server: {
    port: number;
    host: string;
    mode: 'http' | 'mcp';
    toolTimeoutMs: number;
  };
  ollama: {
    generateUrl: string;
    embedUrl: string;
    baseUrl: string;
    embedModel: string;
    generateModel: string;
    embedTimeoutMs: number;
    generateTimeoutMs: number;
  };
  qdrant: {
    url: string;
    collection: string;
    vectorSize: number;
    searchTimeoutMs: number;
  };
  rag: {
    defaultTopK: number;
    contextCharBudget: number;
    clusterContextCharBudget: number;
  };
  bootstrap: {
    seedSampleDocuments: boolean;
    maxRetries: number;
    retryDelayMs: number;
  };
  kubernetes: {
    enabled: boolean;
    inCluster: boolean;
    kubeConfigPath?: string;
    context?: string;
    apiServerUrl?: string;
    bearerToken?: string;
    skipTlsVerify: boolean;
    metricsTimeoutMs: number;
  };
  logging: {
    level: AgentEnv['LOG_LEVEL'];
    enableFile: boolean;
    file: string;
  };
}

/**
 * Build the agent configuration from environment variables.
 * Throws a ZodError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AgentConfig {
  const parsed = AgentEnvSchema.parse(env);

  return {
    server: {
      port: parsed.PORT,
      host: parsed.HOST,
      mode: parsed.SERVER_MODE,
      toolTimeoutMs: parsed.MCP_TOOL_TIMEOUT_MS,
    },
    ollama: {
      generateUrl: parsed.OLLAMA_URL,
      embedUrl: parsed.OLLAMA_EMBED_URL,
      baseUrl: parsed.OLLAMA_BASE_URL.replace(/\/$/, ''),
      embedModel: parsed.EMBED_MODEL,
      generateModel: parsed.GENERATE_MODEL,
      embedTimeoutMs: parsed.EMBED_TIMEOUT_MS,
      generateTimeoutMs: parsed.GENERATE_TIMEOUT_MS,
    },
    qdrant: {
      url: parsed.QDRANT_URL.replace(/\/$/, ''),
      collection: parsed.COLLECTION_NAME,
      vectorSize: parsed.VECTOR_SIZE,
      searchTimeoutMs: parsed.SEARCH_TIMEOUT_MS,
    },
    rag: {
      defaultTopK: parsed.DEFAULT_TOP_K,
      contextCharBudget: parsed.CONTEXT_CHAR_BUDGET,
      clusterContextCharBudget: parsed.CLUSTER_CONTEXT_CHAR_BUDGET,
    },
    bootstrap: {
      seedSampleDocuments: parsed.SEED_SAMPLE_DOCUMENTS,
      maxRetries: parsed.STARTUP_MAX_RETRIES,
      retryDelayMs: parsed.STARTUP_RETRY_DELAY_MS,
    },
    kubernetes: {
      enabled: parsed.K8S_ENABLED,
      inCluster: parsed.K8S_IN_CLUSTER,
      kubeConfigPath: parsed.KUBECONFIG,
      context: parsed.K8S_CONTEXT,
      apiServerUrl: parsed.K8S_API_SERVER,
      bearerToken: parsed.K8S_BEARER_TOKEN,
      skipTlsVerify: parsed.K8S_SKIP_TLS_VERIFY,
      metricsTimeoutMs: parsed.METRICS_TIMEOUT_MS,
    },
    logging: {
      level: parsed.LOG_LEVEL,
      enableFile: parsed.LOG_ENABLE_FILE,
      file: parsed.LOG_FILE,
    },
  };
}
