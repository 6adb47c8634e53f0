#!/usr/bin/env node
/**
 * Cluster RAG agent
 * Main entry point
 *
 * Modes (SERVER_MODE env var):
 * - http (default): REST API for ingestion, RAG queries and cluster metrics
 * - mcp: Model Context Protocol server over stdio exposing the cluster tools
 */

import { Logger } from 'winston';
import { ZodError } from 'zod';
import { OllamaClient } from './clients/OllamaClient.js';
import { QdrantClient } from './clients/QdrantClient.js';
import { ClusterService } from './cluster/ClusterService.js';
import { AgentConfig, loadConfig } from './config/AgentConfig.js';
import { bootstrap } from './ingest/Bootstrap.js';
import { KubernetesClient } from './kubernetes/KubernetesClient.js';
import { ClusterToolsPlugin } from './plugins/ClusterToolsPlugin.js';
import { RagPipeline } from './rag/RagPipeline.js';
import { buildHttpServer } from './server/HttpServer.js';
import { MCPServer } from './server/MCPServer.js';
import { createLogger, errorMessage } from './utils/Logger.js';
import { VERSION } from './version.js';

export { VERSION } from './version.js';

export interface AgentComponents {
  ollama: OllamaClient;
  qdrant: QdrantClient;
  /** null when the Kubernetes integration is disabled or failed to initialize */
  cluster: ClusterService | null;
  pipeline: RagPipeline;
}

function createClusterService(config: AgentConfig, logger: Logger): ClusterService | null {
  const k8s = config.kubernetes;
  if (!k8s.enabled) {
    logger.info('Kubernetes integration disabled');
    return null;
  }
  try {
    const client = new KubernetesClient({
      kubeConfigPath: k8s.kubeConfigPath,
      context: k8s.context,
      inCluster: k8s.inCluster,
      bearerToken: k8s.bearerToken,
      apiServerUrl: k8s.apiServerUrl,
      skipTlsVerify: k8s.skipTlsVerify,
      logger,
    });
    logger.info(
      `Kubernetes integration enabled (auth: ${client.getAuthMethod()}, context: ${client.getCurrentContext()})`,
    );
    return new ClusterService(client, { metricsTimeoutMs: k8s.metricsTimeoutMs, logger });
  } catch (error) {
    logger.warn(`Kubernetes integration unavailable: ${errorMessage(error)}`);
    return null;
  }
}

/**
 * Wire the clients, the cluster service and the pipeline from configuration
 */
export function createComponents(config: AgentConfig, logger: Logger): AgentComponents {
  const ollama = new OllamaClient({ ...config.ollama, logger });
  const qdrant = new QdrantClient({
    url: config.qdrant.url,
    collection: config.qdrant.collection,
    searchTimeoutMs: config.qdrant.searchTimeoutMs,
    logger,
  });
  const cluster = createClusterService(config, logger);
  const pipeline = new RagPipeline({
    embedder: ollama,
    generator: ollama,
    vectorStore: qdrant,
    cluster,
    options: config.rag,
    logger,
  });
  return { ollama, qdrant, cluster, pipeline };
}

async function startHttpMode(
  config: AgentConfig,
  logger: Logger,
  components: AgentComponents,
): Promise<void> {
  const app = buildHttpServer({
    pipeline: components.pipeline,
    cluster: components.cluster,
    vectorStore: components.qdrant,
    logger,
  });

  await app.listen({ port: config.server.port, host: config.server.host });
  logger.info(`HTTP server listening on ${config.server.host}:${config.server.port}`);

  bootstrap({
    vectorStore: components.qdrant,
    llm: components.ollama,
    ingest: (text, metadata) => components.pipeline.ingest(text, metadata),
    options: { vectorSize: config.qdrant.vectorSize, ...config.bootstrap },
    logger,
  })
    .then((result) => logger.info('Startup initialization finished', result))
    .catch((error: unknown) =>
      logger.error(`Startup initialization failed: ${errorMessage(error)}`),
    );

  let closing = false;
  const shutdown = (signal: string) => {
    if (closing) return;
    closing = true;
    logger.info(`Received ${signal}, closing HTTP server...`);
    app
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error(`Failed to close HTTP server: ${errorMessage(error)}`);
        process.exit(1);
      });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

async function startMcpMode(
  config: AgentConfig,
  logger: Logger,
  components: AgentComponents,
): Promise<void> {
  const server = new MCPServer({ logger, name: 'cluster-rag-agent', version: VERSION });
  await server.loadPlugin(
    new ClusterToolsPlugin(components.cluster, { timeoutMs: config.server.toolTimeoutMs }),
  );
  await server.start();
  logger.info('MCP server is running on stdio. Waiting for connections...');
}

export async function main(env: NodeJS.ProcessEnv = process.env): Promise<void> {
  let config: AgentConfig;
  try {
    config = loadConfig(env);
  } catch (error) {
    const details =
      error instanceof ZodError
        ? error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
        : errorMessage(error);
    console.error(`Invalid configuration: ${details}`);
    process.exit(1);
  }

  const logger = createLogger({
    level: config.logging.level,
    enableFile: config.logging.enableFile,
    filePath: config.logging.file,
  });
  logger.info(`Cluster RAG agent ${VERSION} starting in ${config.server.mode} mode`);

  try {
    const components = createComponents(config, logger);
    if (config.server.mode === 'mcp') {
      await startMcpMode(config, logger, components);
    } else {
      await startHttpMode(config, logger, components);
    }
  } catch (error) {
    logger.error(`Failed to start: ${errorMessage(error)}`);
    process.exit(1);
  }
}
