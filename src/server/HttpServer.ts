import { randomUUID } from 'node:crypto';
import Fastify, { FastifyInstance, FastifyReply } from 'fastify';
import { Logger } from 'winston';
import { z, ZodError } from 'zod';
import type { ClusterService } from '../cluster/ClusterService.js';
import { AgentError, MetricsUnavailableError } from '../errors/AgentErrors.js';
import type { RagPipeline } from '../rag/RagPipeline.js';
import {
  presentClusterCpu,
  presentClusterInfo,
  presentClusterMemory,
  presentPods,
  presentQueryResult,
} from './presenters.js';

const QueryBodySchema = z.object({
  prompt: z.string().trim().min(1, 'prompt must not be empty'),
  top_k: z.number().int().min(1).max(50).optional(),
});

const IngestBodySchema = z.object({
  text: z.string().min(1, 'text must not be empty'),
  metadata: z.record(z.string()).optional(),
});

const PodsQuerySchema = z.object({
  namespace: z.string().min(1).optional(),
  label_selector: z.string().min(1).optional(),
});

export interface HttpServerDeps {
  pipeline: Pick<RagPipeline, 'query' | 'ingest'>;
  /** null when the Kubernetes integration is disabled */
  cluster: Pick<
    ClusterService,
    'getClusterCpu' | 'getClusterMemory' | 'listPods' | 'getClusterInfo' | 'isReachable'
  > | null;
  vectorStore: { ping(): Promise<boolean> };
  logger: Logger;
}

function firstIssue(error: ZodError): string {
  const issue = error.issues[0];
  if (!issue) return 'Invalid request';
  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}

function kubernetesDisabled(reply: FastifyReply): FastifyReply {
  return reply
    .code(503)
    .send({ error: 'K8S_DISABLED', message: 'Kubernetes integration is disabled' });
}

/**
 * Fastify app with the RAG and cluster routes. Not listening; callers use `listen` or `inject`.
 */
export function buildHttpServer(deps: HttpServerDeps): FastifyInstance {
  const { pipeline, cluster, vectorStore, logger } = deps;

  const app = Fastify({
    logger: false,
    requestIdHeader: 'x-request-id',
    genReqId: () => randomUUID(),
  });

  // Request ID + basic logging hooks
  app.addHook('onRequest', async (req, reply) => {
    reply.header('x-request-id', req.id);
    logger.debug('request start', { reqId: req.id, method: req.method, url: req.url });
  });

  app.addHook('onResponse', async (req, reply) => {
    logger.info('request end', {
      reqId: req.id,
      method: req.method,
      url: req.url,
      status: reply.statusCode,
      durationMs: Math.round(reply.elapsedTime),
    });
  });

  app.setErrorHandler((error, req, reply) => {
    if (error instanceof AgentError) {
      if (error.statusCode >= 500) {
        logger.error(`${req.method} ${req.url} failed: ${error.message}`, { reqId: req.id });
      }
      return reply.code(error.statusCode).send({ error: error.code, message: error.message });
    }
    if (error instanceof ZodError) {
      return reply.code(400).send({ error: 'VALIDATION_ERROR', message: firstIssue(error) });
    }
    // Fastify's own 4xx errors, e.g. a malformed JSON body
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      return reply.code(error.statusCode).send({ error: 'BAD_REQUEST', message: error.message });
    }
    logger.error(`${req.method} ${req.url} failed: ${error.message}`, {
      reqId: req.id,
      stack: error.stack,
    });
    return reply.code(500).send({ error: 'INTERNAL_ERROR', message: 'Internal server error' });
  });

  app.get('/health', async () => ({
    status: 'ok',
    k8s_enabled: cluster !== null,
    k8s_reachable: cluster ? await cluster.isReachable() : false,
  }));

  app.get('/ready', async (_req, reply) => {
    if (await vectorStore.ping()) {
      return { ready: true };
    }
    return reply.code(503).send({ ready: false, error: 'Vector store is not reachable' });
  });

  app.post('/ingest', async (req) => {
    const body = IngestBodySchema.parse(req.body);
    const result = await pipeline.ingest(body.text, body.metadata ?? {});
    return { message: 'Document ingested', id: result.id, text_length: result.textLength };
  });

  app.post('/query', async (req) => {
    const body = QueryBodySchema.parse(req.body);
    const result = await pipeline.query(body.prompt, body.top_k);
    return presentQueryResult(result);
  });

  app.get('/k8s/cluster/cpu', async (_req, reply) => {
    if (!cluster) return kubernetesDisabled(reply);
    try {
      return presentClusterCpu(await cluster.getClusterCpu());
    } catch (error) {
      if (!(error instanceof MetricsUnavailableError)) throw error;
      return { metrics_available: false, error: error.message, cluster_cpu: null, nodes: [] };
    }
  });

  app.get('/k8s/cluster/memory', async (_req, reply) => {
    if (!cluster) return kubernetesDisabled(reply);
    try {
      return presentClusterMemory(await cluster.getClusterMemory());
    } catch (error) {
      if (!(error instanceof MetricsUnavailableError)) throw error;
      return { metrics_available: false, error: error.message, cluster_memory: null, nodes: [] };
    }
  });

  app.get('/k8s/pods', async (req, reply) => {
    if (!cluster) return kubernetesDisabled(reply);
    const query = PodsQuerySchema.parse(req.query);
    try {
      return presentPods(await cluster.listPods(query.namespace, query.label_selector));
    } catch (error) {
      if (!(error instanceof MetricsUnavailableError)) throw error;
      return { available: false, error: error.message, count: 0, pods: [] };
    }
  });

  app.get('/k8s/cluster/info', async (_req, reply) => {
    if (!cluster) return kubernetesDisabled(reply);
    try {
      return { ...presentClusterInfo(await cluster.getClusterInfo()), k8s_enabled: true };
    } catch (error) {
      if (!(error instanceof MetricsUnavailableError)) throw error;
      return { available: false, error: error.message, k8s_enabled: true };
    }
  });

  return app;
}
