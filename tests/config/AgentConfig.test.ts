import { ZodError } from 'zod';
import { loadConfig } from '../../src/config/AgentConfig';

describe('loadConfig', () => {
  it('should apply defaults', () => {
    const config = loadConfig({});

    expect(config.server).toEqual({
      port: 8000,
      host: '0.0.0.0',
      mode: 'http',
      toolTimeoutMs: 30000,
    });
    expect(config.qdrant).toEqual({
      url: 'http://qdrant:6333',
      collection: 'rag_memory',
      vectorSize: 384,
      searchTimeoutMs: 10000,
    });
    expect(config.rag).toEqual({
      defaultTopK: 3,
      contextCharBudget: 4000,
      clusterContextCharBudget: 800,
    });
    expect(config.kubernetes).toEqual({
      enabled: true,
      inCluster: false,
      kubeConfigPath: undefined,
      context: undefined,
      apiServerUrl: undefined,
      bearerToken: undefined,
      skipTlsVerify: false,
      metricsTimeoutMs: 5000,
    });
    expect(config.bootstrap.seedSampleDocuments).toBe(true);
  });

  it('should coerce numbers and booleans', () => {
    const config = loadConfig({
      PORT: '9090',
      DEFAULT_TOP_K: '5',
      K8S_ENABLED: 'false',
      K8S_IN_CLUSTER: '1',
      SEED_SAMPLE_DOCUMENTS: '0',
    });

    expect(config.server.port).toBe(9090);
    expect(config.rag.defaultTopK).toBe(5);
    expect(config.kubernetes.enabled).toBe(false);
    expect(config.kubernetes.inCluster).toBe(true);
    expect(config.bootstrap.seedSampleDocuments).toBe(false);
  });

  it('should trim trailing slashes from base URLs', () => {
    const config = loadConfig({
      QDRANT_URL: 'http://localhost:6333/',
      OLLAMA_BASE_URL: 'http://localhost:11434/',
    });

    expect(config.qdrant.url).toBe('http://localhost:6333');
    expect(config.ollama.baseUrl).toBe('http://localhost:11434');
  });

  it('should treat blank optional strings as unset', () => {
    const config = loadConfig({ KUBECONFIG: '  ', K8S_BEARER_TOKEN: ' test-secret ' });

    expect(config.kubernetes.kubeConfigPath).toBeUndefined();
    expect(config.kubernetes.bearerToken).toBe('test-secret');
  });

  it.each([
    ['PORT', '70000'],
    ['SERVER_MODE', 'grpc'],
    ['K8S_ENABLED', 'yes'],
    ['QDRANT_URL', 'not a url'],
    ['DEFAULT_TOP_K', '0'],
  ])('should reject %s=%s', (key, value) => {
    expect(() => loadConfig({ [key]: value })).toThrow(ZodError);
  });
});
