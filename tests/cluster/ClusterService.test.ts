import { ClusterService } from '../../src/cluster/ClusterService';
import { MetricsUnavailableError } from '../../src/errors/AgentErrors';
import { ResourceNotFoundError } from '../../src/kubernetes/ErrorHandling';
import { createFakeClient, makeNamespace, makeNode, nodeMetric } from '../helpers/kubernetes';

describe('ClusterService', () => {
  let fake: ReturnType<typeof createFakeClient>;
  let service: ClusterService;

  beforeEach(() => {
    fake = createFakeClient();
    service = new ClusterService(fake.client, { metricsTimeoutMs: 50 });
  });

  it('should aggregate CPU across nodes', async () => {
    fake.core.listNode.mockResolvedValue({
      body: { items: [makeNode('a', { cpu: '2' }), makeNode('b', { cpu: '6' })] },
    });
    fake.customObjects.listClusterCustomObject.mockResolvedValue({
      body: { items: [nodeMetric('a', '1', '1Gi'), nodeMetric('b', '3', '1Gi')] },
    });

    const result = await service.getClusterCpu();

    expect(result.cpu.utilizationPercent).toBe(50);
    expect(result.nodeCount).toBe(2);
  });

  it('should time out a hanging cluster call', async () => {
    fake.core.listNode.mockReturnValue(new Promise(() => undefined));
    fake.customObjects.listClusterCustomObject.mockReturnValue(new Promise(() => undefined));

    const error = await service.collectSnapshot().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(MetricsUnavailableError);
    expect(error).toHaveProperty(
      'message',
      'Collecting node metrics failed: Collecting node metrics timed out after 50ms',
    );
  });

  it('should pass MetricsUnavailableError through unchanged', async () => {
    fake.core.listNode.mockRejectedValue({ statusCode: 503, body: { message: 'overloaded' } });
    fake.customObjects.listClusterCustomObject.mockResolvedValue({ body: { items: [] } });

    await expect(service.getClusterMemory()).rejects.toThrow(
      'Failed to list nodes: overloaded',
    );
  });

  it('should wrap API errors and keep the typed cause', async () => {
    fake.core.readNode.mockRejectedValue({ statusCode: 404, body: { message: 'not found' } });
    fake.customObjects.getClusterCustomObject.mockRejectedValue({ statusCode: 404 });

    const error = await service.getNodeMetrics('ghost').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(MetricsUnavailableError);
    expect(error).toHaveProperty('message', 'Reading metrics for node ghost failed: not found');
    expect(error instanceof Error && error.cause).toBeInstanceOf(ResourceNotFoundError);
  });

  it('should return a single node breakdown', async () => {
    fake.core.readNode.mockResolvedValue({ body: makeNode('a', { cpu: '4' }) });
    fake.customObjects.getClusterCustomObject.mockResolvedValue({
      body: nodeMetric('a', '1', '2Gi'),
    });

    const nodes = await service.getNodeMetrics('a');

    expect(nodes).toHaveLength(1);
    expect(nodes[0].cpu).toEqual({ usage: 1, capacity: 4, utilizationPercent: 25 });
    expect(nodes[0].hasMetrics).toBe(true);
  });

  it('should return every node breakdown when no name is given', async () => {
    fake.core.listNode.mockResolvedValue({
      body: { items: [makeNode('b', { cpu: '2' }), makeNode('a', { cpu: '4' })] },
    });
    fake.customObjects.listClusterCustomObject.mockResolvedValue({
      body: { items: [nodeMetric('a', '1', '1Gi')] },
    });

    const nodes = await service.getNodeMetrics();

    expect(nodes.map((n) => [n.nodeName, n.hasMetrics])).toEqual([
      ['a', true],
      ['b', false],
    ]);
    expect(fake.core.readNode).not.toHaveBeenCalled();
  });

  it('should list namespaces', async () => {
    fake.core.listNamespace.mockResolvedValue({ body: { items: [makeNamespace('default')] } });

    const namespaces = await service.listNamespaces();

    expect(namespaces.map((ns) => ns.name)).toEqual(['default']);
  });

  describe('isReachable', () => {
    it('should report the connection result', async () => {
      await expect(service.isReachable()).resolves.toBe(true);
      fake.testConnection.mockResolvedValue(false);
      await expect(service.isReachable()).resolves.toBe(false);
    });

    it('should never throw', async () => {
      fake.testConnection.mockRejectedValue(new Error('boom'));
      await expect(service.isReachable()).resolves.toBe(false);
    });
  });
});
