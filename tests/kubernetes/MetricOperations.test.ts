import { MetricsUnavailableError } from '../../src/errors/AgentErrors';
import { ResourceNotFoundError } from '../../src/kubernetes/ErrorHandling';
import { MetricOperations } from '../../src/kubernetes/resources/MetricOperations';
import { createFakeClient, makeNode, nodeMetric } from '../helpers/kubernetes';

describe('MetricOperations', () => {
  let fake: ReturnType<typeof createFakeClient>;
  let ops: MetricOperations;

  beforeEach(() => {
    fake = createFakeClient();
    ops = new MetricOperations(fake.client);
  });

  describe('collectNodeMetrics', () => {
    it('should join node capacity with metrics usage', async () => {
      fake.core.listNode.mockResolvedValue({
        body: {
          items: [
            makeNode('node-a', { cpu: '2', memory: '4Gi' }),
            makeNode('node-b', { cpu: '4', memory: '8Gi', ready: 'False' }),
          ],
        },
      });
      fake.customObjects.listClusterCustomObject.mockResolvedValue({
        body: { items: [nodeMetric('node-a', '500m', '1Gi')] },
      });

      const snapshot = await ops.collectNodeMetrics();

      expect(fake.customObjects.listClusterCustomObject).toHaveBeenCalledWith(
        'metrics.k8s.io',
        'v1beta1',
        'nodes',
      );
      expect(snapshot.nodes).toEqual([
        {
          nodeName: 'node-a',
          cpuUsageCores: 0.5,
          cpuCapacityCores: 2,
          memoryUsageBytes: 1073741824,
          memoryCapacityBytes: 4294967296,
          ready: true,
        },
        {
          nodeName: 'node-b',
          cpuUsageCores: null,
          cpuCapacityCores: 4,
          memoryUsageBytes: null,
          memoryCapacityBytes: 8589934592,
          ready: false,
        },
      ]);
      expect(snapshot.warnings).toEqual([]);
      expect(snapshot.collectedAt).toBeInstanceOf(Date);
    });

    it('should treat negative usage as a missing reading', async () => {
      fake.core.listNode.mockResolvedValue({
        body: { items: [makeNode('node-a', { cpu: '2', memory: '4Gi' })] },
      });
      fake.customObjects.listClusterCustomObject.mockResolvedValue({
        body: { items: [nodeMetric('node-a', '-500m', '-1Gi')] },
      });

      const snapshot = await ops.collectNodeMetrics();

      expect(snapshot.nodes).toEqual([
        {
          nodeName: 'node-a',
          cpuUsageCores: null,
          cpuCapacityCores: 2,
          memoryUsageBytes: null,
          memoryCapacityBytes: 4294967296,
          ready: true,
        },
      ]);
    });

    it('should warn about metrics reported for unknown nodes', async () => {
      fake.core.listNode.mockResolvedValue({ body: { items: [makeNode('node-a')] } });
      fake.customObjects.listClusterCustomObject.mockResolvedValue({
        body: {
          items: [nodeMetric('node-a', '1', '1Gi'), nodeMetric('node-gone', '1', '1Gi')],
        },
      });

      const snapshot = await ops.collectNodeMetrics();

      expect(snapshot.nodes).toHaveLength(1);
      expect(snapshot.warnings).toEqual(['Metrics reported for unknown node node-gone; skipped']);
    });

    it('should keep nodes with null usage when the metrics API fails', async () => {
      fake.core.listNode.mockResolvedValue({ body: { items: [makeNode('node-a')] } });
      fake.customObjects.listClusterCustomObject.mockRejectedValue({
        statusCode: 404,
        body: { message: 'the server could not find the requested resource' },
      });

      const snapshot = await ops.collectNodeMetrics();

      expect(snapshot.nodes[0].cpuUsageCores).toBeNull();
      expect(snapshot.nodes[0].memoryUsageBytes).toBeNull();
      expect(snapshot.warnings).toEqual([
        'Node metrics unavailable: the server could not find the requested resource',
      ]);
    });

    it('should treat a malformed metrics payload as unavailable metrics', async () => {
      fake.core.listNode.mockResolvedValue({ body: { items: [makeNode('node-a')] } });
      fake.customObjects.listClusterCustomObject.mockResolvedValue({
        body: { items: [{ usage: { cpu: '1' } }] },
      });

      const snapshot = await ops.collectNodeMetrics();

      expect(snapshot.warnings).toHaveLength(1);
      expect(snapshot.warnings[0]).toMatch(
        /^Node metrics unavailable: Malformed Metrics response for ListNodeMetrics at items\.0\.metadata/,
      );
    });

    it('should fail when nodes cannot be listed', async () => {
      fake.core.listNode.mockRejectedValue({
        code: 'ECONNREFUSED',
        message: 'connect ECONNREFUSED',
      });
      fake.customObjects.listClusterCustomObject.mockResolvedValue({ body: { items: [] } });

      const error = await ops.collectNodeMetrics().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(MetricsUnavailableError);
      expect(error).toHaveProperty('message', 'Failed to list nodes: connect ECONNREFUSED');
    });
  });

  describe('getNodeMetricsByName', () => {
    it('should return the node with its usage', async () => {
      fake.core.readNode.mockResolvedValue({ body: makeNode('node-a', { cpu: '8' }) });
      fake.customObjects.getClusterCustomObject.mockResolvedValue({
        body: nodeMetric('node-a', '2', '2Gi'),
      });

      const node = await ops.getNodeMetricsByName('node-a');

      expect(fake.core.readNode).toHaveBeenCalledWith('node-a');
      expect(node.cpuUsageCores).toBe(2);
      expect(node.cpuCapacityCores).toBe(8);
      expect(node.memoryUsageBytes).toBe(2147483648);
    });

    it('should leave usage null when the node has no metrics', async () => {
      fake.core.readNode.mockResolvedValue({ body: makeNode('node-a') });
      fake.customObjects.getClusterCustomObject.mockRejectedValue({ statusCode: 404 });

      const node = await ops.getNodeMetricsByName('node-a');

      expect(node.cpuUsageCores).toBeNull();
      expect(node.memoryUsageBytes).toBeNull();
    });

    it('should raise ResourceNotFoundError with resource details for an unknown node', async () => {
      fake.core.readNode.mockRejectedValue({
        statusCode: 404,
        body: { message: 'nodes "ghost" not found' },
      });
      fake.customObjects.getClusterCustomObject.mockRejectedValue({ statusCode: 404 });

      const error = await ops.getNodeMetricsByName('ghost').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ResourceNotFoundError);
      expect(error).toHaveProperty('message', 'nodes "ghost" not found');
      expect(error).toHaveProperty('details.resourceName', 'ghost');
      expect(error).toHaveProperty('details.operation', 'GetNode');
    });
  });

  describe('collectPodMetrics', () => {
    const podMetrics = {
      metadata: { name: 'web-1', namespace: 'apps' },
      containers: [
        { name: 'app', usage: { cpu: '250m', memory: '64Mi' } },
        { name: 'sidecar', usage: { cpu: '50m', memory: '16Mi' } },
      ],
    };

    it('should read a single pod when namespace and name are given', async () => {
      fake.customObjects.getNamespacedCustomObject.mockResolvedValue({ body: podMetrics });

      const pods = await ops.collectPodMetrics('apps', 'web-1');

      expect(fake.customObjects.getNamespacedCustomObject).toHaveBeenCalledWith(
        'metrics.k8s.io',
        'v1beta1',
        'apps',
        'pods',
        'web-1',
      );
      expect(pods).toHaveLength(1);
      expect(pods[0].name).toBe('web-1');
      expect(pods[0].namespace).toBe('apps');
      expect(pods[0].totalCpuCores).toBeCloseTo(0.3);
      expect(pods[0].totalMemoryBytes).toBe(83886080);
      expect(pods[0].containers).toEqual([
        { name: 'app', cpuCores: 0.25, memoryBytes: 67108864 },
        { name: 'sidecar', cpuCores: 0.05, memoryBytes: 16777216 },
      ]);
    });

    it('should list a namespace', async () => {
      fake.customObjects.listNamespacedCustomObject.mockResolvedValue({
        body: { items: [podMetrics] },
      });

      const pods = await ops.collectPodMetrics('apps');

      expect(fake.customObjects.listNamespacedCustomObject).toHaveBeenCalledWith(
        'metrics.k8s.io',
        'v1beta1',
        'apps',
        'pods',
      );
      expect(pods.map((p) => p.name)).toEqual(['web-1']);
    });

    it('should list every namespace and filter by pod name', async () => {
      fake.customObjects.listClusterCustomObject.mockResolvedValue({
        body: {
          items: [
            podMetrics,
            { metadata: { name: 'db-0', namespace: 'data' }, containers: [] },
          ],
        },
      });

      const pods = await ops.collectPodMetrics('all', 'db-0');

      expect(fake.customObjects.listClusterCustomObject).toHaveBeenCalledWith(
        'metrics.k8s.io',
        'v1beta1',
        'pods',
      );
      expect(pods).toEqual([
        { name: 'db-0', namespace: 'data', totalCpuCores: 0, totalMemoryBytes: 0, containers: [] },
      ]);
    });
  });
});
