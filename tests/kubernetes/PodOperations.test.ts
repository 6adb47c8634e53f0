import { PodOperations, toPodSummary } from '../../src/kubernetes/resources/PodOperations';
import { AuthorizationError } from '../../src/kubernetes/ErrorHandling';
import { createFakeClient, makePod } from '../helpers/kubernetes';

describe('PodOperations', () => {
  let fake: ReturnType<typeof createFakeClient>;
  let ops: PodOperations;

  beforeEach(() => {
    fake = createFakeClient();
    ops = new PodOperations(fake.client);
  });

  it('should list pods across all namespaces with the label selector', async () => {
    fake.core.listPodForAllNamespaces.mockResolvedValue({ body: { items: [] } });

    await ops.list({ labelSelector: 'app=web' });

    expect(fake.core.listPodForAllNamespaces).toHaveBeenCalledWith(
      undefined,
      undefined,
      undefined,
      'app=web',
    );
    expect(fake.core.listNamespacedPod).not.toHaveBeenCalled();
  });

  it('should list pods in one namespace', async () => {
    fake.core.listNamespacedPod.mockResolvedValue({ body: { items: [makePod('web-1', 'apps')] } });

    const pods = await ops.collectPods('apps', 'app=web');

    expect(fake.core.listNamespacedPod).toHaveBeenCalledWith(
      'apps',
      undefined,
      undefined,
      undefined,
      undefined,
      'app=web',
    );
    expect(pods).toEqual([
      {
        name: 'web-1',
        namespace: 'apps',
        status: 'Running',
        nodeName: 'node-a',
        podIp: '10.0.0.5',
        containers: [
          { name: 'app', ready: true, restartCount: 0, state: 'running', reason: null },
        ],
        createdAt: '2024-02-01T12:00:00.000Z',
      },
    ]);
  });

  it('should treat "all" as every namespace', async () => {
    fake.core.listPodForAllNamespaces.mockResolvedValue({ body: { items: [] } });

    await ops.collectPods('all');

    expect(fake.core.listPodForAllNamespaces).toHaveBeenCalled();
    expect(fake.core.listNamespacedPod).not.toHaveBeenCalled();
  });

  it('should convert API errors', async () => {
    fake.core.listNamespacedPod.mockRejectedValue({
      statusCode: 403,
      body: { message: 'pods is forbidden' },
    });

    await expect(ops.collectPods('kube-system')).rejects.toBeInstanceOf(AuthorizationError);
  });

  describe('toPodSummary', () => {
    it('should report waiting and terminated containers with their reason', () => {
      const pod = makePod('job-1', 'batch', {
        spec: {
          containers: [{ name: 'init' }, { name: 'main' }, { name: 'late' }],
        },
        status: {
          phase: 'Pending',
          containerStatuses: [
            {
              name: 'init',
              image: 'busybox',
              imageID: '',
              ready: false,
              restartCount: 2,
              state: { terminated: { exitCode: 1, reason: 'Error' } },
            },
            {
              name: 'main',
              image: 'busybox',
              imageID: '',
              ready: false,
              restartCount: 0,
              state: { waiting: { reason: 'ContainerCreating' } },
            },
          ],
        },
      });

      const summary = toPodSummary(pod);

      expect(summary.status).toBe('Pending');
      expect(summary.nodeName).toBeNull();
      expect(summary.podIp).toBeNull();
      expect(summary.containers).toEqual([
        { name: 'init', ready: false, restartCount: 2, state: 'terminated', reason: 'Error' },
        {
          name: 'main',
          ready: false,
          restartCount: 0,
          state: 'waiting',
          reason: 'ContainerCreating',
        },
        { name: 'late', ready: false, restartCount: 0, state: 'unknown', reason: null },
      ]);
    });

    it('should map an unrecognized phase to Unknown', () => {
      const summary = toPodSummary(makePod('x', 'default', { status: { phase: 'Evicted' } }));
      expect(summary.status).toBe('Unknown');
    });
  });
});
