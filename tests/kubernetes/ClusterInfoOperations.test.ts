import {
  ClusterInfoOperations,
  nodeRoles,
} from '../../src/kubernetes/resources/ClusterInfoOperations';
import { createFakeClient, makeNamespace, makeNode } from '../helpers/kubernetes';

describe('ClusterInfoOperations', () => {
  it('should combine the version with node and namespace counts', async () => {
    const fake = createFakeClient();
    fake.version.getCode.mockResolvedValue({
      body: { major: '1', minor: '29', gitVersion: 'v1.29.2', platform: 'linux/amd64' },
    });
    fake.core.listNode.mockResolvedValue({
      body: {
        items: [
          makeNode('cp-1', { labels: { 'node-role.kubernetes.io/control-plane': '' } }),
          makeNode('worker-1', { ready: 'False' }),
        ],
      },
    });
    fake.core.listNamespace.mockResolvedValue({
      body: { items: [makeNamespace('default'), makeNamespace('kube-system')] },
    });

    const info = await new ClusterInfoOperations(fake.client).get();

    expect(info).toEqual({
      version: { major: '1', minor: '29', gitVersion: 'v1.29.2', platform: 'linux/amd64' },
      nodeCount: 2,
      namespaceCount: 2,
      nodes: [
        { name: 'cp-1', ready: 'True', roles: ['control-plane'] },
        { name: 'worker-1', ready: 'False', roles: [] },
      ],
    });
  });

  it('should sort role labels and ignore other labels', () => {
    const node = makeNode('n', {
      labels: {
        'node-role.kubernetes.io/worker': '',
        'node-role.kubernetes.io/etcd': 'true',
        'kubernetes.io/hostname': 'n',
      },
    });
    expect(nodeRoles(node)).toEqual(['etcd', 'worker']);
  });
});
