import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

const { customObjectsApi } = vi.hoisted(() => ({
  customObjectsApi: { listClusterCustomObject: vi.fn() }
}));

vi.mock('../../src/cluster/k8sClient', () => ({
  getK8sClients: () => ({ customObjectsApi })
}));

import { grepLines, runOperatorSearch, CLUSTER_OPERATOR_RESOURCE } from '../../src/cli/operatorSearchCommand';

describe('operatorSearchCommand', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('grepLines', () => {
    it('should match lines case-insensitively', () => {
      const text = 'reason: AsExpected\nmessage: PodSecurity label sync is DEGRADED\nstatus: "False"';

      expect(grepLines(text, 'degraded')).toEqual(['message: PodSecurity label sync is DEGRADED']);
    });

    it('should return nothing when no line matches', () => {
      expect(grepLines('a\nb', 'c')).toEqual([]);
    });
  });

  describe('runOperatorSearch', () => {
    it('should require a search term', async () => {
      await expect(runOperatorSearch('')).rejects.toThrow('Please provide a search term');
      expect(customObjectsApi.listClusterCustomObject).not.toHaveBeenCalled();
    });

    it('should return matching lines per operator', async () => {
      customObjectsApi.listClusterCustomObject.mockResolvedValue({
        apiVersion: 'config.openshift.io/v1',
        kind: 'ClusterOperatorList',
        items: [
          {
            metadata: { name: 'kube-apiserver' },
            status: { conditions: [{ type: 'Degraded', status: 'False', reason: 'AsExpected' }] }
          },
          {
            metadata: { name: 'dns' },
            status: { conditions: [{ type: 'Available', status: 'True', reason: 'DNSAvailable' }] }
          }
        ]
      });

      const found = await runOperatorSearch('degraded');

      expect(customObjectsApi.listClusterCustomObject).toHaveBeenCalledWith({ ...CLUSTER_OPERATOR_RESOURCE });
      expect([...found.keys()]).toEqual(['kube-apiserver']);
      expect(found.get('kube-apiserver')).toEqual(['    - type: Degraded']);
    });

    it('should reject a response that is not a ClusterOperator list', async () => {
      customObjectsApi.listClusterCustomObject.mockResolvedValue({ kind: 'Status', message: 'forbidden' });

      await expect(runOperatorSearch('degraded')).rejects.toThrow();
    });
  });
});
