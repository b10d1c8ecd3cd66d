import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { V1Namespace } from '@kubernetes/client-node';
import type { WarningHandler } from '../../src/types/violations';

const { coreApi, appsApi, wiring } = vi.hoisted(() => {
  const wiring: { handler?: WarningHandler | undefined } = {};
  return {
    coreApi: { listNamespace: vi.fn(), replaceNamespace: vi.fn(), readNamespacedPod: vi.fn() },
    appsApi: { readNamespacedDeployment: vi.fn(), readNamespacedReplicaSet: vi.fn() },
    wiring
  };
});

// Mock the k8sClient module; the "API server" replies to dry-runs through the wired warning handler
vi.mock('../../src/cluster/k8sClient', () => ({
  initK8sClients: vi.fn((options: { warningHandler?: WarningHandler }) => {
    wiring.handler = options.warningHandler;
    return { coreApi, appsApi };
  }),
  getK8sClients: () => ({ coreApi, appsApi })
}));

import {
  mapAuditToEnforce,
  collectViolations,
  runAuditEnforce,
  AUDIT_LABEL,
  ENFORCE_LABEL
} from '../../src/cli/auditEnforceCommand';
import { initK8sClients } from '../../src/cluster/k8sClient';

function namespace(name: string, labels?: Record<string, string>): V1Namespace {
  return { metadata: labels ? { name, labels } : { name } };
}

// Warnings the API server sends back for each namespace's dry-run update
const serverWarnings: Record<string, string[]> = {
  'team-a': [
    'existing pods in namespace "team-a" violate the new PodSecurity enforce level "restricted:latest"',
    'web-1: allowPrivilegeEscalation != false, unrestricted capabilities'
  ],
  'team-b': [
    'existing pods in namespace "team-b" violate the new PodSecurity enforce level "baseline:latest"',
    'db-0: privileged'
  ]
};

describe('auditEnforceCommand', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    wiring.handler = undefined;

    coreApi.listNamespace.mockResolvedValue({
      items: [namespace('team-a'), namespace('team-b', { [AUDIT_LABEL]: 'baseline' }), namespace('quiet')]
    });
    coreApi.replaceNamespace.mockImplementation(async ({ name, body }: { name: string; body: V1Namespace }) => {
      for (const text of serverWarnings[name] ?? []) {
        wiring.handler?.handle(299, '-', text);
      }
      return body;
    });
    coreApi.readNamespacedPod.mockImplementation(async ({ name, namespace: ns }: { name: string; namespace: string }) => ({
      metadata: { name, namespace: ns }
    }));
  });

  describe('mapAuditToEnforce', () => {
    it('should set enforce to the audit level', () => {
      const result = mapAuditToEnforce(namespace('team-b', { [AUDIT_LABEL]: 'baseline', team: 'b' }));

      expect(result.metadata?.labels).toEqual({ [AUDIT_LABEL]: 'baseline', [ENFORCE_LABEL]: 'baseline', team: 'b' });
    });

    it('should default to restricted when there is no audit label', () => {
      const result = mapAuditToEnforce(namespace('team-a'));

      expect(result.metadata?.labels).toEqual({ [ENFORCE_LABEL]: 'restricted' });
    });

    it('should override an existing enforce label without touching the input', () => {
      const input = namespace('team-c', { [AUDIT_LABEL]: 'restricted', [ENFORCE_LABEL]: 'privileged' });

      const result = mapAuditToEnforce(input);

      expect(result.metadata?.labels?.[ENFORCE_LABEL]).toBe('restricted');
      expect(input.metadata?.labels?.[ENFORCE_LABEL]).toBe('privileged');
      expect(result.metadata?.name).toBe('team-c');
    });
  });

  describe('collectViolations', () => {
    it('should dry-run every namespace and collect the reported violations', async () => {
      const violations = await collectViolations({ showWarnings: false });

      expect(coreApi.replaceNamespace).toHaveBeenCalledTimes(3);
      expect(coreApi.replaceNamespace).toHaveBeenCalledWith({
        name: 'team-b',
        body: namespace('team-b', { [AUDIT_LABEL]: 'baseline', [ENFORCE_LABEL]: 'baseline' }),
        dryRun: 'All'
      });
      expect(violations.map(v => [v.namespace, v.level])).toEqual([
        ['team-a', 'restricted:latest'],
        ['team-b', 'baseline:latest']
      ]);
      expect(violations[0]?.podViolations[0]?.violations).toEqual([
        'allowPrivilegeEscalation != false',
        'unrestricted capabilities'
      ]);
      expect(violations[1]?.podViolations[0]?.pod).toEqual({ metadata: { name: 'db-0', namespace: 'team-b' } });
    });

    it('should leave warnings received during owner lookups out of the result', async () => {
      coreApi.readNamespacedPod.mockImplementation(async ({ name, namespace: ns }: { name: string; namespace: string }) => {
        wiring.handler?.handle(
          299,
          '-',
          'existing pods in namespace "late" violate the new PodSecurity enforce level "restricted:latest"'
        );
        return { metadata: { name, namespace: ns } };
      });

      const violations = await collectViolations({ showWarnings: false });

      expect(violations.map(v => v.namespace)).toEqual(['team-a', 'team-b']);
      expect(coreApi.readNamespacedPod).toHaveBeenCalledTimes(2);
    });

    it('should pass kubeconfig and context to the client', async () => {
      await collectViolations({ kubeconfig: '/tmp/kubeconfig', context: 'dev', showWarnings: true });

      expect(initK8sClients).toHaveBeenCalledWith(
        expect.objectContaining({ kubeconfig: '/tmp/kubeconfig', context: 'dev' })
      );
    });

    it('should abort when a dry-run update fails', async () => {
      coreApi.replaceNamespace.mockRejectedValueOnce(new Error('namespaces "team-a" is forbidden'));

      await expect(collectViolations({ showWarnings: false })).rejects.toThrow('namespaces "team-a" is forbidden');
      expect(coreApi.replaceNamespace).toHaveBeenCalledTimes(1);
    });
  });

  describe('runAuditEnforce', () => {
    it('should print an empty report when nothing is violated', async () => {
      coreApi.listNamespace.mockResolvedValue({ items: [namespace('quiet')] });
      const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

      const report = await runAuditEnforce({ showWarnings: false });

      expect(report).toBe('');
      expect(log).toHaveBeenCalledWith('');
      log.mockRestore();
    });

    it('should print the JSON report', async () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

      const report = await runAuditEnforce({ showWarnings: false });

      const parsed: unknown = JSON.parse(report);
      expect(parsed).toEqual([
        {
          Namespace: 'team-a',
          Level: 'restricted:latest',
          PodViolations: [
            {
              Name: 'web-1',
              Deployment: null,
              Pod: { metadata: { name: 'web-1', namespace: 'team-a' } },
              Violations: ['allowPrivilegeEscalation != false', 'unrestricted capabilities']
            }
          ]
        },
        {
          Namespace: 'team-b',
          Level: 'baseline:latest',
          PodViolations: [
            {
              Name: 'db-0',
              Deployment: null,
              Pod: { metadata: { name: 'db-0', namespace: 'team-b' } },
              Violations: ['privileged']
            }
          ]
        }
      ]);
      expect(log).toHaveBeenCalledWith(report);
      log.mockRestore();
    });
  });
});
