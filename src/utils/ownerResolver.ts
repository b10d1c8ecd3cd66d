import type { V1Deployment, V1ObjectMeta, V1Pod } from '@kubernetes/client-node';
import { getLogger } from '@fluidware-it/saddlebag';
import { getK8sClients } from '../cluster/k8sClient';
import type { OwnerReference } from '../types/k8s';
import type { NamespaceViolation, PodViolation } from '../types/violations';

const logger = getLogger();

// Extract the first ownerReference from a K8s resource metadata
export function getFirstOwner(metadata: V1ObjectMeta | undefined): OwnerReference | undefined {
  const first = metadata?.ownerReferences?.[0];
  if (!first) return undefined;
  return { kind: first.kind, name: first.name };
}

// Resolve the Deployment that ultimately owns a pod.
// Walks up: Pod → Deployment, or Pod → ReplicaSet → Deployment.
// Any other owner kind, or no owner at all, resolves to undefined.
export async function resolveDeployment(namespace: string, pod: V1Pod): Promise<V1Deployment | undefined> {
  const { appsApi } = getK8sClients();
  const owner = getFirstOwner(pod.metadata);

  switch (owner?.kind) {
    case 'Deployment':
      return appsApi.readNamespacedDeployment({ name: owner.name, namespace });
    case 'ReplicaSet': {
      const replicaSet = await appsApi.readNamespacedReplicaSet({ name: owner.name, namespace });
      const parent = getFirstOwner(replicaSet.metadata);
      if (parent?.kind !== 'Deployment') {
        logger.debug(`ReplicaSet ${namespace}/${owner.name} is not owned by a Deployment`);
        return undefined;
      }
      return appsApi.readNamespacedDeployment({ name: parent.name, namespace });
    }
    default:
      return undefined;
  }
}

export async function resolvePodViolation(namespace: string, podViolation: PodViolation): Promise<void> {
  const { coreApi } = getK8sClients();
  const pod = await coreApi.readNamespacedPod({ name: podViolation.name, namespace });
  podViolation.pod = pod;
  podViolation.deployment = await resolveDeployment(namespace, pod);
}

// Attach the live Pod and its owning Deployment to every pod violation.
// Lookups run one at a time; the first API error aborts the whole pass.
export async function resolveViolationOwners(violations: readonly NamespaceViolation[]): Promise<void> {
  for (const namespaceViolation of violations) {
    for (const podViolation of namespaceViolation.podViolations) {
      await resolvePodViolation(namespaceViolation.namespace, podViolation);
    }
  }
}
