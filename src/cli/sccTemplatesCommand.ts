import { mkdir, rm, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import type { KubernetesObject, V1Deployment, V1Namespace, V1SecurityContext } from '@kubernetes/client-node';
import { getLogger } from '@fluidware-it/saddlebag';
import { stringify } from 'yaml';

const logger = getLogger();

const WILDCARD_USER = 'wildcard-user';
const UNCONFINED_USER = 'unconfined-user';
const POD_ANNOTATION = { 'seccomp.security.alpha.kubernetes.io/pod': 'unconfined' };
const CONTAINER_ANNOTATION = { 'container.seccomp.security.alpha.kubernetes.io/busybox': 'unconfined' };

export interface SccTemplate {
  users: string[];
  seccompProfiles: string[];
}

export interface ExperimentTemplate {
  namespace: string;
  annotations?: Record<string, string>;
  podSeccompType?: string;
  containerSeccompType?: string;
}

// security.openshift.io/v1 has no typed client, only the fields we render
export interface SecurityContextConstraints extends KubernetesObject {
  allowPrivilegedContainer: boolean;
  allowPrivilegeEscalation: boolean;
  requiredDropCapabilities: string[];
  runAsUser: { type: string };
  seLinuxContext: { type: string };
  fsGroup: { type: string };
  supplementalGroups: { type: string };
  volumes: string[];
  users: string[];
  seccompProfiles: string[];
}

export const SCC_TEMPLATES: SccTemplate[] = [
  { users: [WILDCARD_USER], seccompProfiles: ['*'] },
  { users: [UNCONFINED_USER], seccompProfiles: ['Unconfined'] }
];

// Every combination of seccomp annotation and seccompProfile field, at pod and container level.
export const EXPERIMENTS: ExperimentTemplate[] = [
  { namespace: 'wildcard-pod-no-annotations-no-fields' },
  { namespace: 'unconfined-pod-no-annotations-no-fields' },
  { namespace: 'wildcard-pod-annotations-no-fields', annotations: POD_ANNOTATION },
  { namespace: 'unconfined-pod-annotations-no-fields', annotations: POD_ANNOTATION },
  { namespace: 'wildcard-pod-no-annotations-fields', podSeccompType: 'Unconfined' },
  { namespace: 'unconfined-pod-no-annotations-fields', podSeccompType: 'Unconfined' },
  { namespace: 'wildcard-container-annotations-no-fields', annotations: CONTAINER_ANNOTATION },
  { namespace: 'unconfined-container-annotations-no-fields', annotations: CONTAINER_ANNOTATION },
  { namespace: 'wildcard-container-no-annotations-fields', containerSeccompType: 'Unconfined' },
  { namespace: 'unconfined-container-no-annotations-fields', containerSeccompType: 'Unconfined' },
  {
    namespace: 'unconfined-pod-annotations-fields-conflict',
    annotations: POD_ANNOTATION,
    podSeccompType: 'RuntimeDefault'
  },
  {
    namespace: 'unconfined-container-annotations-fields-conflict',
    annotations: CONTAINER_ANNOTATION,
    containerSeccompType: 'RuntimeDefault'
  }
];

export function buildScc(template: SccTemplate): SecurityContextConstraints {
  return {
    apiVersion: 'security.openshift.io/v1',
    kind: 'SecurityContextConstraints',
    metadata: { name: `seccomp-${template.users[0] ?? 'unnamed'}` },
    allowPrivilegedContainer: false,
    allowPrivilegeEscalation: false,
    requiredDropCapabilities: ['ALL'],
    runAsUser: { type: 'MustRunAsRange' },
    seLinuxContext: { type: 'MustRunAs' },
    fsGroup: { type: 'MustRunAs' },
    supplementalGroups: { type: 'RunAsAny' },
    volumes: ['configMap', 'downwardAPI', 'emptyDir', 'projected', 'secret'],
    users: template.users,
    seccompProfiles: template.seccompProfiles
  };
}

export function buildExperiment(template: ExperimentTemplate): [V1Namespace, V1Deployment] {
  const labels = { app: 'seccomp-experiment' };
  const containerSecurityContext: V1SecurityContext = template.containerSeccompType
    ? { seccompProfile: { type: template.containerSeccompType } }
    : {};

  const namespace: V1Namespace = {
    apiVersion: 'v1',
    kind: 'Namespace',
    metadata: { name: template.namespace }
  };

  const deployment: V1Deployment = {
    apiVersion: 'apps/v1',
    kind: 'Deployment',
    metadata: { name: 'seccomp-experiment', namespace: template.namespace },
    spec: {
      replicas: 1,
      selector: { matchLabels: labels },
      template: {
        metadata: template.annotations ? { labels, annotations: template.annotations } : { labels },
        spec: {
          ...(template.podSeccompType
            ? { securityContext: { seccompProfile: { type: template.podSeccompType } } }
            : {}),
          containers: [
            {
              name: 'busybox',
              image: 'busybox',
              command: ['sh', '-c', 'sleep infinity'],
              securityContext: containerSecurityContext
            }
          ]
        }
      }
    }
  };

  return [namespace, deployment];
}

export function toYamlDocuments(objects: object[]): string {
  return objects.map(o => stringify(o)).join('---\n');
}

// Recreate the output directory and render the SCCs and experiment manifests into it.
export async function runSccTemplates(outputDir: string): Promise<string[]> {
  await rm(outputDir, { recursive: true, force: true });
  await mkdir(outputDir, { recursive: true, mode: 0o755 });

  const written: string[] = [];
  const write = async (fileName: string, content: string): Promise<void> => {
    const file = path.join(outputDir, fileName);
    await writeFile(file, content, { mode: 0o644 });
    written.push(file);
  };

  for (const template of SCC_TEMPLATES) {
    await write(`scc-${template.users[0] ?? 'unnamed'}.yaml`, toYamlDocuments([buildScc(template)]));
  }
  for (const experiment of EXPERIMENTS) {
    await write(`${experiment.namespace}.yaml`, toYamlDocuments(buildExperiment(experiment)));
  }

  logger.info(`Rendered ${written.length} manifest(s) to ${outputDir}`);
  return written;
}
