import { writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import type { V1Pod } from '@kubernetes/client-node';
import { getLogger } from '@fluidware-it/saddlebag';
import { getK8sClients } from '../cluster/k8sClient';
import { CONTROLLER_NAME } from '../config/config';
import type { PodLogMatch } from '../types/k8s';
import { errorMessage } from '../utils/errors';
import { pollUntil, type PollOptions } from '../utils/retry';
import { formatTimestamp } from '../utils/time';

const logger = getLogger();

export const DEFAULT_LOG_PATTERN = `= ${CONTROLLER_NAME} =`;
export const TEST_POD_NAME = 'test-pod';
const POD_RUNNING_POLL: PollOptions = { intervalMs: 1000, timeoutMs: 60_000 };

export interface ControllerLogsOptions {
  pattern: string;
  create: boolean;
  logs: boolean;
  debug: boolean;
  logsDir: string;
}

export interface TestNamespaceSpec {
  name: string;
  labels?: Record<string, string>;
  fieldManager?: string;
}

// One namespace the controller must leave alone (sync disabled), one it never
// syncs (openshift- prefix) and one with labels set by a user.
export const TEST_NAMESPACES: TestNamespaceSpec[] = [
  {
    name: 'test-namespace-1',
    labels: {
      'pod-security.kubernetes.io/warn': 'restricted',
      'pod-security.kubernetes.io/audit': 'restricted',
      'security.openshift.io/scc.podSecurityLabelSync': 'false'
    },
    fieldManager: CONTROLLER_NAME
  },
  { name: 'openshift-test-namespace-2' },
  {
    name: 'test-namespace-3',
    labels: {
      'pod-security.kubernetes.io/warn': 'restricted',
      'pod-security.kubernetes.io/audit': 'restricted'
    },
    fieldManager: 'kubectl-edit'
  }
];

// A pod that the restricted profile rejects: it allows privilege escalation.
export function buildTestPod(namespace: string): V1Pod {
  return {
    metadata: { name: TEST_POD_NAME, namespace },
    spec: {
      containers: [
        {
          name: 'test-container',
          image: 'busybox',
          command: ['sh', '-c', "echo 'Pod is running'; sleep infinity"],
          securityContext: { allowPrivilegeEscalation: true }
        }
      ]
    }
  };
}

export async function waitForPodRunning(
  namespace: string,
  name: string,
  poll: PollOptions = POD_RUNNING_POLL
): Promise<void> {
  const { coreApi } = getK8sClients();
  await pollUntil(async () => {
    const pod = await coreApi.readNamespacedPod({ name, namespace });
    return pod.status?.phase === 'Running';
  }, poll);
}

export async function createNamespaceAndPod(spec: TestNamespaceSpec, poll?: PollOptions): Promise<void> {
  const { coreApi } = getK8sClients();

  try {
    const metadata = spec.labels ? { name: spec.name, labels: spec.labels } : { name: spec.name };
    await coreApi.createNamespace(
      spec.fieldManager ? { body: { metadata }, fieldManager: spec.fieldManager } : { body: { metadata } }
    );
  } catch (error: unknown) {
    throw new Error(`error creating namespace: ${errorMessage(error)}`, { cause: error });
  }

  try {
    await coreApi.createNamespacedPod({ namespace: spec.name, body: buildTestPod(spec.name) });
  } catch (error: unknown) {
    throw new Error(`error creating pod: ${errorMessage(error)}`, { cause: error });
  }
  logger.info(`Pod created successfully in namespace ${spec.name}`);

  try {
    await waitForPodRunning(spec.name, TEST_POD_NAME, poll);
  } catch (error: unknown) {
    throw new Error(`error waiting for pod to be running: ${errorMessage(error)}`, { cause: error });
  }
  logger.info(`Pod is now running in namespace ${spec.name}`);
}

export function countMatches(logs: string, pattern: RegExp): number {
  const global = pattern.global ? pattern : new RegExp(pattern.source, `${pattern.flags}g`);
  return logs.match(global)?.length ?? 0;
}

// Search one pod's logs; the logs are saved to a file when the pattern matches.
// Failures are logged and reported as "no match" so one pod cannot stop the search.
export async function searchPodLogs(
  pod: V1Pod,
  pattern: RegExp,
  logsDir: string,
  now: Date = new Date()
): Promise<PodLogMatch | undefined> {
  const namespace = pod.metadata?.namespace ?? '';
  const name = pod.metadata?.name ?? '';
  const { coreApi } = getK8sClients();

  let logs: string;
  try {
    logs = await coreApi.readNamespacedPodLog({ name, namespace });
  } catch (error: unknown) {
    logger.error(`Error opening log stream for ${namespace}/${name}: ${errorMessage(error)}`);
    return undefined;
  }

  const matches = countMatches(logs, pattern);
  if (matches === 0) {
    logger.info(`No matches found in ${namespace}/${name}`);
    return undefined;
  }

  logger.info(`Found ${matches} matches in ${namespace}/${name}. Saving logs...`);
  const file = path.join(logsDir, `logs_${namespace}_${name}_${formatTimestamp(now, '_')}.txt`);
  try {
    await writeFile(file, logs, { mode: 0o644 });
  } catch (error: unknown) {
    logger.error(`Error saving logs for ${namespace}/${name}: ${errorMessage(error)}`);
    return undefined;
  }
  logger.info(`Logs saved to ${file}`);
  return { namespace, pod: name, matches, file };
}

export async function searchAllPodLogs(pattern: RegExp, logsDir: string): Promise<PodLogMatch[]> {
  const { coreApi } = getK8sClients();
  const pods = await coreApi.listPodForAllNamespaces();

  const results = await Promise.all(pods.items.map(pod => searchPodLogs(pod, pattern, logsDir)));
  return results.filter((r): r is PodLogMatch => r !== undefined);
}

export async function runControllerLogs(options: ControllerLogsOptions): Promise<PodLogMatch[]> {
  if (options.debug) {
    logger.info(
      `Options: pattern=${options.pattern} create=${options.create} logs=${options.logs} logsDir=${options.logsDir}`
    );
  }

  // Compile before touching the cluster so a bad pattern fails fast.
  const pattern = new RegExp(options.pattern, 'g');

  if (options.create) {
    for (const [index, spec] of TEST_NAMESPACES.entries()) {
      try {
        await createNamespaceAndPod(spec);
      } catch (error: unknown) {
        logger.error(`Error creating namespace and pod ${index + 1}: ${errorMessage(error)}`);
        return [];
      }
    }
  }

  if (!options.logs) return [];

  const matches = await searchAllPodLogs(pattern, options.logsDir);
  // eslint-disable-next-line no-console
  console.log('Search completed.');
  return matches;
}
