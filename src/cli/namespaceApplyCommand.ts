import { PatchStrategy, type V1Namespace } from '@kubernetes/client-node';
import { getLogger } from '@fluidware-it/saddlebag';
import { getK8sClients } from '../cluster/k8sClient';
import { errorMessage } from '../utils/errors';
import { retryOnConflict } from '../utils/retry';
import { formatTimestamp } from '../utils/time';

const logger = getLogger();

export const APPLIED_LABELS: Record<string, string> = { 'my-enforce': 'restricted' };
const INITIAL_LABELS: Record<string, string> = { foo: 'bar' };

export interface NamespaceApplyOptions {
  fieldManager: string;
}

function fail(step: string, error: unknown): Error {
  return new Error(`Error ${step}: ${errorMessage(error)}`, { cause: error });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function scratchNamespaceName(now: Date = new Date()): string {
  return `test-namespace-${formatTimestamp(now)}`;
}

// Labels of the namespace that the given field manager owns through server-side apply.
// Ownership is read from the manager's managedFields entry: {"f:metadata":{"f:labels":{"f:<key>":{}}}}
export function extractManagedLabels(namespace: V1Namespace, fieldManager: string): Record<string, string> {
  const labels = namespace.metadata?.labels ?? {};
  const entry = namespace.metadata?.managedFields?.find(
    f => f.manager === fieldManager && f.operation === 'Apply'
  );
  const fields: unknown = entry?.fieldsV1;
  if (!isRecord(fields)) return {};

  const metadataFields = fields['f:metadata'];
  const labelFields = isRecord(metadataFields) ? metadataFields['f:labels'] : undefined;
  if (!isRecord(labelFields)) return {};

  const owned: Record<string, string> = {};
  for (const key of Object.keys(labelFields)) {
    if (!key.startsWith('f:')) continue;
    const label = key.slice(2);
    const value = labels[label];
    if (value !== undefined) owned[label] = value;
  }
  return owned;
}

function printLabels(title: string, labels: Record<string, string>): void {
  // eslint-disable-next-line no-console
  console.log(`---\n${title}`);
  for (const [key, value] of Object.entries(labels)) {
    // eslint-disable-next-line no-console
    console.log(`- ${key}: ${value}`);
  }
}

async function readNamespace(name: string): Promise<V1Namespace> {
  try {
    return await getK8sClients().coreApi.readNamespace({ name });
  } catch (error: unknown) {
    throw fail('getting namespace', error);
  }
}

export async function createNamespace(name: string): Promise<void> {
  const { coreApi } = getK8sClients();
  try {
    await coreApi.createNamespace({ body: { metadata: { name, labels: INITIAL_LABELS } } });
  } catch (error: unknown) {
    throw fail('creating namespace', error);
  }

  try {
    await retryOnConflict(() => coreApi.readNamespace({ name }));
  } catch (error: unknown) {
    throw fail('waiting for namespace to be created', error);
  }
  logger.info(`Namespace ${name} created`);
}

export async function applyConfiguration(name: string, fieldManager: string): Promise<void> {
  const { objectApi } = getK8sClients();
  const body: V1Namespace = {
    apiVersion: 'v1',
    kind: 'Namespace',
    metadata: { name, labels: APPLIED_LABELS }
  };

  try {
    await objectApi.patch(body, undefined, undefined, fieldManager, true, PatchStrategy.ServerSideApply);
  } catch (error: unknown) {
    throw fail('applying configuration', error);
  }
}

export async function deleteNamespace(name: string): Promise<void> {
  try {
    await getK8sClients().coreApi.deleteNamespace({ name });
  } catch (error: unknown) {
    throw fail('deleting namespace', error);
  }
  logger.info(`Namespace ${name} deleted`);
}

export async function printNamespaceLabels(name: string): Promise<void> {
  const namespace = await readNamespace(name);
  printLabels(`Labels for namespace ${name}:`, namespace.metadata?.labels ?? {});
}

export async function printManagedLabels(name: string, fieldManager: string): Promise<void> {
  const namespace = await readNamespace(name);
  printLabels(`Labels from ${name} owned by ${fieldManager}:`, extractManagedLabels(namespace, fieldManager));
}

// Walk through the label lifecycle of a scratch namespace:
// create → show labels → server-side apply → show labels → show applied labels → delete
export async function runNamespaceApply(options: NamespaceApplyOptions, now: Date = new Date()): Promise<void> {
  const name = scratchNamespaceName(now);

  await createNamespace(name);
  await printNamespaceLabels(name);
  await applyConfiguration(name, options.fieldManager);
  await printNamespaceLabels(name);
  await printManagedLabels(name, options.fieldManager);
  await deleteNamespace(name);
}
