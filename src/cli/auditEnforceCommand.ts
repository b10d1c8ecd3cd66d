import type { CoreV1Api, V1Namespace } from '@kubernetes/client-node';
import { getLogger } from '@fluidware-it/saddlebag';
import { initK8sClients } from '../cluster/k8sClient';
import type { KubeConfigOptions } from '../types/k8s';
import type { NamespaceViolation } from '../types/violations';
import { resolveViolationOwners } from '../utils/ownerResolver';
import { formatViolationReport } from '../utils/reportFormatter';
import { LoggingWarningHandler, PodSecurityWarningCollector } from '../warnings/warningCollector';

const logger = getLogger();

export const AUDIT_LABEL = 'pod-security.kubernetes.io/audit';
export const ENFORCE_LABEL = 'pod-security.kubernetes.io/enforce';
export const DEFAULT_AUDIT_LEVEL = 'restricted';

export interface AuditEnforceOptions extends KubeConfigOptions {
  showWarnings: boolean;
}

// Copy of the namespace whose enforce level is raised to its audit level
// (restricted when no audit level is set). The input is left untouched.
export function mapAuditToEnforce(namespace: V1Namespace): V1Namespace {
  const labels = { ...namespace.metadata?.labels };
  labels[ENFORCE_LABEL] = labels[AUDIT_LABEL] || DEFAULT_AUDIT_LEVEL;

  return {
    ...namespace,
    metadata: { ...namespace.metadata, labels }
  };
}

// Send a dry-run update per namespace, one at a time, so the API server
// reports (as warnings) the pods the stricter level would reject.
export async function dryRunEnforceAudit(coreApi: CoreV1Api, namespaces: V1Namespace[]): Promise<void> {
  for (const namespace of namespaces) {
    const name = namespace.metadata?.name;
    if (!name) {
      logger.warn('Skipping namespace without a name');
      continue;
    }
    logger.debug(`Dry-run enforcing audit level on namespace ${name}`);
    await coreApi.replaceNamespace({ name, body: mapAuditToEnforce(namespace), dryRun: 'All' });
  }
}

export async function collectViolations(options: AuditEnforceOptions): Promise<readonly NamespaceViolation[]> {
  const collector = new PodSecurityWarningCollector(options.showWarnings ? new LoggingWarningHandler() : undefined);
  const { coreApi } = initK8sClients({
    kubeconfig: options.kubeconfig,
    context: options.context,
    warningHandler: collector
  });

  const namespaceList = await coreApi.listNamespace();
  await dryRunEnforceAudit(coreApi, namespaceList.items);

  if (collector.skipped.length > 0) {
    logger.warn(`${collector.skipped.length} warning(s) could not be attributed and were left out of the report`);
  }

  // The clients still report to the collector, so the owner lookups walk a snapshot
  const violations = collector.violations.map(v => ({ ...v, podViolations: [...v.podViolations] }));
  await resolveViolationOwners(violations);
  return violations;
}

export async function runAuditEnforce(options: AuditEnforceOptions): Promise<string> {
  const violations = await collectViolations(options);
  logger.info(`Found violations in ${violations.length} namespace(s)`);

  const report = formatViolationReport(violations);
  // eslint-disable-next-line no-console
  console.log(report);
  return report;
}
