import type { V1Deployment, V1Pod } from '@kubernetes/client-node';
import { getLogger } from '@fluidware-it/saddlebag';
import type { NamespaceViolation, PodViolation } from '../types/violations';

interface PodViolationReport {
  Name: string;
  Deployment: V1Deployment | null;
  Pod: V1Pod | null;
  Violations: string[];
}

interface NamespaceViolationReport {
  Namespace: string;
  Level: string;
  PodViolations: PodViolationReport[];
}

function toPodReport(podViolation: PodViolation): PodViolationReport {
  return {
    Name: podViolation.name,
    Deployment: podViolation.deployment ?? null,
    Pod: podViolation.pod ?? null,
    Violations: podViolation.violations
  };
}

export function toReport(violations: readonly NamespaceViolation[]): NamespaceViolationReport[] {
  return violations.map(v => ({
    Namespace: v.namespace,
    Level: v.level,
    PodViolations: v.podViolations.map(toPodReport)
  }));
}

// Serialize the collected violations as a JSON document.
// An empty string means there is nothing to report.
export function formatViolationReport(violations: readonly NamespaceViolation[]): string {
  if (violations.length === 0) return '';

  try {
    return JSON.stringify(toReport(violations));
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    getLogger().error(`Failed to serialize violation report: ${message}`);
    return '';
  }
}
