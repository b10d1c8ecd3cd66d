import type { V1Deployment, V1Pod } from '@kubernetes/client-node';

// Pods of one namespace that would be rejected by a stricter enforce level.
export interface NamespaceViolation {
  namespace: string;
  level: string;
  podViolations: PodViolation[];
}

export interface PodViolation {
  name: string;
  violations: string[];
  pod?: V1Pod | undefined;
  deployment?: V1Deployment | undefined;
}

export type ParsedWarning =
  | { kind: 'namespace'; namespace: string; level: string }
  | { kind: 'pod'; name: string; violations: string[] };

// Receives every warning the API server attaches to a response.
export interface WarningHandler {
  handle(code: number, agent: string, text: string): void;
}

export interface SkippedWarning {
  text: string;
  reason: string;
}
