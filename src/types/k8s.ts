// Types shared by the cluster-facing commands

export interface OwnerReference {
  kind: string;
  name: string;
}

export interface KubeConfigOptions {
  kubeconfig?: string | undefined;
  context?: string | undefined;
}

// One decoded value of an HTTP Warning header
export interface WarningHeaderValue {
  code: number;
  agent: string;
  text: string;
}

export interface PodLogMatch {
  namespace: string;
  pod: string;
  matches: number;
  file: string;
}
