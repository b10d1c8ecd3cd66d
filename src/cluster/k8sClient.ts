import * as k8s from '@kubernetes/client-node';
import { getLogger } from '@fluidware-it/saddlebag';
import type { KubeConfigOptions } from '../types/k8s';
import type { WarningHandler } from '../types/violations';
import { warningMiddleware } from '../warnings/warningHeader';

export interface K8sClients {
  kubeConfig: k8s.KubeConfig;
  coreApi: k8s.CoreV1Api;
  appsApi: k8s.AppsV1Api;
  customObjectsApi: k8s.CustomObjectsApi;
  objectApi: k8s.KubernetesObjectApi;
}

export interface K8sClientOptions extends KubeConfigOptions {
  warningHandler?: WarningHandler | undefined;
}

type ApiConstructor<T> = new (configuration: k8s.Configuration) => T;

let clients: K8sClients | undefined;

export function loadKubeConfig(options: KubeConfigOptions = {}): k8s.KubeConfig {
  const kc = new k8s.KubeConfig();
  try {
    if (options.kubeconfig) {
      kc.loadFromFile(options.kubeconfig);
    } else {
      kc.loadFromDefault();
    }
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    getLogger().error(`Failed to load Kubernetes configuration: ${message}`);
    throw new Error(`Kubernetes configuration error: ${message}`);
  }

  if (options.context) {
    const available = kc.getContexts().map(c => c.name);
    if (!available.includes(options.context)) {
      throw new Error(`Context "${options.context}" not found. Available contexts: ${available.join(', ')}`);
    }
    kc.setCurrentContext(options.context);
  }

  getLogger().info(`K8s context loaded: ${kc.getCurrentContext()}`);
  return kc;
}

// Same wiring as KubeConfig.makeApiClient, plus our response middleware.
function makeApiClient<T>(kc: k8s.KubeConfig, apiClientType: ApiConstructor<T>, middleware: k8s.Middleware[]): T {
  const cluster = kc.getCurrentCluster();
  if (!cluster) {
    throw new Error('No active cluster in the Kubernetes configuration');
  }

  const configuration = k8s.createConfiguration({
    baseServer: new k8s.ServerConfiguration(cluster.server, {}),
    authMethods: { default: kc },
    promiseMiddleware: middleware,
  });
  return new apiClientType(configuration);
}

// Build the API clients once per run. Warnings the API server attaches to
// any response of these clients are delivered to `warningHandler`.
export function initK8sClients(options: K8sClientOptions = {}): K8sClients {
  const kubeConfig = loadKubeConfig(options);
  const middleware = options.warningHandler ? [warningMiddleware(options.warningHandler)] : [];

  clients = {
    kubeConfig,
    coreApi: makeApiClient(kubeConfig, k8s.CoreV1Api, middleware),
    appsApi: makeApiClient(kubeConfig, k8s.AppsV1Api, middleware),
    customObjectsApi: makeApiClient(kubeConfig, k8s.CustomObjectsApi, middleware),
    objectApi: k8s.KubernetesObjectApi.makeApiClient(kubeConfig),
  };
  return clients;
}

export function getK8sClients(): K8sClients {
  if (!clients) {
    return initK8sClients();
  }
  return clients;
}
