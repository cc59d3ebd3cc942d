import type * as k8s from '@kubernetes/client-node';
import type {
  AppsReadApi,
  ClientHandle,
  ClientResolver,
  CoreReadApi,
} from '../../src/kubernetes/KubernetesClient';
import { ConfigError } from '../../src/kubernetes/ErrorHandling';

export const CONFIG_INFO = 'Loaded kubeconfig from: /tmp/test-kubeconfig';

export interface FakeClient extends ClientHandle {
  core: jest.Mocked<CoreReadApi>;
  apps: jest.Mocked<AppsReadApi>;
  setRequestTimeout: jest.Mock<void, [number]>;
}

export function createFakeClient(): FakeClient {
  return {
    configInfo: CONFIG_INFO,
    setRequestTimeout: jest.fn(),
    core: {
      listNamespacedPod: jest.fn(),
      listPodForAllNamespaces: jest.fn(),
      readNamespacedPod: jest.fn(),
      readNamespacedPodLog: jest.fn(),
      listNode: jest.fn(),
      listNamespace: jest.fn(),
      listNamespacedService: jest.fn(),
      listServiceForAllNamespaces: jest.fn(),
    },
    apps: {
      listNamespacedDeployment: jest.fn(),
      listDeploymentForAllNamespaces: jest.fn(),
    },
  };
}

export function fakeResolver(client: ClientHandle): ClientResolver {
  return { resolve: () => client };
}

export function failingResolver(): ClientResolver {
  return {
    resolve: () => {
      throw new ConfigError('Service host/port is not set', 'Kubeconfig file not found at: /home/test/.kube/config');
    },
  };
}

/**
 * Shape of the error the client library raises for a non-2xx response
 */
export function httpError(statusCode: number, statusMessage: string, body?: unknown): Error {
  return Object.assign(new Error('HTTP request failed'), {
    statusCode,
    body,
    response: { statusCode, statusMessage },
  });
}

export function podList(items: k8s.V1Pod[]): { body: k8s.V1PodList } {
  return { body: { items } };
}

export function container(name: string, extra: Partial<k8s.V1Container> = {}): k8s.V1Container {
  return { name, image: `registry.example/${name}:1.0`, ...extra };
}

export function pod(name: string, namespace: string, containerNames: string[] = ['app']): k8s.V1Pod {
  return {
    metadata: { name, namespace },
    spec: { containers: containerNames.map((n) => container(n)), nodeName: 'node-1' },
    status: { phase: 'Running', podIP: '10.0.0.5' },
  };
}

export function nodeInfo(overrides: Partial<k8s.V1NodeSystemInfo> = {}): k8s.V1NodeSystemInfo {
  return {
    architecture: 'amd64',
    bootID: 'boot-1',
    containerRuntimeVersion: 'containerd://1.7.0',
    kernelVersion: '6.1.0',
    kubeProxyVersion: 'v1.29.0',
    kubeletVersion: 'v1.29.0',
    machineID: 'machine-1',
    operatingSystem: 'linux',
    osImage: 'Test OS',
    systemUUID: 'uuid-1',
    ...overrides,
  };
}

export function containerStatus(
  name: string,
  extra: Partial<k8s.V1ContainerStatus> = {},
): k8s.V1ContainerStatus {
  return {
    name,
    ready: true,
    restartCount: 0,
    image: `registry.example/${name}:1.0`,
    imageID: `registry.example/${name}@sha256:abc`,
    ...extra,
  };
}
