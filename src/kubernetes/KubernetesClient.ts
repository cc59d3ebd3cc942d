import * as k8s from '@kubernetes/client-node';
import type { Logger } from 'winston';

/**
 * Where the credentials of a client came from
 */
export type ClusterConfigSource =
  | { kind: 'explicit-path'; path: string }
  | { kind: 'env-variable'; path: string }
  | { kind: 'in-cluster' }
  | { kind: 'default-file'; path: string };

export function describeConfigSource(source: ClusterConfigSource): string {
  switch (source.kind) {
    case 'explicit-path':
      return `Loaded kubeconfig from: ${source.path}`;
    case 'env-variable':
      return `Loaded kubeconfig from KUBECONFIG env var: ${source.path}`;
    case 'in-cluster':
      return 'Loaded in-cluster config (running inside Kubernetes)';
    case 'default-file':
      return `Loaded kubeconfig from default location (${source.path})`;
  }
}

/**
 * The core/v1 read calls the query layer issues. `k8s.CoreV1Api` satisfies it.
 */
export interface CoreReadApi {
  listNamespacedPod(
    namespace: string,
    pretty?: string,
    allowWatchBookmarks?: boolean,
    _continue?: string,
    fieldSelector?: string,
    labelSelector?: string,
  ): Promise<{ body: k8s.V1PodList }>;
  listPodForAllNamespaces(
    allowWatchBookmarks?: boolean,
    _continue?: string,
    fieldSelector?: string,
    labelSelector?: string,
  ): Promise<{ body: k8s.V1PodList }>;
  readNamespacedPod(name: string, namespace: string): Promise<{ body: k8s.V1Pod }>;
  readNamespacedPodLog(
    name: string,
    namespace: string,
    container?: string,
    follow?: boolean,
    insecureSkipTLSVerifyBackend?: boolean,
    limitBytes?: number,
    pretty?: string,
    previous?: boolean,
    sinceSeconds?: number,
    tailLines?: number,
    timestamps?: boolean,
  ): Promise<{ body: unknown }>;
  listNode(): Promise<{ body: k8s.V1NodeList }>;
  listNamespace(): Promise<{ body: k8s.V1NamespaceList }>;
  listNamespacedService(namespace: string): Promise<{ body: k8s.V1ServiceList }>;
  listServiceForAllNamespaces(): Promise<{ body: k8s.V1ServiceList }>;
}

/**
 * The apps/v1 read calls the query layer issues. `k8s.AppsV1Api` satisfies it.
 */
export interface AppsReadApi {
  listNamespacedDeployment(namespace: string): Promise<{ body: k8s.V1DeploymentList }>;
  listDeploymentForAllNamespaces(): Promise<{ body: k8s.V1DeploymentList }>;
}

type RequestInterceptor = Parameters<k8s.CoreV1Api['addInterceptor']>[0];

/**
 * An authenticated connection bound to one credential source
 */
export interface ClientHandle {
  readonly core: CoreReadApi;
  readonly apps: AppsReadApi;
  readonly configInfo: string;
  /** Abort each HTTP request issued from now on after this many milliseconds */
  setRequestTimeout(timeoutMs: number): void;
}

/**
 * Anything that can hand out a fresh client per call
 */
export interface ClientResolver {
  resolve(explicitPath?: string): ClientHandle;
}

/**
 * KubernetesClient wraps a loaded KubeConfig and the API clients built from it.
 * Instances are created by the ConfigResolver, one per query.
 */
export class KubernetesClient implements ClientHandle {
  private readonly coreV1Api: k8s.CoreV1Api;
  private readonly appsV1Api: k8s.AppsV1Api;
  private requestTimeoutMs?: number;

  constructor(
    private readonly kc: k8s.KubeConfig,
    public readonly source: ClusterConfigSource,
    private readonly logger?: Logger,
  ) {
    this.coreV1Api = kc.makeApiClient(k8s.CoreV1Api);
    this.appsV1Api = kc.makeApiClient(k8s.AppsV1Api);

    const applyTimeout: RequestInterceptor = (requestOptions) => {
      if (this.requestTimeoutMs) {
        requestOptions.timeout = this.requestTimeoutMs;
      }
    };
    this.coreV1Api.addInterceptor(applyTimeout);
    this.appsV1Api.addInterceptor(applyTimeout);
    this.logger?.debug(
      `Kubernetes client bound to ${source.kind} (server: ${this.getCurrentCluster()?.server ?? 'unknown'})`,
    );
  }

  /**
   * Get the current cluster information
   */
  public getCurrentCluster(): k8s.Cluster | null {
    return this.kc.getCurrentCluster();
  }

  /**
   * Get the current context name
   */
  public getCurrentContext(): string {
    return this.kc.getCurrentContext();
  }

  public setRequestTimeout(timeoutMs: number): void {
    this.requestTimeoutMs = timeoutMs;
  }

  public get core(): CoreReadApi {
    return this.coreV1Api;
  }

  public get apps(): AppsReadApi {
    return this.appsV1Api;
  }

  public get kubeConfig(): k8s.KubeConfig {
    return this.kc;
  }

  /**
   * Human-readable description of the credential source, reported as `config_info`
   */
  public get configInfo(): string {
    return describeConfigSource(this.source);
  }
}
