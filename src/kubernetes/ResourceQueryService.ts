import type { Logger } from 'winston';
import type { QueryOptions } from './BaseResourceOperations.js';
import type { ClientResolver } from './KubernetesClient.js';
import { PodOperations } from './resources/PodOperations.js';
import { NodeOperations } from './resources/NodeOperations.js';
import { NamespaceOperations } from './resources/NamespaceOperations.js';
import { ServiceOperations } from './resources/ServiceOperations.js';
import { DeploymentOperations } from './resources/DeploymentOperations.js';
import type {
  DeploymentListResult,
  LogRequest,
  LogResult,
  NamespaceListResult,
  NodeListResult,
  PodDetailResult,
  PodListResult,
  QueryResult,
  ServiceListResult,
} from './types.js';

/**
 * Entry point for every cluster query. Each call resolves its own client
 * through the resolver, so nothing is cached between calls.
 */
export class ResourceQueryService {
  private readonly pods: PodOperations;
  private readonly nodes: NodeOperations;
  private readonly namespaces: NamespaceOperations;
  private readonly services: ServiceOperations;
  private readonly deployments: DeploymentOperations;

  constructor(resolver: ClientResolver, defaults: QueryOptions = {}, logger?: Logger) {
    this.pods = new PodOperations(resolver, defaults, logger);
    this.nodes = new NodeOperations(resolver, defaults, logger);
    this.namespaces = new NamespaceOperations(resolver, defaults, logger);
    this.services = new ServiceOperations(resolver, defaults, logger);
    this.deployments = new DeploymentOperations(resolver, defaults, logger);
  }

  listPods(
    namespace: string = 'all',
    labelSelector?: string,
    options?: QueryOptions,
  ): Promise<QueryResult<PodListResult>> {
    return this.pods.list(namespace, labelSelector, options);
  }

  listNodes(options?: QueryOptions): Promise<QueryResult<NodeListResult>> {
    return this.nodes.list(options);
  }

  listNamespaces(options?: QueryOptions): Promise<QueryResult<NamespaceListResult>> {
    return this.namespaces.list(options);
  }

  listServices(
    namespace: string = 'all',
    options?: QueryOptions,
  ): Promise<QueryResult<ServiceListResult>> {
    return this.services.list(namespace, options);
  }

  listDeployments(
    namespace: string = 'all',
    options?: QueryOptions,
  ): Promise<QueryResult<DeploymentListResult>> {
    return this.deployments.list(namespace, options);
  }

  getPodDetail(
    name: string,
    namespace: string = 'default',
    options?: QueryOptions,
  ): Promise<QueryResult<PodDetailResult>> {
    return this.pods.describe(name, namespace, options);
  }

  getLogs(request: LogRequest, options?: QueryOptions): Promise<QueryResult<LogResult>> {
    return this.pods.getLogs(request, options);
  }
}
