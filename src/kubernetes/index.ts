export {
  KubernetesClient,
  describeConfigSource,
  type AppsReadApi,
  type ClientHandle,
  type ClientResolver,
  type ClusterConfigSource,
  type CoreReadApi,
} from './KubernetesClient.js';

export { ConfigResolver } from './ConfigResolver.js';

export {
  ClusterSettingsSchema,
  DEFAULT_SERVICE_ACCOUNT_TOKEN_PATH,
  loadClusterSettings,
  type ClusterSettings,
} from './ClusterSettings.js';

// Query layer
export { ResourceQueryService } from './ResourceQueryService.js';
export { BaseResourceOperations, type QueryOptions } from './BaseResourceOperations.js';
export { PodOperations } from './resources/PodOperations.js';
export { NodeOperations } from './resources/NodeOperations.js';
export { NamespaceOperations } from './resources/NamespaceOperations.js';
export { ServiceOperations } from './resources/ServiceOperations.js';
export { DeploymentOperations } from './resources/DeploymentOperations.js';

// Error handling
export {
  KubernetesError,
  ConfigError,
  RemoteError,
  ValidationError,
  AuthenticationError,
  AuthorizationError,
  ResourceNotFoundError,
  ServerUnavailableError,
  NetworkError,
  TimeoutError,
  convertApiError,
} from './ErrorHandling.js';

export * from './types.js';
