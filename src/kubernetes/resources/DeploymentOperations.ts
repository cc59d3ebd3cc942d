import type * as k8s from '@kubernetes/client-node';
import type { Logger } from 'winston';
import { BaseResourceOperations, type QueryOptions } from '../BaseResourceOperations.js';
import type { ClientResolver } from '../KubernetesClient.js';
import type { DeploymentListResult, DeploymentRecord, QueryResult } from '../types.js';
import { copyStringMap, isAllNamespaces, orNull } from '../utils/ResourceUtils.js';

export function formatDeployment(deployment: k8s.V1Deployment): DeploymentRecord {
  const status = deployment.status;

  return {
    name: orNull(deployment.metadata?.name),
    namespace: orNull(deployment.metadata?.namespace),
    replicas: orNull(deployment.spec?.replicas),
    ready_replicas: status?.readyReplicas ?? 0,
    available_replicas: status?.availableReplicas ?? 0,
    updated_replicas: status?.updatedReplicas ?? 0,
    labels: copyStringMap(deployment.metadata?.labels),
    conditions: (status?.conditions ?? []).map((condition) => ({
      type: condition.type,
      status: condition.status,
      reason: orNull(condition.reason),
      message: orNull(condition.message),
    })),
  };
}

/**
 * Deployment operations, served from apps/v1
 */
export class DeploymentOperations extends BaseResourceOperations {
  constructor(resolver: ClientResolver, defaults?: QueryOptions, logger?: Logger) {
    super(resolver, 'Deployment', defaults, logger);
  }

  async list(
    namespace: string = 'all',
    options?: QueryOptions,
  ): Promise<QueryResult<DeploymentListResult>> {
    return this.execute<DeploymentListResult>(
      'listing deployments',
      options,
      async (client, envelope) => {
        const { body } = isAllNamespaces(namespace)
          ? await client.apps.listDeploymentForAllNamespaces()
          : await client.apps.listNamespacedDeployment(namespace);

        const deployments = body.items.map(formatDeployment);
        return { ...envelope, deployment_count: deployments.length, deployments };
      },
    );
  }
}
