import type * as k8s from '@kubernetes/client-node';
import type { Logger } from 'winston';
import { BaseResourceOperations, type QueryOptions } from '../BaseResourceOperations.js';
import type { ClientResolver } from '../KubernetesClient.js';
import type { NamespaceListResult, NamespaceRecord, QueryResult } from '../types.js';
import { copyStringMap, formatTimestamp, orNull } from '../utils/ResourceUtils.js';

export function formatNamespace(namespace: k8s.V1Namespace): NamespaceRecord {
  return {
    name: orNull(namespace.metadata?.name),
    status: orNull(namespace.status?.phase),
    created: formatTimestamp(namespace.metadata?.creationTimestamp),
    labels: copyStringMap(namespace.metadata?.labels),
  };
}

/**
 * Namespace operations - cluster-scoped listing only
 */
export class NamespaceOperations extends BaseResourceOperations {
  constructor(resolver: ClientResolver, defaults?: QueryOptions, logger?: Logger) {
    super(resolver, 'Namespace', defaults, logger);
  }

  async list(options?: QueryOptions): Promise<QueryResult<NamespaceListResult>> {
    return this.execute<NamespaceListResult>(
      'listing namespaces',
      options,
      async (client, envelope) => {
        const { body } = await client.core.listNamespace();
        const namespaces = body.items.map(formatNamespace);
        return { ...envelope, namespace_count: namespaces.length, namespaces };
      },
    );
  }
}
