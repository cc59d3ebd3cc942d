import type * as k8s from '@kubernetes/client-node';
import type { Logger } from 'winston';
import { BaseResourceOperations, type QueryOptions } from '../BaseResourceOperations.js';
import type { ClientResolver } from '../KubernetesClient.js';
import type { NodeListResult, NodeRecord, NodeResources, QueryResult, StringMap } from '../types.js';
import { orNull } from '../utils/ResourceUtils.js';

const ROLE_LABEL_PREFIX = 'node-role.kubernetes.io/';
const UNKNOWN = 'Unknown';

/**
 * Roles come from `node-role.kubernetes.io/<role>` label keys. A node
 * without any is a worker.
 */
export function nodeRoles(labels: { [key: string]: string } | undefined): string[] {
  const roles = Object.keys(labels ?? {})
    .filter((key) => key.startsWith(ROLE_LABEL_PREFIX))
    .map((key) => key.slice(ROLE_LABEL_PREFIX.length))
    .filter((role) => role.length > 0);

  return roles.length > 0 ? roles : ['worker'];
}

function formatResources(quantities: { [key: string]: string } | undefined): NodeResources {
  return {
    cpu: quantities?.cpu ?? UNKNOWN,
    memory: quantities?.memory ?? UNKNOWN,
    pods: quantities?.pods ?? UNKNOWN,
  };
}

export function formatNode(node: k8s.V1Node): NodeRecord {
  const conditions: StringMap = {};
  for (const condition of node.status?.conditions ?? []) {
    conditions[condition.type] = condition.status;
  }

  const info = node.status?.nodeInfo;

  return {
    name: orNull(node.metadata?.name),
    status: conditions.Ready === 'True' ? 'Ready' : 'NotReady',
    roles: nodeRoles(node.metadata?.labels),
    version: info?.kubeletVersion ?? UNKNOWN,
    os: info?.operatingSystem ?? UNKNOWN,
    architecture: info?.architecture ?? UNKNOWN,
    capacity: formatResources(node.status?.capacity),
    allocatable: formatResources(node.status?.allocatable),
    conditions,
  };
}

export class NodeOperations extends BaseResourceOperations {
  constructor(resolver: ClientResolver, defaults?: QueryOptions, logger?: Logger) {
    super(resolver, 'Node', defaults, logger);
  }

  async list(options?: QueryOptions): Promise<QueryResult<NodeListResult>> {
    return this.execute<NodeListResult>('listing nodes', options, async (client, envelope) => {
      const { body } = await client.core.listNode();
      const nodes = body.items.map(formatNode);
      return { ...envelope, node_count: nodes.length, nodes };
    });
  }
}
