import type * as k8s from '@kubernetes/client-node';
import type { Logger } from 'winston';
import { BaseResourceOperations, type QueryOptions } from '../BaseResourceOperations.js';
import type { ClientResolver } from '../KubernetesClient.js';
import type { QueryResult, ServiceListResult, ServicePortRecord, ServiceRecord } from '../types.js';
import { isAllNamespaces, orNull } from '../utils/ResourceUtils.js';

function formatServicePort(port: k8s.V1ServicePort): ServicePortRecord {
  return {
    name: orNull(port.name),
    protocol: orNull(port.protocol),
    port: port.port,
    target_port: port.targetPort ? String(port.targetPort) : null,
    node_port: orNull(port.nodePort),
  };
}

export function formatService(service: k8s.V1Service): ServiceRecord {
  const record: ServiceRecord = {
    name: orNull(service.metadata?.name),
    namespace: orNull(service.metadata?.namespace),
    type: orNull(service.spec?.type),
    cluster_ip: orNull(service.spec?.clusterIP),
    external_ip: service.spec?.externalIPs ? [...service.spec.externalIPs] : [],
    ports: (service.spec?.ports ?? []).map(formatServicePort),
  };

  const ingress = service.status?.loadBalancer?.ingress;
  if (service.spec?.type === 'LoadBalancer' && ingress) {
    const ips: string[] = [];
    for (const entry of ingress) {
      if (entry.ip) ips.push(entry.ip);
    }
    record.load_balancer_ip = ips;
  }

  return record;
}

export class ServiceOperations extends BaseResourceOperations {
  constructor(resolver: ClientResolver, defaults?: QueryOptions, logger?: Logger) {
    super(resolver, 'Service', defaults, logger);
  }

  /**
   * List services in one namespace, or cluster-wide for "all"
   */
  async list(namespace: string = 'all', options?: QueryOptions): Promise<QueryResult<ServiceListResult>> {
    return this.execute<ServiceListResult>('listing services', options, async (client, envelope) => {
      const { body } = isAllNamespaces(namespace)
        ? await client.core.listServiceForAllNamespaces()
        : await client.core.listNamespacedService(namespace);

      const services = body.items.map(formatService);
      return { ...envelope, service_count: services.length, services };
    });
  }
}
