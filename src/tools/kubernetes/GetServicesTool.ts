import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { ResourceQueryService } from '../../kubernetes/ResourceQueryService.js';
import { ArgSchemas, CommonSchemas, parseParams, type BaseTool, type ToolResult } from './BaseTool.js';

const GetServicesArgs = z.object({
  namespace: ArgSchemas.namespaceOrAll,
  timeoutMs: ArgSchemas.timeoutMs,
});

/**
 * List services in a Kubernetes cluster
 */
export class GetServicesTool implements BaseTool {
  tool: Tool = {
    name: 'get_services',
    description:
      'List Service resources with type, cluster IP, ports and load balancer addresses (similar to `kubectl get services`)',
    inputSchema: {
      type: 'object',
      properties: {
        namespace: CommonSchemas.namespace,
        timeoutMs: CommonSchemas.timeoutMs,
      },
    },
  };

  async execute(params: unknown, service: ResourceQueryService): Promise<ToolResult> {
    const parsed = parseParams(this.tool.name, GetServicesArgs, params);
    if (!parsed.ok) return parsed.error;

    const { namespace, timeoutMs } = parsed.value;
    return service.listServices(namespace, { timeoutMs });
  }
}
