import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { ResourceQueryService } from '../../kubernetes/ResourceQueryService.js';
import { ArgSchemas, CommonSchemas, parseParams, type BaseTool, type ToolResult } from './BaseTool.js';

const GetDeploymentsArgs = z.object({
  namespace: ArgSchemas.namespaceOrAll,
  timeoutMs: ArgSchemas.timeoutMs,
});

/**
 * List deployments in a Kubernetes cluster
 */
export class GetDeploymentsTool implements BaseTool {
  tool: Tool = {
    name: 'get_deployments',
    description:
      'List Deployment resources with replica counts and rollout conditions (similar to `kubectl get deployments`)',
    inputSchema: {
      type: 'object',
      properties: {
        namespace: CommonSchemas.namespace,
        timeoutMs: CommonSchemas.timeoutMs,
      },
    },
  };

  async execute(params: unknown, service: ResourceQueryService): Promise<ToolResult> {
    const parsed = parseParams(this.tool.name, GetDeploymentsArgs, params);
    if (!parsed.ok) return parsed.error;

    const { namespace, timeoutMs } = parsed.value;
    return service.listDeployments(namespace, { timeoutMs });
  }
}
