import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { ResourceQueryService } from '../../kubernetes/ResourceQueryService.js';
import { ArgSchemas, CommonSchemas, parseParams, type BaseTool, type ToolResult } from './BaseTool.js';

const GetPodsArgs = z.object({
  namespace: ArgSchemas.namespaceOrAll,
  labelSelector: z.string().optional(),
  timeoutMs: ArgSchemas.timeoutMs,
});

/**
 * List pods in a Kubernetes cluster
 */
export class GetPodsTool implements BaseTool {
  tool: Tool = {
    name: 'get_pods',
    description:
      'List Pod resources in the current Kubernetes cluster (similar to `kubectl get pods`)',
    inputSchema: {
      type: 'object',
      properties: {
        namespace: CommonSchemas.namespace,
        labelSelector: CommonSchemas.labelSelector,
        timeoutMs: CommonSchemas.timeoutMs,
      },
    },
  };

  async execute(params: unknown, service: ResourceQueryService): Promise<ToolResult> {
    const parsed = parseParams(this.tool.name, GetPodsArgs, params);
    if (!parsed.ok) return parsed.error;

    const { namespace, labelSelector, timeoutMs } = parsed.value;
    return service.listPods(namespace, labelSelector, { timeoutMs });
  }
}
