import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { ResourceQueryService } from '../../kubernetes/ResourceQueryService.js';
import { ArgSchemas, CommonSchemas, parseParams, type BaseTool, type ToolResult } from './BaseTool.js';

const DescribePodArgs = z.object({
  name: z.string().min(1),
  namespace: ArgSchemas.namespace,
  timeoutMs: ArgSchemas.timeoutMs,
});

/**
 * Detailed view of a single pod: spec, container states and conditions
 */
export class DescribePodTool implements BaseTool {
  tool: Tool = {
    name: 'describe_pod',
    description:
      'Get detailed information about one pod, including containers, container states and conditions (similar to `kubectl describe pod`)',
    inputSchema: {
      type: 'object',
      properties: {
        name: {
          ...CommonSchemas.name,
          description: 'Name of the pod',
        },
        namespace: {
          ...CommonSchemas.namespace,
          description: 'Kubernetes namespace (defaults to "default")',
        },
        timeoutMs: CommonSchemas.timeoutMs,
      },
      required: ['name'],
    },
  };

  async execute(params: unknown, service: ResourceQueryService): Promise<ToolResult> {
    const parsed = parseParams(this.tool.name, DescribePodArgs, params);
    if (!parsed.ok) return parsed.error;

    const { name, namespace, timeoutMs } = parsed.value;
    return service.getPodDetail(name, namespace, { timeoutMs });
  }
}
