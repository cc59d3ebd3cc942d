import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { ResourceQueryService } from '../../kubernetes/ResourceQueryService.js';
import { ArgSchemas, CommonSchemas, parseParams, type BaseTool, type ToolResult } from './BaseTool.js';

const GetNamespacesArgs = z.object({ timeoutMs: ArgSchemas.timeoutMs });

/**
 * List namespaces in a Kubernetes cluster
 */
export class GetNamespacesTool implements BaseTool {
  tool: Tool = {
    name: 'get_namespaces',
    description: 'List all namespaces with their phase, creation time and labels',
    inputSchema: {
      type: 'object',
      properties: {
        timeoutMs: CommonSchemas.timeoutMs,
      },
    },
  };

  async execute(params: unknown, service: ResourceQueryService): Promise<ToolResult> {
    const parsed = parseParams(this.tool.name, GetNamespacesArgs, params);
    if (!parsed.ok) return parsed.error;

    return service.listNamespaces({ timeoutMs: parsed.value.timeoutMs });
  }
}
