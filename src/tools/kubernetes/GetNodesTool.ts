import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { ResourceQueryService } from '../../kubernetes/ResourceQueryService.js';
import { ArgSchemas, CommonSchemas, parseParams, type BaseTool, type ToolResult } from './BaseTool.js';

const GetNodesArgs = z.object({ timeoutMs: ArgSchemas.timeoutMs });

export class GetNodesTool implements BaseTool {
  tool: Tool = {
    name: 'get_nodes',
    description:
      'List cluster nodes with readiness, roles, kubelet version and capacity (similar to `kubectl get nodes`)',
    inputSchema: {
      type: 'object',
      properties: {
        timeoutMs: CommonSchemas.timeoutMs,
      },
    },
  };

  async execute(params: unknown, service: ResourceQueryService): Promise<ToolResult> {
    const parsed = parseParams(this.tool.name, GetNodesArgs, params);
    if (!parsed.ok) return parsed.error;

    return service.listNodes({ timeoutMs: parsed.value.timeoutMs });
  }
}
