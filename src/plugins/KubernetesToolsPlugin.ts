import type { ResourceQueryService } from '../kubernetes/ResourceQueryService.js';
import { isQuerySuccess } from '../kubernetes/types.js';
import type { ToolHandler } from '../server/MCPServer.js';
import {
  type BaseTool,
  DescribePodTool,
  GetContainerLogsTool,
  GetDeploymentsTool,
  GetNamespacesTool,
  GetNodesTool,
  GetPodsTool,
  GetServicesTool,
} from '../tools/kubernetes/index.js';
import { BaseToolsPlugin } from './BaseToolsPlugin.js';

/**
 * Single source of truth for the tools the plugin exposes
 */
export function createKubernetesTools(): BaseTool[] {
  return [
    new GetPodsTool(),
    new GetNodesTool(),
    new GetNamespacesTool(),
    new GetServicesTool(),
    new GetDeploymentsTool(),
    new DescribePodTool(),
    new GetContainerLogsTool(),
  ];
}

/**
 * Plugin that registers the read-only Kubernetes tools with the MCP server.
 * Every call goes through the query service, which resolves a fresh client.
 */
export class KubernetesToolsPlugin extends BaseToolsPlugin<BaseTool> {
  name = 'kubernetes-tools';

  constructor(private readonly service: ResourceQueryService) {
    super();
  }

  protected createToolInstances(): BaseTool[] {
    return createKubernetesTools();
  }

  static getCommandNames(): string[] {
    return createKubernetesTools().map((command) => command.tool.name);
  }

  protected getHandlerForTool(command: BaseTool): ToolHandler {
    return async (params: unknown) => {
      const result = await command.execute(params, this.service);
      if (!isQuerySuccess(result)) {
        this.logger?.warn(`${command.tool.name} returned an error: ${result.error_message}`);
      }
      return result;
    };
  }
}
