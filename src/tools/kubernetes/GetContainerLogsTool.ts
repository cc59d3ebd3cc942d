import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { ResourceQueryService } from '../../kubernetes/ResourceQueryService.js';
import {
  ArgSchemas,
  CommonSchemas,
  parseDuration,
  parseParams,
  type BaseTool,
  type ToolResult,
} from './BaseTool.js';

const GetLogsArgs = z.object({
  podName: z.string().min(1),
  namespace: ArgSchemas.namespace,
  container: z.string().min(1).optional(),
  previous: z.boolean().default(false),
  tailLines: z.number().int().positive().optional(),
  sinceSeconds: z.number().int().positive().optional(),
  since: z
    .string()
    .regex(/^[1-9]\d*[smhd]$/, 'expected a duration like "30s", "5m" or "1h"')
    .transform(parseDuration)
    .pipe(z.number().int().positive())
    .optional(),
  timestamps: z.boolean().default(false),
  timeoutMs: ArgSchemas.timeoutMs,
});

/**
 * Fetch logs from a container in a Kubernetes pod
 */
export class GetContainerLogsTool implements BaseTool {
  tool: Tool = {
    name: 'get_logs',
    description:
      'Return stdout / stderr logs for a container in a pod in the current cluster (similar to `kubectl logs`)',
    inputSchema: {
      type: 'object',
      properties: {
        podName: {
          type: 'string',
          description: 'Name of the pod',
        },
        namespace: {
          ...CommonSchemas.namespace,
          description: 'Kubernetes namespace (defaults to "default")',
        },
        container: {
          type: 'string',
          description: 'Container name (required when the pod has more than one container)',
        },
        previous: {
          type: 'boolean',
          description: 'Return logs from the previous terminated instance of the container',
        },
        tailLines: {
          type: 'integer',
          minimum: 1,
          description: 'Number of lines from the end of the logs to show',
        },
        sinceSeconds: {
          type: 'integer',
          minimum: 1,
          description: 'Only return logs newer than this many seconds',
        },
        since: {
          type: 'string',
          description: 'Like sinceSeconds but as a duration (e.g., "5m", "1h"); ignored when sinceSeconds is set',
        },
        timestamps: {
          type: 'boolean',
          description: 'Include timestamps in log output',
        },
        timeoutMs: CommonSchemas.timeoutMs,
      },
      required: ['podName'],
    },
  };

  async execute(params: unknown, service: ResourceQueryService): Promise<ToolResult> {
    const parsed = parseParams(this.tool.name, GetLogsArgs, params);
    if (!parsed.ok) return parsed.error;

    const { since, timeoutMs, ...request } = parsed.value;
    const sinceSeconds = request.sinceSeconds ?? since;

    return service.getLogs({ ...request, sinceSeconds }, { timeoutMs });
  }
}
