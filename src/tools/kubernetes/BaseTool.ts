import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { MAX_TIMEOUT_MS } from '../../kubernetes/BaseResourceOperations.js';
import type { ResourceQueryService } from '../../kubernetes/ResourceQueryService.js';
import type {
  QueryErrorResult,
  QueryResult,
  SuccessEnvelope,
} from '../../kubernetes/types.js';

export type ToolResult = QueryResult<SuccessEnvelope>;

/**
 * Base interface for all Kubernetes MCP tools
 */
export interface BaseTool {
  /**
   * The tool definition for MCP registration
   */
  tool: Tool;

  /**
   * Validate the raw arguments and run the query. Never throws: invalid
   * arguments come back as an error record too.
   */
  execute(params: unknown, service: ResourceQueryService): Promise<ToolResult>;
}

/**
 * Common parameter schemas used across multiple tools
 */
export const CommonSchemas = {
  namespace: {
    type: 'string',
    description: 'Kubernetes namespace. Use "all" (the default) for every namespace',
  },
  labelSelector: {
    type: 'string',
    description: 'Label selector to filter resources (e.g., "app=nginx")',
  },
  name: {
    type: 'string',
    description: 'Name of the resource',
  },
  timeoutMs: {
    type: 'integer',
    minimum: 1,
    maximum: MAX_TIMEOUT_MS,
    description: 'Abort the Kubernetes call after this many milliseconds',
  },
};

/**
 * Shared zod fragments for argument validation
 */
export const ArgSchemas = {
  namespaceOrAll: z.string().min(1).default('all'),
  namespace: z.string().min(1).default('default'),
  timeoutMs: z.number().int().positive().max(MAX_TIMEOUT_MS).optional(),
};

type ParseOutcome<T> = { ok: true; value: T } | { ok: false; error: QueryErrorResult };

/**
 * Validate tool arguments; a missing argument object counts as `{}`
 */
export function parseParams<S extends z.ZodTypeAny>(
  toolName: string,
  schema: S,
  params: unknown,
): ParseOutcome<z.output<S>> {
  const result = schema.safeParse(params ?? {});
  if (result.success) {
    return { ok: true, value: result.data };
  }
  return { ok: false, error: invalidParams(toolName, result.error) };
}

export function invalidParams(toolName: string, error: z.ZodError): QueryErrorResult {
  const issues = error.issues
    .map((issue) => `${issue.path.join('.') || 'params'}: ${issue.message}`)
    .join('; ');
  return { status: 'error', error_message: `Invalid arguments for ${toolName}: ${issues}` };
}

/**
 * Parse a duration such as "30s", "5m", "1h" or "2d" into seconds
 */
export function parseDuration(duration: string): number {
  const match = duration.match(/^([1-9]\d*)([smhd])$/);
  if (!match) {
    throw new Error(`Invalid duration format: ${duration}. Use format like "5m", "1h", "30s"`);
  }

  const value = parseInt(match[1], 10);
  switch (match[2]) {
    case 's':
      return value;
    case 'm':
      return value * 60;
    case 'h':
      return value * 3600;
    default:
      return value * 86400;
  }
}
