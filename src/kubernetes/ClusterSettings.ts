import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import { MAX_TIMEOUT_MS } from './BaseResourceOperations.js';

export const DEFAULT_SERVICE_ACCOUNT_TOKEN_PATH =
  '/var/run/secrets/kubernetes.io/serviceaccount/token';

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

export const ClusterSettingsSchema = z.object({
  /** Kubeconfig path given on the command line; wins over everything else when the file exists */
  kubeconfigPath: optionalText,
  /** Value of KUBECONFIG, taken as a single path */
  kubeconfigEnv: optionalText,
  defaultKubeconfigPath: z.string().min(1),
  context: optionalText,
  inCluster: z
    .object({
      serviceHost: optionalText,
      servicePort: optionalText,
      tokenPath: z.string().min(1).default(DEFAULT_SERVICE_ACCOUNT_TOKEN_PATH),
    })
    .default({}),
  requestTimeoutMs: z.coerce.number().int().positive().max(MAX_TIMEOUT_MS).optional(),
  logLevel: z.enum(['error', 'warn', 'info', 'verbose', 'debug', 'silly']).default('info'),
  logFile: optionalText,
});

export type ClusterSettings = z.infer<typeof ClusterSettingsSchema>;

function isEnabled(value: string | undefined): boolean {
  return value === 'true' || value === '1';
}

/**
 * Build the settings once at process entry. Nothing below this point reads
 * the environment.
 */
export function loadClusterSettings(
  env: NodeJS.ProcessEnv = process.env,
  argv: string[] = [],
  home: string = homedir(),
): ClusterSettings {
  const [kubeconfigPath] = argv.filter((arg) => !arg.startsWith('-'));

  const result = ClusterSettingsSchema.safeParse({
    kubeconfigPath,
    kubeconfigEnv: env.KUBECONFIG,
    defaultKubeconfigPath: join(home, '.kube', 'config'),
    context: env.MCP_KUBE_CONTEXT,
    inCluster: {
      serviceHost: env.KUBERNETES_SERVICE_HOST,
      servicePort: env.KUBERNETES_SERVICE_PORT,
    },
    requestTimeoutMs: env.TIMEOUT || undefined,
    logLevel: env.MCP_LOG_LEVEL || undefined,
    logFile: isEnabled(env.MCP_LOG_ENABLE) ? env.MCP_LOG_FILE || 'kube-inspector-mcp.log' : undefined,
  });

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }

  return result.data;
}
