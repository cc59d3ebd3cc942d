#!/usr/bin/env node
/**
 * Read-only Kubernetes inspection server
 * Main entry point for the Model Context Protocol server
 *
 * Usage: kube-inspector-mcp [kubeconfig-path]
 */

import { loadClusterSettings } from './kubernetes/ClusterSettings.js';
import { ConfigResolver } from './kubernetes/ConfigResolver.js';
import { ResourceQueryService } from './kubernetes/ResourceQueryService.js';
import { KubernetesToolsPlugin } from './plugins/KubernetesToolsPlugin.js';
import { MCPServer } from './server/MCPServer.js';
import { createLogger } from './utils/Logger.js';

export { SERVER_NAME, VERSION } from './version.js';
export * from './kubernetes/index.js';
export { MCPServer, type MCPPlugin, type ToolHandler } from './server/MCPServer.js';
export { KubernetesToolsPlugin } from './plugins/KubernetesToolsPlugin.js';

/**
 * Wire settings, resolver, query service and tools, then serve over stdio.
 * Returns the started server.
 */
export async function main(
  argv: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
): Promise<MCPServer> {
  const settings = loadClusterSettings(env, argv);
  const logger = createLogger({ level: settings.logLevel, file: settings.logFile });

  const resolver = new ConfigResolver(settings, logger);
  const service = new ResourceQueryService(
    resolver,
    { timeoutMs: settings.requestTimeoutMs },
    logger,
  );

  const server = new MCPServer({ logger });
  await server.loadPlugin(new KubernetesToolsPlugin(service));
  await server.start();

  logger.info(
    settings.kubeconfigPath
      ? `Kubernetes inspector running with kubeconfig ${settings.kubeconfigPath}`
      : 'Kubernetes inspector running. Waiting for connections...',
  );
  return server;
}
