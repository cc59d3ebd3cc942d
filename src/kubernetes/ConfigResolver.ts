import * as k8s from '@kubernetes/client-node';
import { existsSync } from 'fs';
import type { Logger } from 'winston';
import type { ClusterSettings } from './ClusterSettings.js';
import { ConfigError } from './ErrorHandling.js';
import {
  KubernetesClient,
  type ClientResolver,
  type ClusterConfigSource,
} from './KubernetesClient.js';

/**
 * Decides which credential source to use and loads it.
 *
 * Order: explicit path (when the file exists), then the KUBECONFIG path, then
 * in-cluster service-account credentials. Whichever of those is selected, a
 * failure to load it falls back to the default kubeconfig file. A client is
 * built fresh on every call.
 */
export class ConfigResolver implements ClientResolver {
  constructor(
    private readonly settings: ClusterSettings,
    private readonly logger?: Logger,
  ) {}

  resolve(explicitPath: string | undefined = this.settings.kubeconfigPath): KubernetesClient {
    const primary = this.selectPrimarySource(explicitPath);

    try {
      return this.load(primary);
    } catch (primaryError) {
      const primaryReason = reasonOf(primaryError);
      this.logger?.warn(
        `Failed to load ${primary.kind} Kubernetes config: ${primaryReason}. Falling back to default kubeconfig`,
      );

      try {
        return this.load({ kind: 'default-file', path: this.settings.defaultKubeconfigPath });
      } catch (fallbackError) {
        const error = new ConfigError(primaryReason, reasonOf(fallbackError));
        this.logger?.error(error.message);
        throw error;
      }
    }
  }

  /**
   * Pick the first applicable source without loading anything
   */
  selectPrimarySource(explicitPath?: string): ClusterConfigSource {
    if (explicitPath && existsSync(explicitPath)) {
      return { kind: 'explicit-path', path: explicitPath };
    }

    if (this.settings.kubeconfigEnv) {
      return { kind: 'env-variable', path: this.settings.kubeconfigEnv };
    }

    return { kind: 'in-cluster' };
  }

  private load(source: ClusterConfigSource): KubernetesClient {
    const kc = new k8s.KubeConfig();

    switch (source.kind) {
      case 'in-cluster':
        this.loadInCluster(kc);
        break;
      default:
        this.loadKubeConfigFile(kc, source.path);
        break;
    }

    this.logger?.debug(`Loaded Kubernetes config from ${source.kind}`);
    return new KubernetesClient(kc, source, this.logger);
  }

  private loadKubeConfigFile(kc: k8s.KubeConfig, path: string): void {
    if (!existsSync(path)) {
      throw new Error(`Kubeconfig file not found at: ${path}`);
    }

    kc.loadFromFile(path);

    const context = this.settings.context;
    if (context) {
      if (!kc.getContexts().some((c) => c.name === context)) {
        throw new Error(`Context not found: ${context}`);
      }
      kc.setCurrentContext(context);
    }
  }

  private loadInCluster(kc: k8s.KubeConfig): void {
    const { serviceHost, servicePort, tokenPath } = this.settings.inCluster;

    if (!serviceHost || !servicePort) {
      throw new Error('Service host/port is not set');
    }
    if (!existsSync(tokenPath)) {
      throw new Error(`Service token file not found at: ${tokenPath}`);
    }

    kc.loadFromCluster();
  }
}

function reasonOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
