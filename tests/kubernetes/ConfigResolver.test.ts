import * as k8s from '@kubernetes/client-node';
import { existsSync } from 'fs';
import winston from 'winston';
import type { ClusterSettings } from '../../src/kubernetes/ClusterSettings';
import { ConfigResolver } from '../../src/kubernetes/ConfigResolver';
import { ConfigError } from '../../src/kubernetes/ErrorHandling';

jest.mock('@kubernetes/client-node');
jest.mock('fs', () => ({
  ...jest.requireActual<typeof import('fs')>('fs'),
  existsSync: jest.fn(),
}));

const DEFAULT_PATH = '/home/test/.kube/config';
const ENV_PATH = '/etc/kube/env.yaml';
const TOKEN_PATH = '/var/run/secrets/kubernetes.io/serviceaccount/token';

function settings(overrides: Partial<ClusterSettings> = {}): ClusterSettings {
  return {
    defaultKubeconfigPath: DEFAULT_PATH,
    inCluster: { tokenPath: TOKEN_PATH },
    logLevel: 'info',
    ...overrides,
  };
}

describe('ConfigResolver', () => {
  let existing: Set<string>;
  let logger: winston.Logger;
  let loadFromFile: jest.SpyInstance;
  let loadFromCluster: jest.SpyInstance;

  beforeEach(() => {
    existing = new Set();
    jest.mocked(existsSync).mockImplementation((path) => existing.has(String(path)));

    logger = winston.createLogger({
      silent: true,
      transports: [new winston.transports.Console({ silent: true })],
    });
    jest.spyOn(logger, 'warn');

    loadFromFile = jest.spyOn(k8s.KubeConfig.prototype, 'loadFromFile');
    loadFromCluster = jest.spyOn(k8s.KubeConfig.prototype, 'loadFromCluster');
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('resolution order', () => {
    it('should prefer an explicit path that exists', () => {
      existing.add('/tmp/explicit.yaml').add(ENV_PATH);
      const resolver = new ConfigResolver(settings({ kubeconfigEnv: ENV_PATH }), logger);

      const client = resolver.resolve('/tmp/explicit.yaml');

      expect(client.source).toEqual({ kind: 'explicit-path', path: '/tmp/explicit.yaml' });
      expect(client.configInfo).toBe('Loaded kubeconfig from: /tmp/explicit.yaml');
      expect(loadFromFile).toHaveBeenCalledTimes(1);
      expect(loadFromFile).toHaveBeenCalledWith('/tmp/explicit.yaml');
    });

    it('should use the command-line path from settings when none is passed', () => {
      existing.add('/tmp/cli.yaml');
      const resolver = new ConfigResolver(settings({ kubeconfigPath: '/tmp/cli.yaml' }));

      expect(resolver.resolve().source).toEqual({ kind: 'explicit-path', path: '/tmp/cli.yaml' });
    });

    it('should move on to KUBECONFIG when the explicit file is missing', () => {
      existing.add(ENV_PATH);
      const resolver = new ConfigResolver(settings({ kubeconfigEnv: ENV_PATH }), logger);

      const client = resolver.resolve('/tmp/missing.yaml');

      expect(client.configInfo).toBe(`Loaded kubeconfig from KUBECONFIG env var: ${ENV_PATH}`);
      expect(loadFromFile).toHaveBeenCalledWith(ENV_PATH);
    });

    it('should use in-cluster credentials when no kubeconfig is configured', () => {
      existing.add(TOKEN_PATH).add(DEFAULT_PATH);
      const resolver = new ConfigResolver(
        settings({ inCluster: { serviceHost: '10.0.0.1', servicePort: '443', tokenPath: TOKEN_PATH } }),
        logger,
      );

      const client = resolver.resolve();

      expect(client.source).toEqual({ kind: 'in-cluster' });
      expect(client.configInfo).toBe('Loaded in-cluster config (running inside Kubernetes)');
      expect(loadFromCluster).toHaveBeenCalledTimes(1);
      expect(loadFromFile).not.toHaveBeenCalled();
    });

    it('should pick the primary source without loading it', () => {
      existing.add(ENV_PATH);
      const resolver = new ConfigResolver(settings({ kubeconfigEnv: ENV_PATH }));

      expect(resolver.selectPrimarySource()).toEqual({ kind: 'env-variable', path: ENV_PATH });
      expect(loadFromFile).not.toHaveBeenCalled();
    });
  });

  describe('fallback to the default file', () => {
    it('should fall back when in-cluster service variables are missing', () => {
      existing.add(DEFAULT_PATH);
      const resolver = new ConfigResolver(settings(), logger);

      const client = resolver.resolve();

      expect(client.source).toEqual({ kind: 'default-file', path: DEFAULT_PATH });
      expect(client.configInfo).toBe(`Loaded kubeconfig from default location (${DEFAULT_PATH})`);
      expect(logger.warn).toHaveBeenCalledWith(
        'Failed to load in-cluster Kubernetes config: Service host/port is not set. Falling back to default kubeconfig',
      );
    });

    it('should fall back when the service account token is missing', () => {
      existing.add(DEFAULT_PATH);
      const resolver = new ConfigResolver(
        settings({ inCluster: { serviceHost: '10.0.0.1', servicePort: '443', tokenPath: TOKEN_PATH } }),
        logger,
      );

      expect(resolver.resolve().source.kind).toBe('default-file');
      expect(logger.warn).toHaveBeenCalledWith(
        `Failed to load in-cluster Kubernetes config: Service token file not found at: ${TOKEN_PATH}. Falling back to default kubeconfig`,
      );
      expect(loadFromCluster).not.toHaveBeenCalled();
    });

    it('should fall back when the KUBECONFIG file cannot be parsed', () => {
      existing.add(ENV_PATH).add(DEFAULT_PATH);
      loadFromFile.mockImplementation((file: string) => {
        if (file === ENV_PATH) throw new Error('invalid kubeconfig');
      });
      const resolver = new ConfigResolver(settings({ kubeconfigEnv: ENV_PATH }), logger);

      const client = resolver.resolve();

      expect(client.source).toEqual({ kind: 'default-file', path: DEFAULT_PATH });
      expect(loadFromFile).toHaveBeenNthCalledWith(1, ENV_PATH);
      expect(loadFromFile).toHaveBeenNthCalledWith(2, DEFAULT_PATH);
    });

    it('should throw a ConfigError naming both failures', () => {
      const resolver = new ConfigResolver(settings(), logger);

      expect(() => resolver.resolve()).toThrow(ConfigError);
      expect(() => resolver.resolve()).toThrow(
        `Failed to load any Kubernetes config: Service host/port is not set, Kubeconfig file not found at: ${DEFAULT_PATH}`,
      );
    });
  });

  describe('context selection', () => {
    it('should switch to the configured context', () => {
      existing.add(ENV_PATH);
      jest
        .spyOn(k8s.KubeConfig.prototype, 'getContexts')
        .mockReturnValue([{ name: 'staging', cluster: 'staging-cluster', user: 'staging-user' }]);
      const setCurrentContext = jest.spyOn(k8s.KubeConfig.prototype, 'setCurrentContext');
      const resolver = new ConfigResolver(settings({ kubeconfigEnv: ENV_PATH, context: 'staging' }));

      resolver.resolve();

      expect(setCurrentContext).toHaveBeenCalledWith('staging');
    });

    it('should treat an unknown context as a load failure of every file source', () => {
      existing.add(ENV_PATH).add(DEFAULT_PATH);
      const resolver = new ConfigResolver(settings({ kubeconfigEnv: ENV_PATH, context: 'staging' }));

      expect(() => resolver.resolve()).toThrow(
        'Failed to load any Kubernetes config: Context not found: staging, Context not found: staging',
      );
    });
  });

  it('should build a fresh client on every call', () => {
    existing.add(ENV_PATH);
    const resolver = new ConfigResolver(settings({ kubeconfigEnv: ENV_PATH }));

    expect(resolver.resolve()).not.toBe(resolver.resolve());
  });
});
