import { EMPTY_LOGS_MESSAGE, PodOperations, logText } from '../../src/kubernetes/resources/PodOperations';
import {
  CONFIG_INFO,
  createFakeClient,
  failingResolver,
  fakeResolver,
  httpError,
  pod,
  type FakeClient,
} from './fixtures';

describe('PodOperations.getLogs', () => {
  let client: FakeClient;
  let podOperations: PodOperations;

  beforeEach(() => {
    client = createFakeClient();
    podOperations = new PodOperations(fakeResolver(client));
  });

  describe('container selection', () => {
    it('should ask for a container when the pod has several', async () => {
      client.core.readNamespacedPod.mockResolvedValue({
        body: pod('multi', 'default', ['app', 'sidecar']),
      });

      const result = await podOperations.getLogs({ podName: 'multi' });

      expect(result).toEqual({
        status: 'error',
        error_message: 'Pod has multiple containers. Please specify one: [app, sidecar]',
        containers: ['app', 'sidecar'],
      });
      expect(client.core.readNamespacedPodLog).not.toHaveBeenCalled();
    });

    it('should read the named container of a multi-container pod', async () => {
      client.core.readNamespacedPod.mockResolvedValue({
        body: pod('multi', 'default', ['app', 'sidecar']),
      });
      client.core.readNamespacedPodLog.mockResolvedValue({ body: 'line1\nline2\n' });

      const result = await podOperations.getLogs({ podName: 'multi', container: 'app' });

      expect(client.core.readNamespacedPodLog).toHaveBeenCalledWith(
        'multi',
        'default',
        'app',
        undefined,
        undefined,
        undefined,
        undefined,
        false,
        undefined,
        undefined,
        false,
      );
      expect(result).toEqual({
        status: 'success',
        config_info: CONFIG_INFO,
        pod: 'multi',
        namespace: 'default',
        container: 'app',
        log_lines_count: 3,
        logs: 'line1\nline2\n',
      });
    });

    it('should pick the only container and pass optional arguments through', async () => {
      client.core.readNamespacedPod.mockResolvedValue({ body: pod('web', 'shop') });
      client.core.readNamespacedPodLog.mockResolvedValue({ body: '2024-01-01T00:00:00Z started' });

      const result = await podOperations.getLogs({
        podName: 'web',
        namespace: 'shop',
        previous: true,
        tailLines: 50,
        sinceSeconds: 300,
        timestamps: true,
      });

      expect(client.core.readNamespacedPod).toHaveBeenCalledWith('web', 'shop');
      expect(client.core.readNamespacedPodLog).toHaveBeenCalledWith(
        'web',
        'shop',
        'app',
        undefined,
        undefined,
        undefined,
        undefined,
        true,
        300,
        50,
        true,
      );
      expect(result).toEqual({
        status: 'success',
        config_info: CONFIG_INFO,
        pod: 'web',
        namespace: 'shop',
        container: 'app',
        log_lines_count: 1,
        logs: '2024-01-01T00:00:00Z started',
        tail_lines_requested: 50,
        since_seconds: 300,
        from_previous_container: true,
        timestamps_included: true,
      });
    });
  });

  describe('decoded output', () => {
    it('should turn a log the client decoded as JSON back into text', async () => {
      client.core.readNamespacedPod.mockResolvedValue({ body: pod('api', 'default') });
      client.core.readNamespacedPodLog.mockResolvedValue({ body: { level: 'info', msg: 'ready' } });

      const result = await podOperations.getLogs({ podName: 'api' });

      if (result.status !== 'success') throw new Error(result.error_message);
      expect(result.logs).toBe('{"level":"info","msg":"ready"}');
      expect(result.log_lines_count).toBe(1);
    });

    it.each([
      ['plain\ntext', 'plain\ntext'],
      [42, '42'],
      [null, 'null'],
      [undefined, ''],
    ])('should render %p as %p', (body, expected) => {
      expect(logText(body)).toBe(expected);
    });
  });

  describe('empty output', () => {
    it('should explain an empty log', async () => {
      client.core.readNamespacedPod.mockResolvedValue({ body: pod('quiet', 'default') });
      client.core.readNamespacedPodLog.mockResolvedValue({ body: '' });

      const result = await podOperations.getLogs({ podName: 'quiet' });

      if (result.status !== 'success') throw new Error(result.error_message);
      expect(result.logs).toBe('');
      expect(result.log_lines_count).toBe(0);
      expect(result.message).toBe(EMPTY_LOGS_MESSAGE);
    });

    it('should treat whitespace-only output as empty', async () => {
      client.core.readNamespacedPod.mockResolvedValue({ body: pod('quiet', 'default') });
      client.core.readNamespacedPodLog.mockResolvedValue({ body: '  \n' });

      const result = await podOperations.getLogs({ podName: 'quiet' });

      if (result.status !== 'success') throw new Error(result.error_message);
      expect(result.log_lines_count).toBe(2);
      expect(result.message).toBe(EMPTY_LOGS_MESSAGE);
    });
  });

  describe('pod read failures', () => {
    it('should report a missing pod with code 404', async () => {
      client.core.readNamespacedPod.mockRejectedValue(httpError(404, 'Not Found'));

      const result = await podOperations.getLogs({ podName: 'ghost' });

      expect(result).toEqual({
        status: 'error',
        error_message: "Pod 'ghost' not found in namespace 'default'",
        error_code: 404,
      });
    });

    it('should report other API failures generically', async () => {
      client.core.readNamespacedPod.mockRejectedValue(httpError(403, 'Forbidden'));

      const result = await podOperations.getLogs({ podName: 'web', namespace: 'shop' });

      expect(result).toEqual({
        status: 'error',
        error_message: 'Kubernetes API error: Forbidden',
        error_code: 403,
      });
    });

    it('should return the config failure before any call', async () => {
      const operations = new PodOperations(failingResolver());

      const result = await operations.getLogs({ podName: 'web' });

      expect(result.status).toBe('error');
      if (result.status !== 'error') return;
      expect(result.error_message).toMatch(/^Failed to load any Kubernetes config: /);
    });
  });

  describe('log read failures', () => {
    beforeEach(() => {
      client.core.readNamespacedPod.mockResolvedValue({ body: pod('web', 'default') });
    });

    it('should explain a missing previous container', async () => {
      client.core.readNamespacedPodLog.mockRejectedValue(
        httpError(400, 'Bad Request', {
          message: 'previous terminated container "app" in pod "web" not found',
        }),
      );

      const result = await podOperations.getLogs({ podName: 'web', previous: true });

      expect(result).toEqual({
        status: 'error',
        error_message: 'No previous terminated container found for this pod',
        error_code: 400,
      });
    });

    it('should list the available containers for an unknown one', async () => {
      client.core.readNamespacedPodLog.mockRejectedValue(
        httpError(400, 'Bad Request', { message: 'container db is not valid for pod web' }),
      );

      const result = await podOperations.getLogs({ podName: 'web', container: 'db' });

      expect(result).toEqual({
        status: 'error',
        error_message: "Container 'db' not found in pod. Available containers: [app]",
        error_code: 400,
      });
    });

    it('should map a 404 during the log read to pod not found', async () => {
      client.core.readNamespacedPodLog.mockRejectedValue(httpError(404, 'Not Found'));

      const result = await podOperations.getLogs({ podName: 'web' });

      expect(result).toEqual({
        status: 'error',
        error_message: "Pod 'web' not found in namespace 'default'",
        error_code: 404,
      });
    });

    it('should fall back to the server reason', async () => {
      client.core.readNamespacedPodLog.mockRejectedValue(httpError(500, 'Internal Server Error'));

      const result = await podOperations.getLogs({ podName: 'web' });

      expect(result).toEqual({
        status: 'error',
        error_message: 'Failed to get logs: Internal Server Error',
        error_code: 500,
      });
    });

    it('should report non-HTTP failures as a generic error', async () => {
      client.core.readNamespacedPodLog.mockRejectedValue(
        Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:6443'), { code: 'ECONNREFUSED' }),
      );

      const result = await podOperations.getLogs({ podName: 'web' });

      expect(result).toEqual({
        status: 'error',
        error_message: 'Error getting logs: connect ECONNREFUSED 127.0.0.1:6443',
      });
    });
  });
});
