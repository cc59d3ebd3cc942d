import type * as k8s from '@kubernetes/client-node';
import type { Logger } from 'winston';
import { BaseResourceOperations, type QueryOptions } from '../BaseResourceOperations.js';
import type { ClientResolver } from '../KubernetesClient.js';
import { RemoteError, convertApiError } from '../ErrorHandling.js';
import type {
  ContainerSpecRecord,
  ContainerStateRecord,
  ContainerStatusRecord,
  LogRequest,
  LogResult,
  PodDetail,
  PodDetailResult,
  PodListResult,
  PodRecord,
  QueryErrorResult,
  QueryResult,
} from '../types.js';
import {
  copyStringMap,
  formatNameList,
  formatTimestamp,
  isAllNamespaces,
  orNull,
} from '../utils/ResourceUtils.js';

export const EMPTY_LOGS_MESSAGE =
  'No logs found. The container might be starting up or not producing any output.';

export function formatPod(pod: k8s.V1Pod): PodRecord {
  const record: PodRecord = {
    name: orNull(pod.metadata?.name),
    namespace: orNull(pod.metadata?.namespace),
    status: orNull(pod.status?.phase),
    pod_ip: orNull(pod.status?.podIP),
    node: orNull(pod.spec?.nodeName),
    containers: pod.spec?.containers.length ?? 0,
    labels: copyStringMap(pod.metadata?.labels),
  };

  const statuses = pod.status?.containerStatuses;
  if (statuses && statuses.length > 0) {
    record.container_statuses = statuses.map((cs) => ({
      name: cs.name,
      ready: cs.ready,
      restart_count: cs.restartCount,
    }));
  }

  return record;
}

function formatContainerSpec(container: k8s.V1Container): ContainerSpecRecord {
  const resources: ContainerSpecRecord['resources'] = {};
  if (container.resources?.requests) {
    resources.requests = { ...container.resources.requests };
  }
  if (container.resources?.limits) {
    resources.limits = { ...container.resources.limits };
  }

  const env: { name: string; value: string }[] = [];
  // Variables sourced from secrets, config maps or fields carry no literal value
  for (const variable of container.env ?? []) {
    if (variable.value) {
      env.push({ name: variable.name, value: variable.value });
    }
  }

  return {
    name: container.name,
    image: orNull(container.image),
    ports: (container.ports ?? []).map((p) => ({
      container_port: p.containerPort,
      protocol: orNull(p.protocol),
    })),
    env,
    resources,
  };
}

/**
 * Current state of a container. Running wins over terminated, terminated over
 * waiting; undefined when the API reported no state.
 */
export function formatContainerState(
  state: k8s.V1ContainerState | undefined,
): ContainerStateRecord | undefined {
  if (state?.running) {
    return { running: { started_at: formatTimestamp(state.running.startedAt) } };
  }
  if (state?.terminated) {
    return {
      terminated: {
        exit_code: state.terminated.exitCode,
        reason: orNull(state.terminated.reason),
        message: orNull(state.terminated.message),
      },
    };
  }
  if (state?.waiting) {
    return {
      waiting: {
        reason: orNull(state.waiting.reason),
        message: orNull(state.waiting.message),
      },
    };
  }
  return undefined;
}

function formatContainerStatus(cs: k8s.V1ContainerStatus): ContainerStatusRecord {
  const record: ContainerStatusRecord = {
    name: cs.name,
    ready: cs.ready,
    restart_count: cs.restartCount,
    image: cs.image,
    image_id: cs.imageID,
    container_id: orNull(cs.containerID),
  };

  const state = formatContainerState(cs.state);
  if (state) {
    record.state = state;
  }
  return record;
}

export function formatPodDetail(pod: k8s.V1Pod): PodDetail {
  const detail: PodDetail = {
    name: orNull(pod.metadata?.name),
    namespace: orNull(pod.metadata?.namespace),
    uid: orNull(pod.metadata?.uid),
    created: formatTimestamp(pod.metadata?.creationTimestamp),
    labels: copyStringMap(pod.metadata?.labels),
    annotations: copyStringMap(pod.metadata?.annotations),
    status: {
      phase: orNull(pod.status?.phase),
      message: orNull(pod.status?.message),
      reason: orNull(pod.status?.reason),
      pod_ip: orNull(pod.status?.podIP),
      host_ip: orNull(pod.status?.hostIP),
      start_time: formatTimestamp(pod.status?.startTime),
    },
    spec: {
      node_name: orNull(pod.spec?.nodeName),
      restart_policy: orNull(pod.spec?.restartPolicy),
      service_account: orNull(pod.spec?.serviceAccountName),
      containers: (pod.spec?.containers ?? []).map(formatContainerSpec),
    },
    conditions: (pod.status?.conditions ?? []).map((condition) => ({
      type: condition.type,
      status: condition.status,
      reason: orNull(condition.reason),
      message: orNull(condition.message),
      last_transition_time: formatTimestamp(condition.lastTransitionTime),
    })),
  };

  const statuses = pod.status?.containerStatuses;
  if (statuses && statuses.length > 0) {
    detail.container_statuses = statuses.map(formatContainerStatus);
  }

  return detail;
}

/**
 * The client asks for JSON, so a log that parses as JSON (one structured line,
 * a bare number) arrives decoded. Turn it back into text.
 */
export function logText(body: unknown): string {
  if (typeof body === 'string') return body;
  if (body === undefined) return '';
  return JSON.stringify(body);
}

/**
 * Pod queries: listing, single-pod detail and container logs
 */
export class PodOperations extends BaseResourceOperations {
  constructor(resolver: ClientResolver, defaults?: QueryOptions, logger?: Logger) {
    super(resolver, 'Pod', defaults, logger);
  }

  /**
   * List pods in one namespace, or cluster-wide for "all"
   */
  async list(
    namespace: string = 'all',
    labelSelector?: string,
    options?: QueryOptions,
  ): Promise<QueryResult<PodListResult>> {
    return this.execute<PodListResult>('listing pods', options, async (client, envelope) => {
      const { body } = isAllNamespaces(namespace)
        ? await client.core.listPodForAllNamespaces(undefined, undefined, undefined, labelSelector)
        : await client.core.listNamespacedPod(
            namespace,
            undefined,
            undefined,
            undefined,
            undefined,
            labelSelector,
          );

      const pods = body.items.map(formatPod);
      return { ...envelope, pod_count: pods.length, pods };
    });
  }

  async describe(
    name: string,
    namespace: string = 'default',
    options?: QueryOptions,
  ): Promise<QueryResult<PodDetailResult>> {
    return this.execute<PodDetailResult>('getting pod details', options, async (client, envelope) => {
      const { body } = await client.core.readNamespacedPod(name, namespace);
      return { ...envelope, pod: formatPodDetail(body) };
    });
  }

  /**
   * Read container logs. The pod is read first to pick the container when
   * none was named.
   */
  async getLogs(request: LogRequest, options?: QueryOptions): Promise<QueryResult<LogResult>> {
    const { podName, previous = false, timestamps = false, tailLines, sinceSeconds } = request;
    const namespace = request.namespace ?? 'default';

    return this.execute<LogResult>('getting logs', options, async (client, envelope) => {
      let containerNames: string[];
      try {
        const { body: pod } = await client.core.readNamespacedPod(podName, namespace);
        containerNames = (pod.spec?.containers ?? []).map((c) => c.name);
      } catch (error) {
        return this.podReadFailure(error, podName, namespace);
      }

      let container = request.container;
      if (!container && containerNames.length > 1) {
        return {
          status: 'error',
          error_message: `Pod has multiple containers. Please specify one: ${formatNameList(containerNames)}`,
          containers: containerNames,
        };
      }
      if (!container && containerNames.length === 1) {
        container = containerNames[0];
      }

      let logs: string;
      try {
        const response = await client.core.readNamespacedPodLog(
          podName,
          namespace,
          container,
          undefined,
          undefined,
          undefined,
          undefined,
          previous,
          sinceSeconds,
          tailLines,
          timestamps,
        );
        logs = logText(response.body);
      } catch (error) {
        return this.logReadFailure(error, request, namespace, container, containerNames);
      }

      const result: LogResult = {
        ...envelope,
        pod: podName,
        namespace,
        container: container ?? null,
        log_lines_count: logs ? logs.split('\n').length : 0,
        logs,
      };

      if (tailLines) result.tail_lines_requested = tailLines;
      if (sinceSeconds) result.since_seconds = sinceSeconds;
      if (previous) result.from_previous_container = true;
      if (timestamps) result.timestamps_included = true;

      if (logs.trim() === '') {
        result.message = EMPTY_LOGS_MESSAGE;
      }

      this.logger?.debug(`Read ${result.log_lines_count} log lines from ${namespace}/${podName}`);
      return result;
    });
  }

  private podReadFailure(error: unknown, podName: string, namespace: string): QueryErrorResult {
    const typedError = convertApiError(error);
    if (typedError instanceof RemoteError && typedError.statusCode === 404) {
      this.logger?.warn(`Pod ${namespace}/${podName} not found`);
      return {
        status: 'error',
        error_message: `Pod '${podName}' not found in namespace '${namespace}'`,
        error_code: 404,
      };
    }
    return this.toErrorResult('getting logs', typedError);
  }

  private logReadFailure(
    error: unknown,
    request: LogRequest,
    namespace: string,
    container: string | undefined,
    containerNames: string[],
  ): QueryErrorResult {
    const typedError = convertApiError(error);
    if (!(typedError instanceof RemoteError)) {
      return this.toErrorResult('getting logs', typedError);
    }

    let errorMessage = `Failed to get logs: ${typedError.reason}`;
    const body = typedError.bodyText.toLowerCase();

    if (typedError.statusCode === 400) {
      if (body.includes('previous terminated container')) {
        errorMessage = 'No previous terminated container found for this pod';
      } else if (body.includes('container')) {
        errorMessage = `Container '${container ?? ''}' not found in pod. Available containers: ${formatNameList(containerNames)}`;
      }
    } else if (typedError.statusCode === 404) {
      errorMessage = `Pod '${request.podName}' not found in namespace '${namespace}'`;
    }

    this.logger?.error(`Log read failed for ${namespace}/${request.podName}: ${errorMessage}`);
    return { status: 'error', error_message: errorMessage, error_code: typedError.statusCode };
  }
}
