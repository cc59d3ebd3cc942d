/**
 * Record shapes returned by the query layer. Field names are snake_case
 * because the records are serialized as-is for the tool caller.
 */

export type StringMap = Record<string, string>;

export interface QueryErrorResult {
  status: 'error';
  error_message: string;
  error_code?: number;
  /** Only set by log retrieval when a container has to be picked */
  containers?: string[];
}

export interface SuccessEnvelope {
  status: 'success';
  config_info: string;
}

export type QueryResult<T extends SuccessEnvelope> = T | QueryErrorResult;

export function isQuerySuccess<T extends SuccessEnvelope>(result: QueryResult<T>): result is T {
  return result.status === 'success';
}

// Pods

export interface ContainerStatusSummary {
  name: string;
  ready: boolean;
  restart_count: number;
}

export interface PodRecord {
  name: string | null;
  namespace: string | null;
  status: string | null;
  pod_ip: string | null;
  node: string | null;
  containers: number;
  labels: StringMap;
  container_statuses?: ContainerStatusSummary[];
}

export interface PodListResult extends SuccessEnvelope {
  pod_count: number;
  pods: PodRecord[];
}

// Nodes

export interface NodeResources {
  cpu: string;
  memory: string;
  pods: string;
}

export interface NodeRecord {
  name: string | null;
  status: 'Ready' | 'NotReady';
  roles: string[];
  version: string;
  os: string;
  architecture: string;
  capacity: NodeResources;
  allocatable: NodeResources;
  conditions: StringMap;
}

export interface NodeListResult extends SuccessEnvelope {
  node_count: number;
  nodes: NodeRecord[];
}

// Namespaces

export interface NamespaceRecord {
  name: string | null;
  status: string | null;
  created: string | null;
  labels: StringMap;
}

export interface NamespaceListResult extends SuccessEnvelope {
  namespace_count: number;
  namespaces: NamespaceRecord[];
}

// Services

export interface ServicePortRecord {
  name: string | null;
  protocol: string | null;
  port: number;
  target_port: string | null;
  node_port: number | null;
}

export interface ServiceRecord {
  name: string | null;
  namespace: string | null;
  type: string | null;
  cluster_ip: string | null;
  external_ip: string[];
  ports: ServicePortRecord[];
  load_balancer_ip?: string[];
}

export interface ServiceListResult extends SuccessEnvelope {
  service_count: number;
  services: ServiceRecord[];
}

// Deployments

export interface ConditionRecord {
  type: string;
  status: string;
  reason: string | null;
  message: string | null;
}

export interface DeploymentRecord {
  name: string | null;
  namespace: string | null;
  replicas: number | null;
  ready_replicas: number;
  available_replicas: number;
  updated_replicas: number;
  labels: StringMap;
  conditions: ConditionRecord[];
}

export interface DeploymentListResult extends SuccessEnvelope {
  deployment_count: number;
  deployments: DeploymentRecord[];
}

// Pod detail

export interface ContainerSpecRecord {
  name: string;
  image: string | null;
  ports: { container_port: number; protocol: string | null }[];
  env: { name: string; value: string }[];
  resources: { requests?: StringMap; limits?: StringMap };
}

export type ContainerStateRecord =
  | { running: { started_at: string | null } }
  | { terminated: { exit_code: number; reason: string | null; message: string | null } }
  | { waiting: { reason: string | null; message: string | null } };

export interface ContainerStatusRecord extends ContainerStatusSummary {
  image: string;
  image_id: string;
  container_id: string | null;
  state?: ContainerStateRecord;
}

export interface PodConditionRecord extends ConditionRecord {
  last_transition_time: string | null;
}

export interface PodDetail {
  name: string | null;
  namespace: string | null;
  uid: string | null;
  created: string | null;
  labels: StringMap;
  annotations: StringMap;
  status: {
    phase: string | null;
    message: string | null;
    reason: string | null;
    pod_ip: string | null;
    host_ip: string | null;
    start_time: string | null;
  };
  spec: {
    node_name: string | null;
    restart_policy: string | null;
    service_account: string | null;
    containers: ContainerSpecRecord[];
  };
  container_statuses?: ContainerStatusRecord[];
  conditions: PodConditionRecord[];
}

export interface PodDetailResult extends SuccessEnvelope {
  pod: PodDetail;
}

// Logs

export interface LogRequest {
  podName: string;
  namespace?: string;
  container?: string;
  previous?: boolean;
  tailLines?: number;
  sinceSeconds?: number;
  timestamps?: boolean;
}

export interface LogResult extends SuccessEnvelope {
  pod: string;
  namespace: string;
  container: string | null;
  log_lines_count: number;
  logs: string;
  tail_lines_requested?: number;
  since_seconds?: number;
  from_previous_container?: true;
  timestamps_included?: true;
  message?: string;
}
