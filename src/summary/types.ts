/**
 * Summary records stored under the monitoring/summary namespace.
 *
 * Records are type aliases so they stay assignable to plain attribute maps
 * when they cross the store boundary.
 */

import { ObjectName } from '../schema/types';

export enum NodeStatus {
  UP = 'UP',
  DOWN = 'DOWN',
  NOT_MONITORED = 'NOT_MONITORED'
}

/**
 * Usage figures are published as strings; empty strings mean "not yet known"
 */
export type CpuUsage = {
  percent_used: string;
  updated_at: string;
};

export type CapacityUsage = {
  used: string;
  total: string;
  percent_used: string;
  updated_at: string;
};

export type Utilization = {
  total: number;
  used: number;
  percent_used: number;
  [extra: string]: unknown;
};

export type HostsCount = {
  total?: number;
  down?: number;
  crit_alert_count?: number;
  warn_alert_count?: number;
  [status: string]: number | undefined;
};

export type ClusterCount = {
  total: number;
  [status: string]: number;
};

/** Service name -> status ("running", "not_running", ...) -> count */
export type ServicesCount = Record<string, Record<string, number>>;

export type SdsDetail = {
  services_count?: ServicesCount | string;
  [detail: string]: unknown;
};

export type NodeSummary = {
  name: string;
  node_id: string;
  status: string;
  role: string;
  cluster_name: string;
  cpu_usage: CpuUsage;
  memory_usage: CapacityUsage;
  storage_usage: CapacityUsage;
  alert_count: number;
};

export type ClusterSummary = {
  utilization: Utilization;
  hosts_count: HostsCount;
  /** NodeSummary singular keys, e.g. monitoring/summary/nodes/node-42 */
  node_summaries: string[];
  sds_det: SdsDetail;
  sds_type: string;
  cluster_id: string;
};

export type SystemSummary = {
  utilization: Utilization;
  hosts_count: HostsCount;
  sds_det: SdsDetail;
  sds_type: string;
  cluster_count: ClusterCount;
};

export interface SummaryAttributes {
  NodeSummary: NodeSummary;
  ClusterSummary: ClusterSummary;
  SystemSummary: SystemSummary;
}

/**
 * A summary tagged with the object it is an instance of
 */
export type TaggedSummary<N extends ObjectName> = {
  objectName: N;
  attributes: SummaryAttributes[N];
};

export type SummaryRecord = { [N in ObjectName]: TaggedSummary<N> }[ObjectName];

/**
 * An instance of a declared object that has no typed record
 */
export type DeclaredRecord = {
  objectName: string;
  attributes: Record<string, unknown>;
};
