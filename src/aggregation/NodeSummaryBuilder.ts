import { toNumber } from '../common/utils';
import { CapacityUsage, CpuUsage, NodeStatus, NodeSummary } from '../summary/types';

export const DEFAULT_HEARTBEAT_THRESHOLD_MS = 5000;

/**
 * Node status from the last time its agent checked in
 */
export function deriveNodeStatus(
  lastSeenAt: Date | string | undefined,
  now: Date = new Date(),
  thresholdMs: number = DEFAULT_HEARTBEAT_THRESHOLD_MS
): NodeStatus {
  if (lastSeenAt === undefined || lastSeenAt === '') {
    return NodeStatus.NOT_MONITORED;
  }
  const seen = lastSeenAt instanceof Date ? lastSeenAt.getTime() : Date.parse(lastSeenAt);
  if (Number.isNaN(seen)) {
    return NodeStatus.NOT_MONITORED;
  }
  return now.getTime() - seen < thresholdMs ? NodeStatus.UP : NodeStatus.DOWN;
}

/**
 * CPU usage as user + system percent; undefined when either stat is unavailable
 */
export function buildCpuUsage(percentUser: unknown, percentSystem: unknown, now: Date = new Date()): CpuUsage | undefined {
  const user = toNumber(percentUser);
  const system = toNumber(percentSystem);
  if (Number.isNaN(user) || Number.isNaN(system)) {
    return undefined;
  }
  return {
    percent_used: String(user + system),
    updated_at: now.toISOString()
  };
}

export function buildMemoryUsage(used: unknown, total: unknown, percentUsed: unknown, now: Date = new Date()): CapacityUsage | undefined {
  const values = [toNumber(used), toNumber(total), toNumber(percentUsed)];
  if (values.some(value => Number.isNaN(value))) {
    return undefined;
  }
  const [usedValue, totalValue, percentValue] = values;
  return {
    used: String(usedValue),
    total: String(totalValue),
    percent_used: String(percentValue),
    updated_at: now.toISOString()
  };
}

/**
 * Storage usage summed over every mount point. NaN stats are ignored;
 * undefined when nothing is reported.
 */
export function buildStorageUsage(usedStats: unknown[], freeStats: unknown[], now: Date = new Date()): CapacityUsage | undefined {
  const sum = (stats: unknown[]) =>
    stats.map(toNumber).filter(value => !Number.isNaN(value)).reduce((total, value) => total + value, 0);

  const used = sum(usedStats);
  const free = sum(freeStats);
  if (used + free === 0) {
    return undefined;
  }
  return {
    used: String(used),
    total: String(used + free),
    percent_used: String((used * 100) / (used + free)),
    updated_at: now.toISOString()
  };
}

/**
 * Keep the previous figure when a fresh one could not be computed
 */
export function mergeUsage<T extends CpuUsage | CapacityUsage>(next: T | undefined, previous: T): T {
  return next ?? previous;
}

/**
 * Placeholder summary with blank usage figures, used before anything was published for a node
 */
export function emptyNodeSummary(nodeId: string, alertCount: number = 0): NodeSummary {
  return {
    name: '',
    node_id: nodeId,
    status: '',
    role: '',
    cluster_name: '',
    cpu_usage: { percent_used: '', updated_at: '' },
    memory_usage: { percent_used: '', updated_at: '', used: '', total: '' },
    storage_usage: { percent_used: '', total: '', used: '', updated_at: '' },
    alert_count: alertCount
  };
}

export interface NodeSummaryInput {
  nodeId: string;
  name: string;
  role: string;
  clusterName: string;
  lastSeenAt?: Date | string;
  alertIds: readonly string[];
  cpuUsage?: CpuUsage;
  memoryUsage?: CapacityUsage;
  storageUsage?: CapacityUsage;
}

/**
 * Assemble a node summary, falling back to the previous summary's usage figures
 */
export function buildNodeSummary(
  input: NodeSummaryInput,
  previous: NodeSummary = emptyNodeSummary(input.nodeId),
  now: Date = new Date(),
  thresholdMs: number = DEFAULT_HEARTBEAT_THRESHOLD_MS
): NodeSummary {
  return {
    name: input.name,
    node_id: input.nodeId,
    status: deriveNodeStatus(input.lastSeenAt, now, thresholdMs),
    role: input.role,
    cluster_name: input.clusterName,
    cpu_usage: mergeUsage(input.cpuUsage, previous.cpu_usage),
    memory_usage: mergeUsage(input.memoryUsage, previous.memory_usage),
    storage_usage: mergeUsage(input.storageUsage, previous.storage_usage),
    alert_count: input.alertIds.length
  };
}
