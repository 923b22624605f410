import { createLogger, LoggingConfig, SummaryLogger } from '../common/logger';
import { isPlainObject, toNumber } from '../common/utils';
import { ClusterCount, ClusterSummary, HostsCount, ServicesCount, SystemSummary, Utilization } from '../summary/types';

/**
 * Status of one cluster as the coordination store reports it
 */
export interface ClusterStatusEntry {
  clusterId: string;
  sdsName: string;
  status?: string;
}

/**
 * Service state reported by a node agent
 */
export interface NodeServiceState {
  exists: boolean;
  running: boolean;
}

export interface SystemSummaryAggregatorConfig {
  /** Services counted into a cluster's services_count */
  supportedServices?: string[];
  logging?: LoggingConfig;
}

// Service names as node agents report them
const DEFAULT_SUPPORTED_SERVICES = ['tendrl-node-agent', 'etcd'];

function toCount(value: unknown): number {
  const count = Math.trunc(toNumber(value));
  return Number.isNaN(count) ? 0 : count;
}

/**
 * Rolls cluster summaries of one storage service type up into its system summary
 */
export class SystemSummaryAggregator {
  private readonly logger: SummaryLogger;
  private readonly supportedServices: ReadonlySet<string>;

  constructor(public readonly sdsType: string, config: SystemSummaryAggregatorConfig = {}) {
    this.logger = createLogger(config.logging);
    this.supportedServices = new Set(config.supportedServices ?? DEFAULT_SUPPORTED_SERVICES);
  }

  /**
   * Whether a cluster's storage service belongs to this aggregator
   */
  matches(sdsName: string): boolean {
    return sdsName.includes(this.sdsType);
  }

  computeUtilization(clusterSummaries: readonly ClusterSummary[]): Utilization {
    let total = 0;
    let used = 0;
    for (const summary of clusterSummaries) {
      if (this.matches(summary.sds_type)) {
        total += toCount(summary.utilization.total);
        used += toCount(summary.utilization.used);
      }
    }
    return {
      total,
      used,
      percent_used: total > 0 ? (used * 100) / total : 0
    };
  }

  computeHostCounts(clusterSummaries: readonly ClusterSummary[]): HostsCount {
    const counts: HostsCount = {
      total: 0,
      down: 0,
      crit_alert_count: 0,
      warn_alert_count: 0
    };
    for (const summary of clusterSummaries) {
      if (!this.matches(summary.sds_type)) {
        continue;
      }
      for (const [status, count] of Object.entries(summary.hosts_count)) {
        counts[status] = (counts[status] ?? 0) + toCount(count);
      }
    }
    return counts;
  }

  computeClusterCounts(clusters: readonly ClusterStatusEntry[]): ClusterCount {
    const counts: ClusterCount = { total: 0 };
    for (const cluster of clusters) {
      if (!this.matches(cluster.sdsName) || !cluster.status) {
        continue;
      }
      counts[cluster.status] = (counts[cluster.status] ?? 0) + 1;
      counts.total += 1;
    }
    return counts;
  }

  /**
   * Per-service status counts for one cluster, from the service state of each of its nodes
   */
  countClusterServices(nodeServices: Record<string, Record<string, NodeServiceState>>): ServicesCount {
    const counts: ServicesCount = {};
    for (const services of Object.values(nodeServices)) {
      for (const [serviceName, state] of Object.entries(services)) {
        if (!this.supportedServices.has(serviceName) || !state.exists) {
          continue;
        }
        const counter = counts[serviceName] ?? { running: 0, not_running: 0 };
        if (state.running) {
          counter.running += 1;
        } else {
          counter.not_running += 1;
        }
        counts[serviceName] = counter;
      }
    }
    return counts;
  }

  /**
   * Sum the services_count of every matching cluster summary
   */
  computeServicesCount(clusterSummaries: readonly ClusterSummary[]): ServicesCount {
    const totals: ServicesCount = {};
    for (const summary of clusterSummaries) {
      if (!this.matches(summary.sds_type)) {
        continue;
      }
      const servicesCount = this.readServicesCount(summary);
      for (const [serviceName, statusCounts] of Object.entries(servicesCount)) {
        const counter = totals[serviceName] ?? {};
        for (const [status, count] of Object.entries(statusCounts)) {
          counter[status] = (counter[status] ?? 0) + toCount(count);
        }
        totals[serviceName] = counter;
      }
    }
    return totals;
  }

  buildSystemSummary(clusterSummaries: readonly ClusterSummary[], clusters: readonly ClusterStatusEntry[]): SystemSummary {
    const summary: SystemSummary = {
      utilization: this.computeUtilization(clusterSummaries),
      hosts_count: this.computeHostCounts(clusterSummaries),
      sds_det: { services_count: this.computeServicesCount(clusterSummaries) },
      sds_type: this.sdsType,
      cluster_count: this.computeClusterCounts(clusters)
    };
    this.logger.aggregator(
      `System summary for ${this.sdsType}: ${summary.cluster_count.total} clusters, ${summary.utilization.percent_used}% used`
    );
    return summary;
  }

  /**
   * services_count may arrive JSON-encoded from older writers
   */
  private readServicesCount(summary: ClusterSummary): ServicesCount {
    const raw = summary.sds_det.services_count;
    if (raw === undefined) {
      return {};
    }
    if (typeof raw !== 'string') {
      return raw;
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Ignoring unreadable services_count of cluster ${summary.cluster_id}: ${errorMessage}`);
      return {};
    }

    const servicesCount: ServicesCount = {};
    if (isPlainObject(decoded)) {
      for (const [serviceName, statusCounts] of Object.entries(decoded)) {
        if (isPlainObject(statusCounts)) {
          servicesCount[serviceName] = Object.fromEntries(
            Object.entries(statusCounts).map(([status, count]) => [status, toCount(count)])
          );
        }
      }
    }
    return servicesCount;
  }
}
