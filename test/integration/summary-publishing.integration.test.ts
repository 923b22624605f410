import {
  buildCpuUsage,
  buildNodeSummary,
  ClusterSummary,
  InMemoryKeyValueStore,
  MonitoringConfiguration,
  SummaryRepository,
  SystemSummaryAggregator
} from '../../src';

describe('Summary publishing integration', () => {
  const now = new Date('2026-03-01T12:00:00.000Z');

  it('should publish node, cluster and system summaries readers can enumerate', async () => {
    const monitoringConfig = new MonitoringConfiguration('test');
    monitoringConfig.setConfig({ schema: { expected_version: '0.3' } });
    const registry = await monitoringConfig.createRegistry();
    const store = new InMemoryKeyValueStore();
    const repository = new SummaryRepository(registry, store, monitoringConfig.getRepositoryOptions());

    await repository.publishDefinitions();

    const nodeKeys: string[] = [];
    for (const nodeId of ['node-1', 'node-2']) {
      const previous = await repository.loadOrDefault('NodeSummary', nodeId, buildNodeSummary({
        nodeId,
        name: '',
        role: '',
        clusterName: '',
        alertIds: []
      }, undefined, now));
      const summary = buildNodeSummary(
        {
          nodeId,
          name: `${nodeId}.example.test`,
          role: 'storage',
          clusterName: 'cluster-a',
          lastSeenAt: new Date(now.getTime() - 1000),
          alertIds: ['alert-1'],
          cpuUsage: buildCpuUsage(20, 5, now)
        },
        previous,
        now,
        monitoringConfig.getHeartbeatThresholdMs()
      );
      nodeKeys.push(await repository.save({ objectName: 'NodeSummary', attributes: summary }));
    }

    const cluster: ClusterSummary = {
      utilization: { total: 2000, used: 500, percent_used: 25 },
      hosts_count: { total: 2, down: 0 },
      node_summaries: nodeKeys,
      sds_det: {},
      sds_type: 'ceph',
      cluster_id: 'cluster-a'
    };
    await repository.save({ objectName: 'ClusterSummary', attributes: cluster });

    const aggregator = new SystemSummaryAggregator('ceph');
    const clusterSummaries = await repository.list('ClusterSummary');
    const system = aggregator.buildSystemSummary(clusterSummaries, [
      { clusterId: 'cluster-a', sdsName: 'ceph', status: 'HEALTH_OK' }
    ]);
    await repository.save({ objectName: 'SystemSummary', attributes: system });

    const nodes = await repository.resolveNodeSummaries(cluster);
    expect(nodes.map(node => [node.node_id, node.status, node.cpu_usage.percent_used])).toEqual([
      ['node-1', 'UP', '25'],
      ['node-2', 'UP', '25']
    ]);

    expect(Object.keys(store.snapshot()).sort()).toEqual([
      '_NS/performance_monitoring/definitions/data',
      '_NS/performance_monitoring/definitions/version',
      'monitoring/summary/clusters/cluster-a',
      'monitoring/summary/nodes/node-1',
      'monitoring/summary/nodes/node-2',
      'monitoring/summary/system/ceph'
    ]);

    const systemSummary = await repository.load('SystemSummary', 'ceph');
    expect(systemSummary?.utilization).toEqual({ total: 2000, used: 500, percent_used: 25 });
    expect(systemSummary?.cluster_count).toEqual({ total: 1, HEALTH_OK: 1 });
    expect(systemSummary?.hosts_count).toEqual({ total: 2, down: 0, crit_alert_count: 0, warn_alert_count: 0 });
  });
});
