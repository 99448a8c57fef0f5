import type { ClusterSnapshot } from '../schemas/index.js';

export function makeCluster(overrides: Partial<ClusterSnapshot> = {}): ClusterSnapshot {
  return {
    clusterName: 'staging',
    status: 'ACTIVE',
    runningTasks: 5,
    pendingTasks: 0,
    services: [
      { name: 'web', status: 'ACTIVE', runningCount: 3, desiredCount: 3 },
      { name: 'worker', status: 'ACTIVE', runningCount: 1, desiredCount: 2 },
    ],
    loadBalancers: [
      { name: 'staging-alb', type: 'application', state: 'active', scheme: 'internet-facing', dnsName: 'staging-alb.example.internal' },
    ],
    ...overrides,
  };
}
