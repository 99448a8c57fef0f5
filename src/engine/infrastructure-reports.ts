import type { ClusterSnapshot, DeploymentCheck, InfrastructureSubject, ServiceHealth } from '../schemas/index.js';

const FOOTER = ['---', '*Generated automatically - For AI insights ensure analysis service is available*', ''];

export const isHealthy = (service: ServiceHealth) => service.runningCount === service.desiredCount;

export function buildArchitectureReport(snapshot: ClusterSnapshot, observedAt: string): string {
  const lines = [
    '# Infrastructure Architecture Analysis',
    '',
    `**Cluster:** ${snapshot.clusterName}`,
    `**Status:** ${snapshot.status}`,
    `**Analyzed:** ${observedAt}`,
    '',
    '## 📊 Infrastructure Overview',
    '',
    '### Cluster Summary',
    `- **Cluster Name:** ${snapshot.clusterName}`,
    `- **Status:** ${snapshot.status}`,
    `- **Running Tasks:** ${snapshot.runningTasks}`,
    `- **Pending Tasks:** ${snapshot.pendingTasks}`,
    `- **Services:** ${snapshot.services.length}`,
    '',
    '### Services',
  ];

  for (const service of snapshot.services) {
    lines.push(`- ${isHealthy(service) ? '✅' : '⚠️'} **${service.name}** (${service.status}): ${service.runningCount}/${service.desiredCount} running`);
  }
  if (snapshot.services.length === 0) {
    lines.push('- No services found');
  }

  lines.push('', '### Load Balancers');
  for (const lb of snapshot.loadBalancers) {
    lines.push(
      `- ${lb.state === 'active' ? '✅' : '❌'} **${lb.name}**`,
      `  - Type: ${lb.type}`,
      `  - Scheme: ${lb.scheme}`,
      `  - DNS: ${lb.dnsName}`,
    );
  }
  if (snapshot.loadBalancers.length === 0) {
    lines.push('- No load balancers found');
  }

  lines.push('', '## 🔍 Analysis & Recommendations', '', '### Architecture Assessment');
  lines.push(
    snapshot.runningTasks > 0
      ? '✅ **Active Workload:** Cluster has running tasks and is processing work'
      : '⚠️ **No Running Tasks:** Cluster may be idle or experiencing issues',
  );
  lines.push(
    snapshot.services.length > 0
      ? `✅ **Service Configuration:** ${snapshot.services.length} services configured`
      : '⚠️ **No Services:** No services found in cluster',
  );
  lines.push(
    snapshot.loadBalancers.length > 0
      ? `✅ **Load Balancing:** ${snapshot.loadBalancers.length} load balancer(s) configured for traffic distribution`
      : '⚠️ **No Load Balancer:** Consider adding load balancer for high availability',
  );

  lines.push(
    '',
    '### Security Considerations',
    '- 🔒 Review security group rules for least privilege',
    '- 🔒 Ensure IAM roles follow principle of least privilege',
    '- 🔒 Monitor VPC flow logs for unusual traffic',
    '',
    '### Performance Optimization',
    '- 📈 Monitor CPU and memory utilization',
    '- 📈 Consider auto-scaling based on demand',
    '- 📈 Review task definitions for resource allocation',
    '',
    '### High Availability',
    '- 🌐 Load balancers provide fault tolerance',
    '- 🌐 Consider multi-AZ deployment for critical services',
    '- 🌐 Implement health checks for service monitoring',
    '',
    ...FOOTER,
  );
  return lines.join('\n');
}

export function buildHealthReport(clusterName: string, services: ServiceHealth[], observedAt: string): string {
  const lines = [
    '# Service Health Analysis',
    '',
    `**Cluster:** ${clusterName}`,
    `**Analyzed:** ${observedAt}`,
    '',
    '## 🏥 Service Health Status',
    '',
  ];

  for (const service of services) {
    const status = isHealthy(service) ? '✅ Healthy' : '❌ Unhealthy';
    lines.push(`- **${service.name}**: ${status} (${service.runningCount}/${service.desiredCount} running)`);
  }
  if (services.length === 0) {
    lines.push('- No services found');
  }

  lines.push(
    '',
    '## 🔧 Health Recommendations',
    '',
    '### Monitoring',
    '- Set up alerts for service metrics',
    '- Monitor task health and restart counts',
    '- Track performance trends',
    '',
    '### Troubleshooting',
    '- Check task logs for errors',
    '- Verify resource allocation',
    '- Review network configurations',
    '',
    '### Optimization',
    '- Implement proper scaling policies',
    '- Consider health check tuning',
    '- Use deployment strategies for zero downtime',
    '',
    ...FOOTER,
  );
  return lines.join('\n');
}

function nextSteps(check: DeploymentCheck): string[] {
  if (check.status === 'ready') {
    return [
      '✅ **Safe to Deploy**',
      '- All services are healthy',
      '- Infrastructure is ready for deployment',
      '- Proceed with deployment plan',
      '',
      '### Post-Deployment Actions',
      '- Monitor service health',
      '- Check application logs',
      '- Verify functionality',
      '- Set up monitoring alerts',
    ];
  }

  if (check.status === 'success') {
    return [
      '✅ **Deployment Successful**',
      '- All services are running correctly',
      '- Health checks passing',
      '- Monitor for stability',
      '',
      '### Post-Deployment Monitoring',
      '- Watch performance metrics',
      '- Monitor error rates',
      '- Check user experience',
      '- Document deployment',
    ];
  }

  return [
    '⚠️ **Deployment Issues Detected**',
    '- Some services may need attention',
    '- Review service logs',
    '- Consider rollback if necessary',
    '',
    '### Troubleshooting Steps',
    '- Check individual service health',
    '- Review deployment logs',
    '- Verify configuration',
    '- Consider rollback plan',
  ];
}

function deploymentDetails(check: DeploymentCheck): string[] {
  if (check.action === 'pre-check') {
    return check.unhealthyServices.length > 0
      ? ['**Unhealthy Services:**', ...check.unhealthyServices.map((s) => `- ${s.name}: ${s.runningCount}/${s.desiredCount} running`)]
      : ['**Unhealthy Services:** None'];
  }
  return [`**Healthy Services:** ${check.healthyServices}/${check.totalServices} (${check.healthPercentage.toFixed(1)}%)`];
}

export function buildDeploymentReport(check: DeploymentCheck, observedAt: string): string {
  return [
    '# Deployment Analysis',
    '',
    `**Cluster:** ${check.clusterName}`,
    `**Action:** ${check.action}`,
    `**Status:** ${check.status}`,
    `**Analyzed:** ${observedAt}`,
    '',
    '## 📊 Deployment Results',
    '',
    `**Recommendation:** ${check.recommendation}`,
    ...deploymentDetails(check),
    '',
    '## 🔧 Next Steps',
    '',
    ...nextSteps(check),
    '',
    ...FOOTER,
  ].join('\n');
}

export function buildInfrastructureReport(subject: InfrastructureSubject): string {
  switch (subject.kind) {
    case 'architecture':
      return buildArchitectureReport(subject.snapshot, subject.observedAt);
    case 'health':
      return buildHealthReport(subject.clusterName, subject.services, subject.observedAt);
    case 'deployment':
      return buildDeploymentReport(subject.check, subject.observedAt);
  }
}
