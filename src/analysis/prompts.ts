import type { DiagnosticRecord, InfrastructureSubject, ServiceHealth } from '../schemas/index.js';
import { buildSummary } from './summary.js';

export const URL_ANALYSIS_CONTEXT = 'url-analysis';

export const INFRASTRUCTURE_CONTEXTS = {
  architecture: 'architecture-analysis',
  health: 'health-analysis',
  deployment: 'deployment-analysis',
} as const satisfies Record<InfrastructureSubject['kind'], string>;

export function buildUrlPrompt(record: DiagnosticRecord, question?: string): string {
  const summary = buildSummary(record).join('\n');

  if (question) {
    return `Analyze this URL and answer the user's specific question:

URL: ${record.target}
User Question: ${question}

Test Results:
${summary}

Please provide a detailed answer to their question based on the connectivity data.
Focus on their specific concern and provide actionable recommendations.`;
  }

  return `Analyze this URL and diagnose the issues:

URL: ${record.target}

Test Results:
${summary}

Please provide:
1. Root cause analysis of the issues
2. Specific troubleshooting steps
3. Priority level (Critical/High/Medium/Low)
4. Estimated time to resolve
5. Prevention recommendations

Be concise and actionable.`;
}

const serviceLine = (s: ServiceHealth) => `- ${s.name}: ${s.runningCount}/${s.desiredCount} running`;

const healthLine = (s: ServiceHealth) =>
  `- ${s.name}: ${s.runningCount === s.desiredCount ? '✅ Healthy' : '❌ Unhealthy'} (${s.runningCount}/${s.desiredCount} running)`;

export function buildInfrastructurePrompt(subject: InfrastructureSubject): string {
  switch (subject.kind) {
    case 'architecture': {
      const { snapshot } = subject;
      return `Analyze this container cluster architecture and provide recommendations:

Cluster: ${snapshot.clusterName}
Services: ${snapshot.services.length}
Load Balancers: ${snapshot.loadBalancers.length}

Services Details:
${snapshot.services.map(serviceLine).join('\n')}

Please provide:
1. Architecture assessment
2. High availability analysis
3. Security considerations
4. Optimization recommendations
5. Improvement suggestions`;
    }

    case 'health':
      return `Analyze this container service health:

Cluster: ${subject.clusterName}

Service Health:
${subject.services.map(healthLine).join('\n')}

Please provide:
1. Health assessment
2. Performance issues
3. Scaling recommendations
4. Monitoring suggestions
5. Troubleshooting steps`;

    case 'deployment':
      return `Analyze this deployment status:

Status: ${subject.check.status}
Recommendation: ${subject.check.recommendation}

Please provide:
1. Deployment assessment
2. Risk analysis
3. Next steps
4. Rollback considerations if needed
5. Monitoring recommendations`;
  }
}
