import { describe, it, expect } from 'vitest';
import { buildInfrastructurePrompt, buildUrlPrompt } from '../prompts.js';
import { makeRecord } from '../../__fixtures__/records.js';
import { makeCluster } from '../../__fixtures__/clusters.js';

describe('buildUrlPrompt', () => {
  it('asks for the five-point diagnosis without a question', () => {
    const prompt = buildUrlPrompt(makeRecord());

    expect(prompt.startsWith('Analyze this URL and diagnose the issues:')).toBe(true);
    expect(prompt).toContain('URL: https://httpbin.org/status/200');
    expect(prompt).toContain('✅ Port 443 is open');
    expect(prompt).toContain('3. Priority level (Critical/High/Medium/Low)');
    expect(prompt).toContain('4. Estimated time to resolve');
  });

  it('focuses on the question when one is given', () => {
    const prompt = buildUrlPrompt(makeRecord(), 'Why is this slow?');

    expect(prompt).toContain('User Question: Why is this slow?');
    expect(prompt).not.toContain('Priority level');
  });

  it('sends only the summary, not raw certificate details', () => {
    const prompt = buildUrlPrompt(makeRecord());
    expect(prompt).not.toContain('CN=httpbin.org');
  });
});

describe('buildInfrastructurePrompt', () => {
  it('lists services for architecture analysis', () => {
    const prompt = buildInfrastructurePrompt({
      kind: 'architecture',
      observedAt: '2026-03-01T12:00:00.000Z',
      snapshot: makeCluster(),
    });

    expect(prompt).toContain('Cluster: staging');
    expect(prompt).toContain('Services: 2');
    expect(prompt).toContain('- worker: 1/2 running');
  });

  it('marks service health', () => {
    const prompt = buildInfrastructurePrompt({
      kind: 'health',
      observedAt: '2026-03-01T12:00:00.000Z',
      clusterName: 'staging',
      services: makeCluster().services,
    });

    expect(prompt).toContain('- web: ✅ Healthy (3/3 running)');
    expect(prompt).toContain('- worker: ❌ Unhealthy (1/2 running)');
  });
});
