import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createWorkflow, runDiagnosis } from '../workflow.js';
import { AnalysisDispatcher } from '../../dispatcher/index.js';
import { FallbackReasoner } from '../../engine/index.js';
import { invalidTargetRecord } from '../../probe/index.js';
import type { AnalysisService } from '../../analysis/index.js';
import { makeRecord } from '../../__fixtures__/records.js';

const mockProbe = vi.fn();
const mockAnalyze = vi.fn();
const prober = { probe: mockProbe };
const service: AnalysisService = { name: 'fake', analyze: mockAnalyze };
const options = { timeoutMs: 30000, questionTimeoutMs: 15000 };
const reasoner = new FallbackReasoner();

describe('Workflow', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    mockProbe.mockResolvedValue(makeRecord());
  });

  describe('AI Path', () => {
    it('should return the AI report when the service answers', async () => {
      mockAnalyze.mockResolvedValue({ text: 'Everything responds normally.', model: 'llama3', processingTimeMs: 900 });
      const workflow = createWorkflow({ prober, dispatcher: new AnalysisDispatcher(service, options) });

      const result = await runDiagnosis(workflow, { url: 'https://httpbin.org/status/200' });

      expect(mockProbe).toHaveBeenCalledWith('https://httpbin.org/status/200');
      expect(result.report?.source).toBe('ai');
      expect(result.report?.text).toBe('Everything responds normally.');
      expect(result.error).toBeUndefined();
    });
  });

  describe('Fallback Path', () => {
    it('should fall back after an AI soft failure', async () => {
      mockAnalyze.mockResolvedValue({ text: 'AI API timeout - using fallback analysis', processingTimeMs: 15000 });
      const workflow = createWorkflow({ prober, dispatcher: new AnalysisDispatcher(service, options) });

      const result = await runDiagnosis(workflow, { url: 'https://httpbin.org/status/200' });

      expect(result.aiAttempt?.ok).toBe(false);
      expect(result.report?.source).toBe('fallback');
      expect(result.report?.text).toContain('🟢 **Priority: Low** - No critical issues');
      expect(result.report?.text).toContain('No critical issues detected.');
    });

    it('should skip the AI service when noAi is set', async () => {
      const workflow = createWorkflow({ prober, dispatcher: new AnalysisDispatcher(service, options) });

      const result = await runDiagnosis(workflow, {
        url: 'https://httpbin.org/status/200',
        question: 'why is this slow?',
        noAi: true,
      });

      expect(mockAnalyze).not.toHaveBeenCalled();
      expect(result.report).toEqual({
        text: reasoner.answer(makeRecord(), 'why is this slow?'),
        source: 'fallback',
        fallbackReason: 'AI analysis disabled',
      });
    });

    it('should skip the AI service when the dispatcher has none', async () => {
      const workflow = createWorkflow({ prober, dispatcher: new AnalysisDispatcher(null, options) });

      const result = await runDiagnosis(workflow, { url: 'https://httpbin.org/status/200' });

      expect(result.report?.source).toBe('fallback');
    });
  });

  describe('Invalid Input', () => {
    it('should stop after probing and report the input error', async () => {
      mockProbe.mockResolvedValue(
        invalidTargetRecord('http://', 'Invalid URL "http://": Invalid URL', '2026-03-01T12:00:00.000Z'),
      );
      const workflow = createWorkflow({ prober, dispatcher: new AnalysisDispatcher(service, options) });

      const result = await runDiagnosis(workflow, { url: 'http://' });

      expect(result.error).toBe('Invalid URL "http://": Invalid URL');
      expect(result.report).toBeUndefined();
      expect(mockAnalyze).not.toHaveBeenCalled();
    });
  });
});
