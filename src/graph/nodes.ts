import type { DiagnosisState } from './state.js';
import type { TargetProber } from '../probe/index.js';
import type { AnalysisDispatcher } from '../dispatcher/index.js';

export interface WorkflowConfig {
  prober: TargetProber;
  dispatcher: AnalysisDispatcher;
}

/**
 * Probe Node - DNS, port, TLS and HTTP checks against the target
 */
export function createProbeNode(prober: TargetProber) {
  return async (state: DiagnosisState): Promise<Partial<DiagnosisState>> => {
    console.log(`[Probe] Starting connectivity checks for: ${state.targetUrl}`);

    const record = await prober.probe(state.targetUrl);
    if (record.inputError) {
      return { record, error: record.inputError };
    }
    return { record };
  };
}

/**
 * AI Analysis Node - sends the probe summary to the analysis service
 */
export function createAiAnalysisNode(dispatcher: AnalysisDispatcher) {
  return async (state: DiagnosisState): Promise<Partial<DiagnosisState>> => {
    if (!state.record) {
      return { error: 'No diagnostic record available' };
    }

    console.log(`[AI] Requesting analysis${state.question ? ` for question: ${state.question}` : ''}`);
    const aiAttempt = await dispatcher.requestAiAnalysis(state.record, state.question);

    if (!aiAttempt.ok) {
      console.log(`[AI] Soft failure: ${aiAttempt.reason}`);
      return { aiAttempt };
    }

    return {
      aiAttempt,
      report: {
        text: aiAttempt.response.text,
        source: 'ai',
        model: aiAttempt.response.model,
        processingTimeMs: aiAttempt.response.processingTimeMs,
      },
    };
  };
}

/**
 * Fallback Node - rule-based report or answer
 */
export function createFallbackNode(dispatcher: AnalysisDispatcher) {
  return async (state: DiagnosisState): Promise<Partial<DiagnosisState>> => {
    if (!state.record) {
      return { error: 'No diagnostic record available' };
    }

    const reason =
      state.aiAttempt && !state.aiAttempt.ok
        ? state.aiAttempt.reason
        : state.forceFallback
          ? 'AI analysis disabled'
          : undefined;

    console.log(`[Fallback] Generating rule-based analysis${reason ? ` (${reason})` : ''}`);
    return { report: dispatcher.fallbackAnalysis(state.record, state.question, reason) };
  };
}
