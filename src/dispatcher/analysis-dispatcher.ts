import type { AnalysisReport, DiagnosticRecord, InfrastructureSubject } from '../schemas/index.js';
import type { AnalysisResponse, AnalysisService } from '../analysis/index.js';
import {
  buildInfrastructurePrompt,
  buildUrlPrompt,
  INFRASTRUCTURE_CONTEXTS,
  isSoftFailureText,
  URL_ANALYSIS_CONTEXT,
} from '../analysis/index.js';
import { FallbackReasoner } from '../engine/index.js';

export interface DispatcherOptions {
  timeoutMs: number;
  // shorter budget when the user asked a specific question
  questionTimeoutMs: number;
}

export type AiAttempt =
  | { ok: true; response: AnalysisResponse }
  | { ok: false; reason: string };

export class AnalysisDispatcher {
  constructor(
    private service: AnalysisService | null,
    private options: DispatcherOptions,
    private reasoner: FallbackReasoner = new FallbackReasoner(),
  ) {}

  get aiEnabled(): boolean {
    return this.service !== null;
  }

  async requestAiAnalysis(record: DiagnosticRecord, question?: string): Promise<AiAttempt> {
    const timeoutMs = question ? this.options.questionTimeoutMs : this.options.timeoutMs;
    return this.submit(buildUrlPrompt(record, question), URL_ANALYSIS_CONTEXT, timeoutMs);
  }

  fallbackAnalysis(record: DiagnosticRecord, question?: string, reason?: string): AnalysisReport {
    return {
      text: this.reasoner.analyze(record, question),
      source: 'fallback',
      fallbackReason: reason,
    };
  }

  /**
   * AI analysis with rule-based fallback. Never rejects.
   */
  async analyze(record: DiagnosticRecord, question?: string): Promise<AnalysisReport> {
    const attempt = await this.requestAiAnalysis(record, question);
    if (attempt.ok) {
      return toReport(attempt.response);
    }

    console.log(`[Dispatcher] Using fallback analysis (${attempt.reason})`);
    return this.fallbackAnalysis(record, question, attempt.reason);
  }

  async analyzeInfrastructure(subject: InfrastructureSubject): Promise<AnalysisReport> {
    const attempt = await this.submit(
      buildInfrastructurePrompt(subject),
      INFRASTRUCTURE_CONTEXTS[subject.kind],
      this.options.timeoutMs,
    );
    if (attempt.ok) {
      return toReport(attempt.response);
    }

    console.log(`[Dispatcher] Using fallback ${subject.kind} analysis (${attempt.reason})`);
    return {
      text: this.reasoner.infrastructure(subject),
      source: 'fallback',
      fallbackReason: attempt.reason,
    };
  }

  private async submit(prompt: string, context: string, timeoutMs: number): Promise<AiAttempt> {
    if (!this.service) {
      return { ok: false, reason: 'AI analysis disabled' };
    }

    console.log(`[Dispatcher] Requesting ${context} from ${this.service.name} (timeout: ${timeoutMs}ms)`);

    try {
      const response = await this.service.analyze({ prompt, context, timeoutMs });
      if (isSoftFailureText(response.text)) {
        return { ok: false, reason: `Degraded AI response: ${response.text.slice(0, 120)}` };
      }
      console.log(`[Dispatcher] AI analysis received${response.model ? ` from ${response.model}` : ''}`);
      return { ok: true, response };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      console.error(`[Dispatcher] AI analysis failed: ${reason}`);
      return { ok: false, reason };
    }
  }
}

function toReport(response: AnalysisResponse): AnalysisReport {
  return {
    text: response.text,
    source: 'ai',
    model: response.model,
    processingTimeMs: response.processingTimeMs,
  };
}
