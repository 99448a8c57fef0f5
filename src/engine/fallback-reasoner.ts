import type { DiagnosticRecord, InfrastructureSubject } from '../schemas/index.js';
import { answerQuestion } from './question-answers.js';
import { buildUrlReport } from './url-report.js';
import { buildInfrastructureReport } from './infrastructure-reports.js';

/**
 * Rule-based analysis used when the AI path is disabled or degraded.
 * Output depends only on its inputs.
 */
export class FallbackReasoner {
  analyze(record: DiagnosticRecord, question?: string): string {
    return question ? answerQuestion(record, question) : buildUrlReport(record);
  }

  report(record: DiagnosticRecord): string {
    return buildUrlReport(record);
  }

  answer(record: DiagnosticRecord, question: string): string {
    return answerQuestion(record, question);
  }

  infrastructure(subject: InfrastructureSubject): string {
    return buildInfrastructureReport(subject);
  }
}

const defaultReasoner = new FallbackReasoner();

export function fallback(record: DiagnosticRecord, question?: string): string {
  return defaultReasoner.analyze(record, question);
}
